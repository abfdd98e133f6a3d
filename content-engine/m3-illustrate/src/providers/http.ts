import {
  ProviderAuthError,
  ProviderRequestError,
  ProviderTransientError
} from '../../../utils/errors.js';
import { errorMessage } from '../../../utils/logger.js';
import type { FetchLike } from '../types.js';

const BILLING_RE = /billing|payment required|insufficient (?:credits|kudos|quota)/i;

/**
 * Map an unsuccessful HTTP status to the error kind the gateway acts on.
 */
export function classifyHttpFailure(provider: string, status: number, body: string): Error {
  const detail = `HTTP ${status}: ${body.slice(0, 200)}`;

  if (status === 401 || status === 402 || status === 403 || BILLING_RE.test(body)) {
    return new ProviderAuthError(provider, detail, status);
  }
  if (status === 408 || status === 429 || status >= 500) {
    return new ProviderTransientError(provider, detail, status);
  }
  return new ProviderRequestError(provider, detail, status);
}

/**
 * fetch with a hard timeout; network failures and timeouts become transient errors.
 */
export async function requestWithTimeout(
  fetchImpl: FetchLike,
  provider: string,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  try {
    return await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw new ProviderTransientError(provider, `network error: ${errorMessage(error)}`, undefined, error);
  }
}

export async function readImageResponse(provider: string, response: Response): Promise<Buffer> {
  if (!response.ok) {
    throw classifyHttpFailure(provider, response.status, await response.text());
  }
  return Buffer.from(await response.arrayBuffer());
}

export async function downloadImage(
  fetchImpl: FetchLike,
  provider: string,
  url: string,
  timeoutMs: number
): Promise<Buffer> {
  const response = await requestWithTimeout(fetchImpl, provider, url, { method: 'GET' }, timeoutMs);
  return readImageResponse(provider, response);
}

export async function readJson(provider: string, response: Response): Promise<unknown> {
  const text = await response.text();
  if (!response.ok) {
    throw classifyHttpFailure(provider, response.status, text);
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderRequestError(provider, `response is not JSON: ${text.slice(0, 200)}`, response.status);
  }
}

/**
 * Accepts bare base64 or a `data:image/...;base64,` URL.
 */
export function decodeBase64Image(payload: string): Buffer {
  const comma = payload.startsWith('data:') ? payload.indexOf(',') : -1;
  return Buffer.from(comma >= 0 ? payload.slice(comma + 1) : payload, 'base64');
}

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
