/**
 * AI Horde: a crowd-sourced queue, so generation is asynchronous.
 *
 *   POST /generate/async        -> { id }
 *   GET  /generate/check/{id}   -> { done, faulted, is_possible }   (polled)
 *   GET  /generate/status/{id}  -> { generations: [{ img }] }       (img is a URL or base64)
 *
 * The poll loop has a hard ceiling (`pollTimeoutMs`); exceeding it raises
 * `ProviderTimeoutError`, which the gateway retries like any transient failure.
 */

import { z } from 'zod';
import {
  ProviderRequestError,
  ProviderTimeoutError,
  ProviderTransientError
} from '../../../utils/errors.js';
import { delay } from '../../../utils/retry-policies.js';
import type { FetchLike, GenerationRequest, ImageProvider, ProviderSettings } from '../types.js';
import { decodeBase64Image, downloadImage, isHttpUrl, joinUrl, readJson, requestWithTimeout } from './http.js';

export const HORDE_ANONYMOUS_KEY = '0000000000';
const CLIENT_AGENT = 'lesson-illustrator:1.0:unknown';
const DIMENSION_STEP = 64;

const SubmitResponseSchema = z.object({ id: z.string().min(1) });

const CheckResponseSchema = z.object({
  done: z.boolean(),
  faulted: z.boolean().optional(),
  is_possible: z.boolean().optional()
});

const StatusResponseSchema = z.object({
  generations: z.array(z.object({ img: z.string().min(1) })).min(1)
});

export interface HordeDependencies {
  fetchImpl: FetchLike;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
}

export class HordeProvider implements ImageProvider {
  readonly name = 'horde';
  readonly kind = 'async' as const;

  private deps: HordeDependencies;

  constructor(
    private settings: ProviderSettings,
    deps: Partial<HordeDependencies> = {}
  ) {
    this.deps = {
      fetchImpl: deps.fetchImpl ?? fetch,
      sleep: deps.sleep ?? delay,
      now: deps.now ?? Date.now
    };
  }

  async generate(request: GenerationRequest): Promise<Buffer> {
    const id = await this.submit(request);
    await this.waitUntilDone(id);

    const status = await this.getJson(`generate/status/${id}`, { method: 'GET' });
    const parsed = StatusResponseSchema.safeParse(status);
    if (!parsed.success) {
      throw new ProviderRequestError(this.name, `job ${id} finished without an image`);
    }

    const img = parsed.data.generations[0].img;
    return isHttpUrl(img)
      ? downloadImage(this.deps.fetchImpl, this.name, img, this.settings.requestTimeoutMs)
      : decodeBase64Image(img);
  }

  private async submit(request: GenerationRequest): Promise<string> {
    // Horde encodes the negative prompt after a `###` separator
    const prompt = request.negativePrompt ? `${request.prompt} ### ${request.negativePrompt}` : request.prompt;

    const params: Record<string, unknown> = {
      width: roundToStep(request.width),
      height: roundToStep(request.height),
      steps: this.settings.steps,
      cfg_scale: this.settings.guidance,
      n: 1
    };
    if (request.seed !== undefined) params.seed = String(request.seed);

    const body = await this.getJson('generate/async', {
      method: 'POST',
      body: JSON.stringify({ prompt, params, models: [this.settings.model], r2: true })
    });

    const parsed = SubmitResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderRequestError(this.name, 'submission was accepted without a job id');
    }
    return parsed.data.id;
  }

  private async waitUntilDone(id: string): Promise<void> {
    const started = this.deps.now();

    for (;;) {
      const elapsed = this.deps.now() - started;
      if (elapsed >= this.settings.pollTimeoutMs) {
        throw new ProviderTimeoutError(this.name, elapsed);
      }

      await this.deps.sleep(this.settings.pollIntervalMs);

      const parsed = CheckResponseSchema.safeParse(await this.getJson(`generate/check/${id}`, { method: 'GET' }));
      if (!parsed.success) {
        throw new ProviderTransientError(this.name, `unreadable status for job ${id}`);
      }
      if (parsed.data.faulted) {
        throw new ProviderTransientError(this.name, `job ${id} faulted`);
      }
      if (parsed.data.is_possible === false) {
        throw new ProviderRequestError(this.name, `no worker can serve model ${this.settings.model}`);
      }
      if (parsed.data.done) {
        return;
      }
    }
  }

  private async getJson(path: string, init: RequestInit): Promise<unknown> {
    const response = await requestWithTimeout(
      this.deps.fetchImpl,
      this.name,
      joinUrl(this.settings.endpoint, path),
      {
        ...init,
        headers: {
          apikey: this.settings.apiKey || HORDE_ANONYMOUS_KEY,
          'Client-Agent': CLIENT_AGENT,
          'Content-Type': 'application/json'
        }
      },
      this.settings.requestTimeoutMs
    );
    return readJson(this.name, response);
  }
}

function roundToStep(value: number): number {
  return Math.max(DIMENSION_STEP, Math.round(value / DIMENSION_STEP) * DIMENSION_STEP);
}
