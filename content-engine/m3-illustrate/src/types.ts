// Core types for M3-Illustrate module

export type ImageSource = 'provider' | 'cache' | 'placeholder';

/**
 * Decoded raster in the canonical PNG encoding plus its pixel size.
 */
export interface RenderedImage {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  readonly source: ImageSource;
}

export interface ImageSize {
  width: number;
  height: number;
}

export interface GenerationRequest extends ImageSize {
  prompt: string;
  seed?: number;
  negativePrompt?: string;
}

export type ProviderKind = 'sync' | 'async';

export type ProviderName = 'hf-inference' | 'openai-images' | 'horde';

/**
 * A text-to-image backend. Implementations return raw encoded bytes in
 * whatever format the backend produced and throw the provider error kinds
 * from `utils/errors.ts`; retrying and re-encoding belong to the gateway.
 */
export interface ImageProvider {
  readonly name: string;
  readonly kind: ProviderKind;
  generate(request: GenerationRequest): Promise<Buffer>;
}

export interface ProviderSettings {
  name: ProviderName;
  endpoint: string;
  apiKey?: string;
  model: string;
  steps: number;
  guidance: number;
  requestTimeoutMs: number;
  pollIntervalMs: number;
  pollTimeoutMs: number;
}

/**
 * What the gateway does once retries are spent: hand back a placeholder or rethrow.
 */
export type FailureMode = 'placeholder' | 'strict';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
