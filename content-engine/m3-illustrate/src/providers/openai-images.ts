/**
 * OpenAI-compatible image generation (`POST /images/generations`).
 *
 * Works against any router that speaks the OpenAI images dialect. The SDK's
 * typed `images.generate` only admits the sizes OpenAI's own models support,
 * so the request goes through the client's raw `post` with arbitrary
 * `WxH` sizes and sampler fields.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import {
  ProviderAuthError,
  ProviderRequestError,
  ProviderTransientError
} from '../../../utils/errors.js';
import { errorMessage } from '../../../utils/logger.js';
import type { FetchLike, GenerationRequest, ImageProvider, ProviderSettings } from '../types.js';
import { classifyHttpFailure, decodeBase64Image, downloadImage } from './http.js';

const ImagesResponseSchema = z.object({
  data: z
    .array(
      z.object({
        b64_json: z.string().nullish(),
        url: z.string().nullish()
      })
    )
    .min(1)
});

export type ImagesResponse = z.infer<typeof ImagesResponseSchema>;

/**
 * The one SDK call the provider makes, separated so tests can stand in for it.
 */
export interface ImagesEndpoint {
  generate(body: Record<string, unknown>): Promise<unknown>;
}

export function createOpenAiEndpoint(settings: ProviderSettings): ImagesEndpoint {
  const client = new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.endpoint,
    timeout: settings.requestTimeoutMs,
    maxRetries: 0
  });

  return {
    generate: body => client.post<Record<string, unknown>, unknown>('/images/generations', { body })
  };
}

export class OpenAiImagesProvider implements ImageProvider {
  readonly name = 'openai-images';
  readonly kind = 'sync' as const;

  private endpoint?: ImagesEndpoint;

  constructor(
    private settings: ProviderSettings,
    private fetchImpl: FetchLike = fetch,
    endpoint?: ImagesEndpoint
  ) {
    this.endpoint = endpoint;
  }

  async generate(request: GenerationRequest): Promise<Buffer> {
    if (!this.settings.apiKey) {
      throw new ProviderAuthError(this.name, 'no API key configured');
    }
    this.endpoint ??= createOpenAiEndpoint(this.settings);

    const body: Record<string, unknown> = {
      model: this.settings.model,
      prompt: request.prompt,
      size: `${request.width}x${request.height}`,
      n: 1,
      response_format: 'b64_json',
      guidance_scale: this.settings.guidance,
      steps: this.settings.steps
    };
    if (request.seed !== undefined) body.seed = request.seed;
    if (request.negativePrompt) body.negative_prompt = request.negativePrompt;

    let raw: unknown;
    try {
      raw = await this.endpoint.generate(body);
    } catch (error) {
      throw classifyOpenAiError(this.name, error);
    }

    const parsed = ImagesResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderRequestError(this.name, `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const [first] = parsed.data.data;
    if (first?.b64_json) {
      return decodeBase64Image(first.b64_json);
    }
    if (first?.url) {
      return downloadImage(this.fetchImpl, this.name, first.url, this.settings.requestTimeoutMs);
    }
    throw new ProviderRequestError(this.name, 'response carried neither b64_json nor url');
  }
}

export function classifyOpenAiError(provider: string, error: unknown): Error {
  if (error instanceof OpenAI.APIConnectionError) {
    return new ProviderTransientError(provider, `connection failed: ${error.message}`, undefined, error);
  }
  if (error instanceof OpenAI.APIError) {
    if (error.status === undefined) {
      return new ProviderTransientError(provider, error.message, undefined, error);
    }
    return classifyHttpFailure(provider, error.status, error.message);
  }
  return new ProviderRequestError(provider, errorMessage(error));
}
