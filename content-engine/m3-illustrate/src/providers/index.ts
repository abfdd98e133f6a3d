import type { FetchLike, ImageProvider, ProviderSettings } from '../types.js';
import { HfInferenceProvider } from './hf-inference.js';
import { HordeProvider } from './horde.js';
import { OpenAiImagesProvider } from './openai-images.js';

export interface ProviderFactoryOptions {
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export function createImageProvider(settings: ProviderSettings, options: ProviderFactoryOptions = {}): ImageProvider {
  const fetchImpl = options.fetchImpl ?? fetch;

  switch (settings.name) {
    case 'hf-inference':
      return new HfInferenceProvider(settings, fetchImpl);
    case 'openai-images':
      return new OpenAiImagesProvider(settings, fetchImpl);
    case 'horde':
      return new HordeProvider(settings, { fetchImpl, sleep: options.sleep });
  }
}

export const PROVIDER_DEFAULTS: Record<ProviderSettings['name'], { endpoint: string; model: string }> = {
  'hf-inference': {
    endpoint: 'https://api-inference.huggingface.co',
    model: 'runwayml/stable-diffusion-v1-5'
  },
  'openai-images': {
    endpoint: 'https://api.imagerouter.io/v1/openai',
    model: 'black-forest-labs/FLUX-1-schnell:free'
  },
  horde: {
    endpoint: 'https://aihorde.net/api/v2',
    model: 'stable_diffusion'
  }
};

export { HfInferenceProvider } from './hf-inference.js';
export { HordeProvider, HORDE_ANONYMOUS_KEY } from './horde.js';
export type { HordeDependencies } from './horde.js';
export { OpenAiImagesProvider, classifyOpenAiError, createOpenAiEndpoint } from './openai-images.js';
export type { ImagesEndpoint } from './openai-images.js';
export { classifyHttpFailure, decodeBase64Image } from './http.js';
