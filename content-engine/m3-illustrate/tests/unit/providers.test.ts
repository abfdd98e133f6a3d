import OpenAI from 'openai';
import { HfInferenceProvider } from '../../src/providers/hf-inference.js';
import { HordeProvider } from '../../src/providers/horde.js';
import { classifyHttpFailure, decodeBase64Image } from '../../src/providers/http.js';
import { OpenAiImagesProvider, classifyOpenAiError } from '../../src/providers/openai-images.js';
import type { ImagesEndpoint } from '../../src/providers/openai-images.js';
import type { FetchLike, ProviderSettings } from '../../src/types.js';
import {
  ProviderAuthError,
  ProviderRequestError,
  ProviderTimeoutError,
  ProviderTransientError
} from '../../../utils/errors.js';
import { imageResponse, jsonResponse, solidPng, textResponse } from '../../../tests/fixtures/images.js';

interface RecordedCall {
  url: string;
  init?: RequestInit;
}

function recordingFetch(respond: (url: string, init?: RequestInit) => Response) {
  const calls: RecordedCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return respond(url, init);
  };
  return { calls, fetchImpl };
}

function settings(overrides: Partial<ProviderSettings>): ProviderSettings {
  return {
    name: 'hf-inference',
    endpoint: 'https://images.test',
    apiKey: 'test-secret',
    model: 'test/model',
    steps: 20,
    guidance: 4,
    requestTimeoutMs: 1000,
    pollIntervalMs: 2000,
    pollTimeoutMs: 10000,
    ...overrides
  };
}

const request = { prompt: 'a paper boat', width: 960, height: 600 };

describe('classifyHttpFailure', () => {
  test.each([
    [401, '', ProviderAuthError],
    [402, '', ProviderAuthError],
    [403, '', ProviderAuthError],
    [400, 'Billing hard limit reached', ProviderAuthError],
    [408, '', ProviderTransientError],
    [429, '', ProviderTransientError],
    [500, '', ProviderTransientError],
    [503, '', ProviderTransientError],
    [400, 'bad size', ProviderRequestError],
    [404, '', ProviderRequestError]
  ])('should map HTTP %i %p', (status, body, kind) => {
    expect(classifyHttpFailure('p', status, body)).toBeInstanceOf(kind);
  });
});

describe('decodeBase64Image', () => {
  test('should accept bare base64 and data URLs', () => {
    expect(decodeBase64Image('aGVsbG8=').toString()).toBe('hello');
    expect(decodeBase64Image('data:image/png;base64,aGVsbG8=').toString()).toBe('hello');
  });
});

describe('HfInferenceProvider', () => {
  test('should post the prompt and return the image bytes', async () => {
    const png = await solidPng(4, 4);
    const { calls, fetchImpl } = recordingFetch(() => imageResponse(png));
    const provider = new HfInferenceProvider(settings({}), fetchImpl);

    const bytes = await provider.generate({ ...request, seed: 3 });

    expect(bytes.equals(png)).toBe(true);
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://images.test/models/test/model');
    const headers = new Headers(calls[0].init?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-secret');
    expect(headers.get('accept')).toBe('image/png');
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({
      inputs: 'a paper boat',
      parameters: { width: 960, height: 600, num_inference_steps: 20, guidance_scale: 4, seed: 3 }
    });
  });

  test('should refuse to run without a token', async () => {
    const { calls, fetchImpl } = recordingFetch(() => textResponse('', 500));
    const provider = new HfInferenceProvider(settings({ apiKey: undefined }), fetchImpl);

    await expect(provider.generate(request)).rejects.toBeInstanceOf(ProviderAuthError);
    expect(calls).toHaveLength(0);
  });

  test.each([
    [401, ProviderAuthError],
    [503, ProviderTransientError],
    [404, ProviderRequestError]
  ])('should classify HTTP %i', async (status, kind) => {
    const { fetchImpl } = recordingFetch(() => textResponse('{"error":"x"}', status));
    await expect(new HfInferenceProvider(settings({}), fetchImpl).generate(request)).rejects.toBeInstanceOf(kind);
  });

  test('should reject a successful response that is not an image', async () => {
    const { fetchImpl } = recordingFetch(() => jsonResponse({ error: 'queued' }));
    await expect(new HfInferenceProvider(settings({}), fetchImpl).generate(request)).rejects.toBeInstanceOf(ProviderRequestError);
  });

  test('should treat network failures as transient', async () => {
    const fetchImpl: FetchLike = async () => {
      throw new TypeError('fetch failed');
    };
    await expect(new HfInferenceProvider(settings({}), fetchImpl).generate(request)).rejects.toBeInstanceOf(ProviderTransientError);
  });
});

describe('OpenAiImagesProvider', () => {
  function endpoint(respond: () => Promise<unknown>) {
    const bodies: Record<string, unknown>[] = [];
    const images: ImagesEndpoint = {
      generate: async body => {
        bodies.push(body);
        return respond();
      }
    };
    return { bodies, images };
  }

  const openAiSettings = settings({ name: 'openai-images', model: 'test-model' });

  test('should send an OpenAI-style request and decode b64_json', async () => {
    const png = await solidPng(4, 4);
    const { bodies, images } = endpoint(async () => ({ data: [{ b64_json: png.toString('base64') }] }));
    const { fetchImpl } = recordingFetch(() => textResponse('', 500));

    const bytes = await new OpenAiImagesProvider(openAiSettings, fetchImpl, images).generate(request);

    expect(bytes.equals(png)).toBe(true);
    expect(bodies[0]).toMatchObject({ model: 'test-model', prompt: 'a paper boat', size: '960x600', n: 1 });
  });

  test('should download a url payload', async () => {
    const png = await solidPng(4, 4);
    const { images } = endpoint(async () => ({ data: [{ url: 'https://cdn.test/out.png' }] }));
    const { calls, fetchImpl } = recordingFetch(() => imageResponse(png));

    const bytes = await new OpenAiImagesProvider(openAiSettings, fetchImpl, images).generate(request);

    expect(bytes.equals(png)).toBe(true);
    expect(calls.map(call => call.url)).toEqual(['https://cdn.test/out.png']);
  });

  test('should reject a response without image data', async () => {
    const { images } = endpoint(async () => ({ data: [] }));
    await expect(new OpenAiImagesProvider(openAiSettings, fetch, images).generate(request)).rejects.toBeInstanceOf(ProviderRequestError);
  });

  test('should classify SDK errors', async () => {
    const { images } = endpoint(async () => {
      throw new OpenAI.APIConnectionError({ message: 'socket hang up' });
    });
    await expect(new OpenAiImagesProvider(openAiSettings, fetch, images).generate(request)).rejects.toBeInstanceOf(ProviderTransientError);

    expect(classifyOpenAiError('p', new OpenAI.AuthenticationError(401, undefined, 'bad key', {}))).toBeInstanceOf(ProviderAuthError);
    expect(classifyOpenAiError('p', new OpenAI.RateLimitError(429, undefined, 'slow down', {}))).toBeInstanceOf(ProviderTransientError);
    expect(classifyOpenAiError('p', new OpenAI.BadRequestError(400, undefined, 'bad size', {}))).toBeInstanceOf(ProviderRequestError);
  });
});

describe('HordeProvider', () => {
  const hordeSettings = settings({ name: 'horde', apiKey: undefined, model: 'stable_diffusion' });

  function virtualClock() {
    let now = 0;
    const sleep = jest.fn(async (ms: number) => {
      now += ms;
    });
    return { sleep, now: () => now };
  }

  test('should submit, poll until done and decode the result', async () => {
    const png = await solidPng(4, 4);
    let checks = 0;
    const { calls, fetchImpl } = recordingFetch(url => {
      if (url.endsWith('/generate/async')) return jsonResponse({ id: 'job-1' }, 202);
      if (url.includes('/generate/check/')) return jsonResponse({ done: ++checks >= 2, faulted: false, is_possible: true });
      return jsonResponse({ generations: [{ img: png.toString('base64') }] });
    });
    const clock = virtualClock();

    const bytes = await new HordeProvider(hordeSettings, { fetchImpl, ...clock }).generate({ ...request, negativePrompt: 'text' });

    expect(bytes.equals(png)).toBe(true);
    expect(calls.map(call => call.url)).toEqual([
      'https://images.test/generate/async',
      'https://images.test/generate/check/job-1',
      'https://images.test/generate/check/job-1',
      'https://images.test/generate/status/job-1'
    ]);
    expect(clock.sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 2000]);
    expect(new Headers(calls[0].init?.headers).get('apikey')).toBe('0000000000');
    expect(JSON.parse(String(calls[0].init?.body))).toMatchObject({
      prompt: 'a paper boat ### text',
      params: { width: 960, height: 576, steps: 20, cfg_scale: 4, n: 1 },
      models: ['stable_diffusion']
    });
  });

  test('should download a result given as a URL', async () => {
    const png = await solidPng(4, 4);
    const { fetchImpl } = recordingFetch(url => {
      if (url.endsWith('/generate/async')) return jsonResponse({ id: 'job-2' }, 202);
      if (url.includes('/generate/check/')) return jsonResponse({ done: true });
      if (url.includes('/generate/status/')) return jsonResponse({ generations: [{ img: 'https://r2.test/job-2.webp' }] });
      return imageResponse(png, 'image/webp');
    });

    const bytes = await new HordeProvider(hordeSettings, { fetchImpl, ...virtualClock() }).generate(request);
    expect(bytes.equals(png)).toBe(true);
  });

  test('should time out when the job never finishes', async () => {
    const { calls, fetchImpl } = recordingFetch(url =>
      url.endsWith('/generate/async') ? jsonResponse({ id: 'slow' }, 202) : jsonResponse({ done: false })
    );
    const provider = new HordeProvider({ ...hordeSettings, pollTimeoutMs: 5000 }, { fetchImpl, ...virtualClock() });

    const failure = provider.generate(request);

    await expect(failure).rejects.toBeInstanceOf(ProviderTimeoutError);
    await expect(failure).rejects.toMatchObject({ elapsedMs: 6000 });
    expect(calls.filter(call => call.url.includes('/generate/check/'))).toHaveLength(3);
  });

  test('should treat a faulted job as transient', async () => {
    const { fetchImpl } = recordingFetch(url =>
      url.endsWith('/generate/async') ? jsonResponse({ id: 'bad' }, 202) : jsonResponse({ done: false, faulted: true })
    );
    await expect(new HordeProvider(hordeSettings, { fetchImpl, ...virtualClock() }).generate(request)).rejects.toBeInstanceOf(ProviderTransientError);
  });

  test('should reject a job no worker can serve', async () => {
    const { fetchImpl } = recordingFetch(url =>
      url.endsWith('/generate/async') ? jsonResponse({ id: 'odd' }, 202) : jsonResponse({ done: false, is_possible: false })
    );
    await expect(new HordeProvider(hordeSettings, { fetchImpl, ...virtualClock() }).generate(request)).rejects.toBeInstanceOf(ProviderRequestError);
  });
});
