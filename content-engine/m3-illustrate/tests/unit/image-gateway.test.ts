import { ImageGateway } from '../../src/image-gateway.js';
import type { GatewayOptions } from '../../src/image-gateway.js';
import type { GenerationRequest, ImageProvider } from '../../src/types.js';
import {
  ProviderAuthError,
  ProviderRequestError,
  ProviderTransientError
} from '../../../utils/errors.js';
import { solidPng } from '../../../tests/fixtures/images.js';

class StubProvider implements ImageProvider {
  readonly name = 'stub';
  readonly kind = 'sync' as const;
  readonly requests: GenerationRequest[] = [];

  constructor(private outcomes: Array<Buffer | Error>) {}

  get calls(): number {
    return this.requests.length;
  }

  async generate(request: GenerationRequest): Promise<Buffer> {
    const outcome = this.outcomes[Math.min(this.requests.length, this.outcomes.length - 1)];
    this.requests.push(request);
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

const transient = () => new ProviderTransientError('stub', 'HTTP 503: loading', 503);
const size = { width: 96, height: 60 };

function createGateway(provider: ImageProvider, options: Partial<GatewayOptions> = {}) {
  const sleep = jest.fn(async (_ms: number) => {});
  const gateway = new ImageGateway(
    provider,
    { requestIntervalMs: 0, ...options },
    () => {},
    { sleep, random: () => 0, now: () => 0 }
  );
  return { gateway, sleep };
}

describe('ImageGateway', () => {
  describe('retries', () => {
    test('should succeed on the last attempt after transient failures', async () => {
      const provider = new StubProvider([transient(), transient(), transient(), transient(), await solidPng(96, 60)]);
      const { gateway, sleep } = createGateway(provider, { retry: { maxAttempts: 5 } });

      const image = await gateway.generate('a lighthouse', size);

      expect(provider.calls).toBe(5);
      expect(image.source).toBe('provider');
      expect(image.width).toBe(96);
      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000, 8000, 16000]);
    });

    test('should fall back to a placeholder once attempts are spent', async () => {
      const provider = new StubProvider([transient()]);
      const { gateway } = createGateway(provider, { retry: { maxAttempts: 3 } });

      const image = await gateway.generate('a lighthouse', size);

      expect(provider.calls).toBe(3);
      expect(image.source).toBe('placeholder');
      expect(image.width).toBe(96);
      expect(image.height).toBe(60);
      expect(gateway.getMetrics().placeholders_total).toBe(1);
    });

    test('should rethrow in strict mode', async () => {
      const provider = new StubProvider([transient()]);
      const { gateway } = createGateway(provider, { failureMode: 'strict', retry: { maxAttempts: 2 } });

      await expect(gateway.generate('a lighthouse', size)).rejects.toBeInstanceOf(ProviderTransientError);
      expect(provider.calls).toBe(2);
    });

    test('should not retry a rejected request', async () => {
      const provider = new StubProvider([new ProviderRequestError('stub', 'HTTP 404: no such model', 404)]);
      const { gateway } = createGateway(provider);

      const image = await gateway.generate('a lighthouse', size);

      expect(provider.calls).toBe(1);
      expect(image.source).toBe('placeholder');
    });

    test('should reject payloads that are not images without retrying', async () => {
      const provider = new StubProvider([Buffer.from('<html>busy</html>')]);
      const { gateway } = createGateway(provider, { failureMode: 'strict' });

      await expect(gateway.fetchImage({ prompt: 'x', ...size })).rejects.toBeInstanceOf(ProviderRequestError);
      expect(provider.calls).toBe(1);
    });
  });

  describe('auth failures', () => {
    test('should not retry and should open the circuit', async () => {
      const provider = new StubProvider([new ProviderAuthError('stub', 'HTTP 401: bad token', 401)]);
      const { gateway } = createGateway(provider);

      const first = await gateway.generate('first', size);
      const second = await gateway.generate('second', size);

      expect(provider.calls).toBe(1);
      expect(first.source).toBe('placeholder');
      expect(second.source).toBe('placeholder');
      expect(gateway.getMetrics()).toMatchObject({ auth_failures_total: 1, circuit_open: true });
    });

    test('should fall back even in strict mode unless failOnAuthError is set', async () => {
      const provider = new StubProvider([new ProviderAuthError('stub', 'billing required', 402)]);
      const { gateway } = createGateway(provider, { failureMode: 'strict' });

      expect((await gateway.generate('x', size)).source).toBe('placeholder');
    });

    test('should escalate when failOnAuthError is set', async () => {
      const provider = new StubProvider([new ProviderAuthError('stub', 'HTTP 403: forbidden', 403)]);
      const { gateway } = createGateway(provider, { failOnAuthError: true });

      await expect(gateway.generate('x', size)).rejects.toBeInstanceOf(ProviderAuthError);
    });
  });

  test('should pass the request through to the provider', async () => {
    const provider = new StubProvider([await solidPng(8, 8)]);
    const { gateway } = createGateway(provider);

    await gateway.generate('a fox', size, { seed: 7, negativePrompt: 'text' });

    expect(provider.requests).toEqual([{ prompt: 'a fox', width: 96, height: 60, seed: 7, negativePrompt: 'text' }]);
  });

  test('should throttle consecutive provider calls', async () => {
    const provider = new StubProvider([await solidPng(8, 8)]);
    const { gateway, sleep } = createGateway(provider, { requestIntervalMs: 3000 });

    await gateway.generate('one', size);
    await gateway.generate('two', size);

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([3000]);
  });
});
