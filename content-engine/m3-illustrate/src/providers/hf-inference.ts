import { ProviderAuthError, ProviderRequestError } from '../../../utils/errors.js';
import type { FetchLike, GenerationRequest, ImageProvider, ProviderSettings } from '../types.js';
import { classifyHttpFailure, joinUrl, requestWithTimeout } from './http.js';

/**
 * Hugging Face Inference API: one POST, image bytes in the response body.
 * A cold model answers 503 until loaded; `X-Wait-For-Model` asks the API to hold
 * the request instead.
 */
export class HfInferenceProvider implements ImageProvider {
  readonly name = 'hf-inference';
  readonly kind = 'sync' as const;

  constructor(
    private settings: ProviderSettings,
    private fetchImpl: FetchLike = fetch
  ) {}

  async generate(request: GenerationRequest): Promise<Buffer> {
    if (!this.settings.apiKey) {
      throw new ProviderAuthError(this.name, 'no access token configured');
    }

    const parameters: Record<string, unknown> = {
      width: request.width,
      height: request.height,
      num_inference_steps: this.settings.steps,
      guidance_scale: this.settings.guidance
    };
    if (request.seed !== undefined) parameters.seed = request.seed;
    if (request.negativePrompt) parameters.negative_prompt = request.negativePrompt;

    const response = await requestWithTimeout(
      this.fetchImpl,
      this.name,
      joinUrl(this.settings.endpoint, `models/${this.settings.model}`),
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.settings.apiKey}`,
          Accept: 'image/png',
          'Content-Type': 'application/json',
          'X-Wait-For-Model': 'true'
        },
        body: JSON.stringify({ inputs: request.prompt, parameters })
      },
      this.settings.requestTimeoutMs
    );

    const contentType = response.headers.get('content-type') ?? '';
    if (!response.ok) {
      throw classifyHttpFailure(this.name, response.status, await response.text());
    }
    if (!contentType.startsWith('image/')) {
      const body = await response.text();
      throw new ProviderRequestError(
        this.name,
        `expected an image, got ${contentType || 'no content type'}: ${body.slice(0, 200)}`,
        response.status
      );
    }

    return Buffer.from(await response.arrayBuffer());
  }
}
