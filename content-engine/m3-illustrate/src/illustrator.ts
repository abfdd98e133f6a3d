import type { CacheMetrics, ImageCache } from '../../utils/cache-manager.js';
import type { Logger } from '../../utils/logger.js';
import { silentLogger } from '../../utils/logger.js';
import type { GatewayMetrics, ImageGateway } from './image-gateway.js';
import { createPlaceholder } from './placeholder.js';
import { decodeImage } from './raster.js';
import type { PromptBuilder } from './prompt-builder.js';
import type { ImageSize, RenderedImage } from './types.js';

export interface IllustratorOptions {
  paragraphSize: ImageSize;
  coverSize: ImageSize;
  /** Produce placeholders without touching the cache or the provider. */
  skipImages: boolean;
  seed?: number;
}

export const DEFAULT_ILLUSTRATOR_OPTIONS: IllustratorOptions = {
  paragraphSize: { width: 960, height: 600 },
  coverSize: { width: 1280, height: 720 },
  skipImages: false
};

export type IllustratorMetrics = {
  gateway: GatewayMetrics;
  cache?: CacheMetrics;
};

/**
 * Front door for every image a document needs: builds the prompt, consults
 * the cache, and on a miss goes through the gateway.
 */
export class Illustrator {
  private options: IllustratorOptions;

  constructor(
    private gateway: ImageGateway,
    private prompts: PromptBuilder,
    private cache?: ImageCache,
    options: Partial<IllustratorOptions> = {},
    private logger: Logger = silentLogger
  ) {
    this.options = { ...DEFAULT_ILLUSTRATOR_OPTIONS, ...options };
  }

  illustrateParagraph(text: string, documentTitle: string = ''): Promise<RenderedImage> {
    return this.acquire(this.prompts.forParagraph(text, documentTitle), this.options.paragraphSize);
  }

  illustrateDirective(text: string): Promise<RenderedImage> {
    return this.acquire(this.prompts.forDirective(text), this.options.paragraphSize);
  }

  illustrateCover(title: string): Promise<RenderedImage> {
    return this.acquire(this.prompts.forCover(title), this.options.coverSize);
  }

  getMetrics(): IllustratorMetrics {
    return { gateway: this.gateway.getMetrics(), cache: this.cache?.getMetrics() };
  }

  private async acquire(prompt: string, size: ImageSize): Promise<RenderedImage> {
    if (this.options.skipImages) {
      return createPlaceholder(size);
    }

    const fetchImage = () =>
      this.gateway.fetchImage({
        prompt,
        ...size,
        seed: this.options.seed,
        negativePrompt: this.prompts.negativePrompt()
      });

    try {
      if (this.cache) {
        return await this.cache.get(prompt, fetchImage);
      }
      return await decodeImage(await fetchImage(), 'provider');
    } catch (error) {
      this.logger('debug', 'Illustration fetch failed', { prompt: prompt.slice(0, 80) });
      return this.gateway.recover(error, size);
    }
  }
}
