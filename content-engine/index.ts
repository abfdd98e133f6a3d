/**
 * Lesson illustrator engine
 *
 * Wires the modules together from one `IllustratorConfig`:
 * M1-Parse → M2-Select → M3-Illustrate → M4-Layout, driven per document by
 * M5-Assembler and per batch by the FSM pipeline.
 */

import type { IllustratorConfig } from '../illustrator.config.js';
import { BatchPipeline } from './fsm/src/pipeline.js';
import { ParagraphSelector } from './m2-select/src/paragraph-selector.js';
import { Illustrator } from './m3-illustrate/src/illustrator.js';
import { ImageGateway } from './m3-illustrate/src/image-gateway.js';
import { PromptBuilder } from './m3-illustrate/src/prompt-builder.js';
import { createImageProvider } from './m3-illustrate/src/providers/index.js';
import type { FetchLike } from './m3-illustrate/src/types.js';
import type { FontSources, PdfImageHandle } from './m4-layout/src/pdf-surface.js';
import { PdfSurface } from './m4-layout/src/pdf-surface.js';
import { A4_GEOMETRY } from './m4-layout/src/types.js';
import { DocumentAssembler } from './m5-assembler/src/assembler.js';
import { DiskCacheStore, ImageCache } from './utils/cache-manager.js';
import type { Logger } from './utils/logger.js';
import { silentLogger } from './utils/logger.js';

export interface EngineDependencies {
  logger?: Logger;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  /** TrueType faces for the PDF; Helvetica when absent. */
  fonts?: FontSources;
}

export function createIllustrator(config: IllustratorConfig, deps: EngineDependencies = {}): Illustrator {
  const logger = deps.logger ?? silentLogger;
  const provider = createImageProvider(config.provider, { fetchImpl: deps.fetchImpl, sleep: deps.sleep });

  const gateway = new ImageGateway(
    provider,
    {
      failureMode: config.failureMode,
      failOnAuthError: config.failOnAuthError,
      requestIntervalMs: config.requestIntervalMs,
      retry: {
        maxAttempts: config.retryAttempts,
        initialDelayMs: config.retryBaseDelayMs,
        maxDelayMs: config.retryMaxDelayMs
      }
    },
    logger,
    deps.sleep ? { sleep: deps.sleep } : {}
  );

  const cache = config.cacheEnabled ? new ImageCache(new DiskCacheStore(config.cacheDir), logger) : undefined;

  return new Illustrator(
    gateway,
    new PromptBuilder({ strategy: config.promptStrategy }),
    cache,
    { skipImages: config.skipImages, seed: config.seed },
    logger
  );
}

export function createDocumentAssembler(
  config: IllustratorConfig,
  deps: EngineDependencies = {}
): DocumentAssembler<PdfImageHandle> {
  const logger = deps.logger ?? silentLogger;

  return new DocumentAssembler(
    createIllustrator(config, deps),
    title =>
      PdfSurface.create({
        pageWidth: A4_GEOMETRY.pageWidth,
        pageHeight: A4_GEOMETRY.pageHeight,
        title,
        fonts: deps.fonts
      }),
    {
      maxImages: config.maxImages,
      coverImage: config.coverImage,
      appendixMarker: config.appendixMarker
    },
    new ParagraphSelector(),
    logger
  );
}

/**
 * Batch over the configured input root; each worker gets its own assembler,
 * so gateways (throttle, auth circuit) are per worker while the disk cache is shared.
 */
export function createBatchPipeline(config: IllustratorConfig, deps: EngineDependencies = {}): BatchPipeline {
  return new BatchPipeline(
    () => createDocumentAssembler(config, deps),
    { inputRoot: config.inputRoot, outputRoot: config.outputRoot, concurrency: config.concurrency },
    deps.logger ?? silentLogger
  );
}

export * from './m1-parse/src/index.js';
export * from './m2-select/src/index.js';
export * from './m3-illustrate/src/index.js';
export * from './m4-layout/src/index.js';
export * from './m5-assembler/src/index.js';
export { BatchPipeline, DEFAULT_BATCH_OPTIONS } from './fsm/src/pipeline.js';
export type { BatchInputs, BatchOptions, BatchReport, DocumentOutcome, DocumentRenderer, PipelineState } from './fsm/src/pipeline.js';
export { DiskCacheStore, ImageCache, MemoryCacheStore, cacheKeyForPrompt } from './utils/cache-manager.js';
export type { CacheStore } from './utils/cache-manager.js';
export * from './utils/errors.js';
export { createConsoleLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { Ok, Err } from './utils/result.js';
