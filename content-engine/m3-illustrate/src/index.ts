// M3-Illustrate: prompts, providers, gateway and the illustrator service

export { Illustrator, DEFAULT_ILLUSTRATOR_OPTIONS } from './illustrator.js';
export type { IllustratorMetrics, IllustratorOptions } from './illustrator.js';
export { ImageGateway, DEFAULT_GATEWAY_OPTIONS } from './image-gateway.js';
export type { GatewayMetrics, GatewayOptions, GenerateOptions } from './image-gateway.js';
export {
  PromptBuilder,
  synthesizeScene,
  DEFAULT_LEXICON,
  DEFAULT_PROMPT_OPTIONS,
  DEFAULT_STYLE_PREFIX,
  DEFAULT_COVER_TEMPLATE
} from './prompt-builder.js';
export type { PromptBuilderOptions, PromptLexicon, PromptStrategy } from './prompt-builder.js';
export { createPlaceholder } from './placeholder.js';
export { decodeImage, toCanonicalPng, toJpeg } from './raster.js';
export * from './providers/index.js';
export type {
  FailureMode,
  FetchLike,
  GenerationRequest,
  ImageProvider,
  ImageSize,
  ImageSource,
  ProviderKind,
  ProviderName,
  ProviderSettings,
  RenderedImage
} from './types.js';
