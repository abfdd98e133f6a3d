// Core types for M1-Parse module

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type Block =
  | { readonly kind: 'heading'; readonly level: HeadingLevel; readonly text: string }
  | { readonly kind: 'paragraph'; readonly text: string }
  | { readonly kind: 'image-directive'; readonly text: string };

export type HeadingBlock = Extract<Block, { kind: 'heading' }>;
export type ParagraphBlock = Extract<Block, { kind: 'paragraph' }>;
export type ImageDirectiveBlock = Extract<Block, { kind: 'image-directive' }>;

export interface Document {
  readonly title: string;
  readonly blocks: readonly Block[];
  readonly appendixBlocks: readonly Block[];
}

export interface ParseOptions {
  /** Used when the text has no level-1 heading */
  fallbackTitle?: string;
  /** Normalized text of the level-2 heading that opens the appendix */
  appendixMarker?: string;
}

export const DEFAULT_APPENDIX_MARKER = 'actividades';

export function isParagraph(block: Block): block is ParagraphBlock {
  return block.kind === 'paragraph';
}

export function isImageDirective(block: Block): block is ImageDirectiveBlock {
  return block.kind === 'image-directive';
}
