// M1-Parse module exports

export { MarkdownParser, parseMarkdown, normalizeHeadingText, fallbackTitleFromPath } from './markdown-parser.js';
export { cleanInlineMarkdown, isListItem, stripListMarker } from './inline-cleaner.js';
export {
  DEFAULT_APPENDIX_MARKER,
  isParagraph,
  isImageDirective
} from './types.js';
export type {
  Block,
  Document,
  HeadingBlock,
  HeadingLevel,
  ImageDirectiveBlock,
  ParagraphBlock,
  ParseOptions
} from './types.js';
