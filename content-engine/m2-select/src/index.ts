// M2-Select module exports

export { ParagraphSelector, selectParagraphs } from './paragraph-selector.js';
export { DEFAULT_SCORING_WEIGHTS } from './types.js';
export type {
  ParagraphScore,
  ScoringWeights,
  SelectionMode,
  SelectionResult,
  SelectionSet
} from './types.js';
