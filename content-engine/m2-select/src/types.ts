// Core types for M2-Select module

export type SelectionSet = ReadonlySet<number>;

export type SelectionMode = 'manual' | 'automatic';

export interface SelectionResult {
  mode: SelectionMode;
  indices: SelectionSet;
}

/**
 * Heuristic weights. The numbers are tuning defaults, not load-bearing constants.
 */
export interface ScoringWeights {
  lengthDivisor: number;
  lengthCap: number;
  afterSectionHeadingBonus: number;
  keywordBonus: number;
  shortTextThreshold: number;
  shortTextPenalty: number;
  listItemPenalty: number;
  codeFencePenalty: number;
  keywords: readonly string[];
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  lengthDivisor: 400,
  lengthCap: 1.5,
  afterSectionHeadingBonus: 0.6,
  keywordBonus: 0.7,
  shortTextThreshold: 80,
  shortTextPenalty: 0.6,
  listItemPenalty: 0.8,
  codeFencePenalty: 1.0,
  keywords: [
    'definición',
    'definition',
    'concepto clave',
    'key concept',
    'importante',
    'important',
    'conclusión',
    'conclusion',
    'ejemplo',
    'example',
    'problema',
    'problem'
  ]
};

export interface ParagraphScore {
  index: number;
  score: number;
}
