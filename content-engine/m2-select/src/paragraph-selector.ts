import type { Block } from '../../m1-parse/src/types.js';
import { isImageDirective, isParagraph } from '../../m1-parse/src/types.js';
import { isListItem } from '../../m1-parse/src/inline-cleaner.js';
import {
  DEFAULT_SCORING_WEIGHTS,
  ParagraphScore,
  ScoringWeights,
  SelectionResult,
  SelectionSet
} from './types.js';

const CODE_FENCE = '```';

/**
 * M2-Select: decides which blocks get an illustration.
 *
 * Author directives win outright: one `![prompt]` line anywhere switches the
 * whole document to manual mode and nothing is auto-scored.
 */
export class ParagraphSelector {
  private weights: ScoringWeights;

  constructor(weights: Partial<ScoringWeights> = {}) {
    this.weights = { ...DEFAULT_SCORING_WEIGHTS, ...weights };
  }

  select(blocks: readonly Block[], maxImages: number): SelectionResult {
    const limit = Math.max(0, Math.floor(maxImages));

    const directiveIndices = blocks
      .map((block, index) => (isImageDirective(block) ? index : -1))
      .filter(index => index >= 0);

    if (directiveIndices.length > 0) {
      return { mode: 'manual', indices: new Set(directiveIndices.slice(0, limit)) };
    }

    const ranked = this.score(blocks)
      // Array.prototype.sort is stable, so equal scores keep document order
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(entry => entry.index)
      .sort((a, b) => a - b);

    return { mode: 'automatic', indices: new Set(ranked) };
  }

  /**
   * Scores every paragraph block, in document order.
   */
  score(blocks: readonly Block[]): ParagraphScore[] {
    const scores: ParagraphScore[] = [];

    blocks.forEach((block, index) => {
      if (!isParagraph(block)) return;
      scores.push({ index, score: this.scoreParagraph(block.text, blocks[index - 1]) });
    });

    return scores;
  }

  private scoreParagraph(text: string, previous: Block | undefined): number {
    const w = this.weights;
    const length = text.length;
    const lower = text.toLowerCase();

    let score = Math.min(length / w.lengthDivisor, w.lengthCap);

    if (previous?.kind === 'heading' && (previous.level === 2 || previous.level === 3)) {
      score += w.afterSectionHeadingBonus;
    }
    if (w.keywords.some(keyword => lower.includes(keyword))) {
      score += w.keywordBonus;
    }
    if (length < w.shortTextThreshold) {
      score -= w.shortTextPenalty;
    }
    if (isListItem(text)) {
      score -= w.listItemPenalty;
    }
    if (text.includes(CODE_FENCE)) {
      score -= w.codeFencePenalty;
    }

    return score;
  }
}

export function selectParagraphs(
  blocks: readonly Block[],
  maxImages: number,
  weights: Partial<ScoringWeights> = {}
): SelectionSet {
  return new ParagraphSelector(weights).select(blocks, maxImages).indices;
}
