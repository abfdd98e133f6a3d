import type { TextMeasurer } from './types.js';

/**
 * Greedy word wrap. Words wider than the column are split by character so no
 * line ever exceeds `width`. Whitespace runs collapse; empty text yields no lines.
 */
export function wrapText(
  measurer: TextMeasurer,
  text: string,
  width: number,
  fontSize: number,
  bold: boolean = false
): string[] {
  const words = text.split(/\s+/).filter(word => word.length > 0);
  const fits = (candidate: string) => measurer.widthOf(candidate, fontSize, bold) <= width;

  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (fits(candidate)) {
      current = candidate;
      continue;
    }

    if (current) {
      lines.push(current);
      current = '';
    }

    if (fits(word)) {
      current = word;
      continue;
    }

    for (const piece of splitWord(word, fits)) {
      if (current) lines.push(current);
      current = piece;
    }
  }

  if (current) {
    lines.push(current);
  }
  return lines;
}

function splitWord(word: string, fits: (candidate: string) => boolean): string[] {
  const pieces: string[] = [];
  let piece = '';

  for (const char of word) {
    if (piece && !fits(piece + char)) {
      pieces.push(piece);
      piece = '';
    }
    piece += char;
  }
  if (piece) pieces.push(piece);
  return pieces;
}

export function lineCount(measurer: TextMeasurer, text: string, width: number, fontSize: number, bold: boolean = false): number {
  return wrapText(measurer, text, width, fontSize, bold).length;
}
