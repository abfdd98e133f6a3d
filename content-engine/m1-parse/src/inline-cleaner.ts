/**
 * Inline Markdown cleanup applied before text reaches the page.
 * Only the emphasis and escapes lesson authors actually use are handled.
 */

const BOLD_STAR_RE = /\*\*(.+?)\*\*/g;
const BOLD_UNDERSCORE_RE = /__(.+?)__/g;
const ESCAPE_RE = /\\([()*_#[\]])/g;
// Egyptian hieroglyphs block; no bundled font covers it
const UNRENDERABLE_RE = /[\u{13000}-\u{1342F}]/gu;
const WHITESPACE_RE = /\s+/g;

export function cleanInlineMarkdown(text: string): string {
  return text
    .replace(BOLD_STAR_RE, '$1')
    .replace(BOLD_UNDERSCORE_RE, '$1')
    .replace(ESCAPE_RE, '$1')
    .replace(UNRENDERABLE_RE, '')
    .replace(WHITESPACE_RE, ' ')
    .trim();
}

const LIST_MARKER_RE = /^\s*(?:[-*+•]|\d+[.)])\s+/;

export function isListItem(text: string): boolean {
  return LIST_MARKER_RE.test(text);
}

export function stripListMarker(text: string): string {
  return text.replace(LIST_MARKER_RE, '');
}
