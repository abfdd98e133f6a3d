import { basename, extname } from 'path';
import {
  Block,
  Document,
  HeadingLevel,
  ParseOptions,
  DEFAULT_APPENDIX_MARKER
} from './types.js';

const HEADING_RE = /^\s*(#{1,6})\s+(.+?)\s*$/;
const IMAGE_DIRECTIVE_RE = /^\s*!\[prompt\]\s*(.+?)\s*$/i;
const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

/**
 * M1-Parse: line scanner turning lesson Markdown into ordered blocks.
 *
 * Total over its input: anything that is not a heading, a directive or a
 * blank line ends up in a paragraph.
 */
export class MarkdownParser {
  private appendixMarker: string;

  constructor(options: Pick<ParseOptions, 'appendixMarker'> = {}) {
    this.appendixMarker = normalizeHeadingText(options.appendixMarker ?? DEFAULT_APPENDIX_MARKER);
  }

  parse(text: string, fallbackTitle: string = ''): Document {
    const blocks: Block[] = [];
    const appendixBlocks: Block[] = [];
    let paragraphLines: string[] = [];
    let inAppendix = false;
    let title: string | undefined;

    const emit = (block: Block) => {
      (inAppendix ? appendixBlocks : blocks).push(Object.freeze(block));
    };

    const flushParagraph = () => {
      if (paragraphLines.length === 0) return;
      const joined = paragraphLines.join('\n').trim();
      paragraphLines = [];
      if (joined) {
        emit({ kind: 'paragraph', text: joined });
      }
    };

    for (const line of text.split(/\r?\n/)) {
      const heading = HEADING_RE.exec(line);
      if (heading) {
        flushParagraph();
        const level = HEADING_LEVELS[heading[1].length - 1];
        const headingText = heading[2].trim();

        if (level === 1 && title === undefined) {
          title = headingText;
        }

        if (!inAppendix && level === 2 && normalizeHeadingText(headingText) === this.appendixMarker) {
          // The marker heading only switches routing; the appendix page prints its own label
          inAppendix = true;
          continue;
        }

        emit({ kind: 'heading', level, text: headingText });
        continue;
      }

      const directive = IMAGE_DIRECTIVE_RE.exec(line);
      if (directive) {
        flushParagraph();
        emit({ kind: 'image-directive', text: directive[1] });
        continue;
      }

      if (line.trim() === '') {
        flushParagraph();
      } else {
        paragraphLines.push(line);
      }
    }

    flushParagraph();

    return Object.freeze({
      title: title ?? fallbackTitle,
      blocks: Object.freeze(blocks),
      appendixBlocks: Object.freeze(appendixBlocks)
    });
  }
}

export function parseMarkdown(text: string, options: ParseOptions = {}): Document {
  return new MarkdownParser(options).parse(text, options.fallbackTitle);
}

export function normalizeHeadingText(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Title used when a document has no level-1 heading: the file name without extension.
 */
export function fallbackTitleFromPath(filePath: string): string {
  return basename(filePath, extname(filePath));
}
