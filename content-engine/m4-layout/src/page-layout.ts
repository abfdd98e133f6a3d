/**
 * Page Layout Engine
 *
 * Owns a single cursor over a sequence of fixed-size pages and places flow
 * elements (title, headings, paragraphs, images, bullet lists) on a
 * `PageSurface`. Nothing here can fail: degenerate geometry is clamped.
 *
 * Invariant: after every placement `cursor.pageY <= bottomLimit`. Breaks are
 * taken before an element is placed, never in the middle of an
 * image-with-text block unless its text alone is taller than a page.
 */

import { lineCount, wrapText } from './text-measure.js';
import type {
  ImageHandle,
  LayoutCursor,
  PageGeometry,
  PageSurface,
  PlacementResult,
  Side,
  TextAlign,
  TextStyle,
  Typography
} from './types.js';
import { A4_GEOMETRY, DEFAULT_TYPOGRAPHY } from './types.js';

// Baseline sits this far down a line box, as a fraction of the line height
const BASELINE_RATIO = 0.72;
const FOOTER_OFFSET = 15;

export class PageLayout<TImage extends ImageHandle> {
  readonly geometry: PageGeometry;
  readonly typography: Typography;

  private pageIndex: number;
  private y: number;
  private side: Side = 'right';

  constructor(
    private surface: PageSurface<TImage>,
    geometry: Partial<PageGeometry> = {},
    typography: Partial<Typography> = {}
  ) {
    this.geometry = { ...A4_GEOMETRY, ...geometry };
    this.typography = { ...DEFAULT_TYPOGRAPHY, ...typography };
    this.pageIndex = surface.addPage();
    this.y = this.geometry.marginTop;
  }

  get cursor(): LayoutCursor {
    return { pageIndex: this.pageIndex, pageY: this.y };
  }

  get bottomLimit(): number {
    return this.geometry.pageHeight - this.geometry.bottomMargin;
  }

  get usableWidth(): number {
    return Math.max(0, this.geometry.pageWidth - this.geometry.marginLeft - this.geometry.marginRight);
  }

  get usableHeight(): number {
    return Math.max(0, this.bottomLimit - this.geometry.marginTop);
  }

  get atTopOfPage(): boolean {
    return this.y <= this.geometry.marginTop;
  }

  /**
   * Wrapped line count of `text` at `width` in the body font. Does not move the cursor.
   */
  measureText(width: number, text: string): number {
    return lineCount(this.surface, text, width, this.geometry.bodyFontSize);
  }

  /**
   * Side the next image-beside-text block takes when none is given.
   */
  get nextSide(): Side {
    return this.side;
  }

  addPage(): void {
    this.pageIndex = this.surface.addPage();
    this.y = this.geometry.marginTop;
  }

  writeTitle(text: string): void {
    const style: TextStyle = { fontSize: this.typography.titleSize, bold: true, color: this.typography.titleColor };
    this.flowText(text, this.geometry.marginLeft, this.usableWidth, style, this.typography.titleLineHeight, 'center');
    this.advance(3);
  }

  writeHeading(level: number, text: string): void {
    const index = Math.min(Math.max(Math.trunc(level), 1), 6) - 1;
    const style: TextStyle = {
      fontSize: this.typography.headingSizes[index],
      bold: true,
      color: this.typography.headingColors[index]
    };
    const lineHeight = this.typography.headingLineHeights[index];

    // keep the heading with at least one body line
    if (!this.atTopOfPage && this.y + lineHeight + this.geometry.lineHeight > this.bottomLimit) {
      this.addPage();
    }
    this.flowText(text, this.geometry.marginLeft, this.usableWidth, style, lineHeight, 'left');
    this.advance(this.typography.headingSpaceAfter[index]);
  }

  writeParagraph(text: string): void {
    this.flowText(text, this.geometry.marginLeft, this.usableWidth, this.bodyStyle(), this.geometry.lineHeight, 'justify');
    this.advance(this.typography.paragraphSpaceAfter);
  }

  writeCenteredLabel(text: string): void {
    const style: TextStyle = {
      fontSize: this.typography.sectionLabelSize,
      bold: true,
      color: this.typography.sectionLabelColor
    };
    this.flowText(text, this.geometry.marginLeft, this.usableWidth, style, this.typography.titleLineHeight, 'center');
    this.advance(5);
  }

  writeBulletList(items: readonly string[]): void {
    for (const item of items) {
      this.writeParagraph(`${this.typography.bullet} ${item}`);
    }
  }

  /**
   * Image at the usable width (bounded by `maxImageWidthFraction`), centred,
   * with its own page-break check. Only its height advances the cursor.
   */
  placeFullWidthImage(image: TImage, gapAfter: number = this.geometry.blockGap): void {
    const size = this.fitImage(image, this.maxImageWidth());
    if (!size) return;

    if (!this.atTopOfPage && this.y + size.height > this.bottomLimit) {
      this.addPage();
    }

    const x = this.geometry.marginLeft + (this.usableWidth - size.width) / 2;
    this.surface.drawImage(this.pageIndex, image, x, this.y, size.width, size.height);
    this.y += size.height;
    this.advance(gapAfter);
  }

  /**
   * Image in a side column with `text` justified in the remaining column.
   * Falls back to full-width text without the image when the column would be
   * narrower than `minTextColumn`. Only a placed image flips the next side.
   */
  placeImageWithText(text: string, image: TImage, side: Side = this.side): PlacementResult {
    const size = this.fitImage(image, Math.min(this.geometry.imageWidth, this.maxImageWidth()));
    const columnWidth = size ? this.usableWidth - size.width - this.geometry.gutter : 0;

    if (!size || columnWidth < this.geometry.minTextColumn) {
      const pageBefore = this.pageIndex;
      const lines = this.flowText(text, this.geometry.marginLeft, this.usableWidth, this.bodyStyle(), this.geometry.lineHeight, 'justify');
      this.advance(this.geometry.blockGap);
      return {
        outcome: 'text-only',
        pageBreak: this.pageIndex !== pageBefore,
        imageWidth: 0,
        imageHeight: 0,
        textLines: lines
      };
    }

    const lines = wrapText(this.surface, text, columnWidth, this.geometry.bodyFontSize);
    const textHeight = lines.length * this.geometry.lineHeight;

    let pageBreak = false;
    if (!this.atTopOfPage && this.y + Math.max(size.height, textHeight) > this.bottomLimit) {
      this.addPage();
      pageBreak = true;
    }

    const top = this.y;
    const imagePage = this.pageIndex;
    const { marginLeft } = this.geometry;
    const imageX = side === 'right' ? marginLeft + this.usableWidth - size.width : marginLeft;
    const textX = side === 'right' ? marginLeft : marginLeft + size.width + this.geometry.gutter;

    this.surface.drawImage(imagePage, image, imageX, top, size.width, size.height);
    this.side = side === 'right' ? 'left' : 'right';

    // lines that fit beside the image; the rest continues full width on later pages
    const fitting = Math.max(0, Math.floor((this.bottomLimit - top) / this.geometry.lineHeight + 1e-9));
    const beside = lines.slice(0, fitting);
    const overflow = lines.slice(fitting);

    this.drawLines(beside, textX, columnWidth, this.bodyStyle(), this.geometry.lineHeight, 'justify', overflow.length === 0);
    const textBottom = this.y;

    if (overflow.length > 0) {
      this.addPage();
      this.flowText(overflow.join(' '), marginLeft, this.usableWidth, this.bodyStyle(), this.geometry.lineHeight, 'justify');
      this.y = Math.min(this.y + this.geometry.blockGap, this.bottomLimit);
    } else {
      this.y = Math.min(Math.max(top + size.height, textBottom) + this.geometry.blockGap, this.bottomLimit);
    }

    return {
      outcome: 'beside',
      side,
      pageBreak,
      imageWidth: size.width,
      imageHeight: size.height,
      textLines: lines.length
    };
  }

  /**
   * Draw `<label> N` centred at the foot of every page.
   */
  finalize(pageLabel: string): void {
    const style: TextStyle = { fontSize: this.typography.footerSize, bold: false, color: this.typography.footerColor };
    const baseline = this.geometry.pageHeight - FOOTER_OFFSET + 10 * BASELINE_RATIO;

    for (let page = 0; page < this.surface.pageCount; page++) {
      const text = `${pageLabel} ${page + 1}`;
      const width = this.surface.widthOf(text, style.fontSize, style.bold);
      const x = this.geometry.marginLeft + (this.usableWidth - width) / 2;
      this.surface.drawText(page, text, x, baseline, style);
    }
  }

  private bodyStyle(): TextStyle {
    return { fontSize: this.geometry.bodyFontSize, bold: false, color: this.typography.textColor };
  }

  private maxImageWidth(): number {
    const fraction = Math.min(Math.max(this.geometry.maxImageWidthFraction, 0), 1);
    return this.usableWidth * fraction;
  }

  /**
   * Aspect-preserving size for `targetWidth`, shrunk to fit the usable page
   * height. Undefined when either side would be non-positive.
   */
  private fitImage(image: ImageHandle, targetWidth: number): { width: number; height: number } | undefined {
    if (!(targetWidth > 0) || !(image.widthPx > 0) || !(image.heightPx > 0)) {
      return undefined;
    }

    const aspect = image.heightPx / image.widthPx;
    let width = targetWidth;
    let height = width * aspect;
    if (height > this.usableHeight) {
      height = this.usableHeight;
      width = height / aspect;
    }
    return { width, height };
  }

  /**
   * Wrap and draw with line-level page breaks. Returns the line count.
   */
  private flowText(text: string, x: number, width: number, style: TextStyle, lineHeight: number, align: TextAlign): number {
    const lines = wrapText(this.surface, text, width, style.fontSize, style.bold);
    this.drawLines(lines, x, width, style, lineHeight, align, true);
    return lines.length;
  }

  private drawLines(
    lines: readonly string[],
    x: number,
    width: number,
    style: TextStyle,
    lineHeight: number,
    align: TextAlign,
    endsParagraph: boolean
  ): void {
    lines.forEach((line, index) => {
      if (this.y + lineHeight > this.bottomLimit && !this.atTopOfPage) {
        this.addPage();
      }

      const baseline = this.y + lineHeight * BASELINE_RATIO;
      const isLast = endsParagraph && index === lines.length - 1;
      this.drawLine(line, x, width, baseline, style, isLast && align === 'justify' ? 'left' : align);
      this.y += lineHeight;
    });
  }

  private drawLine(line: string, x: number, width: number, baseline: number, style: TextStyle, align: TextAlign): void {
    if (align === 'center') {
      const lineWidth = this.surface.widthOf(line, style.fontSize, style.bold);
      this.surface.drawText(this.pageIndex, line, x + Math.max(0, (width - lineWidth) / 2), baseline, style);
      return;
    }

    const words = line.split(' ');
    if (align === 'left' || words.length < 2) {
      this.surface.drawText(this.pageIndex, line, x, baseline, style);
      return;
    }

    const wordWidths = words.map(word => this.surface.widthOf(word, style.fontSize, style.bold));
    const spacing = (width - wordWidths.reduce((sum, w) => sum + w, 0)) / (words.length - 1);
    let cursorX = x;
    words.forEach((word, index) => {
      this.surface.drawText(this.pageIndex, word, cursorX, baseline, style);
      cursorX += wordWidths[index] + spacing;
    });
  }

  private advance(distance: number): void {
    this.y = Math.min(this.y + distance, this.bottomLimit);
  }
}
