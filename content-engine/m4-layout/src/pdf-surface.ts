/**
 * pdf-lib implementation of `PageSurface`.
 *
 * Converts the layout's millimetre, top-down coordinates to PDF points with
 * the origin at the bottom-left. Text is filtered to the glyphs the embedded
 * font can encode; the standard Helvetica faces only cover WinAnsi.
 */

import fontkit from '@pdf-lib/fontkit';
import { PDFDocument, StandardFonts, rgb } from 'pdf-lib';
import type { PDFFont, PDFImage, PDFPage } from 'pdf-lib';
import type { RenderedImage } from '../../m3-illustrate/src/types.js';
import { toJpeg } from '../../m3-illustrate/src/raster.js';
import type { DocumentSurface, ImageHandle, TextStyle } from './types.js';

export const POINTS_PER_MM = 72 / 25.4;

export interface PdfImageHandle extends ImageHandle {
  readonly image: PDFImage;
}

/**
 * TrueType bytes for the body faces. Without them the standard Helvetica pair is used.
 */
export interface FontSources {
  regular?: Uint8Array;
  bold?: Uint8Array;
}

export interface PdfSurfaceOptions {
  pageWidth: number;
  pageHeight: number;
  title?: string;
  fonts?: FontSources;
  jpegQuality?: number;
}

interface FontFace {
  font: PDFFont;
  charset: ReadonlySet<number>;
}

export class PdfSurface implements DocumentSurface<PdfImageHandle> {
  private pages: PDFPage[] = [];

  private constructor(
    private doc: PDFDocument,
    private regular: FontFace,
    private bold: FontFace,
    private options: PdfSurfaceOptions
  ) {}

  static async create(options: PdfSurfaceOptions): Promise<PdfSurface> {
    const doc = await PDFDocument.create();
    if (options.title) {
      doc.setTitle(options.title);
    }
    doc.setCreator('lesson-illustrator');

    const fonts = options.fonts ?? {};
    if (fonts.regular || fonts.bold) {
      doc.registerFontkit(fontkit);
    }

    const regularFont = fonts.regular
      ? await doc.embedFont(fonts.regular, { subset: true })
      : await doc.embedFont(StandardFonts.Helvetica);
    const boldBytes = fonts.bold ?? fonts.regular;
    const boldFont = boldBytes
      ? await doc.embedFont(boldBytes, { subset: true })
      : await doc.embedFont(StandardFonts.HelveticaBold);

    return new PdfSurface(doc, toFace(regularFont), toFace(boldFont), options);
  }

  get pageCount(): number {
    return this.pages.length;
  }

  addPage(): number {
    this.pages.push(this.doc.addPage([this.options.pageWidth * POINTS_PER_MM, this.options.pageHeight * POINTS_PER_MM]));
    return this.pages.length - 1;
  }

  widthOf(text: string, fontSize: number, bold: boolean): number {
    const face = bold ? this.bold : this.regular;
    return face.font.widthOfTextAtSize(encodable(text, face), fontSize) / POINTS_PER_MM;
  }

  drawText(pageIndex: number, text: string, x: number, y: number, style: TextStyle): void {
    const face = style.bold ? this.bold : this.regular;
    const printable = encodable(text, face);
    if (!printable) return;

    const [r, g, b] = style.color;
    this.page(pageIndex).drawText(printable, {
      x: x * POINTS_PER_MM,
      y: (this.options.pageHeight - y) * POINTS_PER_MM,
      size: style.fontSize,
      font: face.font,
      color: rgb(r / 255, g / 255, b / 255)
    });
  }

  drawImage(pageIndex: number, handle: PdfImageHandle, x: number, y: number, width: number, height: number): void {
    this.page(pageIndex).drawImage(handle.image, {
      x: x * POINTS_PER_MM,
      y: (this.options.pageHeight - y - height) * POINTS_PER_MM,
      width: width * POINTS_PER_MM,
      height: height * POINTS_PER_MM
    });
  }

  /**
   * Embed as JPEG; returns the handle the layout engine places.
   */
  async embedImage(image: RenderedImage): Promise<PdfImageHandle> {
    const jpeg = await toJpeg(image, this.options.jpegQuality);
    const embedded = await this.doc.embedJpg(jpeg);
    return { widthPx: image.width, heightPx: image.height, image: embedded };
  }

  save(): Promise<Uint8Array> {
    return this.doc.save();
  }

  private page(index: number): PDFPage {
    const page = this.pages[index];
    if (!page) {
      throw new RangeError(`No page ${index}; document has ${this.pages.length}`);
    }
    return page;
  }
}

function toFace(font: PDFFont): FontFace {
  return { font, charset: new Set(font.getCharacterSet()) };
}

function encodable(text: string, face: FontFace): string {
  let out = '';
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint !== undefined && face.charset.has(codePoint)) {
      out += char;
    }
  }
  return out;
}
