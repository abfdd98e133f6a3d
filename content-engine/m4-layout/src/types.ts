// Core types for M4-Layout module. All lengths are millimetres, y grows downwards.

import type { RenderedImage } from '../../m3-illustrate/src/types.js';

export type Side = 'left' | 'right';

export type Rgb = readonly [number, number, number];

export type TextAlign = 'left' | 'center' | 'justify';

export interface TextStyle {
  fontSize: number;
  bold: boolean;
  color: Rgb;
}

export interface PageGeometry {
  pageWidth: number;
  pageHeight: number;
  marginLeft: number;
  marginRight: number;
  marginTop: number;
  /** Distance from the page bottom below which nothing is placed. */
  bottomMargin: number;
  lineHeight: number;
  bodyFontSize: number;
  imageWidth: number;
  gutter: number;
  minTextColumn: number;
  blockGap: number;
  /** Upper bound for any image width, as a fraction of the usable width. */
  maxImageWidthFraction: number;
}

export const A4_GEOMETRY: PageGeometry = {
  pageWidth: 210,
  pageHeight: 297,
  marginLeft: 10,
  marginRight: 10,
  marginTop: 10,
  bottomMargin: 16,
  lineHeight: 6,
  bodyFontSize: 12,
  imageWidth: 68,
  gutter: 6,
  minTextColumn: 40,
  blockGap: 4,
  maxImageWidthFraction: 1
};

export interface LayoutCursor {
  readonly pageIndex: number;
  readonly pageY: number;
}

/**
 * Anything the surface can draw as a raster; the layout only needs its pixel size.
 */
export interface ImageHandle {
  readonly widthPx: number;
  readonly heightPx: number;
}

export interface TextMeasurer {
  /** Rendered width in millimetres. */
  widthOf(text: string, fontSize: number, bold: boolean): number;
}

/**
 * Drawing target. Pages are addressed by index; `y` is the text baseline for
 * `drawText` and the top edge for `drawImage`.
 */
export interface PageSurface<TImage extends ImageHandle> extends TextMeasurer {
  readonly pageCount: number;
  addPage(): number;
  drawText(pageIndex: number, text: string, x: number, y: number, style: TextStyle): void;
  drawImage(pageIndex: number, image: TImage, x: number, y: number, width: number, height: number): void;
}

/**
 * A surface that can also take decoded images and serialize the finished document.
 */
export interface DocumentSurface<TImage extends ImageHandle> extends PageSurface<TImage> {
  embedImage(image: RenderedImage): Promise<TImage>;
  save(): Promise<Uint8Array>;
}

export type PlacementOutcome = 'beside' | 'text-only';

export interface PlacementResult {
  outcome: PlacementOutcome;
  side?: Side;
  pageBreak: boolean;
  imageWidth: number;
  imageHeight: number;
  textLines: number;
}

export interface Typography {
  headingSizes: readonly number[];
  headingLineHeights: readonly number[];
  headingSpaceAfter: readonly number[];
  headingColors: readonly Rgb[];
  titleSize: number;
  titleLineHeight: number;
  titleColor: Rgb;
  sectionLabelSize: number;
  sectionLabelColor: Rgb;
  footerSize: number;
  footerColor: Rgb;
  textColor: Rgb;
  paragraphSpaceAfter: number;
  bullet: string;
}

const BLACK: Rgb = [0, 0, 0];

export const DEFAULT_TYPOGRAPHY: Typography = {
  headingSizes: [20, 16, 14, 13, 12, 12],
  headingLineHeights: [10, 8, 7, 6.5, 6, 6],
  headingSpaceAfter: [3, 2, 1, 1, 1, 1],
  headingColors: [BLACK, [200, 30, 30], BLACK, BLACK, BLACK, BLACK],
  titleSize: 20,
  titleLineHeight: 10,
  titleColor: [30, 30, 120],
  sectionLabelSize: 18,
  sectionLabelColor: [30, 100, 30],
  footerSize: 10,
  footerColor: [120, 120, 120],
  textColor: BLACK,
  paragraphSpaceAfter: 2,
  bullet: '•'
};
