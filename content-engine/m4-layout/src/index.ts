// M4-Layout: page cursor, text flow and the pdf-lib drawing surface

export { PageLayout } from './page-layout.js';
export { PdfSurface, POINTS_PER_MM } from './pdf-surface.js';
export type { FontSources, PdfImageHandle, PdfSurfaceOptions } from './pdf-surface.js';
export { wrapText, lineCount } from './text-measure.js';
export { A4_GEOMETRY, DEFAULT_TYPOGRAPHY } from './types.js';
export type {
  DocumentSurface,
  ImageHandle,
  LayoutCursor,
  PageGeometry,
  PageSurface,
  PlacementOutcome,
  PlacementResult,
  Rgb,
  Side,
  TextAlign,
  TextMeasurer,
  TextStyle,
  Typography
} from './types.js';
