// Core types for M5-Assembler module

import type { SelectionMode } from '../../m2-select/src/types.js';
import type { ImageSource } from '../../m3-illustrate/src/types.js';
import type { DocumentSurface, ImageHandle, PageGeometry } from '../../m4-layout/src/types.js';

export type { ModuleError, Result } from '../../utils/result.js';

export interface AssemblerOptions {
  maxImages: number;
  coverImage: boolean;
  appendixMarker: string;
  /** Label centred on the appendix page. */
  appendixTitle: string;
  /** Footer prefix, rendered as `<label> N`. */
  pageLabel: string;
  geometry: Partial<PageGeometry>;
}

export const DEFAULT_ASSEMBLER_OPTIONS: AssemblerOptions = {
  maxImages: 6,
  coverImage: true,
  appendixMarker: 'actividades',
  appendixTitle: 'Actividades',
  pageLabel: 'Página',
  geometry: {}
};

export interface AssemblyStatistics {
  pages: number;
  selectionMode: SelectionMode;
  illustratedBlocks: number;
  images: Record<ImageSource, number>;
  /** Selected blocks rendered as plain text because no image could be placed. */
  textFallbacks: number;
  appendixItems: number;
}

export interface AssemblyResult {
  title: string;
  pdf: Uint8Array;
  statistics: AssemblyStatistics;
}

export type SurfaceFactory<TImage extends ImageHandle> = (title: string) => Promise<DocumentSurface<TImage>>;
