import sharp from 'sharp';
import type { ImageSource, RenderedImage } from './types.js';

export interface CanonicalRaster {
  data: Buffer;
  width: number;
  height: number;
}

/**
 * Decode any format sharp understands (PNG, JPEG, WebP, ...) and re-encode
 * as flattened PNG. Throws when the bytes are not a readable image.
 */
export async function toCanonicalPng(bytes: Uint8Array): Promise<CanonicalRaster> {
  const { data, info } = await sharp(bytes)
    .flatten({ background: '#ffffff' })
    .png()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height };
}

export async function decodeImage(bytes: Uint8Array, source: ImageSource): Promise<RenderedImage> {
  const raster = await toCanonicalPng(bytes);
  return { ...raster, source };
}

/**
 * JPEG copy for embedding; photos from diffusion models are far smaller this way.
 */
export async function toJpeg(image: RenderedImage, quality: number = 90): Promise<Buffer> {
  return sharp(image.data).jpeg({ quality, mozjpeg: true }).toBuffer();
}
