import sharp from 'sharp';
import type { ImageSize, RenderedImage } from './types.js';

const BACKGROUND = { r: 236, g: 239, b: 244 };
const BORDER_COLOR = 'rgb(38,50,56)';
const MIN_SIDE = 16;

/**
 * Neutral bordered rectangle used when no real illustration is available.
 * Carries no text so it never clashes with the page language.
 */
export async function createPlaceholder(size: ImageSize): Promise<RenderedImage> {
  const width = Math.max(MIN_SIDE, Math.round(size.width));
  const height = Math.max(MIN_SIDE, Math.round(size.height));
  const border = Math.max(2, Math.round(Math.min(width, height) * 0.02));

  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
    `<rect x="${border / 2}" y="${border / 2}" width="${width - border}" height="${height - border}" ` +
    `fill="none" stroke="${BORDER_COLOR}" stroke-width="${border}"/></svg>`;

  const data = await sharp({
    create: { width, height, channels: 3, background: BACKGROUND }
  })
    .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
    .png()
    .toBuffer();

  return { data, width, height, source: 'placeholder' };
}
