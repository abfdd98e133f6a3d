import { PDFDocument } from 'pdf-lib';
import { PdfSurface } from '../../src/pdf-surface.js';
import { decodeImage } from '../../../m3-illustrate/src/raster.js';
import { solidPng } from '../../../tests/fixtures/images.js';

describe('PdfSurface', () => {
  const a4 = { pageWidth: 210, pageHeight: 297 };

  test('should write A4 pages with text and images', async () => {
    const surface = await PdfSurface.create({ ...a4, title: 'Lección' });
    const page = surface.addPage();
    const image = await surface.embedImage(await decodeImage(await solidPng(64, 40), 'provider'));

    surface.drawText(page, 'Página 1', 20, 30, { fontSize: 12, bold: false, color: [0, 0, 0] });
    surface.drawImage(page, image, 10, 40, 68, 42.5);
    const bytes = await surface.save();

    const reloaded = await PDFDocument.load(bytes);
    expect(reloaded.getPageCount()).toBe(1);
    expect(reloaded.getTitle()).toBe('Lección');
    const { width, height } = reloaded.getPage(0).getSize();
    expect(width).toBeCloseTo(595.28, 1);
    expect(height).toBeCloseTo(841.89, 1);
    expect(image).toMatchObject({ widthPx: 64, heightPx: 40 });
  });

  test('should drop characters the standard font cannot encode', async () => {
    const surface = await PdfSurface.create(a4);

    expect(surface.widthOf('año\u{13000}', 12, false)).toBeCloseTo(surface.widthOf('año', 12, false));
    expect(surface.widthOf('año', 12, true)).toBeGreaterThan(surface.widthOf('año', 12, false));
  });

  test('should measure in millimetres', async () => {
    const surface = await PdfSurface.create(a4);
    // Helvetica "M" is 833/1000 em
    expect(surface.widthOf('M', 72, false)).toBeCloseTo(25.4 * 0.833, 2);
  });

  test('should reject drawing on a page that does not exist', async () => {
    const surface = await PdfSurface.create(a4);
    expect(() => surface.drawText(3, 'x', 0, 0, { fontSize: 12, bold: false, color: [0, 0, 0] })).toThrow(RangeError);
  });
});
