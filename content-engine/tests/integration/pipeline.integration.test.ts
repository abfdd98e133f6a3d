import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PDFDocument } from 'pdf-lib';
import { loadIllustratorConfig } from '../../../illustrator.config.js';
import { createBatchPipeline } from '../../index.js';
import { imageResponse, solidPng } from '../fixtures/images.js';

/**
 * End to end: Markdown folder → PDFs, with the HTTP provider answered in process.
 */
describe('Lesson batch integration', () => {
  let root: string;

  const LESSON = [
    '# El ciclo del agua',
    '',
    '## Evaporación',
    '',
    'El sol calienta el agua de ríos y mares, y el vapor sube hasta formar nubes en el cielo. Este es un concepto clave del ciclo.',
    '',
    'Las nubes se enfrían y el agua vuelve a caer como lluvia.',
    '',
    '## Actividades',
    '',
    '- Dibuja el ciclo del agua',
    '- Explica qué es la condensación'
  ].join('\n');

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'lessons-'));
    await mkdir(join(root, 'historias', 'ciencias'), { recursive: true });
    await writeFile(join(root, 'historias', 'ciencias', 'agua.md'), LESSON);
    await writeFile(join(root, 'historias', 'notas-sueltas.md'), 'Texto sin título.');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const setup = () => {
    const png = solidPng(64, 40);
    const fetchImpl = jest.fn(async (_url: string, _init?: RequestInit) => imageResponse(await png));
    const config = loadIllustratorConfig(
      { HF_TOKEN: 'test-secret' },
      {
        inputRoot: join(root, 'historias'),
        outputRoot: join(root, 'pdfs'),
        cacheDir: join(root, 'cache'),
        requestIntervalMs: 0,
        maxImages: 2
      }
    );
    return { fetchImpl, pipeline: createBatchPipeline(config, { fetchImpl }) };
  };

  test('should write one loadable PDF per lesson in the mirrored tree', async () => {
    const { fetchImpl, pipeline } = setup();

    const report = await pipeline.run();

    expect(report.status).toBe('SUCCESS');
    expect(report.documents.map(document => document.title)).toEqual(['El ciclo del agua', 'notas-sueltas']);

    const water = await PDFDocument.load(await readFile(join(root, 'pdfs', 'ciencias', 'agua.pdf')));
    expect(water.getPageCount()).toBe(2);
    expect(water.getTitle()).toBe('El ciclo del agua');
    expect(report.documents[0].statistics).toMatchObject({
      pages: 2,
      selectionMode: 'automatic',
      illustratedBlocks: 2,
      appendixItems: 2,
      images: { provider: 3, cache: 0, placeholder: 0 }
    });

    // cover and two paragraphs, then cover and one paragraph
    expect(fetchImpl).toHaveBeenCalledTimes(5);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://api-inference.huggingface.co/models/runwayml/stable-diffusion-v1-5');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect((await readdir(join(root, 'cache'))).filter(name => name.endsWith('.png'))).toHaveLength(5);
  });

  test('should serve a second run entirely from the image cache', async () => {
    await setup().pipeline.run();
    const { fetchImpl, pipeline } = setup();

    const report = await pipeline.run();

    expect(fetchImpl).not.toHaveBeenCalled();
    expect(report.documents[0].statistics?.images).toEqual({ provider: 0, cache: 3, placeholder: 0 });
  });
});
