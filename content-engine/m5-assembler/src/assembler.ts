import { randomUUID } from 'crypto';
import { cleanInlineMarkdown, stripListMarker } from '../../m1-parse/src/inline-cleaner.js';
import { parseMarkdown } from '../../m1-parse/src/markdown-parser.js';
import type { Block, Document } from '../../m1-parse/src/types.js';
import { ParagraphSelector } from '../../m2-select/src/paragraph-selector.js';
import type { SelectionSet } from '../../m2-select/src/types.js';
import type { Illustrator, IllustratorMetrics } from '../../m3-illustrate/src/illustrator.js';
import type { RenderedImage } from '../../m3-illustrate/src/types.js';
import { PageLayout } from '../../m4-layout/src/page-layout.js';
import type { DocumentSurface, ImageHandle } from '../../m4-layout/src/types.js';
import { IllustratorError, ProviderAuthError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { errorMessage, silentLogger } from '../../utils/logger.js';
import { Err, Ok } from '../../utils/result.js';
import type { ModuleError, Result } from '../../utils/result.js';
import type { AssemblerOptions, AssemblyResult, AssemblyStatistics, SurfaceFactory } from './types.js';
import { DEFAULT_ASSEMBLER_OPTIONS } from './types.js';

interface RenderContext<TImage extends ImageHandle> {
  document: Document;
  surface: DocumentSurface<TImage>;
  layout: PageLayout<TImage>;
  statistics: AssemblyStatistics;
  correlationId: string;
}

/**
 * M5-Assembler: turns one Markdown lesson into PDF bytes.
 * Drives parse, selection, illustration and layout strictly in document order.
 */
export class DocumentAssembler<TImage extends ImageHandle> {
  private options: AssemblerOptions;

  constructor(
    private illustrator: Illustrator,
    private createSurface: SurfaceFactory<TImage>,
    options: Partial<AssemblerOptions> = {},
    private selector: ParagraphSelector = new ParagraphSelector(),
    private logger: Logger = silentLogger
  ) {
    this.options = { ...DEFAULT_ASSEMBLER_OPTIONS, ...options };
  }

  getMetrics(): IllustratorMetrics {
    return this.illustrator.getMetrics();
  }

  /**
   * Main entry point. Per-image failures degrade to text; only an escalated
   * auth error or an unexpected fault fails the document.
   */
  async assemble(
    markdown: string,
    fallbackTitle: string,
    correlationId: string = randomUUID()
  ): Promise<Result<AssemblyResult, ModuleError[]>> {
    try {
      // Step 1: Parse and pick the blocks to illustrate
      const document = parseMarkdown(markdown, { fallbackTitle, appendixMarker: this.options.appendixMarker });
      const selection = this.selector.select(document.blocks, this.options.maxImages);
      this.logger('debug', 'Selected blocks for illustration', {
        correlationId,
        mode: selection.mode,
        indices: [...selection.indices]
      });

      // Step 2: Open the drawing surface
      const surface = await this.createSurface(cleanInlineMarkdown(document.title));
      const context: RenderContext<TImage> = {
        document,
        surface,
        layout: new PageLayout(surface, this.options.geometry),
        statistics: {
          pages: 0,
          selectionMode: selection.mode,
          illustratedBlocks: 0,
          images: { provider: 0, cache: 0, placeholder: 0 },
          textFallbacks: 0,
          appendixItems: 0
        },
        correlationId
      };

      // Step 3: Title page, body, appendix
      await this.renderTitle(context);
      await this.renderBody(context, selection.indices);
      this.renderAppendix(context);

      // Step 4: Footers and serialization
      context.layout.finalize(this.options.pageLabel);
      context.statistics.pages = surface.pageCount;
      const pdf = await surface.save();

      this.logger('info', 'Document assembled', { correlationId, title: document.title, ...context.statistics.images });
      return Ok({ title: document.title, pdf, statistics: context.statistics });
    } catch (error) {
      return Err([
        {
          code: error instanceof ProviderAuthError ? 'E-M5-PROVIDER-AUTH' : 'E-M5-ASSEMBLY-FAILED',
          module: 'M5',
          data: {
            error: errorMessage(error),
            cause: error instanceof IllustratorError ? error.code : undefined,
            fallbackTitle
          },
          correlationId
        }
      ]);
    }
  }

  private async renderTitle(context: RenderContext<TImage>): Promise<void> {
    const title = cleanInlineMarkdown(context.document.title);

    if (this.options.coverImage) {
      const cover = await this.acquire(context, () => this.illustrator.illustrateCover(title));
      if (cover) {
        context.layout.placeFullWidthImage(cover, 5);
      }
    }
    context.layout.writeTitle(title);
  }

  private async renderBody(context: RenderContext<TImage>, selection: SelectionSet): Promise<void> {
    const { blocks, title } = context.document;
    const { layout } = context;
    let titleHeadingSkipped = false;

    for (let index = 0; index < blocks.length; index++) {
      const block = blocks[index];

      switch (block.kind) {
        case 'heading':
          // the first level-1 heading is already on the title page
          if (block.level === 1 && block.text === title && !titleHeadingSkipped) {
            titleHeadingSkipped = true;
            break;
          }
          layout.writeHeading(block.level, cleanInlineMarkdown(block.text));
          break;

        case 'image-directive': {
          if (!selection.has(index)) break;

          const next: Block | undefined = blocks[index + 1];
          const companion = next?.kind === 'paragraph' ? cleanInlineMarkdown(next.text) : undefined;
          const handle = await this.acquire(context, () => this.illustrator.illustrateDirective(block.text));

          if (companion !== undefined) {
            index++;
            this.placeBeside(context, companion, handle);
          } else if (handle) {
            layout.placeFullWidthImage(handle);
            context.statistics.illustratedBlocks++;
          }
          break;
        }

        case 'paragraph': {
          const text = cleanInlineMarkdown(block.text);
          if (!selection.has(index)) {
            layout.writeParagraph(text);
            break;
          }

          const handle = await this.acquire(context, () =>
            this.illustrator.illustrateParagraph(block.text, cleanInlineMarkdown(title))
          );
          this.placeBeside(context, text, handle);
          break;
        }
      }
    }
  }

  private placeBeside(context: RenderContext<TImage>, text: string, handle: TImage | undefined): void {
    if (!handle) {
      context.statistics.textFallbacks++;
      context.layout.writeParagraph(text);
      return;
    }

    const placement = context.layout.placeImageWithText(text, handle);
    if (placement.outcome === 'beside') {
      context.statistics.illustratedBlocks++;
    } else {
      context.statistics.textFallbacks++;
    }
  }

  private renderAppendix(context: RenderContext<TImage>): void {
    const items = context.document.appendixBlocks
      .flatMap(block => block.text.split('\n'))
      .map(line => cleanInlineMarkdown(stripListMarker(line)))
      .filter(line => line.length > 0);
    if (items.length === 0) return;

    context.layout.addPage();
    context.layout.writeCenteredLabel(this.options.appendixTitle);
    context.layout.writeBulletList(items);
    context.statistics.appendixItems = items.length;
  }

  /**
   * Fetch and embed one image. Returns undefined when it cannot be had, so
   * the caller renders text instead; an escalated auth error propagates.
   */
  private async acquire(context: RenderContext<TImage>, fetch: () => Promise<RenderedImage>): Promise<TImage | undefined> {
    try {
      const image = await fetch();
      context.statistics.images[image.source]++;
      return await context.surface.embedImage(image);
    } catch (error) {
      if (error instanceof ProviderAuthError) {
        throw error;
      }
      this.logger('warn', 'Illustration unavailable; rendering text only', {
        correlationId: context.correlationId,
        error: errorMessage(error)
      });
      return undefined;
    }
  }
}
