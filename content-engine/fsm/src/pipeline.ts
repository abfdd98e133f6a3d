import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { isFile, isMarkdownFile, listMarkdownFiles, mirrorOutputPath, readListFile } from '../../../config/paths.js';
import { fallbackTitleFromPath } from '../../m1-parse/src/markdown-parser.js';
import type { AssemblyResult, AssemblyStatistics } from '../../m5-assembler/src/types.js';
import { writeFileAtomic } from '../../utils/atomic-writer.js';
import type { Logger } from '../../utils/logger.js';
import { errorMessage, silentLogger } from '../../utils/logger.js';
import type { ModuleError, Result } from '../../utils/result.js';

/**
 * Pipeline execution states
 */
export type PipelineState = 'INITIALIZED' | 'DISCOVERING' | 'RENDERING' | 'COMPLETED' | 'FAILED';

/**
 * One document in, PDF bytes out. `DocumentAssembler` is the production implementation.
 */
export interface DocumentRenderer {
  assemble(markdown: string, fallbackTitle: string, correlationId?: string): Promise<Result<AssemblyResult, ModuleError[]>>;
  /** Counters logged once per worker when the batch ends. */
  getMetrics?(): Record<string, unknown>;
}

export interface BatchOptions {
  inputRoot: string;
  outputRoot: string;
  /** Documents rendered at once, each on its own renderer. */
  concurrency: number;
}

export const DEFAULT_BATCH_OPTIONS: BatchOptions = {
  inputRoot: 'historias',
  outputRoot: 'pdfs_generados',
  concurrency: 1
};

/**
 * An existing list file wins over explicit inputs; with neither, the input root is scanned.
 */
export interface BatchInputs {
  files?: string[];
  listFile?: string;
}

export interface DocumentOutcome {
  inputPath: string;
  outputPath: string;
  status: 'SUCCESS' | 'FAILED' | 'SKIPPED';
  title?: string;
  statistics?: AssemblyStatistics;
  errors: ModuleError[];
  processingTime: number;
}

export interface BatchReport {
  status: 'SUCCESS' | 'PARTIAL_FAILURE' | 'CRITICAL_FAILURE';
  state: PipelineState;
  documents: DocumentOutcome[];
  errors: ModuleError[];
  correlationId: string;
  processingTime: number;
}

const AUTH_ESCALATION_CODE = 'E-M5-PROVIDER-AUTH';

/**
 * FSM-based batch orchestrator.
 * A failed document is recorded and the run moves on; an escalated provider
 * auth error stops the run, since every later document would hit it too.
 */
export class BatchPipeline {
  private options: BatchOptions;
  private state: PipelineState = 'INITIALIZED';
  private errors: ModuleError[] = [];
  private stopRequested = false;

  constructor(
    private createRenderer: () => DocumentRenderer,
    options: Partial<BatchOptions> = {},
    private logger: Logger = silentLogger,
    private now: () => number = Date.now
  ) {
    this.options = { ...DEFAULT_BATCH_OPTIONS, ...options };
  }

  async run(inputs: BatchInputs = {}): Promise<BatchReport> {
    const startTime = this.now();
    const correlationId = this.generateCorrelationId();
    this.errors = [];
    this.stopRequested = false;

    this.setState('DISCOVERING');
    let paths: string[];
    try {
      paths = await this.discover(inputs);
    } catch (error) {
      this.setState('FAILED');
      this.errors.push({
        code: 'E-PIPELINE-DISCOVERY',
        module: 'PIPELINE',
        data: { error: errorMessage(error), inputRoot: this.options.inputRoot, listFile: inputs.listFile },
        correlationId
      });
      return this.createReport([], correlationId, startTime);
    }

    this.logger('info', `Markdown files to process: ${paths.length}`, { correlationId });
    if (paths.length === 0) {
      this.logger('warn', 'No Markdown files found', { inputRoot: this.options.inputRoot });
    }

    this.setState('RENDERING');
    const documents = await this.renderAll(paths, correlationId);

    this.setState(this.stopRequested ? 'FAILED' : 'COMPLETED');
    return this.createReport(documents, correlationId, startTime);
  }

  getState(): PipelineState {
    return this.state;
  }

  getErrors(): ModuleError[] {
    return [...this.errors];
  }

  private async discover(inputs: BatchInputs): Promise<string[]> {
    if (inputs.listFile) {
      if (await isFile(inputs.listFile)) {
        return readListFile(inputs.listFile);
      }
      this.logger('warn', 'List file not found; ignoring it', { listFile: inputs.listFile });
    }

    if (inputs.files && inputs.files.length > 0) {
      const accepted: string[] = [];
      for (const file of inputs.files) {
        if (isMarkdownFile(file) && (await isFile(file))) {
          accepted.push(file);
        } else {
          this.logger('warn', 'Skipping input that is not a Markdown file', { file });
        }
      }
      return accepted;
    }

    return listMarkdownFiles(this.options.inputRoot);
  }

  /**
   * Worker pool over a shared cursor; each worker owns one renderer so layout
   * state and request throttling stay sequential within it.
   */
  private async renderAll(paths: string[], correlationId: string): Promise<DocumentOutcome[]> {
    const outcomes: DocumentOutcome[] = [];
    if (paths.length === 0) return outcomes;
    let next = 0;

    const renderers: DocumentRenderer[] = [];

    const worker = async () => {
      const renderer = this.createRenderer();
      renderers.push(renderer);
      while (next < paths.length) {
        const index = next++;
        const inputPath = paths[index];

        if (this.stopRequested) {
          outcomes[index] = this.skipped(inputPath);
          continue;
        }
        outcomes[index] = await this.renderDocument(renderer, inputPath, `${correlationId}-${index + 1}`);
      }
    };

    const workerCount = Math.max(1, Math.min(Math.floor(this.options.concurrency), paths.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    renderers.forEach((renderer, position) => {
      const metrics = renderer.getMetrics?.();
      if (metrics) {
        this.logger('info', 'Image metrics', { correlationId, worker: position + 1, ...metrics });
      }
    });

    return outcomes;
  }

  private async renderDocument(renderer: DocumentRenderer, inputPath: string, correlationId: string): Promise<DocumentOutcome> {
    const startTime = this.now();
    const outputPath = this.outputPathFor(inputPath);
    this.logger('info', `Rendering ${inputPath}`, { correlationId });

    const failed = (errors: ModuleError[]): DocumentOutcome => {
      this.errors.push(...errors);
      this.logger('error', `Failed to render ${inputPath}`, { correlationId, codes: errors.map(e => e.code) });
      return { inputPath, outputPath, status: 'FAILED', errors, processingTime: this.now() - startTime };
    };

    let markdown: string;
    try {
      markdown = await readFile(inputPath, 'utf-8');
    } catch (error) {
      return failed([{ code: 'E-PIPELINE-READ', module: 'PIPELINE', data: { error: errorMessage(error), inputPath }, correlationId }]);
    }

    const result = await renderer.assemble(markdown, fallbackTitleFromPath(inputPath), correlationId);
    if (!result.isSuccess()) {
      const errors = result.errors ?? [];
      if (errors.some(error => error.code === AUTH_ESCALATION_CODE)) {
        this.stopRequested = true;
        this.logger('error', 'Provider rejected the credential; stopping the batch', { correlationId });
      }
      return failed(errors.map(error => ({ ...error, data: { ...error.data, inputPath } })));
    }

    try {
      await writeFileAtomic(outputPath, result.value.pdf);
    } catch (error) {
      return failed([{ code: 'E-PIPELINE-WRITE', module: 'PIPELINE', data: { error: errorMessage(error), outputPath }, correlationId }]);
    }

    this.logger('info', `PDF written: ${outputPath}`, { correlationId, pages: result.value.statistics.pages });
    return {
      inputPath,
      outputPath,
      status: 'SUCCESS',
      title: result.value.title,
      statistics: result.value.statistics,
      errors: [],
      processingTime: this.now() - startTime
    };
  }

  private skipped(inputPath: string): DocumentOutcome {
    return { inputPath, outputPath: this.outputPathFor(inputPath), status: 'SKIPPED', errors: [], processingTime: 0 };
  }

  private outputPathFor(inputPath: string): string {
    return mirrorOutputPath(inputPath, this.options.inputRoot, resolve(this.options.outputRoot));
  }

  private createReport(documents: DocumentOutcome[], correlationId: string, startTime: number): BatchReport {
    const processingTime = this.now() - startTime;
    const failures = documents.filter(document => document.status !== 'SUCCESS').length;

    let status: BatchReport['status'];
    if (this.state === 'FAILED') {
      status = 'CRITICAL_FAILURE';
    } else {
      status = failures === 0 ? 'SUCCESS' : 'PARTIAL_FAILURE';
    }

    this.logger(status === 'SUCCESS' ? 'info' : 'warn', `Batch finished with status: ${status}`, {
      correlationId,
      processingTime,
      documents: documents.length,
      failures
    });

    return {
      status,
      state: this.state,
      documents,
      errors: [...this.errors],
      correlationId,
      processingTime
    };
  }

  private setState(newState: PipelineState): void {
    this.logger('debug', `Pipeline state: ${this.state} → ${newState}`);
    this.state = newState;
  }

  private generateCorrelationId(): string {
    const timestamp = this.now().toString(36);
    const random = Math.random().toString(36).slice(2, 11);
    return `batch-${timestamp}-${random}`;
  }
}
