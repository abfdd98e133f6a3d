#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { createBatchPipeline } from '../content-engine/index.js';
import type { FontSources } from '../content-engine/m4-layout/src/pdf-surface.js';
import { ConfigError } from '../content-engine/utils/errors.js';
import type { Logger } from '../content-engine/utils/logger.js';
import { createConsoleLogger, errorMessage } from '../content-engine/utils/logger.js';
import { loadIllustratorConfig } from '../illustrator.config.js';
import type { IllustratorConfig } from '../illustrator.config.js';
import { USAGE, parseCliArgs } from './cli-args.js';

/**
 * Batch CLI: Markdown lessons → illustrated PDFs
 *
 *   lesson-illustrator                      every .md under the input folder
 *   lesson-illustrator --list-file pendientes.txt paths listed one per line
 *   lesson-illustrator a.md b.md            just these files
 */

async function loadFonts(config: IllustratorConfig, logger: Logger): Promise<FontSources | undefined> {
  if (!config.fontPath) return undefined;

  try {
    const regular = await readFile(config.fontPath);
    const bold = config.boldFontPath ? await readFile(config.boldFontPath) : undefined;
    return { regular, bold };
  } catch (error) {
    logger('warn', 'Unicode font not readable; falling back to Helvetica', {
      fontPath: config.fontPath,
      error: errorMessage(error)
    });
    return undefined;
  }
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadIllustratorConfig(process.env, args.overrides);
  const logger = createConsoleLogger(config.logLevel);

  if (!config.skipImages && !config.provider.apiKey && config.provider.name !== 'horde') {
    logger('warn', `No credential configured for ${config.provider.name}; images will fall back to placeholders`);
  }

  const fonts = await loadFonts(config, logger);
  const pipeline = createBatchPipeline(config, { logger, fonts });
  const report = await pipeline.run({ files: args.files, listFile: args.listFile });

  for (const document of report.documents) {
    if (document.status === 'SUCCESS') {
      console.log(`✅ ${document.outputPath}`);
    } else if (document.status === 'FAILED') {
      const codes = document.errors.map(error => error.code).join(', ');
      console.error(`❌ ${document.inputPath}: ${codes}`);
    }
  }

  const rendered = report.documents.filter(document => document.status === 'SUCCESS').length;
  console.log(`📄 ${rendered}/${report.documents.length} PDFs generated in ${report.processingTime}ms`);

  return report.status === 'SUCCESS' ? 0 : 1;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error(USAGE);
      process.exitCode = 2;
      return;
    }
    console.error(error);
    process.exitCode = 1;
  });
