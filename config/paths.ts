/**
 * Path helpers for batch runs: input discovery and output mirroring.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { basename, dirname, extname, isAbsolute, join, relative, resolve } from 'path';

export const MARKDOWN_EXTENSION = '.md';
export const PDF_EXTENSION = '.pdf';

export function isMarkdownFile(filePath: string): boolean {
  return extname(filePath).toLowerCase() === MARKDOWN_EXTENSION;
}

/**
 * Output path for `inputPath`: its directory relative to `inputRoot` is
 * recreated under `outputRoot`, with the extension swapped for `.pdf`.
 * Inputs outside the input root land directly in the output root.
 */
export function mirrorOutputPath(inputPath: string, inputRoot: string, outputRoot: string): string {
  const fileName = basename(inputPath, extname(inputPath)) + PDF_EXTENSION;
  const relativeDir = relative(resolve(inputRoot), dirname(resolve(inputPath)));

  if (pathValidation.isOutside(relativeDir)) {
    return join(outputRoot, fileName);
  }
  return join(outputRoot, relativeDir, fileName);
}

/**
 * Every `.md` file under `root`, recursively, sorted by path.
 */
export async function listMarkdownFiles(root: string): Promise<string[]> {
  const entries = await readdir(root, { withFileTypes: true });
  const found: string[] = [];

  for (const entry of entries) {
    const fullPath = join(root, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await listMarkdownFiles(fullPath)));
    } else if (entry.isFile() && isMarkdownFile(entry.name)) {
      found.push(fullPath);
    }
  }

  return found.sort();
}

/**
 * One path per line; blank lines and `#` comments are ignored.
 * Relative entries resolve against `baseDir`, the working directory by default.
 */
export async function readListFile(listPath: string, baseDir: string = process.cwd()): Promise<string[]> {
  const content = await readFile(listPath, 'utf-8');

  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
    .map(line => (isAbsolute(line) ? line : resolve(baseDir, line)));
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export const pathValidation = {
  /**
   * True when a `relative()` result climbs out of its base directory.
   */
  isOutside: (relativePath: string): boolean =>
    relativePath === '..' || relativePath.startsWith('../') || relativePath.startsWith('..\\') || isAbsolute(relativePath)
};
