import { glob } from 'glob';
import fs from 'fs-extra';
import * as path from 'path';
import type { Font } from '../types/font';
import { parseFontSnapshot } from './snapshot';
import { loadBinaryFonts } from './font-loader';
import { UsageError, describeError } from '../utils/errors';

const BINARY_EXTENSIONS = new Set(['.ttf', '.otf', '.woff']);

export async function findFontSources(directory: string): Promise<string[]> {
  try {
    const files = await glob('**/*.{json,ttf,otf,woff}', { cwd: directory, absolute: true, nodir: true, ignore: ['**/node_modules/**'] });
    return files.sort();
  } catch (error) {
    throw new Error(`Error finding font sources: ${error}`);
  }
}

export async function readFontSnapshot(snapshotPath: string): Promise<Font> {
  let raw: unknown;
  try {
    raw = await fs.readJson(snapshotPath);
  } catch (error) {
    throw new UsageError(`Error reading snapshot ${snapshotPath}: ${describeError(error)}`);
  }
  return parseFontSnapshot(raw);
}

/**
 * One JSON snapshot, or one or more compiled fonts (one master each).
 */
export async function loadFontSources(sources: readonly string[]): Promise<Font> {
  if (sources.length === 0) {
    throw new UsageError('No font source given');
  }
  for (const source of sources) {
    if (!(await fs.pathExists(source))) {
      throw new UsageError(`Font source ${source} does not exist`);
    }
  }

  const extensions = sources.map((source) => path.extname(source).toLowerCase());
  if (extensions.every((ext) => ext === '.json')) {
    if (sources.length > 1) {
      throw new UsageError('Only one JSON snapshot can be audited at a time');
    }
    return readFontSnapshot(sources[0]);
  }
  if (extensions.every((ext) => BINARY_EXTENSIONS.has(ext))) {
    return loadBinaryFonts(sources);
  }
  throw new UsageError(`Unsupported source mix: ${sources.join(', ')}. Pass one .json snapshot or .ttf/.otf/.woff files`);
}
