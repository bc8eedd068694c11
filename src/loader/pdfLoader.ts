import type { Dirent, Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { LoadError, describeError } from '../errors';
import type { PageText } from '../rag/schema';
import type { PdfTextExtractor } from './types';

export type LoadOptions = {
  extractor: PdfTextExtractor;
  recursive?: boolean;
  /** Fail on the first unreadable PDF instead of skipping it. */
  strict?: boolean;
  onDocument?: (source: string, pageCount: number) => void;
  onSkip?: (source: string, error: LoadError) => void;
};

const isPdf = (name: string): boolean => name.toLowerCase().endsWith('.pdf');

const toPosix = (relativePath: string): string => relativePath.split(path.sep).join('/');

const collectPdfFiles = async (root: string, directory: string, recursive: boolean): Promise<string[]> => {
  let entries: Dirent[];

  try {
    entries = await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    throw new LoadError(`Failed to read directory ${directory}: ${describeError(error)}`, { cause: error });
  }

  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);

    if (entry.isDirectory() && recursive) {
      files.push(...(await collectPdfFiles(root, fullPath, recursive)));
    } else if (entry.isFile() && isPdf(entry.name)) {
      files.push(toPosix(path.relative(root, fullPath)));
    }
  }

  return files;
};

type PdfSources = {
  /** Directory the sources are relative to. */
  root: string;
  files: string[];
};

/** Resolves a data directory, or a single PDF file, to sorted sources. */
const resolvePdfSources = async (dataPath: string, recursive: boolean): Promise<PdfSources> => {
  const resolved = path.resolve(dataPath);
  let stats: Stats;

  try {
    stats = await fs.stat(resolved);
  } catch (error) {
    throw new LoadError(`Data directory not found: ${dataPath}`, { cause: error });
  }

  if (stats.isFile()) {
    if (!isPdf(resolved)) {
      throw new LoadError(`Data path ${dataPath} is neither a directory nor a PDF file.`);
    }
    return { root: path.dirname(resolved), files: [path.basename(resolved)] };
  }

  if (!stats.isDirectory()) {
    throw new LoadError(`Data path ${dataPath} is neither a directory nor a PDF file.`);
  }

  const files = await collectPdfFiles(resolved, resolved, recursive);

  return { root: resolved, files: files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)) };
};

/**
 * PDF paths relative to `dataPath`, sorted. A path to a single PDF lists just
 * that file under its base name.
 */
export const listPdfFiles = async (dataPath: string, recursive = false): Promise<string[]> =>
  (await resolvePdfSources(dataPath, recursive)).files;

const extractDocument = async (
  root: string,
  source: string,
  extractor: PdfTextExtractor,
): Promise<{ pageCount: number; pages: string[] }> => {
  try {
    const buffer = await fs.readFile(path.join(root, source));
    return await extractor.extract(new Uint8Array(buffer));
  } catch (error) {
    throw new LoadError(`Failed to parse ${source}: ${describeError(error)}`, { cause: error, source });
  }
};

/**
 * Yields the text of every page of every PDF under `dataDir` (or of the one PDF
 * it names), one document at a time. Unreadable files are skipped with a warning unless `strict` is set.
 */
export async function* loadPdfPages(dataDir: string, options: LoadOptions): AsyncGenerator<PageText> {
  const { extractor, recursive = false, strict = false, onDocument, onSkip } = options;
  const { root, files } = await resolvePdfSources(dataDir, recursive);

  for (const source of files) {
    let document: { pageCount: number; pages: string[] };

    try {
      document = await extractDocument(root, source, extractor);
    } catch (error) {
      if (strict || !(error instanceof LoadError)) {
        throw error;
      }

      console.warn(`[LOAD] Skipping ${source}: ${error.message}`);
      onSkip?.(source, error);
      continue;
    }

    onDocument?.(source, document.pageCount);

    for (let index = 0; index < document.pages.length; index += 1) {
      yield {
        source,
        page: index + 1,
        pageCount: document.pageCount,
        text: document.pages[index],
      };
    }
  }
}
