import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { StorageError, describeError } from '../errors';

export const INDEX_FORMAT = 'pdf-qa-index';
export const INDEX_VERSION = 1;

const entrySchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  metadata: z.object({
    source: z.string(),
    page: z.number().int().positive(),
    chunkIndex: z.number().int().nonnegative(),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  }),
  embedding: z.array(z.number()),
});

const snapshotSchema = z
  .object({
    format: z.literal(INDEX_FORMAT),
    version: z.literal(INDEX_VERSION),
    createdAt: z.string(),
    metric: z.enum(['cosine', 'l2']),
    model: z.string().min(1),
    dimension: z.number().int().nonnegative(),
    entries: z.array(entrySchema),
  })
  .superRefine((snapshot, ctx) => {
    snapshot.entries.forEach((entry, index) => {
      if (entry.embedding.length !== snapshot.dimension) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entries', index, 'embedding'],
          message: `expected ${snapshot.dimension} values, found ${entry.embedding.length}`,
        });
      }
    });
  });

export type IndexSnapshot = z.infer<typeof snapshotSchema>;

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export const readIndexSnapshot = async (filePath: string): Promise<IndexSnapshot> => {
  let raw: string;

  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new StorageError(`Vector index not found at ${filePath}. Run the ingest command first.`, {
        cause: error,
        path: filePath,
        reason: 'missing',
      });
    }
    throw new StorageError(`Failed to read vector index at ${filePath}: ${describeError(error)}`, {
      cause: error,
      path: filePath,
      reason: 'unreadable',
    });
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StorageError(`Vector index at ${filePath} is not valid JSON.`, { cause: error, path: filePath });
  }

  const result = snapshotSchema.safeParse(parsed);

  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new StorageError(`Vector index at ${filePath} is corrupt${where}: ${issue?.message ?? 'invalid snapshot'}`, {
      cause: result.error,
      path: filePath,
    });
  }

  return result.data;
};

/**
 * Writes the snapshot beside the target and renames it into place, so a failed
 * write never replaces the previous index.
 */
export const writeIndexSnapshot = async (filePath: string, snapshot: IndexSnapshot): Promise<void> => {
  const directory = path.dirname(path.resolve(filePath));
  const tempPath = path.join(directory, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);

  try {
    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(snapshot));
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      console.warn(`Failed to remove temporary index file ${tempPath}.`, cleanupError);
    });
    throw new StorageError(`Failed to persist vector index to ${filePath}: ${describeError(error)}`, {
      cause: error,
      path: filePath,
      reason: 'write',
    });
  }
};
