import fs from 'fs-extra';
import path from 'path';
import { logger } from '../utils/logger.js';
import { createFileSystemError } from '../utils/errors.js';
import type { FileSet } from '../engine/types.js';

/**
 * Persists a composed file set under `directory`. Files already written stay
 * in place if a later write fails.
 */
export async function writeFileSet(directory: string, files: FileSet): Promise<string[]> {
  const written: string[] = [];

  for (const [relativePath, content] of files) {
    const target = path.join(directory, relativePath);
    try {
      await fs.outputFile(target, content, 'utf-8');
    } catch (error) {
      throw createFileSystemError('write', target, error instanceof Error ? error : new Error(String(error)));
    }
    written.push(relativePath);
    logger.debug(`Wrote ${relativePath}`);
  }

  return written;
}
