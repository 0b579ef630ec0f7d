import path from 'path';
import fs from 'fs-extra';
import { logger } from '../../utils/logger.js';
import { createCancelledError, createValidationError } from '../../utils/errors.js';
import { askToOverwriteDirectory } from './prompts.js';

async function isDirectoryEmpty(dirPath: string): Promise<boolean> {
  const files = await fs.readdir(dirPath);
  return files.length === 0;
}

/**
 * Resolves the target directory for a new project. An existing non-empty
 * directory is replaced only after the user agrees; non-interactive runs
 * refuse instead.
 */
export async function validateAndPrepareDirectory(
  name: string,
  options: { interactive: boolean; cwd?: string }
): Promise<string> {
  const directory = path.resolve(options.cwd ?? process.cwd(), name);

  if (!await fs.pathExists(directory)) {
    return directory;
  }

  const stat = await fs.stat(directory);
  if (!stat.isDirectory()) {
    throw createValidationError('project directory', directory, ['must not be an existing file']);
  }

  if (await isDirectoryEmpty(directory)) {
    return directory;
  }

  if (!options.interactive) {
    throw createValidationError('project directory', directory, [
      'must not exist yet, or be empty',
      'remove it or choose another project name'
    ]);
  }

  const overwrite = await askToOverwriteDirectory(name);
  if (!overwrite) {
    throw createCancelledError(`Directory "${name}" left untouched`);
  }

  await fs.remove(directory);
  logger.debug(`Removed existing directory ${directory}`);
  return directory;
}
