import fs from 'fs-extra';
import path from 'path';
import { execTool, venvBinary, type CommandRunner } from '../utils/cli.js';
import { createFileSystemError, createValidationError } from '../utils/errors.js';
import { validatePackageName } from '../utils/validation.js';

export async function assertVirtualEnvironment(directory: string): Promise<void> {
  if (!await fs.pathExists(path.join(directory, 'venv'))) {
    throw createValidationError('project', directory, [
      'must contain a virtual environment at venv/',
      'run "fastapi-kit init" or "fastapi-kit create" first'
    ]);
  }
}

/**
 * Installs a package into the project's venv, then rewrites requirements.txt
 * from what pip reports as installed.
 */
export async function installPackage(
  directory: string,
  packageName: string,
  runner: CommandRunner = execTool
): Promise<string> {
  if (!validatePackageName(packageName)) {
    throw createValidationError('package name', packageName, [
      'must be a package name, optionally with extras and a version specifier (e.g. "requests==2.31.0")'
    ]);
  }
  await assertVirtualEnvironment(directory);

  const pip = venvBinary(directory, 'pip');
  await runner(pip, ['install', packageName], { cwd: directory });

  const { stdout } = await runner(pip, ['freeze'], { cwd: directory });
  const requirementsPath = path.join(directory, 'requirements.txt');
  const content = stdout.endsWith('\n') ? stdout : `${stdout}\n`;
  try {
    await fs.writeFile(requirementsPath, content, 'utf-8');
  } catch (error) {
    throw createFileSystemError('write', requirementsPath, error instanceof Error ? error : new Error(String(error)));
  }
  return content;
}
