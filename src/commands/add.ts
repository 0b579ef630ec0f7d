import path from 'path';
import { logger } from '../utils/logger.js';
import { withProgress } from '../utils/progress.js';
import { installPackage } from '../services/packages.js';

export async function addPackage(packageName: string, projectPath: string = '.', verbose: boolean = false): Promise<void> {
  const directory = path.resolve(projectPath);

  await withProgress(
    `📦 Installing ${packageName}`,
    () => installPackage(directory, packageName),
    { success: `Installed ${packageName}`, failure: `Failed to install ${packageName}` },
    verbose
  );

  logger.success(`Package '${packageName}' installed and added to requirements.txt`);
}
