import path from 'path';
import chalk from 'chalk';
import { logger } from '../../utils/logger.js';
import { compose } from '../../engine/composer.js';
import { describeConfiguration } from '../../engine/resolver.js';
import type { ProjectConfiguration } from '../../engine/types.js';
import { writeFileSet } from '../../services/writer.js';
import { setupEnvironment } from '../../services/virtualenv.js';
import { venvBinary } from '../../utils/cli.js';
import type { ScaffoldOptions } from './types.js';

/**
 * Composes, writes and (optionally) installs a project. Composition finishes
 * in memory before the first file is written.
 */
export async function scaffoldProject(
  config: ProjectConfiguration,
  directory: string,
  options: ScaffoldOptions
): Promise<void> {
  logger.step(`Creating project "${config.name}"...`);
  logger.list(describeConfiguration(config).slice(1));
  logger.newLine();

  const files = compose(config);
  const written = await writeFileSet(directory, files);
  logger.success(`Generated ${written.length} files in ${directory}`);

  if (options.install) {
    await setupEnvironment(directory, config, { verbose: options.verbose });
  } else {
    logger.info('Skipping virtual environment setup (--no-install)');
  }

  printNextSteps(config, directory, options.install);
}

function printNextSteps(config: ProjectConfiguration, directory: string, installed: boolean): void {
  const relative = path.relative(process.cwd(), directory) || '.';

  logger.newLine();
  logger.success(`🎉 Project ${config.name} initialized successfully!`);
  logger.newLine();

  console.log(chalk.green.bold('▶️  Next steps:'));
  logger.command(`cd ${relative}`);
  if (!installed) {
    logger.command('python -m venv venv');
    logger.command(`${path.relative(directory, venvBinary(directory, 'pip'))} install -r requirements.txt`);
  }
  logger.command(`${path.relative(directory, venvBinary(directory, 'uvicorn'))} app.main:app --reload`);
  if (config.features.has('testing')) {
    logger.command(`${path.relative(directory, venvBinary(directory, 'pytest'))}`);
  }
  if (config.features.has('docker')) {
    logger.command('docker compose up --build');
  }
  logger.newLine();
}
