import { logger } from '../utils/logger.js';
import { defaultConfiguration, resolveInteractive } from '../engine/resolver.js';
import { inquirerPrompter } from './shared/prompts.js';
import { validateAndPrepareDirectory } from './shared/project.js';
import { scaffoldProject } from './shared/scaffold.js';
import type { InitOptions } from './shared/types.js';
import type { ProjectConfiguration } from '../engine/types.js';

export async function initProject(projectName: string, options: InitOptions): Promise<void> {
  let config: ProjectConfiguration;
  if (options.quick) {
    config = defaultConfiguration(projectName);
    logger.info('Quick mode: using SQLite with JWT authentication and no additional features');
  } else {
    logger.heading(`🚀 Configuring your FastAPI project: ${projectName}`);
    config = await resolveInteractive(projectName, inquirerPrompter);
  }

  const directory = await validateAndPrepareDirectory(config.name, { interactive: !options.quick });
  await scaffoldProject(config, directory, options);
}
