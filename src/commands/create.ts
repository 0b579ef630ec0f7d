import { resolveFromFlags } from '../engine/resolver.js';
import { validateAndPrepareDirectory } from './shared/project.js';
import { scaffoldProject } from './shared/scaffold.js';
import type { CreateOptions } from './shared/types.js';

export async function createProject(projectName: string, options: CreateOptions): Promise<void> {
  const config = resolveFromFlags({
    name: projectName,
    db: options.db,
    auth: options.auth,
    features: options.features
  });

  const directory = await validateAndPrepareDirectory(config.name, { interactive: false });
  await scaffoldProject(config, directory, options);
}
