import { execTool, venvBinary, type CommandRunner } from '../utils/cli.js';
import { assertVirtualEnvironment } from './packages.js';

export const DEFAULT_MIGRATION_MESSAGE = 'auto migration';

export async function makeMigrations(
  directory: string,
  message: string = DEFAULT_MIGRATION_MESSAGE,
  runner: CommandRunner = execTool
): Promise<void> {
  await assertVirtualEnvironment(directory);
  await runner(venvBinary(directory, 'alembic'), ['revision', '--autogenerate', '-m', message], {
    cwd: directory,
    stdio: 'inherit'
  });
}

export async function applyMigrations(directory: string, runner: CommandRunner = execTool): Promise<void> {
  await assertVirtualEnvironment(directory);
  await runner(venvBinary(directory, 'alembic'), ['upgrade', 'head'], {
    cwd: directory,
    stdio: 'inherit'
  });
}
