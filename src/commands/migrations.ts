import path from 'path';
import { logger } from '../utils/logger.js';
import { applyMigrations, makeMigrations, DEFAULT_MIGRATION_MESSAGE } from '../services/migrations.js';

export async function makeMigrationsCommand(message: string = DEFAULT_MIGRATION_MESSAGE, projectPath: string = '.'): Promise<void> {
  logger.step(`Generating migration "${message}"...`);
  await makeMigrations(path.resolve(projectPath), message);
  logger.success('Migration generated');
}

export async function migrateCommand(projectPath: string = '.'): Promise<void> {
  logger.step('Applying migrations...');
  await applyMigrations(path.resolve(projectPath));
  logger.success('Database is up to date');
}
