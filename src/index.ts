#!/usr/bin/env node

import fs from 'fs-extra';
import { pathToFileURL } from 'url';
import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { exitCodeOf } from './utils/errors.js';
import { getToolSettings } from './utils/env.js';
import { initProject } from './commands/init.js';
import { createProject } from './commands/create.js';
import { addRouter } from './commands/routers.js';
import { addPackage } from './commands/add.js';
import { makeMigrationsCommand, migrateCommand } from './commands/migrations.js';
import { showPresets } from './commands/presets.js';
import { DEFAULT_MIGRATION_MESSAGE } from './services/migrations.js';
import type { CreateOptions, InitOptions } from './commands/shared/types.js';

/**
 * Wraps a command action so every failure ends the process with the error's
 * exit code after a single error line.
 */
function run<Args extends unknown[]>(action: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(exitCodeOf(error));
    }
  };
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('fastapi-kit')
    .description('Scaffold FastAPI projects with your choice of database, authentication and extras')
    .version('1.0.0')
    .option('--verbose', 'Enable verbose logging')
    .hook('preAction', (command) => {
      logger.setVerbose(Boolean(command.opts().verbose) || getToolSettings().verbose);
    })
    .addHelpText('after', `
Examples:
  # Interactive setup
  fastapi-kit init my-api

  # All defaults (SQLite + JWT), no questions
  fastapi-kit init my-api --quick

  # Fully specified, non-interactive
  fastapi-kit create my-api --db postgresql --auth jwt --features docker,testing,cors

  # More examples
  fastapi-kit presets
    `);

  program
    .command('init')
    .description('Initialize a FastAPI project, asking for database, auth and features')
    .argument('<project_name>', 'Name of the project directory to create')
    .option('--quick', 'Skip the questions and use the defaults (SQLite, JWT, no features)')
    .option('--no-install', 'Write the files only; skip virtual environment and dependency installation')
    .action(run(async (projectName: string, options: Omit<InitOptions, 'verbose'>) => {
      await initProject(projectName, { ...options, verbose: logger.isVerbose() });
    }));

  program
    .command('create')
    .description('Create a FastAPI project from explicit flags, without prompting')
    .argument('<project_name>', 'Name of the project directory to create')
    .option('--db <kind>', 'Database: sqlite, postgresql, mongodb, supabase, firebase', 'sqlite')
    .option('--auth <kind>', 'Authentication: jwt, supabase, firebase, none', 'jwt')
    .option('--features <csv>', 'Comma-separated features: alembic, docker, testing, cors, rate_limiting', '')
    .option('--no-install', 'Write the files only; skip virtual environment and dependency installation')
    .action(run(async (projectName: string, options: Omit<CreateOptions, 'verbose'>) => {
      await createProject(projectName, { ...options, verbose: logger.isVerbose() });
    }));

  program
    .command('routers')
    .description('Create a router in app/routers/ and register it in app/main.py')
    .argument('<router_name>', 'Router module name (a Python identifier)')
    .argument('[project_name]', 'Project directory', '.')
    .action(run(async (routerName: string, projectName: string) => {
      await addRouter(routerName, projectName);
    }));

  program
    .command('add')
    .description('Install a package into the project venv and refresh requirements.txt')
    .argument('<package_name>', 'Package to install, optionally with a version specifier')
    .argument('[project_name]', 'Project directory', '.')
    .action(run(async (packageName: string, projectName: string) => {
      await addPackage(packageName, projectName, logger.isVerbose());
    }));

  program
    .command('makemigrations')
    .description('Autogenerate an Alembic migration')
    .argument('[message]', 'Migration message', DEFAULT_MIGRATION_MESSAGE)
    .argument('[project_name]', 'Project directory', '.')
    .action(run(async (message: string, projectName: string) => {
      await makeMigrationsCommand(message, projectName);
    }));

  program
    .command('migrate')
    .description('Apply all pending Alembic migrations')
    .argument('[project_name]', 'Project directory', '.')
    .action(run(async (projectName: string) => {
      await migrateCommand(projectName);
    }));

  program
    .command('presets')
    .description('Show example invocations for common stacks')
    .action(run(() => {
      showPresets();
    }));

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
