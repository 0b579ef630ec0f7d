import path from 'path';
import semver from 'semver';
import { logger } from '../utils/logger.js';
import { execTool, resolvePython, venvBinary, type CommandRunner } from '../utils/cli.js';
import { createValidationError } from '../utils/errors.js';
import { withProgress } from '../utils/progress.js';
import type { ProjectConfiguration } from '../engine/types.js';

export interface SetupStep {
  label: string;
  success: string;
  failure: string;
  command: string;
  args: string[];
}

export interface EnvironmentSetupOptions {
  runner?: CommandRunner;
  python?: string;
  verbose?: boolean;
}

// Oldest interpreter the pinned base requirements install on
export const MIN_PYTHON_VERSION = '3.9.0';

export function parsePythonVersion(output: string): string | undefined {
  return semver.coerce(output)?.version;
}

/**
 * Asks the interpreter for its version. Python 2 prints it on stderr.
 */
export async function checkPythonVersion(python: string, runner: CommandRunner = execTool): Promise<string> {
  const { stdout, stderr } = await runner(python, ['--version']);
  const version = parsePythonVersion(stdout || stderr);

  if (!version) {
    throw createValidationError('python interpreter', python, ['must print its version for --version']);
  }
  if (!semver.gte(version, MIN_PYTHON_VERSION)) {
    throw createValidationError('python version', version, [
      `must be ${MIN_PYTHON_VERSION} or newer`,
      'set FASTAPI_KIT_PYTHON to a newer interpreter'
    ]);
  }

  logger.debug(`Using Python ${version}`);
  return version;
}

/**
 * The blocking steps that follow a write: create venv/, install the manifest,
 * and initialise Alembic when it was selected.
 */
export function planEnvironmentSetup(directory: string, config: ProjectConfiguration, python: string): SetupStep[] {
  const steps: SetupStep[] = [
    {
      label: 'Creating virtual environment',
      success: 'Virtual environment created',
      failure: 'Failed to create virtual environment',
      command: python,
      args: ['-m', 'venv', path.join(directory, 'venv')]
    },
    {
      label: 'Installing dependencies in virtual environment',
      success: 'Dependencies installed',
      failure: 'Failed to install dependencies',
      command: venvBinary(directory, 'pip'),
      args: ['install', '-r', path.join(directory, 'requirements.txt')]
    }
  ];

  if (config.features.has('alembic')) {
    steps.push({
      label: 'Initializing Alembic migrations',
      success: 'Alembic initialized',
      failure: 'Failed to initialize Alembic',
      command: venvBinary(directory, 'alembic'),
      args: ['init', 'alembic']
    });
  }

  return steps;
}

/**
 * Runs the setup steps in order. The first failure aborts the rest and is
 * rethrown as is; files already on disk are left for inspection.
 */
export async function setupEnvironment(
  directory: string,
  config: ProjectConfiguration,
  options: EnvironmentSetupOptions = {}
): Promise<void> {
  const runner = options.runner ?? execTool;
  const python = options.python ?? await resolvePython();
  const verbose = options.verbose ?? false;

  await checkPythonVersion(python, runner);

  for (const step of planEnvironmentSetup(directory, config, python)) {
    await withProgress(
      step.label,
      () => runner(step.command, step.args, { cwd: directory, stdio: verbose ? 'inherit' : 'pipe' }),
      { success: step.success, failure: step.failure },
      verbose
    );
  }
}
