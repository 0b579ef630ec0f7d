import path from 'path';
import { execa, ExecaError } from 'execa';
import which from 'which';
import { logger } from './logger.js';
import { getToolSettings } from './env.js';
import { createCLIError } from './errors.js';

export interface RunOptions {
  stdio?: 'pipe' | 'inherit';
  timeout?: number;
  cwd?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs an external command to completion. A non-zero exit rejects with an
 * ExternalToolError carrying the exit code and stderr as the tool printed them.
 */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<CommandResult>;

export const execTool: CommandRunner = async (command, args, options = {}) => {
  const runOptions = {
    stdio: 'pipe' as const,
    timeout: 600000, // 10 minutes; pip installs can be slow
    ...options
  };
  const commandLine = [command, ...args].join(' ');
  const tool = path.basename(command);

  // Bare commands must be on PATH; explicit paths (venv binaries) are run as given
  if (!command.includes('/') && !command.includes('\\')) {
    const resolved = await which(command, { nothrow: true });
    if (!resolved) {
      throw createCLIError(tool, commandLine, new Error(`${command} is not installed or not available in PATH`));
    }
    logger.debug(`Using ${resolved}`);
  }

  logger.debug(`Running: ${commandLine}${runOptions.cwd ? ` (in ${runOptions.cwd})` : ''}`);

  try {
    const result = await execa(command, args, runOptions);
    return {
      stdout: String(result.stdout ?? ''),
      stderr: String(result.stderr ?? '')
    };
  } catch (error) {
    if (error instanceof ExecaError) {
      throw createCLIError(tool, commandLine, error, {
        exitCode: error.exitCode,
        stderr: String(error.stderr ?? '')
      });
    }
    if (error instanceof Error) {
      throw createCLIError(tool, commandLine, error);
    }
    throw createCLIError(tool, commandLine, new Error(String(error)));
  }
};

/**
 * Interpreter for creating virtual environments: FASTAPI_KIT_PYTHON when set,
 * otherwise python3 if it is on PATH, otherwise python.
 */
export async function resolvePython(): Promise<string> {
  const { python } = getToolSettings();
  if (python) {
    return python;
  }
  const python3 = await which('python3', { nothrow: true });
  return python3 ? 'python3' : 'python';
}

export function venvBinary(directory: string, tool: string, platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32'
    ? path.join(directory, 'venv', 'Scripts', tool)
    : path.join(directory, 'venv', 'bin', tool);
}
