/**
 * Environment variable access for the CLI's own settings.
 */

type EnvLike = Record<string, string | undefined>;

let contextEnv: EnvLike | null = null;

/**
 * Overrides the variable source; tests use this instead of mutating process.env.
 */
export function setEnvContext(env: EnvLike) {
  contextEnv = env;
}

export function clearEnvContext() {
  contextEnv = null;
}

function getEnvSource(): EnvLike {
  return contextEnv || process.env;
}

export function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = getEnvSource()[key];
  return value !== undefined && value !== '' ? value : defaultValue;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

export interface ToolSettings {
  /** Interpreter used to create the project's virtual environment; auto-detected when unset */
  python?: string;
  verbose: boolean;
}

export function getToolSettings(): ToolSettings {
  return {
    python: getEnv('FASTAPI_KIT_PYTHON'),
    verbose: isTruthy(getEnv('FASTAPI_KIT_VERBOSE'))
  };
}
