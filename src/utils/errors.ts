export class ValidationError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UserCancelledError extends Error {
  readonly exitCode: number = 2;

  constructor(message: string) {
    super(message);
    this.name = 'UserCancelledError';
  }
}

/**
 * A (dimension, choice) pair or template asset that the catalog does not
 * know about. Reaching this is a bug in the catalog, not a user error.
 */
export class CatalogGapError extends Error {
  readonly exitCode: number = 70;

  constructor(message: string) {
    super(message);
    this.name = 'CatalogGapError';
  }
}

export class ExternalToolError extends Error {
  readonly exitCode: number;

  constructor(
    message: string,
    readonly tool: string,
    readonly command: string,
    exitCode: number | undefined,
    readonly stderr: string
  ) {
    super(message);
    this.name = 'ExternalToolError';
    this.exitCode = exitCode ?? 1;
  }
}

export function exitCodeOf(error: unknown): number {
  if (
    error instanceof ValidationError ||
    error instanceof UserCancelledError ||
    error instanceof CatalogGapError ||
    error instanceof ExternalToolError
  ) {
    return error.exitCode;
  }
  return 1;
}

export function createValidationError(field: string, value: string, requirements: string[]): ValidationError {
  const message = `Invalid ${field}: "${value}"\n\nRequirements:\n${requirements.map(req => `  • ${req}`).join('\n')}`;
  return new ValidationError(message);
}

export function createCancelledError(reason: string): UserCancelledError {
  return new UserCancelledError(`${reason}. No files were written.`);
}

export function createCatalogGapError(dimension: string, choice: string): CatalogGapError {
  return new CatalogGapError(`No template fragment registered for ${dimension} "${choice}"`);
}

export function createFileSystemError(operation: string, path: string, originalError: Error): Error {
  const message = `File system error during ${operation} at "${path}": ${originalError.message}`;
  return new Error(message);
}

export function createCLIError(
  tool: string,
  command: string,
  originalError: Error,
  details: { exitCode?: number; stderr?: string } = {}
): ExternalToolError {
  const stderr = details.stderr ?? '';
  let message = `${tool} failed running "${command}": ${originalError.message}`;
  if (stderr) {
    message += `\nStderr: ${stderr}`;
  }
  return new ExternalToolError(message, tool, command, details.exitCode, stderr);
}
