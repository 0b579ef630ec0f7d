import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export function createSpinner(message: string, verbose: boolean = false): Ora | null {
  if (verbose) {
    console.log(chalk.gray(`  ${message}...`));
    return null;
  }
  return ora({ text: message, spinner: 'line' }).start();
}

export function succeedSpinner(spinner: Ora | null, message?: string, verbose: boolean = false): void {
  if (verbose) {
    if (message) {
      console.log(chalk.green(`  ✓ ${message}`));
    }
  } else if (spinner) {
    spinner.succeed(message);
  }
}

export function failSpinner(spinner: Ora | null, message?: string, verbose: boolean = false): void {
  if (verbose) {
    if (message) {
      console.log(chalk.red(`  ✗ ${message}`));
    }
  } else if (spinner) {
    spinner.fail(message);
  }
}

/**
 * Runs an operation behind a spinner. Failures mark the spinner and are
 * rethrown unchanged.
 */
export async function withProgress<T>(
  message: string,
  operation: () => Promise<T>,
  messages: { success?: string; failure?: string } = {},
  verbose: boolean = false
): Promise<T> {
  const spinner = createSpinner(message, verbose);

  try {
    const result = await operation();
    succeedSpinner(spinner, messages.success, verbose);
    return result;
  } catch (error) {
    failSpinner(spinner, messages.failure, verbose);
    throw error;
  }
}
