import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { withProgress } from './progress.js';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('withProgress', () => {
  it('prints the step and its outcome as plain lines in verbose mode', async () => {
    const result = await withProgress('Installing requests', async () => 42, { success: 'Installed requests' }, true);

    expect(result).toBe(42);
    expect(vi.mocked(console.log).mock.calls).toEqual([
      [chalk.gray('  Installing requests...')],
      [chalk.green('  ✓ Installed requests')]
    ]);
  });

  it('reports the failure and rethrows the original error', async () => {
    const failure = new Error('pip exited with 1');

    await expect(
      withProgress('Installing requests', async () => Promise.reject(failure), { failure: 'Failed to install requests' }, true)
    ).rejects.toBe(failure);
    expect(console.log).toHaveBeenLastCalledWith(chalk.red('  ✗ Failed to install requests'));
  });
});
