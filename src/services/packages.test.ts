import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { installPackage } from './packages.js';
import { applyMigrations, makeMigrations } from './migrations.js';
import { venvBinary, type CommandRunner } from '../utils/cli.js';
import { ValidationError } from '../utils/errors.js';

let projectDir: string;

beforeEach(async () => {
  projectDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fastapi-kit-packages-'));
});

afterEach(async () => {
  await fs.remove(projectDir);
});

function freezeRunner(freeze: string) {
  return vi.fn<CommandRunner>(async (_command, args) => ({
    stdout: args[0] === 'freeze' ? freeze : '',
    stderr: ''
  }));
}

describe('installPackage', () => {
  it('installs into the venv and rewrites requirements.txt from pip freeze', async () => {
    await fs.ensureDir(path.join(projectDir, 'venv'));
    const runner = freezeRunner('fastapi==0.115.12\nrequests==2.31.0');

    const content = await installPackage(projectDir, 'requests==2.31.0', runner);

    expect(content).toBe('fastapi==0.115.12\nrequests==2.31.0\n');
    expect(await fs.readFile(path.join(projectDir, 'requirements.txt'), 'utf-8')).toBe(content);
    expect(runner.mock.calls.map(call => [call[0], ...call[1]])).toEqual([
      [venvBinary(projectDir, 'pip'), 'install', 'requests==2.31.0'],
      [venvBinary(projectDir, 'pip'), 'freeze']
    ]);
  });

  it('rejects a malformed package name without running pip', async () => {
    await fs.ensureDir(path.join(projectDir, 'venv'));
    const runner = freezeRunner('');

    await expect(installPackage(projectDir, 'requests; rm -rf', runner)).rejects.toBeInstanceOf(ValidationError);
    expect(runner).not.toHaveBeenCalled();
  });

  it('requires a virtual environment', async () => {
    const runner = freezeRunner('');

    await expect(installPackage(projectDir, 'requests', runner)).rejects.toBeInstanceOf(ValidationError);
    expect(runner).not.toHaveBeenCalled();
  });
});

describe('migrations', () => {
  it('autogenerates a revision with the given message', async () => {
    await fs.ensureDir(path.join(projectDir, 'venv'));
    const runner = freezeRunner('');

    await makeMigrations(projectDir, 'add users', runner);

    expect(runner).toHaveBeenCalledWith(venvBinary(projectDir, 'alembic'), ['revision', '--autogenerate', '-m', 'add users'], {
      cwd: projectDir,
      stdio: 'inherit'
    });
  });

  it('upgrades to head', async () => {
    await fs.ensureDir(path.join(projectDir, 'venv'));
    const runner = freezeRunner('');

    await applyMigrations(projectDir, runner);

    expect(runner).toHaveBeenCalledWith(venvBinary(projectDir, 'alembic'), ['upgrade', 'head'], {
      cwd: projectDir,
      stdio: 'inherit'
    });
  });

  it('refuses to run outside a project with a venv', async () => {
    await expect(applyMigrations(projectDir, freezeRunner(''))).rejects.toBeInstanceOf(ValidationError);
  });
});
