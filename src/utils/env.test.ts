import { describe, it, expect, afterEach } from 'vitest';
import { clearEnvContext, getEnv, getToolSettings, setEnvContext } from './env.js';

afterEach(() => {
  clearEnvContext();
});

describe('getEnv', () => {
  it('treats empty values as unset', () => {
    setEnvContext({ EMPTY: '', SET: 'value' });

    expect(getEnv('EMPTY', 'fallback')).toBe('fallback');
    expect(getEnv('SET')).toBe('value');
    expect(getEnv('MISSING')).toBeUndefined();
  });
});

describe('getToolSettings', () => {
  it('reads the interpreter and verbose flag', () => {
    setEnvContext({ FASTAPI_KIT_PYTHON: 'python3.11', FASTAPI_KIT_VERBOSE: 'TRUE' });

    expect(getToolSettings()).toEqual({ python: 'python3.11', verbose: true });
  });

  it('defaults to auto-detection and quiet output', () => {
    setEnvContext({ FASTAPI_KIT_VERBOSE: '0' });

    expect(getToolSettings()).toEqual({ python: undefined, verbose: false });
  });
});
