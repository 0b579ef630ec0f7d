import { randomBytes } from 'crypto';

export const DEFAULT_ALGORITHM = 'HS256';
export const DEFAULT_TOKEN_LIFETIME_MINUTES = 30;

/**
 * 32 random bytes as a URL-safe token, drawn fresh on every call.
 */
export function generateSecret(): string {
  return randomBytes(32).toString('base64url');
}

/**
 * Base keys go in first, then the database keys, then the identity keys. A key
 * that is already present is skipped, so the earlier value always wins.
 */
export function buildEnvironment(
  databaseEnv: Readonly<Record<string, string>>,
  secret: string,
  identityEnv: Readonly<Record<string, string>> = {}
): Map<string, string> {
  const env = new Map<string, string>([
    ['SECRET_KEY', secret],
    ['ALGORITHM', DEFAULT_ALGORITHM],
    ['ACCESS_TOKEN_EXPIRE_MINUTES', String(DEFAULT_TOKEN_LIFETIME_MINUTES)]
  ]);

  for (const source of [databaseEnv, identityEnv]) {
    for (const [key, value] of Object.entries(source)) {
      if (!env.has(key)) {
        env.set(key, value);
      }
    }
  }

  return env;
}

export function renderEnvironment(env: ReadonlyMap<string, string>): string {
  let content = '';
  for (const [key, value] of env) {
    content += `${key}=${value}\n`;
  }
  return content;
}
