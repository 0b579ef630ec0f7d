import { authFragment, databaseFragment } from './catalog.js';
import type { IdentityBundle, ProjectConfiguration } from './types.js';

/**
 * Picks the identity module and auth router for a configuration.
 *
 * Precedence, first match wins:
 *   1. auth "none": no identity at all
 *   2. the database ships its own identity (MongoDB, Firestore): use it, even
 *      when the caller asked for JWT or a delegated provider
 *   3. otherwise the auth fragment's identity (delegated or local JWT)
 *
 * Once a document backend is chosen the auth kind only decides whether auth
 * exists, not how it works.
 */
export function selectIdentity(config: ProjectConfiguration): IdentityBundle | undefined {
  if (config.auth === 'none') {
    return undefined;
  }

  const databaseIdentity = databaseFragment(config.database).identity;
  if (databaseIdentity) {
    return databaseIdentity;
  }

  return authFragment(config.auth).identity;
}
