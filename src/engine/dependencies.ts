import {
  BASE_RUNTIME_DEPENDENCIES,
  PASSWORD_HASHING_DEPENDENCIES,
  databaseFragment,
  featureFragment
} from './catalog.js';
import { selectIdentity } from './identity.js';
import { orderedFeatures, type DependencyManifest, type ProjectConfiguration } from './types.js';

/**
 * Concatenates every contribution, drops exact duplicates and sorts by code
 * unit. `pkg==1.0` and `pkg==2.0` are different strings and both survive;
 * version conflicts are left for the user to settle.
 */
export function mergeDependencies(contributions: ReadonlyArray<readonly string[]>): DependencyManifest {
  const unique = new Set<string>();
  for (const specifiers of contributions) {
    for (const specifier of specifiers) {
      unique.add(specifier);
    }
  }
  return Object.freeze([...unique].sort());
}

export function requiresPasswordHashing(config: ProjectConfiguration): boolean {
  return selectIdentity(config)?.hashing ?? false;
}

export function resolveDependencies(config: ProjectConfiguration): DependencyManifest {
  const contributions: Array<readonly string[]> = [
    BASE_RUNTIME_DEPENDENCIES,
    databaseFragment(config.database).dependencies,
    selectIdentity(config)?.dependencies ?? [],
    ...orderedFeatures(config.features).map(feature => featureFragment(feature).dependencies)
  ];

  if (requiresPasswordHashing(config)) {
    contributions.push(PASSWORD_HASHING_DEPENDENCIES);
  }

  return mergeDependencies(contributions);
}

export function renderManifest(manifest: DependencyManifest): string {
  return manifest.join('\n') + '\n';
}
