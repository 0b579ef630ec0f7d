import { databaseFragment, featureFragment } from './catalog.js';
import { orderedFeatures, type IdentityBundle, type ProjectConfiguration } from './types.js';

export type EntrySectionName = 'imports' | 'app' | 'schema' | 'middleware' | 'routers' | 'shutdown' | 'health';

export interface EntrySection {
  name: EntrySectionName;
  lines: string[];
}

export const FRAMEWORK_IMPORT = 'from fastapi import FastAPI';
export const AUTH_ROUTER_IMPORT = 'from .routers.auth import router as auth_router';
export const AUTH_ROUTER_REGISTRATION = 'app.include_router(auth_router)';

const HEALTH_ROUTE = [
  '@app.get("/")',
  'def home():',
  '    return {"message": "Hello world"}'
];

/**
 * Lays out app/main.py as named sections in a fixed order. Empty sections are
 * kept here so callers can inspect them; rendering drops them.
 */
export function buildEntrySections(config: ProjectConfiguration, identity: IdentityBundle | undefined): EntrySection[] {
  const database = databaseFragment(config.database);
  const features = orderedFeatures(config.features).map(featureFragment);

  const imports = [FRAMEWORK_IMPORT, ...database.imports];
  if (identity) {
    imports.push(AUTH_ROUTER_IMPORT);
  }
  for (const feature of features) {
    imports.push(...feature.imports);
  }

  const middleware: string[] = [];
  for (const feature of features) {
    if (feature.entry.middleware.length === 0) continue;
    if (middleware.length > 0) {
      middleware.push('');
    }
    middleware.push(...feature.entry.middleware);
  }

  return [
    { name: 'imports', lines: imports },
    { name: 'app', lines: ['app = FastAPI()'] },
    { name: 'schema', lines: [...database.entry.schemaInit] },
    { name: 'middleware', lines: middleware },
    { name: 'routers', lines: identity ? [AUTH_ROUTER_REGISTRATION] : [] },
    { name: 'shutdown', lines: [...database.entry.shutdown] },
    { name: 'health', lines: [...HEALTH_ROUTE] }
  ];
}

export function renderEntrySections(sections: readonly EntrySection[]): string {
  return sections
    .filter(section => section.lines.length > 0)
    .map(section => section.lines.join('\n'))
    .join('\n\n') + '\n';
}

export function buildEntryPoint(config: ProjectConfiguration, identity: IdentityBundle | undefined): string {
  return renderEntrySections(buildEntrySections(config, identity));
}
