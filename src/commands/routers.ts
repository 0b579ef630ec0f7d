import fs from 'fs-extra';
import path from 'path';
import { logger } from '../utils/logger.js';
import { createValidationError } from '../utils/errors.js';
import { ROUTER_NAME_REQUIREMENTS, validateRouterName } from '../utils/validation.js';

export function renderRouterStub(routerName: string): string {
  return [
    'from fastapi import APIRouter',
    '',
    `router = APIRouter(prefix='/${routerName}', tags=['${routerName}'])`,
    '',
    '',
    '@router.get("/")',
    'def read_root():',
    `    return {"message": "Hello from ${routerName}!"}`,
    ''
  ].join('\n');
}

export interface WiredSource {
  source: string;
  changed: boolean;
}

/**
 * Adds the router import after the last top-level import of main.py and
 * appends its registration at the end. Leaves the source alone if the import
 * is already there.
 */
export function wireRouter(mainSource: string, routerName: string): WiredSource {
  const importLine = `from .routers.${routerName} import router as ${routerName}_router`;
  const includeLine = `app.include_router(${routerName}_router)`;

  const lines = mainSource.replace(/\n+$/, '').split('\n');
  if (lines.includes(importLine)) {
    return { source: mainSource, changed: false };
  }

  let insertIndex = 0;
  lines.forEach((line, index) => {
    if (line.startsWith('import') || line.startsWith('from')) {
      insertIndex = index + 1;
    }
  });

  lines.splice(insertIndex, 0, importLine);
  lines.push('', includeLine);

  return { source: lines.join('\n') + '\n', changed: true };
}

export async function addRouter(routerName: string, projectPath: string = '.'): Promise<void> {
  if (!validateRouterName(routerName)) {
    throw createValidationError('router name', routerName, ROUTER_NAME_REQUIREMENTS);
  }

  const base = path.resolve(projectPath);
  const routersPath = path.join(base, 'app', 'routers');
  const mainPath = path.join(base, 'app', 'main.py');

  if (!await fs.pathExists(mainPath)) {
    throw createValidationError('project', base, [
      'must contain app/main.py',
      'initialize the project first'
    ]);
  }

  const routerFile = path.join(routersPath, `${routerName}.py`);
  if (await fs.pathExists(routerFile)) {
    logger.warning(`Router '${routerName}' already exists!`);
    return;
  }

  await fs.ensureDir(routersPath);
  if (!await fs.pathExists(path.join(routersPath, '__init__.py'))) {
    await fs.writeFile(path.join(routersPath, '__init__.py'), '');
  }
  await fs.writeFile(routerFile, renderRouterStub(routerName), 'utf-8');

  const wired = wireRouter(await fs.readFile(mainPath, 'utf-8'), routerName);
  if (!wired.changed) {
    logger.info('Router already imported in app/main.py');
    return;
  }

  await fs.writeFile(mainPath, wired.source, 'utf-8');
  logger.success(`Router '${routerName}' created and added to app/main.py`);
}
