import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { createCatalogGapError } from '../utils/errors.js';

// src/engine and dist/engine both sit two levels below the package root
export const TEMPLATES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'templates');

/**
 * Reads a template asset relative to templates/. A missing asset means the
 * catalog references something that was never shipped.
 */
export function readTemplate(relativePath: string): string {
  const templatePath = path.join(TEMPLATES_DIR, relativePath);
  if (!fs.pathExistsSync(templatePath)) {
    throw createCatalogGapError('template asset', relativePath);
  }
  return fs.readFileSync(templatePath, 'utf-8');
}

/**
 * Reads a template asset as a list of lines, without the trailing newline.
 */
export function readTemplateLines(relativePath: string): string[] {
  return readTemplate(relativePath).replace(/\n+$/, '').split('\n');
}

/**
 * Reads a one-specifier-per-line list, skipping blanks and # comments.
 */
export function readSpecifierList(relativePath: string): string[] {
  return readTemplate(relativePath)
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

export function renderTemplate(content: string, replacements: Record<string, string>): string {
  let rendered = content;
  for (const [placeholder, value] of Object.entries(replacements)) {
    rendered = rendered.replace(new RegExp(placeholder.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'g'), () => value);
  }
  return rendered;
}
