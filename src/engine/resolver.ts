import { logger } from '../utils/logger.js';
import { createCancelledError, createValidationError } from '../utils/errors.js';
import { PROJECT_NAME_REQUIREMENTS, validateProjectName } from '../utils/validation.js';
import {
  AUTH_KINDS,
  DATABASE_KINDS,
  FEATURE_KINDS,
  isAuthKind,
  isDatabaseKind,
  isFeatureKind,
  orderedFeatures,
  type AuthKind,
  type DatabaseKind,
  type FeatureKind,
  type ProjectConfiguration
} from './types.js';

export interface MenuOption<T> {
  label: string;
  value: T;
}

/**
 * A numbered menu. Selection is 1-based; `defaultIndex` is 0-based into
 * `options` and is used for empty, malformed or out-of-range input.
 */
export interface NumberedMenu<T> {
  title: string;
  options: MenuOption<T>[];
  defaultIndex: number;
}

export interface Question {
  message: string;
  default: string;
}

/**
 * Interactive I/O used by resolveInteractive. The production implementation
 * is backed by inquirer; tests script the answers.
 */
export interface Prompter {
  /** Shows the menu and returns the raw text the user typed */
  ask(menu: NumberedMenu<unknown>, question: Question): Promise<string>;
  confirm(message: string, summary: string[]): Promise<boolean>;
}

export const DATABASE_LABELS: Record<DatabaseKind, string> = {
  sqlite: 'SQLite',
  postgresql: 'PostgreSQL',
  mongodb: 'MongoDB',
  supabase: 'Supabase',
  firebase: 'Firebase Firestore'
};

export const AUTH_LABELS: Record<AuthKind, string> = {
  jwt: 'JWT Authentication',
  supabase: 'Supabase Auth',
  firebase: 'Firebase Auth',
  none: 'No authentication'
};

export const FEATURE_LABELS: Record<FeatureKind, string> = {
  alembic: 'Alembic (Database migrations)',
  docker: 'Docker (Containerization)',
  testing: 'Testing setup (pytest + test files)',
  cors: 'CORS middleware',
  rate_limiting: 'Rate limiting'
};

export function databaseMenu(): NumberedMenu<DatabaseKind> {
  return {
    title: '🗄️  Select your database:',
    options: [
      { label: 'SQLite (Default - File-based, great for development)', value: 'sqlite' },
      { label: 'PostgreSQL (Robust relational database)', value: 'postgresql' },
      { label: 'MongoDB (NoSQL document database)', value: 'mongodb' },
      { label: 'Supabase (Backend-as-a-Service with PostgreSQL)', value: 'supabase' },
      { label: "Firebase Firestore (Google's NoSQL cloud database)", value: 'firebase' }
    ],
    defaultIndex: 0
  };
}

/**
 * The auth menu depends on the database: managed backends offer their own
 * identity provider first.
 */
export function authMenu(database: DatabaseKind): NumberedMenu<AuthKind> {
  const title = '🔐 Select your authentication method:';
  switch (database) {
    case 'supabase':
      return {
        title,
        options: [
          { label: 'Supabase Auth (Recommended for Supabase)', value: 'supabase' },
          { label: AUTH_LABELS.jwt, value: 'jwt' },
          { label: AUTH_LABELS.none, value: 'none' }
        ],
        defaultIndex: 0
      };
    case 'firebase':
      return {
        title,
        options: [
          { label: 'Firebase Auth (Recommended for Firebase)', value: 'firebase' },
          { label: AUTH_LABELS.jwt, value: 'jwt' },
          { label: AUTH_LABELS.none, value: 'none' }
        ],
        defaultIndex: 0
      };
    default:
      return {
        title,
        options: [
          { label: 'JWT Authentication (Default)', value: 'jwt' },
          { label: AUTH_LABELS.none, value: 'none' }
        ],
        defaultIndex: 0
      };
  }
}

export function featureMenu(): NumberedMenu<FeatureKind> {
  return {
    title: '✨ Select additional features (space-separated numbers, or press Enter for none):',
    options: FEATURE_KINDS.map(feature => ({ label: FEATURE_LABELS[feature], value: feature })),
    defaultIndex: 0
  };
}

function parseIndex(token: string): number | undefined {
  return /^[+-]?\d+$/.test(token) ? Number.parseInt(token, 10) : undefined;
}

/**
 * Maps a typed menu number to its value. Anything that is not a number in
 * range selects the menu default instead of failing.
 */
export function pickFromMenu<T>(menu: NumberedMenu<T>, raw: string): T {
  const fallback = menu.options[menu.defaultIndex];
  if (!fallback) {
    throw new Error(`Menu "${menu.title}" has no option at default index ${menu.defaultIndex}`);
  }

  const index = parseIndex(raw.trim());
  if (index === undefined) {
    return fallback.value;
  }
  return menu.options[index - 1]?.value ?? fallback.value;
}

/**
 * Parses the space-separated feature numbers. A token that is not a number
 * discards the whole answer; numbers outside the menu are dropped.
 */
export function parseFeatureSelection(raw: string): FeatureKind[] {
  const tokens = raw.trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) {
    return [];
  }

  const indexes = tokens.map(parseIndex);
  const selected = new Set<FeatureKind>();
  for (const index of indexes) {
    if (index === undefined) {
      logger.warning('Invalid input. Skipping additional features.');
      return [];
    }
    const feature = FEATURE_KINDS[index - 1];
    if (index >= 1 && feature) {
      selected.add(feature);
    }
  }
  return orderedFeatures(selected);
}

export function createConfiguration(
  name: string,
  database: DatabaseKind,
  auth: AuthKind,
  features: Iterable<FeatureKind> = []
): ProjectConfiguration {
  const trimmed = name.trim();
  if (!validateProjectName(trimmed)) {
    throw createValidationError('project name', name, PROJECT_NAME_REQUIREMENTS);
  }

  return Object.freeze({
    name: trimmed,
    database,
    auth,
    features: new Set(orderedFeatures(new Set(features)))
  });
}

export function defaultConfiguration(name: string): ProjectConfiguration {
  return createConfiguration(name, 'sqlite', 'jwt');
}

export function describeConfiguration(config: ProjectConfiguration): string[] {
  const features = orderedFeatures(config.features);
  return [
    `Project: ${config.name}`,
    `Database: ${DATABASE_LABELS[config.database]}`,
    `Authentication: ${AUTH_LABELS[config.auth]}`,
    `Additional features: ${features.length > 0 ? features.map(feature => FEATURE_LABELS[feature]).join(', ') : 'None'}`
  ];
}

function singleChoice(menu: NumberedMenu<unknown>): Question {
  return {
    message: `Enter your choice (1-${menu.options.length})`,
    default: String(menu.defaultIndex + 1)
  };
}

export async function resolveInteractive(name: string, prompter: Prompter): Promise<ProjectConfiguration> {
  // Validate the name before asking anything
  createConfiguration(name, 'sqlite', 'jwt');

  const databases = databaseMenu();
  const database = pickFromMenu(databases, await prompter.ask(databases, singleChoice(databases)));

  const auths = authMenu(database);
  const auth = pickFromMenu(auths, await prompter.ask(auths, singleChoice(auths)));

  const features = parseFeatureSelection(
    await prompter.ask(featureMenu(), { message: 'Enter your choices', default: '' })
  );

  const config = createConfiguration(name, database, auth, features);

  const proceed = await prompter.confirm('Proceed with this configuration?', describeConfiguration(config));
  if (!proceed) {
    throw createCancelledError('Configuration cancelled');
  }

  return config;
}

export interface ConfigurationFlags {
  name: string;
  db?: string;
  auth?: string;
  features?: string;
}

/**
 * Resolves explicit flags without prompting. Database and auth values must
 * name a known kind; unknown feature tokens are dropped silently.
 */
export function resolveFromFlags(flags: ConfigurationFlags): ProjectConfiguration {
  const db = (flags.db ?? 'sqlite').trim().toLowerCase();
  if (!isDatabaseKind(db)) {
    throw createValidationError('database', flags.db ?? '', [`must be one of: ${DATABASE_KINDS.join(', ')}`]);
  }

  const auth = (flags.auth ?? 'jwt').trim().toLowerCase();
  if (!isAuthKind(auth)) {
    throw createValidationError('auth', flags.auth ?? '', [`must be one of: ${AUTH_KINDS.join(', ')}`]);
  }

  return createConfiguration(flags.name, db, auth, parseFeatureList(flags.features ?? ''));
}

export function parseFeatureList(csv: string): FeatureKind[] {
  const features: FeatureKind[] = [];
  for (const token of csv.split(',')) {
    const normalized = token.trim().toLowerCase().replace(/-/g, '_');
    if (isFeatureKind(normalized)) {
      features.push(normalized);
    } else if (normalized) {
      logger.debug(`Ignoring unknown feature "${token.trim()}"`);
    }
  }
  return features;
}
