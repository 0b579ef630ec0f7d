export const DATABASE_KINDS = ['sqlite', 'postgresql', 'mongodb', 'supabase', 'firebase'] as const;
export const AUTH_KINDS = ['jwt', 'supabase', 'firebase', 'none'] as const;

/**
 * Canonical feature order. Composition always walks features in this order,
 * whatever order the caller supplied them in.
 */
export const FEATURE_KINDS = ['alembic', 'docker', 'testing', 'cors', 'rate_limiting'] as const;

export type DatabaseKind = (typeof DATABASE_KINDS)[number];
export type AuthKind = (typeof AUTH_KINDS)[number];
export type FeatureKind = (typeof FEATURE_KINDS)[number];

export type Dimension = 'database' | 'auth' | 'feature';

export type FragmentKey =
  | { dimension: 'database'; choice: DatabaseKind }
  | { dimension: 'auth'; choice: AuthKind }
  | { dimension: 'feature'; choice: FeatureKind };

export interface ProjectConfiguration {
  readonly name: string;
  readonly database: DatabaseKind;
  readonly auth: AuthKind;
  readonly features: ReadonlySet<FeatureKind>;
}

export type FileMap = Readonly<Record<string, string>>;

/**
 * Lines a fragment splices into the generated entry point.
 */
export interface EntrySnippets {
  readonly schemaInit: readonly string[];
  readonly middleware: readonly string[];
  readonly shutdown: readonly string[];
}

/**
 * Identity module plus auth router, shipped as a unit so the router always
 * imports what the identity module actually defines.
 */
export interface IdentityBundle {
  readonly id: string;
  readonly files: FileMap;
  readonly dependencies: readonly string[];
  /** Keys the identity module reads, appended after the database keys */
  readonly env: Readonly<Record<string, string>>;
  /** Whether the router hashes passwords locally through app/utils.py */
  readonly hashing: boolean;
}

export interface TemplateFragment {
  readonly files: FileMap;
  readonly env: Readonly<Record<string, string>>;
  readonly dependencies: readonly string[];
  readonly imports: readonly string[];
  readonly auxiliaryFiles: FileMap;
  readonly entry: EntrySnippets;
  readonly identity?: IdentityBundle;
}

export type FileSet = ReadonlyMap<string, string>;

export type DependencyManifest = readonly string[];

export function isDatabaseKind(value: string): value is DatabaseKind {
  return DATABASE_KINDS.some(kind => kind === value);
}

export function isAuthKind(value: string): value is AuthKind {
  return AUTH_KINDS.some(kind => kind === value);
}

export function isFeatureKind(value: string): value is FeatureKind {
  return FEATURE_KINDS.some(kind => kind === value);
}

/**
 * Features of a configuration in canonical order.
 */
export function orderedFeatures(features: ReadonlySet<FeatureKind>): FeatureKind[] {
  return FEATURE_KINDS.filter(feature => features.has(feature));
}
