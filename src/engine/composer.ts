import { renderTemplate } from './assets.js';
import { BASE_TEMPLATES, OUTPUT_PATHS, authFragment, databaseFragment, featureFragment } from './catalog.js';
import { renderManifest, resolveDependencies } from './dependencies.js';
import { buildEntryPoint } from './entryPoint.js';
import { buildEnvironment, generateSecret, renderEnvironment } from './environment.js';
import { selectIdentity } from './identity.js';
import { orderedFeatures, type FileSet, type ProjectConfiguration, type TemplateFragment } from './types.js';

export interface ComposeOptions {
  /** Source of SECRET_KEY; defaults to a fresh cryptographically secure token */
  generateSecret?: () => string;
}

class FileSetBuilder {
  private readonly files = new Map<string, string>();

  add(path: string, content: string): void {
    if (this.files.has(path)) {
      throw new Error(`Composition produced "${path}" twice`);
    }
    this.files.set(path, content);
  }

  build(replacements: Record<string, string>): FileSet {
    const rendered = new Map<string, string>();
    for (const [path, content] of this.files) {
      rendered.set(path, renderTemplate(content, replacements));
    }
    return rendered;
  }
}

/**
 * Returns the first override of `path` among the fragments' `files`, in the
 * order given.
 */
function primaryContent(path: string, fragments: readonly TemplateFragment[], fallback: string): string {
  for (const fragment of fragments) {
    const content = fragment.files[path];
    if (content !== undefined) {
      return content;
    }
  }
  return fallback;
}

/**
 * Composes the complete file set for a configuration. Fragments are always
 * consulted database first, then auth, then features in canonical order, so
 * the caller's feature order never shows up in the output. The whole set is
 * built in memory; nothing here touches the filesystem.
 */
export function compose(config: ProjectConfiguration, options: ComposeOptions = {}): FileSet {
  const database = databaseFragment(config.database);
  const auth = authFragment(config.auth);
  const features = orderedFeatures(config.features).map(featureFragment);
  const fragments = [database, auth, ...features];
  const identity = selectIdentity(config);
  const secret = (options.generateSecret ?? generateSecret)();

  const files = new FileSetBuilder();
  files.add(OUTPUT_PATHS.gitignore, BASE_TEMPLATES.gitignore);
  files.add(OUTPUT_PATHS.env, renderEnvironment(buildEnvironment(database.env, secret, identity?.env)));
  files.add(OUTPUT_PATHS.requirements, renderManifest(resolveDependencies(config)));
  files.add(OUTPUT_PATHS.appInit, '');
  files.add(OUTPUT_PATHS.main, buildEntryPoint(config, identity));
  files.add(OUTPUT_PATHS.database, primaryContent(OUTPUT_PATHS.database, fragments, ''));
  files.add(OUTPUT_PATHS.models, primaryContent(OUTPUT_PATHS.models, fragments, BASE_TEMPLATES.models));
  files.add(OUTPUT_PATHS.schemas, primaryContent(OUTPUT_PATHS.schemas, fragments, BASE_TEMPLATES.schemas));
  files.add(OUTPUT_PATHS.utils, identity?.hashing ? BASE_TEMPLATES.hashingUtils : '');

  if (identity) {
    files.add(OUTPUT_PATHS.oauth2, identity.files[OUTPUT_PATHS.oauth2] ?? '');
  }
  files.add(OUTPUT_PATHS.routersInit, '');
  if (identity) {
    files.add(OUTPUT_PATHS.authRouter, identity.files[OUTPUT_PATHS.authRouter] ?? '');
  }

  // An auxiliary file ships only with the fragment that contributes it, but an
  // earlier fragment (usually the database) may supply its content
  for (const fragment of fragments) {
    for (const [path, content] of Object.entries(fragment.auxiliaryFiles)) {
      files.add(path, primaryContent(path, fragments, content));
    }
  }

  return files.build({ '{{PROJECT_NAME}}': config.name });
}
