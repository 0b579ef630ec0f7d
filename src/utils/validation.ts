export const PROJECT_NAME_REQUIREMENTS = [
  'must not be empty',
  'must start with a letter or digit',
  'may contain letters, digits, dots, underscores and hyphens'
];

export const ROUTER_NAME_REQUIREMENTS = [
  'must be a valid Python identifier',
  'must start with a letter or underscore',
  'may contain letters, digits and underscores'
];

export function validateProjectName(name: string): boolean {
  // Project name becomes a directory name, so keep it to a portable set:
  // - not empty
  // - starts with a letter or digit
  // - letters, digits, dots, underscores and hyphens only
  // - reasonable length
  const regex = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
  return name.length > 0 && name.length <= 100 && regex.test(name);
}

export function validateRouterName(name: string): boolean {
  // Router names end up in "from .routers.<name> import router as <name>_router"
  const regex = /^[A-Za-z_][A-Za-z0-9_]*$/;
  return regex.test(name);
}

export function validatePackageName(name: string): boolean {
  // Accepts requirement specifiers such as "requests" or "requests==2.31.0"
  const regex = /^[A-Za-z0-9][A-Za-z0-9._-]*(\[[A-Za-z0-9_,.-]+\])?([<>=!~]=?[A-Za-z0-9.*+!-]+)?$/;
  return regex.test(name);
}

export function sanitizeInput(input: string): string {
  // General input sanitization - remove potentially dangerous characters
  return input.trim().replace(/[<>"'&]/g, '');
}
