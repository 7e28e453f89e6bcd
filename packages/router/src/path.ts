/**
 * Route path grammar: word segments separated by single slashes, with an
 * optional trailing slash. No leading slash, no empty segments.
 */
const ROUTE_PATH = /^(\w+\/)*\w+\/?$/;

const SLASH = "/";

export function isValidPath(path: string): boolean {
  return ROUTE_PATH.test(path);
}

/**
 * Append a trailing slash unless the path already ends with one.
 */
export function normalizePath(path: string): string {
  return path.endsWith(SLASH) ? path : `${path}${SLASH}`;
}

/**
 * Turn a route path into a base path: validated, normalized and rooted,
 * so it always starts and ends with a slash.
 *
 * Returns null for the root path and for paths that fail validation.
 */
export function toBasePath(path: string): string | null {
  if (path === SLASH || !isValidPath(path)) {
    return null;
  }
  return `${SLASH}${normalizePath(path)}`;
}
