import picomatch from 'picomatch';

const GLOB_CHARS = /[*?[\]{}]/;

const matchers = new Map<string, (path: string) => boolean>();

export function isGlobPattern(pattern: string): boolean {
  return GLOB_CHARS.test(pattern);
}

function matcherFor(pattern: string): (path: string) => boolean {
  let matcher = matchers.get(pattern);
  if (!matcher) {
    matcher = picomatch(pattern, { dot: true });
    matchers.set(pattern, matcher);
  }
  return matcher;
}

/**
 * A pattern with glob characters is a picomatch glob; anything else is a
 * prefix, and the empty prefix matches every path.
 */
export function matchesPattern(pattern: string, path: string): boolean {
  return isGlobPattern(pattern) ? matcherFor(pattern)(path) : path.startsWith(pattern);
}

export function matchesAny(patterns: readonly string[], path: string): boolean {
  return patterns.some(pattern => matchesPattern(pattern, path));
}

function literalPrefixOf(pattern: string): string {
  const match = GLOB_CHARS.exec(pattern);
  return match ? pattern.slice(0, match.index) : pattern;
}

/**
 * Whether everything `child` can match is also matched by `parent`.
 * A glob parent of the form `<dir>/**` contains every pattern under `<dir>/`;
 * any other glob parent contains only itself.
 */
export function patternWithin(child: string, parent: string): boolean {
  if (!isGlobPattern(parent)) {
    return child.startsWith(parent);
  }
  if (child === parent) {
    return true;
  }
  const base = literalPrefixOf(parent);
  const isSubtree = parent === `${base}**` && (base === '' || base.endsWith('/'));
  return isSubtree && literalPrefixOf(child).startsWith(base);
}

/**
 * Child patterns not contained by any of the parent patterns.
 */
export function patternsOutside(children: readonly string[], parents: readonly string[]): string[] {
  return children.filter(child => !parents.some(parent => patternWithin(child, parent)));
}
