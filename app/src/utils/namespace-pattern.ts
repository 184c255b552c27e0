/**
 * Namespace glob matching.
 *
 * Patterns use `*` as a wildcard for any (possibly empty) run of
 * characters, e.g. `production-*`, `*-prod`, `prod`. Everything else
 * matches literally. Compiled patterns are cached per pattern string.
 */

const compiled = new Map<string, RegExp>();

function compile(pattern: string): RegExp {
  let re = compiled.get(pattern);
  if (!re) {
    const body = pattern
      .split('*')
      .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
      .join('.*');
    re = new RegExp(`^${body}$`);
    compiled.set(pattern, re);
  }
  return re;
}

export function matchesNamespacePattern(namespace: string, pattern: string): boolean {
  return compile(pattern).test(namespace);
}

export function matchesAnyNamespacePattern(
  namespace: string,
  patterns: readonly string[],
): boolean {
  return patterns.some((p) => matchesNamespacePattern(namespace, p));
}
