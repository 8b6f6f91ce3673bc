const REGEXP_SPECIAL = /[.*+?^${}()|[\]\\]/;

/**
 * Compile a path glob to an anchored RegExp. `*` matches a run of non-`/`
 * characters, `?` a single non-`/` character, and a run of two or more `*`
 * crosses separators. Everything else is literal.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern.charAt(i);
    if (ch === '*') {
      let run = 1;
      while (pattern.charAt(i + run) === '*') run++;
      source += run > 1 ? '.*' : '[^/]*';
      i += run;
      continue;
    }
    if (ch === '?') {
      source += '[^/]';
    } else if (REGEXP_SPECIAL.test(ch)) {
      source += `\\${ch}`;
    } else {
      source += ch;
    }
    i++;
  }
  return new RegExp(`^${source}$`);
}

export function globMatch(pattern: string, path: string): boolean {
  return globToRegExp(pattern).test(path);
}
