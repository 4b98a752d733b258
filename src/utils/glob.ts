/**
 * Glob patterns for file names and exclusion rules: `*` (no slash), `**`
 * (any depth), `?` and `[abc]` classes.
 */

function escapeRegExp(text: string): string {
  return text.replace(/[.+^${}()|\\]/g, '\\$&');
}

export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);
    if (char === '*') {
      if (pattern.charAt(i + 1) === '*') {
        const slashFollows = pattern.charAt(i + 2) === '/';
        source += slashFollows ? '(?:.*/)?' : '.*';
        i += slashFollows ? 2 : 1;
      } else {
        source += '[^/]*';
      }
    } else if (char === '?') {
      source += '[^/]';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close < 0) {
        source += '\\[';
      } else {
        source += `[${pattern.slice(i + 1, close).replace(/^!/, '^').replace(/\\/g, '\\\\')}]`;
        i = close;
      }
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`);
}

/**
 * Matches a forward-slash path against a glob. Patterns without a slash
 * match the final path segment; others match the tail of the path.
 */
export function matchesGlob(path: string, pattern: string): boolean {
  const regex = globToRegExp(pattern);
  if (!pattern.includes('/')) {
    return regex.test(path.slice(path.lastIndexOf('/') + 1));
  }
  if (regex.test(path)) {
    return true;
  }
  const segments = path.split('/');
  for (let start = 1; start < segments.length; start++) {
    if (regex.test(segments.slice(start).join('/'))) {
      return true;
    }
  }
  return false;
}
