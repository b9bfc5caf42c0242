/**
 * Shell-style glob matching for image selection.
 *
 * `*` matches any run of characters, `/` and `:` included, so `*foo*`
 * selects `registry.example.org/ns/foo:1.0`. `?` matches one character,
 * `[abc]` / `[!abc]` a character class. Matching is anchored and
 * case-sensitive.
 *
 * With `pathname` set, wildcards stop at `/` the way file globs do
 * (used for .dockerignore entries).
 */

export interface GlobOptions {
  pathname?: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}

/**
 * Translate a glob into an anchored regular expression.
 */
export function globToRegExp(pattern: string, options: GlobOptions = {}): RegExp {
  const any = options.pathname ? "[^/]" : ".";
  let source = "";
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern.charAt(i);
    i++;
    if (ch === "*") {
      source += `${any}*`;
    } else if (ch === "?") {
      source += any;
    } else if (ch === "[") {
      let j = i;
      if (pattern.charAt(j) === "!") {j++;}
      if (pattern.charAt(j) === "]") {j++;}
      while (j < pattern.length && pattern.charAt(j) !== "]") {j++;}
      if (j >= pattern.length) {
        // Unterminated class: a literal bracket
        source += "\\[";
        continue;
      }
      let body = pattern.slice(i, j).replace(/\\/g, "\\\\");
      i = j + 1;
      if (body.startsWith("!")) {
        body = `^${body.slice(1)}`;
      } else if (body.startsWith("^")) {
        body = `\\${body}`;
      }
      source += `[${body}]`;
    } else {
      source += escapeRegExp(ch);
    }
  }
  return new RegExp(`^${source}$`, "s");
}

export function fnmatch(name: string, pattern: string, options: GlobOptions = {}): boolean {
  return globToRegExp(pattern, options).test(name);
}
