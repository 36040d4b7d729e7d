export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const PY_NAMED_GROUP_REGEX = /\(\?P<([A-Za-z_]\w*)>/g;
const PY_NAMED_BACKREF_REGEX = /\(\?P=([A-Za-z_]\w*)\)/g;
const PY_ANCHOR_REGEX = /\\[\\AZ]/g;
const PY_INLINE_FLAGS_REGEX = /^\(\?([aiLmsux]+)\)/;

const PY_ANCHORS: Record<string, string> = {
  "\\A": "(?<![\\s\\S])",
  "\\Z": "$(?![\\s\\S])",
};

/**
 * Settings files are commonly written with `(?P<name>...)` style groups and
 * `\A`/`\Z` anchors. Rewrites those into the JavaScript spelling; plain
 * JavaScript patterns pass through unchanged.
 */
export function toJavaScriptPattern(pattern: string): string {
  return pattern
    .replace(PY_NAMED_GROUP_REGEX, "(?<$1>")
    .replace(PY_NAMED_BACKREF_REGEX, "\\k<$1>")
    .replace(PY_ANCHOR_REGEX, (token) => PY_ANCHORS[token] ?? token);
}

export interface InlineFlags {
  source: string;
  flags: string;
}

// Drops unescaped whitespace and `#` comments outside character classes.
function stripVerbose(source: string): string {
  let out = "";
  let inClass = false;
  for (let i = 0; i < source.length; i += 1) {
    const ch = source[i] ?? "";
    if (ch === "\\") {
      out += source.slice(i, i + 2);
      i += 1;
    } else if (inClass) {
      out += ch;
      inClass = ch !== "]";
    } else if (ch === "#") {
      const end = source.indexOf("\n", i);
      i = end === -1 ? source.length : end;
    } else if (!/\s/.test(ch)) {
      out += ch;
      inClass = ch === "[";
    }
  }
  return out;
}

/**
 * Lifts leading inline flag groups such as `(?i)` or `(?sm)` off a pattern
 * and returns them as `RegExp` flags. `a`, `L` and `u` have no JavaScript
 * counterpart and are dropped; `x` is applied to the source directly.
 */
export function extractInlineFlags(pattern: string): InlineFlags {
  let source = pattern;
  const letters = new Set<string>();
  let match = PY_INLINE_FLAGS_REGEX.exec(source);
  while (match?.[1] !== undefined) {
    for (const letter of match[1]) {
      letters.add(letter);
    }
    source = source.slice(match[0].length);
    match = PY_INLINE_FLAGS_REGEX.exec(source);
  }

  if (letters.has("x")) {
    source = stripVerbose(source);
  }
  const flags = ["i", "m", "s"].filter((flag) => letters.has(flag)).join("");
  return { source, flags };
}

const REPLACEMENT_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
};

// Group 0 is the whole match, which JavaScript spells `$&`.
function groupReference(digits: string): string {
  const index = Number(digits);
  return index === 0 ? "$&" : `$${index}`;
}

/**
 * Converts a replacement template that may use `\1` or `\g<name>`
 * back-references into a `String.prototype.replace` template. Literal `$`
 * signs are escaped so they are never read as JavaScript group references.
 */
export function toJavaScriptReplacement(template: string): string {
  let out = "";
  let i = 0;
  while (i < template.length) {
    const ch = template[i] ?? "";
    if (ch === "$") {
      out += "$$";
      i += 1;
      continue;
    }
    if (ch !== "\\" || i + 1 >= template.length) {
      out += ch;
      i += 1;
      continue;
    }

    const next = template[i + 1] ?? "";
    const named = /^g<(\w+)>/.exec(template.slice(i + 1));
    if (named?.[1] !== undefined) {
      const ref = named[1];
      out += /^\d+$/.test(ref) ? groupReference(ref) : `$<${ref}>`;
      i += 1 + named[0].length;
      continue;
    }
    const numbered = /^\d{1,2}/.exec(template.slice(i + 1));
    if (numbered) {
      out += groupReference(numbered[0]);
      i += 1 + numbered[0].length;
      continue;
    }
    out += REPLACEMENT_ESCAPES[next] ?? `\\${next}`;
    i += 2;
  }
  return out;
}
