import { escapeRegExp } from "../core/utils/regex";

export interface ToolBlock {
  name: string;
  /** Index of the opening `<`. */
  start: number;
  /** Index just past the closing tag. */
  end: number;
  markup: string;
}

/**
 * Compiles the pattern `findToolBlocks` scans with, or undefined when there
 * are no tool names to look for.
 */
export function compileToolBlockPattern(
  toolNames: readonly string[]
): RegExp | undefined {
  if (toolNames.length === 0) {
    return;
  }
  const alternatives = [...toolNames]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
  return new RegExp(
    `<(${alternatives})(?:\\s[^<>]*?)?(?:\\/>|>[\\s\\S]*?<\\/\\1\\s*>)`,
    "g"
  );
}

/**
 * Finds every complete `<tool>…</tool>` (or self-closing `<tool/>`) block
 * matched by `pattern`, earliest first. Blocks do not overlap; an opening tag
 * without its closing tag is not a block.
 */
export function findToolBlocks(
  text: string,
  pattern: RegExp | undefined
): ToolBlock[] {
  if (!pattern || !text.includes("<")) {
    return [];
  }
  pattern.lastIndex = 0;

  const blocks: ToolBlock[] = [];
  let match = pattern.exec(text);
  while (match) {
    blocks.push({
      name: match[1] ?? "",
      start: match.index,
      end: match.index + match[0].length,
      markup: match[0],
    });
    match = pattern.exec(text);
  }
  return blocks;
}

export interface ChildElement {
  tag: string;
  attributes: Record<string, string>;
  /** Raw text between the tags, or undefined for a self-closing element. */
  inner: string | undefined;
  start: number;
  end: number;
}

const ATTRIBUTE_REGEX = /([A-Za-z_][\w.:-]*)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

export function parseAttributes(head: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of head.matchAll(ATTRIBUTE_REGEX)) {
    const name = match[1];
    if (name !== undefined) {
      attributes[name] =
        match[2]?.replace(/&quot;/g, '"') ?? match[3] ?? "";
    }
  }
  return attributes;
}

/**
 * Scans `text` for elements named in `tagNames` without interpreting their
 * contents, so values may hold raw `<`, `&` or even other tags.
 */
export function scanChildElements(
  text: string,
  tagNames: readonly string[]
): ChildElement[] {
  if (tagNames.length === 0) {
    return [];
  }
  const alternatives = [...tagNames]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
  const pattern = new RegExp(
    `<(${alternatives})(\\s[^<>]*?)?(?:\\/>|>([\\s\\S]*?)<\\/\\1\\s*>)`,
    "g"
  );

  const elements: ChildElement[] = [];
  for (const match of text.matchAll(pattern)) {
    elements.push({
      tag: match[1] ?? "",
      attributes: parseAttributes(match[2] ?? ""),
      inner: match[3],
      start: match.index ?? 0,
      end: (match.index ?? 0) + match[0].length,
    });
  }
  return elements;
}

export function containsTagOf(
  text: string,
  tagNames: readonly string[]
): boolean {
  return tagNames.some((name) =>
    new RegExp(`<\\/?${escapeRegExp(name)}(?:[\\s/>]|$)`).test(text)
  );
}
