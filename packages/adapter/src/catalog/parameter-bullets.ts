import type { ParameterType } from "../core/types";

export interface ParamNode {
  name: string;
  description: string;
  required: boolean;
  typeHint?: ParameterType | "integer";
  children: ParamNode[];
  indent: number;
}

const BULLET_REGEX = /^(\s*)-\s*(\w+)\s*:\s*(.*)$/;
const TYPE_HINT_REGEX = /\((string|number|integer|boolean|array|object)\)/i;

function readTypeHint(description: string): ParamNode["typeHint"] {
  const hint = TYPE_HINT_REGEX.exec(description)?.[1]?.toLowerCase();
  switch (hint) {
    case "string":
    case "number":
    case "integer":
    case "boolean":
    case "array":
    case "object":
      return hint;
    default:
      return;
  }
}

/**
 * Parses an indented bullet list such as
 *
 * ```
 * - args: Contains one or more file elements
 *   - file:
 *     - path: (required) File path
 * ```
 *
 * into a forest. Continuation lines extend the previous bullet's description.
 */
export function parseParameterBullets(
  markdown: string,
  { optional = false }: { optional?: boolean } = {}
): ParamNode[] {
  const roots: ParamNode[] = [];
  const stack: ParamNode[] = [];

  for (const line of markdown.split("\n")) {
    if (line.trim() === "") {
      continue;
    }
    const match = BULLET_REGEX.exec(line);
    if (!match) {
      const last = stack.at(-1);
      if (last) {
        last.description = `${last.description}\n${line.trim()}`.trim();
        last.typeHint ??= readTypeHint(line);
      }
      continue;
    }

    const rawDescription = match[3]?.trim() ?? "";
    const node: ParamNode = {
      name: match[2] ?? "",
      description: rawDescription
        .replace(/\((?:required|optional)\)/gi, "")
        .trim(),
      required:
        !optional && !rawDescription.toLowerCase().includes("(optional)"),
      children: [],
      indent: (match[1] ?? "").replace(/\t/g, "    ").length,
    };
    const typeHint = readTypeHint(rawDescription);
    if (typeHint) {
      node.typeHint = typeHint;
    }

    while (stack.length > 0 && (stack.at(-1)?.indent ?? 0) >= node.indent) {
      stack.pop();
    }
    const parent = stack.at(-1);
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    stack.push(node);
  }

  return roots;
}

export interface ParameterInfo {
  description?: string;
  required: boolean;
  typeHint?: ParamNode["typeHint"];
}

/**
 * Name-keyed view of a bullet forest (lower-cased names, first description
 * wins). Not path-aware: a name used at two depths shares one entry.
 */
export function flattenParameterInfo(
  nodes: readonly ParamNode[]
): Map<string, ParameterInfo> {
  const info = new Map<string, ParameterInfo>();

  const visit = (node: ParamNode) => {
    const key = node.name.toLowerCase();
    const existing = info.get(key);
    info.set(key, {
      required: (existing?.required ?? false) || node.required,
      ...((existing?.description ?? node.description)
        ? { description: existing?.description ?? node.description }
        : {}),
      ...((existing?.typeHint ?? node.typeHint)
        ? { typeHint: existing?.typeHint ?? node.typeHint }
        : {}),
    });
    node.children.forEach(visit);
  };
  nodes.forEach(visit);

  return info;
}
