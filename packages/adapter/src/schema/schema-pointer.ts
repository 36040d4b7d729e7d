import type { JSONSchema7 } from "@ai-sdk/provider";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSchema(value: unknown): value is JSONSchema7 {
  return isRecord(value);
}

/** Resolves a local `#/…` reference against `root`. */
export function resolveRef(
  root: JSONSchema7,
  ref: string
): JSONSchema7 | undefined {
  if (!ref.startsWith("#")) {
    return;
  }
  let current: unknown = root;
  for (const part of ref.replace(/^#\/?/, "").split("/").filter(Boolean)) {
    const key = part.replace(/~1/g, "/").replace(/~0/g, "~");
    if (!isRecord(current)) {
      return;
    }
    current = current[key];
  }
  return isSchema(current) ? current : undefined;
}

/** Follows `$ref` chains; a cycle or dangling reference yields `{}`. */
export function deref(root: JSONSchema7, schema: JSONSchema7): JSONSchema7 {
  const visited = new Set<string>();
  let current = schema;
  while (current.$ref !== undefined) {
    if (visited.has(current.$ref)) {
      return {};
    }
    visited.add(current.$ref);
    const target = resolveRef(root, current.$ref);
    if (!target) {
      return {};
    }
    current = target;
  }
  return current;
}
