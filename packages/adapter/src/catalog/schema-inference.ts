import type { JSONSchema7 } from "@ai-sdk/provider";
import type { SampleElement } from "../xml/sample-parser";
import type { ParameterInfo, ParamNode } from "./parameter-bullets";

interface StructureStats {
  /** parent path → child tag → largest count under one parent */
  childMax: Map<string, Map<string, number>>;
  /** `${parent path}/${child}` → number of samples containing it */
  presence: Map<string, number>;
  attributes: Map<string, Set<string>>;
}

function collectStats(samples: readonly SampleElement[]): StructureStats {
  const stats: StructureStats = {
    childMax: new Map(),
    presence: new Map(),
    attributes: new Map(),
  };

  for (const root of samples) {
    const seen = new Set<string>();

    const walk = (element: SampleElement, path: string) => {
      if (element.attributes.length > 0) {
        const names = stats.attributes.get(path) ?? new Set<string>();
        element.attributes.forEach((name) => names.add(name));
        stats.attributes.set(path, names);
      }

      const counts = new Map<string, number>();
      for (const child of element.children) {
        counts.set(child.tag, (counts.get(child.tag) ?? 0) + 1);
      }
      const maxima = stats.childMax.get(path) ?? new Map<string, number>();
      for (const [tag, count] of counts) {
        maxima.set(tag, Math.max(maxima.get(tag) ?? 0, count));
        seen.add(`${path}/${tag}`);
      }
      stats.childMax.set(path, maxima);

      for (const child of element.children) {
        walk(child, `${path}/${child.tag}`);
      }
    };
    walk(root, root.tag);

    for (const key of seen) {
      stats.presence.set(key, (stats.presence.get(key) ?? 0) + 1);
    }
  }
  return stats;
}

function leafSchema(info: ParameterInfo | undefined): JSONSchema7 {
  return { type: info?.typeHint ?? "string" };
}

function withDescription(schema: JSONSchema7, description: string | undefined) {
  return description ? { ...schema, description } : schema;
}

/**
 * Infers a tool's input schema from its usage samples: elements with child
 * elements are objects, elements repeated under one parent are arrays,
 * elements with attributes are `{ value, ...attributes }` objects and leaves
 * are strings unless a bullet hints otherwise. A child is required when every
 * sample has it and no bullet marks it optional.
 */
export function inferSchemaFromSamples(
  samples: readonly SampleElement[],
  parameterInfo: ReadonlyMap<string, ParameterInfo>
): JSONSchema7 {
  const stats = collectStats(samples);
  const root = samples[0];
  if (!root) {
    return { type: "object", properties: {}, required: [] };
  }

  const objectSchema = (path: string): JSONSchema7 => {
    const properties: Record<string, JSONSchema7> = {};
    const required: string[] = [];

    for (const [child, maxCount] of stats.childMax.get(path) ?? []) {
      const childPath = `${path}/${child}`;
      const info = parameterInfo.get(child.toLowerCase());
      const hasChildren = (stats.childMax.get(childPath)?.size ?? 0) > 0;

      let schema: JSONSchema7 = hasChildren
        ? objectSchema(childPath)
        : leafSchema(info);
      const attributes = stats.attributes.get(childPath);
      if (attributes) {
        schema = {
          type: "object",
          properties: {
            value: schema,
            ...Object.fromEntries(
              [...attributes].map((name): [string, JSONSchema7] => [
                name,
                { type: "string" },
              ])
            ),
          },
          required: ["value"],
        };
      }
      properties[child] =
        maxCount > 1
          ? withDescription({ type: "array", items: schema }, info?.description)
          : withDescription(schema, info?.description);

      const presentEverywhere =
        (stats.presence.get(childPath) ?? 0) >= samples.length;
      if (presentEverywhere && (info?.required ?? true)) {
        required.push(child);
      }
    }
    return { type: "object", properties, required };
  };

  return objectSchema(root.tag);
}

/** Schema for a tool documented by bullets only. */
export function inferSchemaFromBullets(
  nodes: readonly ParamNode[]
): JSONSchema7 {
  const properties: Record<string, JSONSchema7> = {};
  const required: string[] = [];

  for (const node of nodes) {
    const schema: JSONSchema7 =
      node.children.length > 0
        ? inferSchemaFromBullets(node.children)
        : { type: node.typeHint ?? "string" };
    properties[node.name] = withDescription(schema, node.description);
    if (node.required) {
      required.push(node.name);
    }
  }
  return { type: "object", properties, required };
}

/** Adds top-level bullets that no sample shows, as optional properties. */
export function addUndemonstratedParameters(
  schema: JSONSchema7,
  nodes: readonly ParamNode[]
): JSONSchema7 {
  const properties = { ...(schema.properties ?? {}) };
  let changed = false;
  for (const node of nodes) {
    if (node.name in properties) {
      continue;
    }
    const bulletSchema = inferSchemaFromBullets([node]).properties?.[node.name];
    if (bulletSchema !== undefined) {
      properties[node.name] = bulletSchema;
      changed = true;
    }
  }
  return changed ? { ...schema, properties } : schema;
}
