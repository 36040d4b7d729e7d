import type { JSONSchema7 } from "@ai-sdk/provider";
import {
  asSchema,
  getItemsSchema,
  schemaTypes,
} from "../core/utils/json-schema";
import { deref } from "./schema-pointer";

const UNSUPPORTED_KEYWORDS = [
  "allOf",
  "not",
  "dependentRequired",
  "dependentSchemas",
  "if",
  "then",
  "else",
  "$anchor",
  "$dynamicAnchor",
  "$dynamicRef",
  "$id",
  "patternProperties",
  "prefixItems",
  "unevaluatedItems",
  "unevaluatedProperties",
] as const;

function usesUnsupportedKeyword(node: JSONSchema7): boolean {
  return UNSUPPORTED_KEYWORDS.some((keyword) => keyword in node);
}

function makeNullable(schema: JSONSchema7): void {
  if (schema.type !== undefined) {
    const types = Array.isArray(schema.type) ? schema.type : [schema.type];
    if (!types.includes("null")) {
      schema.type = [...types, "null"];
    }
  }
  for (const keyword of ["anyOf", "oneOf"] as const) {
    const branches = schema[keyword];
    if (!branches) {
      continue;
    }
    const hasNull = branches.some((branch) =>
      schemaTypes(asSchema(branch)).includes("null")
    );
    if (!hasNull) {
      schema[keyword] = [...branches, { type: "null" }];
    }
  }
}

/**
 * Rewrites a parameter schema into the form strict structured-output
 * backends accept: every object lists all its properties as required,
 * formerly optional properties become nullable and no additional properties
 * are allowed. Returns undefined when the schema uses a keyword that cannot
 * be carried over; the caller then sends it unstrict.
 */
export function strictifySchema(schema: JSONSchema7): JSONSchema7 | undefined {
  const root = structuredClone(schema);
  const processed = new Set<JSONSchema7>();

  const process = (input: JSONSchema7): boolean => {
    const node = deref(root, input);
    if (processed.has(node)) {
      return true;
    }
    processed.add(node);
    if (usesUnsupportedKeyword(node)) {
      return false;
    }

    for (const keyword of ["anyOf", "oneOf"] as const) {
      for (const branch of node[keyword] ?? []) {
        if (typeof branch === "object" && !process(branch)) {
          return false;
        }
      }
    }

    const types = schemaTypes(node);
    if (types.includes("object") || (types.length === 0 && node.properties)) {
      const properties = node.properties ?? {};
      const originallyRequired = new Set(node.required ?? []);
      node.required = Object.keys(properties);
      node.additionalProperties = false;
      for (const [name, definition] of Object.entries(properties)) {
        if (typeof definition !== "object") {
          continue;
        }
        const property = deref(root, definition);
        if (!originallyRequired.has(name)) {
          makeNullable(property);
        }
        if (!process(property)) {
          return false;
        }
      }
    }

    if (types.includes("array")) {
      const items = getItemsSchema(node);
      if (items && node.items !== undefined && typeof node.items === "object") {
        return process(items);
      }
    }
    return true;
  };

  return process(root) ? root : undefined;
}
