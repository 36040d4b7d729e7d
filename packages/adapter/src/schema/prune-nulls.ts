import type { JSONSchema7 } from "@ai-sdk/provider";
import {
  allowsNull,
  asSchema,
  getItemsSchema,
  getSchemaType,
} from "../core/utils/json-schema";
import { deref, isRecord } from "./schema-pointer";

const DELETE = Symbol("delete");

function branchFor(value: unknown, schema: JSONSchema7): JSONSchema7 {
  const branches = (schema.anyOf ?? schema.oneOf ?? []).map(asSchema);
  if (branches.length === 0) {
    return schema;
  }
  const wanted = Array.isArray(value)
    ? "array"
    : isRecord(value)
      ? "object"
      : undefined;
  return (
    (wanted && branches.find((branch) => getSchemaType(branch) === wanted)) ||
    schema
  );
}

function prune(value: unknown, input: JSONSchema7, root: JSONSchema7): unknown {
  const schema = branchFor(value, deref(root, input));

  if (value === null) {
    const typed = schema.type !== undefined || schema.anyOf || schema.oneOf;
    return !typed || allowsNull(schema) ? null : DELETE;
  }

  if (isRecord(value)) {
    const properties = schema.properties ?? {};
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const result = prune(item, asSchema(properties[key]), root);
      if (result !== DELETE) {
        out[key] = result;
      }
    }
    return out;
  }

  if (Array.isArray(value)) {
    const items = getItemsSchema(schema) ?? {};
    return value
      .map((item) => prune(item, items, root))
      .filter((item) => item !== DELETE);
  }

  return value;
}

/**
 * Removes nulls the model produced where `schema` does not allow them. Strict
 * tool definitions make optional properties nullable; pruning against the
 * original schema turns those nulls back into absent properties.
 */
export function pruneNulls(
  args: Record<string, unknown>,
  schema: JSONSchema7
): Record<string, unknown> {
  const result = prune(args, schema, schema);
  return isRecord(result) ? result : {};
}
