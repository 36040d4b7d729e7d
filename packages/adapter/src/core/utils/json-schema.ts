import type { JSONSchema7, JSONSchema7Definition } from "@ai-sdk/provider";
import type { ParameterType, ToolParameter } from "../types";

export function asSchema(
  definition: JSONSchema7Definition | undefined
): JSONSchema7 {
  if (!definition || typeof definition === "boolean") {
    return {};
  }
  return definition;
}

export function schemaTypes(schema: JSONSchema7): string[] {
  const t = schema.type;
  if (typeof t === "string") {
    return [t];
  }
  if (Array.isArray(t)) {
    return [...t];
  }
  return [];
}

export function getSchemaType(schema: JSONSchema7): string | undefined {
  const types = schemaTypes(schema).filter((t) => t !== "null");
  const preferred = [
    "object",
    "array",
    "boolean",
    "number",
    "integer",
    "string",
  ];
  for (const p of preferred) {
    if (types.includes(p)) {
      return p;
    }
  }
  if (schema.properties || schema.additionalProperties) {
    return "object";
  }
  if (schema.items) {
    return "array";
  }
  return;
}

export function allowsNull(schema: JSONSchema7): boolean {
  if (schemaTypes(schema).includes("null")) {
    return true;
  }
  const branches = schema.anyOf ?? schema.oneOf ?? [];
  return branches.some((branch) => allowsNull(asSchema(branch)));
}

export function toParameterType(schema: JSONSchema7): ParameterType {
  switch (getSchemaType(schema)) {
    case "object":
      return "object";
    case "array":
      return "array";
    case "boolean":
      return "boolean";
    case "number":
    case "integer":
      return "number";
    default:
      return "string";
  }
}

export function getProperties(schema: JSONSchema7): [string, JSONSchema7][] {
  return Object.entries(schema.properties ?? {}).map(([name, definition]) => [
    name,
    asSchema(definition),
  ]);
}

export function getItemsSchema(schema: JSONSchema7): JSONSchema7 | undefined {
  const items = schema.items;
  if (items === undefined || Array.isArray(items)) {
    return;
  }
  return asSchema(items);
}

/** Ordered parameter list for an object schema. */
export function describeParameters(schema: JSONSchema7): ToolParameter[] {
  const required = new Set(schema.required ?? []);
  return getProperties(schema).map(([name, propertySchema]) => ({
    name,
    type: toParameterType(propertySchema),
    required: required.has(name),
    ...(propertySchema.description
      ? { description: propertySchema.description }
      : {}),
    schema: propertySchema,
  }));
}
