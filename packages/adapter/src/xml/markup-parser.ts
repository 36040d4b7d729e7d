import type { JSONSchema7 } from "@ai-sdk/provider";
import {
  getItemsSchema,
  getProperties,
  getSchemaType,
} from "../core/utils/json-schema";
import { escapeRegExp } from "../core/utils/regex";
import {
  type ChildElement,
  containsTagOf,
  parseAttributes,
  scanChildElements,
} from "./tool-tag-scanner";

export type MarkupParseResult =
  | { ok: true; arguments: Record<string, unknown>; id?: string }
  | { ok: false; reason: string };

type ValueResult = { ok: true; value: unknown } | { ok: false; reason: string };

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return;
  }
}

/** Object schema with a `value` property: `<tag attr="x">value</tag>`. */
export function isAttributeObject(schema: JSONSchema7): boolean {
  return (
    getSchemaType(schema) === "object" &&
    schema.properties?.value !== undefined &&
    getProperties(schema).length > 1 &&
    getProperties(schema).every(
      ([, propertySchema]) =>
        getSchemaType(propertySchema) !== "object" &&
        getSchemaType(propertySchema) !== "array"
    )
  );
}

function leafValue(inner: string, schema: JSONSchema7): unknown {
  const type = getSchemaType(schema);
  if (type === "object" || type === "array") {
    const trimmed = inner.trim();
    const parsed = tryParseJson(trimmed);
    return parsed === undefined ? inner : parsed;
  }
  if (type === undefined || type === "string") {
    return inner;
  }
  return inner.trim();
}

function elementValue(element: ChildElement, schema: JSONSchema7): ValueResult {
  const inner = element.inner ?? "";

  if (isAttributeObject(schema)) {
    const valueSchema = getProperties(schema).find(
      ([name]) => name === "value"
    );
    const value: Record<string, unknown> = {
      value: leafValue(inner, valueSchema?.[1] ?? {}),
    };
    for (const [name, attribute] of Object.entries(element.attributes)) {
      value[name] = attribute;
    }
    return { ok: true, value };
  }

  if (getSchemaType(schema) === "object" && getProperties(schema).length > 0) {
    const nested = parseObjectBody(inner, schema, false);
    return nested.ok ? { ok: true, value: nested.arguments } : nested;
  }

  return { ok: true, value: leafValue(inner, schema) };
}

/**
 * Parses the children of an element whose schema is `schema`. Text outside
 * known elements is ignored; a known tag left over after scanning (unclosed
 * or interleaved) makes the body ambiguous.
 */
function parseObjectBody(
  body: string,
  schema: JSONSchema7,
  allowId: boolean
): MarkupParseResult {
  const properties = new Map(getProperties(schema));
  const tagNames = [...properties.keys()];
  const acceptsId = allowId && !properties.has("id");
  if (acceptsId) {
    tagNames.push("id");
  }

  const elements = scanChildElements(body, tagNames);
  let leftover = "";
  let cursor = 0;
  for (const element of elements) {
    leftover += body.slice(cursor, element.start);
    cursor = element.end;
  }
  leftover += body.slice(cursor);
  if (containsTagOf(leftover, tagNames)) {
    return { ok: false, reason: "unbalanced or interleaved parameter tags" };
  }

  const values: Record<string, unknown> = {};
  let id: string | undefined;
  const arrays = new Map<string, unknown[]>();

  for (const element of elements) {
    if (acceptsId && element.tag === "id") {
      id ??= (element.inner ?? "").trim();
      continue;
    }
    const propertySchema = properties.get(element.tag) ?? {};

    if (getSchemaType(propertySchema) === "array") {
      const itemsSchema = getItemsSchema(propertySchema);
      if (!itemsSchema) {
        values[element.tag] ??= leafValue(element.inner ?? "", propertySchema);
        continue;
      }
      const item = elementValue(element, itemsSchema);
      if (!item.ok) {
        return item;
      }
      const list = arrays.get(element.tag) ?? [];
      list.push(item.value);
      arrays.set(element.tag, list);
      values[element.tag] = list;
      continue;
    }

    if (element.tag in values) {
      continue;
    }
    const value = elementValue(element, propertySchema);
    if (!value.ok) {
      return value;
    }
    values[element.tag] = value.value;
  }

  return id === undefined
    ? { ok: true, arguments: values }
    : { ok: true, arguments: values, id };
}

/**
 * Parses one `<tool>…</tool>` block against the tool's input schema. Values
 * are taken verbatim (the client does not escape markup), string values keep
 * their whitespace, and an `<id>` child is returned separately unless the
 * tool declares an `id` parameter.
 */
export function parseToolMarkup(
  markup: string,
  toolName: string,
  inputSchema: JSONSchema7
): MarkupParseResult {
  const name = escapeRegExp(toolName);
  const selfClosing = new RegExp(`^<${name}(\\s[^<>]*?)?\\/>$`).exec(markup);
  if (selfClosing) {
    return { ok: true, arguments: {} };
  }

  const match = new RegExp(
    `^<${name}(\\s[^<>]*?)?>([\\s\\S]*)<\\/${name}\\s*>$`
  ).exec(markup);
  if (!match) {
    return { ok: false, reason: `not a <${toolName}> element` };
  }

  const body = match[2] ?? "";
  const result = parseObjectBody(body, inputSchema, true);
  if (!result.ok) {
    return result;
  }
  const attributes = parseAttributes(match[1] ?? "");
  for (const [attribute, value] of Object.entries(attributes)) {
    result.arguments[attribute] ??= value;
  }
  return result;
}
