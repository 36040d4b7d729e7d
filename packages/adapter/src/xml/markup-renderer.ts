import type { JSONSchema7 } from "@ai-sdk/provider";
import {
  getItemsSchema,
  getProperties,
  getSchemaType,
} from "../core/utils/json-schema";
import { isAttributeObject } from "./markup-parser";

export interface RenderMarkupOptions {
  /** Emit the call id as a leading `<id>` element. */
  includeCallId?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function renderText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

// Single quotes when the value holds `"`; `&quot;` only when it holds both.
function renderAttribute(name: string, attribute: unknown): string {
  const text = renderText(attribute);
  if (!text.includes('"')) {
    return ` ${name}="${text}"`;
  }
  if (!text.includes("'")) {
    return ` ${name}='${text}'`;
  }
  return ` ${name}="${text.replace(/"/g, "&quot;")}"`;
}

function renderElement(
  tag: string,
  value: unknown,
  schema: JSONSchema7
): string {
  if (isAttributeObject(schema) && isRecord(value)) {
    const attributes = Object.entries(value)
      .filter(([name, attribute]) => name !== "value" && attribute != null)
      .map(([name, attribute]) => renderAttribute(name, attribute))
      .join("");
    return `<${tag}${attributes}>${renderText(value.value)}</${tag}>`;
  }

  if (
    getSchemaType(schema) === "object" &&
    getProperties(schema).length > 0 &&
    isRecord(value)
  ) {
    return `<${tag}>${renderObjectBody(value, schema)}</${tag}>`;
  }

  return `<${tag}>${renderText(value)}</${tag}>`;
}

function renderProperty(
  name: string,
  value: unknown,
  schema: JSONSchema7
): string {
  const itemsSchema = getItemsSchema(schema);
  if (
    getSchemaType(schema) === "array" &&
    itemsSchema &&
    Array.isArray(value)
  ) {
    return value.map((item) => renderElement(name, item, itemsSchema)).join("");
  }
  return renderElement(name, value, schema);
}

/**
 * Declared properties first, in declaration order, then any extra keys the
 * call carries. Absent and null values are omitted.
 */
function renderObjectBody(
  values: Record<string, unknown>,
  schema: JSONSchema7
): string {
  const properties = new Map(getProperties(schema));
  const names = [
    ...properties.keys(),
    ...Object.keys(values).filter((key) => !properties.has(key)),
  ];

  let body = "";
  for (const name of names) {
    const value = values[name];
    if (value === undefined || value === null) {
      continue;
    }
    body += renderProperty(name, value, properties.get(name) ?? {});
  }
  return body;
}

/**
 * Renders a call as the client's markup: no indentation, no escaping, one
 * element per argument.
 *
 * @example
 * renderToolMarkup("read_file", { path: "a.txt" }, schema)
 * // => "<read_file><path>a.txt</path></read_file>"
 */
export function renderToolMarkup(
  toolName: string,
  args: Record<string, unknown>,
  inputSchema: JSONSchema7,
  options: RenderMarkupOptions & { id?: string } = {}
): string {
  const id =
    options.includeCallId && options.id ? `<id>${options.id}</id>` : "";
  const body = renderObjectBody(args, inputSchema);
  return `<${toolName}>${id}${body}</${toolName}>`;
}
