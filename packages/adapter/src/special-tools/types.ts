import type { JSONSchema7 } from "@ai-sdk/provider";
import type { ToolDocBlock } from "../catalog/markdown-sections";
import type { ToolDefinition } from "../core/types";
import { describeParameters } from "../core/utils/json-schema";

export interface NamedArguments {
  toolName: string;
  arguments: Record<string, unknown>;
}

export interface RefineContext {
  block: ToolDocBlock;
  /** Definition inferred from the client's documentation. */
  definition: ToolDefinition;
  /** The full system prompt the catalog came from. */
  prompt: string;
}

export interface Refinement {
  /** Definitions the backend sees in place of the documented one. */
  definitions: ToolDefinition[];
  /** Prompt passages now carried by those definitions. */
  promptRemovals: string[];
}

/**
 * Per-tool hook between the client's markup grammar and the structured
 * arguments the backend is asked for. Conversions that do not recognise
 * their input return it unchanged.
 */
export interface SpecialToolAdapter {
  readonly toolName: string;
  refine(context: RefineContext): Refinement | undefined;
  /** Markup-side arguments to backend-side arguments. */
  toStructured(call: NamedArguments): NamedArguments;
  /** Backend-side arguments to markup-side arguments. */
  toMarkup(call: NamedArguments): NamedArguments;
}

/**
 * Replaces one property of `definition` by an array of `items`, keeping its
 * description. Undefined when the definition has no such property.
 */
export function withArrayProperty(
  definition: ToolDefinition,
  property: string,
  items: JSONSchema7,
  { required = false }: { required?: boolean } = {}
): ToolDefinition | undefined {
  const current = definition.inputSchema.properties?.[property];
  if (current === undefined) {
    return;
  }
  const description =
    typeof current === "object" ? current.description : undefined;
  const inputSchema: JSONSchema7 = {
    ...definition.inputSchema,
    properties: {
      ...definition.inputSchema.properties,
      [property]: {
        type: "array",
        items,
        ...(description ? { description } : {}),
      },
    },
  };
  if (required && !(inputSchema.required ?? []).includes(property)) {
    inputSchema.required = [...(inputSchema.required ?? []), property];
  }
  return {
    ...definition,
    inputSchema,
    parameters: describeParameters(inputSchema),
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function stringField(
  record: Record<string, unknown>,
  key: string
): string {
  const value = record[key];
  return typeof value === "string" ? value : value == null ? "" : String(value);
}
