import type { JSONSchema7 } from "@ai-sdk/provider";
import {
  asSchema,
  getItemsSchema,
  schemaTypes,
} from "../core/utils/json-schema";
import { deref, isRecord } from "./schema-pointer";

export type ValidationResult =
  | { success: true; value: Record<string, unknown> }
  | { success: false; issues: string[] };

type Coerced = { ok: true; value: unknown } | { ok: false; issue: string };

const NUMBER_REGEX = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text.trim());
  } catch {
    return;
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}

function sameJson(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

class Validator {
  constructor(private readonly root: JSONSchema7) {}

  check(value: unknown, input: JSONSchema7, path: string): Coerced {
    const schema = deref(this.root, input);

    const branches = schema.anyOf ?? schema.oneOf;
    if (branches && branches.length > 0) {
      for (const branch of branches) {
        const result = this.check(value, asSchema(branch), path);
        if (result.ok) {
          return result;
        }
      }
      return {
        ok: false,
        issue: `${path}: matches none of the allowed schemas`,
      };
    }

    const typed = this.checkType(value, schema, path);
    if (!typed.ok) {
      return typed;
    }

    if (
      schema.enum &&
      !schema.enum.some((option) => sameJson(option, typed.value))
    ) {
      const options = schema.enum
        .map((option) => JSON.stringify(option))
        .join(", ");
      return { ok: false, issue: `${path}: must be one of ${options}` };
    }
    if (schema.const !== undefined && !sameJson(schema.const, typed.value)) {
      return {
        ok: false,
        issue: `${path}: must be ${JSON.stringify(schema.const)}`,
      };
    }
    return typed;
  }

  private checkType(
    value: unknown,
    schema: JSONSchema7,
    path: string
  ): Coerced {
    const types = schemaTypes(schema);
    if (types.length === 0) {
      if (schema.properties) {
        return this.checkObject(value, schema, path);
      }
      if (schema.items) {
        return this.checkArray(value, schema, path);
      }
      return { ok: true, value };
    }

    if (value === null) {
      return types.includes("null")
        ? { ok: true, value }
        : { ok: false, issue: `${path}: must not be null` };
    }

    let firstIssue: string | undefined;
    for (const type of types) {
      const result = this.coerceTo(type, value, schema, path);
      if (result.ok) {
        return result;
      }
      firstIssue ??= result.issue;
    }
    return {
      ok: false,
      issue: firstIssue ?? `${path}: expected ${types.join(" | ")}`,
    };
  }

  private coerceTo(
    type: string,
    value: unknown,
    schema: JSONSchema7,
    path: string
  ): Coerced {
    const mismatch: Coerced = {
      ok: false,
      issue: `${path}: expected ${type}, got ${describeValue(value)}`,
    };

    switch (type) {
      case "string":
        if (typeof value === "string") {
          return { ok: true, value };
        }
        return typeof value === "number" || typeof value === "boolean"
          ? { ok: true, value: String(value) }
          : mismatch;

      case "number":
      case "integer": {
        let number: number | undefined;
        if (typeof value === "number") {
          number = value;
        } else if (
          typeof value === "string" &&
          NUMBER_REGEX.test(value.trim())
        ) {
          number = Number(value.trim());
        }
        if (number === undefined || !Number.isFinite(number)) {
          return mismatch;
        }
        return type === "integer" && !Number.isInteger(number)
          ? mismatch
          : { ok: true, value: number };
      }

      case "boolean":
        if (typeof value === "boolean") {
          return { ok: true, value };
        }
        if (typeof value === "string") {
          const lower = value.trim().toLowerCase();
          if (lower === "true" || lower === "false") {
            return { ok: true, value: lower === "true" };
          }
        }
        return mismatch;

      case "object":
        return this.checkObject(value, schema, path);

      case "array":
        return this.checkArray(value, schema, path);

      case "null":
        return mismatch;

      default:
        return { ok: true, value };
    }
  }

  private checkObject(
    value: unknown,
    schema: JSONSchema7,
    path: string
  ): Coerced {
    const candidate = typeof value === "string" ? parseJson(value) : value;
    if (!isRecord(candidate)) {
      return {
        ok: false,
        issue: `${path}: expected object, got ${describeValue(value)}`,
      };
    }

    const properties = schema.properties ?? {};
    const out: Record<string, unknown> = {};
    for (const name of schema.required ?? []) {
      if (candidate[name] === undefined) {
        return { ok: false, issue: `${path}.${name}: required` };
      }
    }
    for (const [name, item] of Object.entries(candidate)) {
      const definition = properties[name];
      if (definition === undefined) {
        if (schema.additionalProperties === false) {
          return { ok: false, issue: `${path}.${name}: not allowed` };
        }
        out[name] = item;
        continue;
      }
      const result = this.check(item, asSchema(definition), `${path}.${name}`);
      if (!result.ok) {
        return result;
      }
      out[name] = result.value;
    }
    return { ok: true, value: out };
  }

  private checkArray(
    value: unknown,
    schema: JSONSchema7,
    path: string
  ): Coerced {
    let candidate: unknown[];
    if (Array.isArray(value)) {
      candidate = value;
    } else {
      const parsed = typeof value === "string" ? parseJson(value) : undefined;
      candidate = Array.isArray(parsed) ? parsed : [value];
    }

    const items = getItemsSchema(schema);
    if (!items) {
      return { ok: true, value: candidate };
    }
    const out: unknown[] = [];
    for (const [index, item] of candidate.entries()) {
      const result = this.check(item, items, `${path}[${index}]`);
      if (!result.ok) {
        return result;
      }
      out.push(result.value);
    }
    return { ok: true, value: out };
  }
}

/**
 * Checks call arguments against a tool's input schema and returns them with
 * primitive mismatches coerced: numeric strings to numbers, `"true"`/`"false"`
 * to booleans, numbers and booleans to strings, JSON text to arrays and
 * objects, and a lone value to a one-element array.
 */
export function validateArguments(
  args: Record<string, unknown>,
  schema: JSONSchema7
): ValidationResult {
  const result = new Validator(schema).check(args, schema, "$");
  if (!result.ok) {
    return { success: false, issues: [result.issue] };
  }
  return isRecord(result.value)
    ? { success: true, value: result.value }
    : { success: false, issues: ["$: expected object"] };
}
