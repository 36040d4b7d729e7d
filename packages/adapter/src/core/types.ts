import type { JSONSchema7 } from "@ai-sdk/provider";
import type { ChatMessage, MessageRole, WireTool } from "./openai-schemas";

export type ParameterType =
  | "string"
  | "number"
  | "boolean"
  | "array"
  | "object";

/**
 * Roles a replacement rule can target. `completion` is the backend's answer on
 * its way back to the client; it never appears in a request.
 */
export type RuleRole = MessageRole | "completion";

export interface ToolParameter {
  name: string;
  type: ParameterType;
  required: boolean;
  description?: string;
  schema: JSONSchema7;
}

export interface ToolDefinition {
  name: string;
  description: string;
  /** Ordered as documented; markup is rendered in this order. */
  parameters: ToolParameter[];
  /** Object schema whose properties mirror `parameters`. */
  inputSchema: JSONSchema7;
}

export interface ToolCall {
  id: string;
  toolName: string;
  arguments: Record<string, unknown>;
}

/**
 * A structured call exactly as the backend delivered it, before its
 * arguments text is parsed or validated.
 */
export interface RawToolCall {
  id: string;
  toolName: string;
  argumentsText: string;
}

export interface ReplacementRule {
  name?: string;
  role: RuleRole;
  pattern: string;
  replacement?: string;
  trigger?: string;
  ref?: RuleRole[];
}

export interface BackendTool {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: JSONSchema7;
    strict?: boolean;
  };
}

export type ToolChoicePolicy = "auto" | "required";

export interface OutgoingSnapshot {
  messages: ChatMessage[];
  tools: BackendTool[];
}

/** Chat request as sent to the backend; unknown fields are relayed. */
export interface BackendRequest {
  model?: string;
  messages: ChatMessage[];
  stream?: boolean | null;
  tools?: (BackendTool | WireTool)[];
  tool_choice?: unknown;
  [key: string]: unknown;
}
