import type { ToolCatalog } from "../catalog/tool-catalog";
import type { ReportDiagnostic } from "../core/diagnostics";
import type { RawToolCall } from "../core/types";
import { generateToolCallId } from "../core/utils/id";
import { pruneNulls } from "../schema/prune-nulls";
import { validateArguments } from "../schema/validate";
import { renderToolMarkup } from "../xml/markup-renderer";

export interface CallRenderingOptions {
  catalog: ToolCatalog;
  strict: boolean;
  includeCallId: boolean;
  report?: ReportDiagnostic;
}

export type RenderedCall =
  | { type: "markup"; text: string }
  /** The call could not be rendered and is relayed as plain text. */
  | { type: "text"; text: string };

function parseArguments(text: string): Record<string, unknown> | undefined {
  if (text.trim() === "") {
    return {};
  }
  try {
    const value: unknown = JSON.parse(text);
    return typeof value === "object" && value !== null && !Array.isArray(value)
      ? Object.fromEntries(Object.entries(value))
      : undefined;
  } catch {
    return;
  }
}

/** How a call that cannot become markup is shown to the client. */
export function downgradeToText(call: RawToolCall): string {
  return `${call.toolName} arguments: ${call.argumentsText}`;
}

/**
 * Turns one structured call from the backend into the client's markup. A call
 * naming an unknown tool, carrying arguments that are not a JSON object, or
 * (in strict mode) failing validation comes back as plain text instead.
 */
export function renderBackendCall(
  call: RawToolCall,
  { catalog, strict, includeCallId, report }: CallRenderingOptions
): RenderedCall {
  const downgrade = (issues: string[]): RenderedCall => {
    report?.({
      kind: "schema-validation-failure",
      direction: "completion",
      toolName: call.toolName,
      issues,
    });
    return { type: "text", text: downgradeToText(call) };
  };

  const tool = catalog.tool(call.toolName);
  if (!tool) {
    return downgrade([`unknown tool "${call.toolName}"`]);
  }
  let args = parseArguments(call.argumentsText);
  if (!args) {
    return downgrade(["arguments are not a JSON object"]);
  }

  if (strict) {
    const validation = validateArguments(
      pruneNulls(args, tool.inputSchema),
      tool.inputSchema
    );
    if (!validation.success) {
      return downgrade(validation.issues);
    }
    args = validation.value;
  }

  const markupCall = catalog.toMarkup({
    toolName: call.toolName,
    arguments: args,
  });
  const markupTool = catalog.markupTool(markupCall.toolName);
  if (!markupTool) {
    return downgrade([`no markup grammar for "${markupCall.toolName}"`]);
  }

  return {
    type: "markup",
    text: renderToolMarkup(
      markupCall.toolName,
      markupCall.arguments,
      markupTool.inputSchema,
      { includeCallId, id: call.id || generateToolCallId() }
    ),
  };
}
