import { extractCatalog } from "./catalog/catalog-extractor";
import { ToolCatalog } from "./catalog/tool-catalog";
import type { ReportDiagnostic } from "./core/diagnostics";
import type { ChatMessage, MessageContent } from "./core/openai-schemas";
import type {
  BackendTool,
  ReplacementRule,
  ToolChoicePolicy,
  ToolDefinition,
} from "./core/types";
import { contentToText, isTextPart } from "./core/utils/content";
import { convertHistory } from "./history/history-converter";
import { CaptureContext } from "./rules/capture-context";
import { rewriteMessages } from "./rules/rule-engine";
import { strictifySchema } from "./schema/strictify";
import type { SpecialToolAdapter } from "./special-tools/types";

export interface RequestTransformOptions {
  rules: readonly ReplacementRule[];
  strict: boolean;
  forceToolChoice: boolean;
  rewritePrompt: boolean;
  specialTools?: readonly SpecialToolAdapter[];
  report?: ReportDiagnostic;
}

export interface TransformedRequest {
  messages: ChatMessage[];
  tools: BackendTool[];
  toolChoice?: ToolChoicePolicy;
  catalog: ToolCatalog;
  context: CaptureContext;
}

export function toBackendTool(
  definition: ToolDefinition,
  strict: boolean
): BackendTool {
  const strictSchema = strict
    ? strictifySchema(definition.inputSchema)
    : undefined;
  return {
    type: "function",
    function: {
      name: definition.name,
      description: definition.description,
      parameters: strictSchema ?? definition.inputSchema,
      ...(strictSchema ? { strict: true } : {}),
    },
  };
}

export function selectToolChoice(
  catalog: ToolCatalog,
  forceToolChoice: boolean
): ToolChoicePolicy | undefined {
  if (catalog.isEmpty) {
    return;
  }
  return forceToolChoice ? "required" : "auto";
}

function replaceText(content: MessageContent, text: string): MessageContent {
  if (typeof content === "string" || !content) {
    return text;
  }
  let placed = false;
  return content.flatMap((part) => {
    if (!isTextPart(part)) {
      return [part];
    }
    if (placed) {
      return [];
    }
    placed = true;
    return [{ ...part, text }];
  });
}

/**
 * Builds what the backend is sent for one request. The catalog comes from
 * the first message when it is a system or user message; history is
 * converted against it; rewrite rules then run over every message in order,
 * sharing one capture context that the response side reuses.
 */
export function transformRequest(
  messages: readonly ChatMessage[],
  options: RequestTransformOptions
): TransformedRequest {
  const context = new CaptureContext();
  let catalog = ToolCatalog.empty();
  let outgoing = [...messages];

  const first = outgoing[0];
  if (first && (first.role === "system" || first.role === "user")) {
    const prompt = contentToText(first.content);
    const extraction = extractCatalog(prompt, {
      rewritePrompt: options.rewritePrompt,
      ...(options.specialTools ? { specialTools: options.specialTools } : {}),
      ...(options.report ? { report: options.report } : {}),
    });
    catalog = extraction.catalog;
    if (extraction.prompt !== prompt) {
      outgoing[0] = {
        ...first,
        content: replaceText(first.content, extraction.prompt),
      };
    }
  }

  outgoing = convertHistory(outgoing, {
    catalog,
    strict: options.strict,
    ...(options.report ? { report: options.report } : {}),
  });
  outgoing = rewriteMessages(outgoing, {
    rules: options.rules,
    context,
    ...(options.report ? { report: options.report } : {}),
  });

  const toolChoice = selectToolChoice(catalog, options.forceToolChoice);
  return {
    messages: outgoing,
    tools: catalog.tools.map((tool) => toBackendTool(tool, options.strict)),
    ...(toolChoice ? { toolChoice } : {}),
    catalog,
    context,
  };
}
