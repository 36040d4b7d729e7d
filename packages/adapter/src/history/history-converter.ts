import type { ToolCatalog } from "../catalog/tool-catalog";
import { extractSection } from "../catalog/markdown-sections";
import type { ReportDiagnostic } from "../core/diagnostics";
import type {
  ChatMessage,
  MessageContent,
  WireToolCall,
} from "../core/openai-schemas";
import { firstText, isTextPart } from "../core/utils/content";
import { generateToolCallId } from "../core/utils/id";
import { escapeRegExp } from "../core/utils/regex";
import { validateArguments } from "../schema/validate";
import { parseToolMarkup } from "../xml/markup-parser";
import { findToolBlocks } from "../xml/tool-tag-scanner";

export interface HistoryConversionOptions {
  catalog: ToolCatalog;
  strict: boolean;
  report?: ReportDiagnostic;
}

interface PendingCall {
  id: string;
  /** Name as the client wrote it; results are labelled with it. */
  markupName: string;
}

interface ExtractedText {
  text: string;
  calls: WireToolCall[];
  pending: PendingCall[];
}

const ERROR_PREFIX = "[ERROR] ";
const TOOL_USE_REMINDER = "Reminder: Instructions for Tool Use";

function extractCalls(
  text: string,
  options: HistoryConversionOptions
): ExtractedText {
  const { catalog, strict, report } = options;
  const result: ExtractedText = { text: "", calls: [], pending: [] };
  let cursor = 0;

  for (const block of findToolBlocks(text, catalog.toolBlockPattern)) {
    const keep = () => {
      result.text += text.slice(cursor, block.end);
      cursor = block.end;
    };
    const definition = catalog.markupTool(block.name);
    if (!definition) {
      keep();
      continue;
    }

    const parsed = parseToolMarkup(
      block.markup,
      block.name,
      definition.inputSchema
    );
    if (!parsed.ok) {
      report?.({
        kind: "unparseable-history-markup",
        toolName: block.name,
        message: parsed.reason,
        snippet: block.markup,
      });
      keep();
      continue;
    }

    const call = catalog.toStructured({
      toolName: block.name,
      arguments: parsed.arguments,
    });
    const tool = catalog.tool(call.toolName);
    if (!tool) {
      report?.({
        kind: "unparseable-history-markup",
        toolName: call.toolName,
        message: "no backend definition for this call",
        snippet: block.markup,
      });
      keep();
      continue;
    }

    let args = call.arguments;
    if (strict) {
      const validation = validateArguments(args, tool.inputSchema);
      if (!validation.success) {
        report?.({
          kind: "schema-validation-failure",
          direction: "history",
          toolName: call.toolName,
          issues: validation.issues,
        });
        keep();
        continue;
      }
      args = validation.value;
    }

    const id = parsed.id || generateToolCallId();
    result.text += text.slice(cursor, block.start);
    cursor = block.end;
    result.calls.push({
      id,
      type: "function",
      function: { name: call.toolName, arguments: JSON.stringify(args) },
    });
    result.pending.push({ id, markupName: block.name });
  }

  result.text += text.slice(cursor);
  return result;
}

function convertAssistantContent(
  content: MessageContent,
  options: HistoryConversionOptions
): { content: MessageContent; calls: WireToolCall[]; pending: PendingCall[] } {
  if (typeof content === "string") {
    const extracted = extractCalls(content, options);
    if (extracted.calls.length === 0) {
      return { content, calls: [], pending: [] };
    }
    const text = extracted.text.trim();
    return {
      content: text === "" ? null : text,
      calls: extracted.calls,
      pending: extracted.pending,
    };
  }
  if (!content) {
    return { content, calls: [], pending: [] };
  }

  const calls: WireToolCall[] = [];
  const pending: PendingCall[] = [];
  const parts = content.flatMap((part) => {
    if (!isTextPart(part)) {
      return [part];
    }
    const extracted = extractCalls(part.text, options);
    if (extracted.calls.length === 0) {
      return [part];
    }
    calls.push(...extracted.calls);
    pending.push(...extracted.pending);
    const text = extracted.text.trim();
    return text === "" ? [] : [{ ...part, text }];
  });
  return {
    content: calls.length > 0 && parts.length === 0 ? null : parts,
    calls,
    pending,
  };
}

function isResultFor(
  message: ChatMessage,
  call: PendingCall | undefined
): boolean {
  if (!call || message.role !== "user") {
    return false;
  }
  return new RegExp(`^\\[${escapeRegExp(call.markupName)}\\b`).test(
    firstText(message.content)
  );
}

function withoutToolUseReminder(message: ChatMessage): ChatMessage {
  const head = firstText(message.content);
  if (message.role !== "user" || !head.startsWith(ERROR_PREFIX)) {
    return message;
  }
  const reminder = extractSection(head, TOOL_USE_REMINDER);
  if (!reminder) {
    return message;
  }
  const stripped = head.replace(reminder, () => "");

  if (typeof message.content === "string") {
    return { ...message, content: stripped };
  }
  let replaced = false;
  return {
    ...message,
    content: message.content?.map((part) => {
      if (replaced || !isTextPart(part)) {
        return part;
      }
      replaced = true;
      return { ...part, text: stripped };
    }),
  };
}

/**
 * Rewrites past turns for the backend. Tool markup in assistant messages
 * becomes structured `tool_calls`; each directly following user message
 * labelled `[<tool name>…` becomes the `tool` message answering the next
 * unanswered call. Anything that cannot be converted stays as text.
 */
export function convertHistory(
  messages: readonly ChatMessage[],
  options: HistoryConversionOptions
): ChatMessage[] {
  if (options.catalog.isEmpty) {
    return messages.map(withoutToolUseReminder);
  }

  let pending: PendingCall[] = [];
  return messages.map((message): ChatMessage => {
    if (message.role === "assistant") {
      const converted = convertAssistantContent(message.content, options);
      pending = converted.pending;
      if (converted.calls.length === 0) {
        return message;
      }
      return {
        ...message,
        content: converted.content,
        tool_calls: [...(message.tool_calls ?? []), ...converted.calls],
      };
    }

    const next = pending[0];
    if (next && isResultFor(message, next)) {
      pending = pending.slice(1);
      return { ...message, role: "tool", tool_call_id: next.id };
    }

    pending = [];
    return withoutToolUseReminder(message);
  });
}
