import type {
  ChatCompletion,
  ChatCompletionChoice,
} from "../core/openai-schemas";
import { type CallRenderingOptions, renderBackendCall } from "./call-renderer";

export interface CompletionTranslationOptions extends CallRenderingOptions {
  /** Applies the `completion` rewrite rules to plain text. */
  rewriteText: (text: string) => string;
}

export function toClientFinishReason<T extends string | null | undefined>(
  reason: T
): T | "stop" {
  return reason === "tool_calls" ? "stop" : reason;
}

function translateChoice(
  choice: ChatCompletionChoice,
  options: CompletionTranslationOptions
): ChatCompletionChoice {
  const { tool_calls: toolCalls, ...message } = choice.message;
  const content =
    typeof message.content === "string"
      ? options.rewriteText(message.content)
      : message.content;

  const rendered = (toolCalls ?? []).map(
    (call) =>
      renderBackendCall(
        {
          id: call.id,
          toolName: call.function.name,
          argumentsText: call.function.arguments,
        },
        options
      ).text
  );

  const segments = [content ?? "", ...rendered].filter((text) => text !== "");
  return {
    ...choice,
    message: {
      ...message,
      content: segments.length > 0 ? segments.join("\n") : content,
    },
    finish_reason: toClientFinishReason(choice.finish_reason),
  };
}

/**
 * Rewrites a complete backend response for the client: structured calls
 * become markup appended to the (rewritten) content, one segment per line,
 * and no `tool_calls` field remains.
 */
export function translateCompletion(
  completion: ChatCompletion,
  options: CompletionTranslationOptions
): ChatCompletion {
  return {
    ...completion,
    choices: completion.choices.map((choice) =>
      translateChoice(choice, options)
    ),
  };
}
