import {
  type CompletionTranslationOptions,
  translateCompletion,
} from "./completion/completion-parser";
import { createStreamConverter } from "./completion/stream-converter";
import {
  createDiagnosticReporter,
  type DiagnosticHooks,
} from "./core/diagnostics";
import { RequestValidationError } from "./core/errors";
import {
  type ChatCompletion,
  type ChatCompletionChunk,
  type ChatMessage,
  type ChatRequest,
  chatRequestSchema,
} from "./core/openai-schemas";
import type {
  BackendRequest,
  BackendTool,
  ReplacementRule,
  ToolChoicePolicy,
} from "./core/types";
import { transformRequest } from "./request-transformer";
import { applyRules, hasRulesFor } from "./rules/rule-engine";
import type { SpecialToolAdapter } from "./special-tools/types";

export interface ToolCallAdapterOptions extends DiagnosticHooks {
  /** Rewrite rules, applied in order. */
  rules?: readonly ReplacementRule[];
  /**
   * Send strict tool schemas and turn calls failing validation into text.
   * @default true
   */
  strict?: boolean;
  /**
   * Ask the backend to call a tool on every turn when tools are present.
   * @default false
   */
  forceToolChoice?: boolean;
  /**
   * Render the call id as an `<id>` element in markup sent to the client.
   * @default false
   */
  includeCallId?: boolean;
  /**
   * Rewrite the system prompt to document structured calls.
   * @default true
   */
  rewritePrompt?: boolean;
  specialTools?: readonly SpecialToolAdapter[];
}

export interface ResponseTranslator {
  translateResponse(completion: ChatCompletion): ChatCompletion;
  translateResponse(
    stream: ReadableStream<ChatCompletionChunk>
  ): ReadableStream<ChatCompletionChunk>;
  createStreamTransformer(): TransformStream<
    ChatCompletionChunk,
    ChatCompletionChunk
  >;
}

export interface TranslatedRequest extends ResponseTranslator {
  /** The request body for the backend. */
  request: BackendRequest;
  messages: ChatMessage[];
  tools: BackendTool[];
  toolChoice?: ToolChoicePolicy;
}

export interface ToolCallAdapter {
  translateRequest(
    request: ChatRequest | readonly ChatMessage[]
  ): TranslatedRequest;
}

function parseRequest(
  input: ChatRequest | readonly ChatMessage[]
): ChatRequest {
  const candidate = Array.isArray(input) ? { messages: input } : input;
  const parsed = chatRequestSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new RequestValidationError(
      `Invalid chat request: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ")}`,
      parsed.error
    );
  }
  return parsed.data;
}

/**
 * Creates the translator between a markup-only client and a backend with
 * structured tool calling. Each `translateRequest` call is independent and
 * returns the response translator bound to that request.
 *
 * @example
 * const adapter = createToolCallAdapter({ rules });
 * const translated = adapter.translateRequest(body);
 * const completion = await backend.complete(translated.request);
 * reply(translated.translateResponse(completion));
 */
export function createToolCallAdapter(
  options: ToolCallAdapterOptions = {}
): ToolCallAdapter {
  const {
    rules = [],
    strict = true,
    forceToolChoice = false,
    includeCallId = false,
    rewritePrompt = true,
    specialTools,
    onDiagnostic,
    onOutgoing,
  } = options;
  const report = createDiagnosticReporter({ onDiagnostic });

  return {
    translateRequest(input) {
      const request = parseRequest(input);
      const transformed = transformRequest(request.messages, {
        rules,
        strict,
        forceToolChoice,
        rewritePrompt,
        report,
        ...(specialTools ? { specialTools } : {}),
      });
      onOutgoing?.({
        messages: transformed.messages,
        tools: transformed.tools,
      });

      const {
        tools: _clientTools,
        tool_choice: _clientChoice,
        ...rest
      } = request;
      const outgoing: BackendRequest = transformed.catalog.isEmpty
        ? { ...request, messages: transformed.messages }
        : {
            ...rest,
            messages: transformed.messages,
            tools: transformed.tools,
            ...(transformed.toolChoice
              ? { tool_choice: transformed.toolChoice }
              : {}),
          };

      const translation: CompletionTranslationOptions = {
        catalog: transformed.catalog,
        strict,
        includeCallId,
        report,
        rewriteText: (text) =>
          applyRules(text, "completion", {
            rules,
            context: transformed.context,
            report,
          }),
      };
      const bufferLines = hasRulesFor(rules, "completion");
      const createStreamTransformer = () =>
        createStreamConverter({ ...translation, bufferLines });

      function translateResponse(completion: ChatCompletion): ChatCompletion;
      function translateResponse(
        stream: ReadableStream<ChatCompletionChunk>
      ): ReadableStream<ChatCompletionChunk>;
      function translateResponse(
        input: ChatCompletion | ReadableStream<ChatCompletionChunk>
      ): ChatCompletion | ReadableStream<ChatCompletionChunk> {
        if (input instanceof ReadableStream) {
          return input.pipeThrough(createStreamTransformer());
        }
        return translateCompletion(input, translation);
      }

      return {
        request: outgoing,
        messages: transformed.messages,
        tools: transformed.tools,
        ...(transformed.toolChoice
          ? { toolChoice: transformed.toolChoice }
          : {}),
        translateResponse,
        createStreamTransformer,
      };
    },
  };
}
