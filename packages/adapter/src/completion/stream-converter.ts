import type {
  ChatCompletionChunk,
  ChatCompletionChunkChoice,
} from "../core/openai-schemas";
import {
  getDebugLevel,
  logConvertedChunk,
  logRawChunk,
} from "../core/utils/debug";
import { generateToolCallId } from "../core/utils/id";
import { type CallRenderingOptions, renderBackendCall } from "./call-renderer";
import { toClientFinishReason } from "./completion-parser";
import {
  type ConversionState,
  createConversionState,
  type StreamEvent,
  type StreamOutput,
  step,
} from "./stream-state";

export interface StreamTranslationOptions extends CallRenderingOptions {
  rewriteText: (text: string) => string;
  /** Hold text until a line break; set when `completion` rules exist. */
  bufferLines: boolean;
}

interface ChoiceState {
  conversion: ConversionState;
  /** Last character sent to the client for this choice. */
  lastChar: string;
  /** Markup was the last thing sent. */
  afterMarkup: boolean;
}

type ChunkDelta = NonNullable<ChatCompletionChunkChoice["delta"]>;

function eventsFor(choice: ChatCompletionChunkChoice): StreamEvent[] {
  const events: StreamEvent[] = [];
  const content = choice.delta?.content;
  if (content) {
    events.push({ type: "text", text: content });
  }
  for (const delta of choice.delta?.tool_calls ?? []) {
    events.push({
      type: "tool-call-delta",
      ...(delta.index != null ? { index: delta.index } : {}),
      ...(delta.id ? { id: delta.id } : {}),
      ...(delta.function?.name ? { name: delta.function.name } : {}),
      ...(delta.function?.arguments
        ? { argumentsText: delta.function.arguments }
        : {}),
    });
  }
  if (choice.finish_reason) {
    events.push({ type: "finish", reason: choice.finish_reason });
  }
  return events;
}

/**
 * Converts a backend chunk stream into one the client can read: structured
 * call fragments are withheld until the call is complete, then sent as one
 * piece of markup; no chunk carries `tool_calls`.
 *
 * Every choice index keeps its own conversion state. If the stream errors or
 * is cancelled, buffered calls and text are dropped with it.
 */
export function createStreamConverter(
  options: StreamTranslationOptions
): TransformStream<ChatCompletionChunk, ChatCompletionChunk> {
  const choices = new Map<number, ChoiceState>();
  let template: ChatCompletionChunk | undefined;
  const debugStream = getDebugLevel() === "stream";

  const choiceState = (index: number): ChoiceState => {
    let state = choices.get(index);
    if (!state) {
      state = {
        conversion: createConversionState(),
        lastChar: "",
        afterMarkup: false,
      };
      choices.set(index, state);
    }
    return state;
  };

  const render = (state: ChoiceState, outputs: StreamOutput[]): string => {
    let text = "";
    const emit = (piece: string, isMarkup: boolean) => {
      if (piece === "") {
        return;
      }
      const previous = text === "" ? state.lastChar : text.at(-1);
      const needsBreak =
        previous !== undefined &&
        previous !== "" &&
        previous !== "\n" &&
        !piece.startsWith("\n") &&
        (isMarkup || state.afterMarkup);
      text += needsBreak ? `\n${piece}` : piece;
      state.afterMarkup = isMarkup;
    };

    for (const output of outputs) {
      switch (output.type) {
        case "text":
          emit(options.rewriteText(output.text), false);
          break;
        case "call": {
          const rendered = renderBackendCall(
            { ...output.call, id: output.call.id || generateToolCallId() },
            options
          );
          emit(rendered.text, true);
          break;
        }
        case "truncated":
          options.report?.({
            kind: "truncated-tool-call",
            toolName: output.call.toolName,
            toolCallId: output.call.id,
            argumentsText: output.call.argumentsText,
          });
          break;
      }
    }
    if (text !== "") {
      state.lastChar = text.at(-1) ?? state.lastChar;
    }
    return text;
  };

  const advance = (index: number, events: StreamEvent[]): string => {
    const state = choiceState(index);
    let text = "";
    for (const event of events) {
      const result = step(state.conversion, event, {
        bufferLines: options.bufferLines,
      });
      state.conversion = result.state;
      text += render(state, result.outputs);
    }
    return text;
  };

  const convertChoice = (
    choice: ChatCompletionChunkChoice
  ): ChatCompletionChunkChoice | undefined => {
    const text = advance(choice.index, eventsFor(choice));
    const original: ChunkDelta = choice.delta ?? {};
    const { tool_calls: _toolCalls, content: _content, ...rest } = original;
    const delta: ChunkDelta = text === "" ? rest : { ...rest, content: text };
    const finishReason = toClientFinishReason(choice.finish_reason);

    if (Object.keys(delta).length === 0 && !finishReason) {
      return;
    }
    return { ...choice, delta, finish_reason: finishReason };
  };

  return new TransformStream<ChatCompletionChunk, ChatCompletionChunk>({
    transform(chunk, controller) {
      if (debugStream) {
        logRawChunk(chunk);
      }
      template = chunk;
      const converted = chunk.choices
        .map(convertChoice)
        .filter((choice): choice is ChatCompletionChunkChoice => !!choice);

      if (chunk.choices.length > 0 && converted.length === 0 && !chunk.usage) {
        return;
      }
      const out: ChatCompletionChunk = { ...chunk, choices: converted };
      if (debugStream) {
        logConvertedChunk(out);
      }
      controller.enqueue(out);
    },

    flush(controller) {
      for (const index of [...choices.keys()].sort((a, b) => a - b)) {
        const text = advance(index, [{ type: "end" }]);
        if (text === "") {
          continue;
        }
        const last: ChatCompletionChunk = template ?? { choices: [] };
        const { usage: _usage, ...base } = last;
        const out: ChatCompletionChunk = {
          ...base,
          choices: [{ index, delta: { content: text }, finish_reason: null }],
        };
        if (debugStream) {
          logConvertedChunk(out);
        }
        controller.enqueue(out);
      }
    },
  });
}
