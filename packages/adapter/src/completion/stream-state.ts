import type { RawToolCall } from "../core/types";

/**
 * A structured call still being received. `id` stays empty until the backend
 * sends one.
 */
export interface OpenCall {
  index: number;
  id: string;
  name: string;
  argumentsText: string;
}

export type StreamPhase =
  | { type: "plain-text" }
  /** A call was announced; no argument text yet. */
  | { type: "inside-call"; call: OpenCall }
  /** Argument text of the open call is arriving. */
  | { type: "inside-parameter"; call: OpenCall };

export interface ConversionState {
  phase: StreamPhase;
  /** Text held back until a line break, finish or end. */
  pendingText: string;
  /** Calls completed so far, in order. */
  completed: RawToolCall[];
  finishReason?: string;
}

export type StreamEvent =
  | { type: "text"; text: string }
  | {
      type: "tool-call-delta";
      index?: number;
      id?: string;
      name?: string;
      argumentsText?: string;
    }
  | { type: "finish"; reason: string }
  | { type: "end" };

export type StreamOutput =
  | { type: "text"; text: string }
  | { type: "call"; call: RawToolCall }
  | { type: "truncated"; call: RawToolCall };

export interface StepOptions {
  /**
   * Hold text back until a line break, so rewrite rules see whole lines.
   */
  bufferLines: boolean;
}

export interface StepResult {
  state: ConversionState;
  outputs: StreamOutput[];
}

export function createConversionState(): ConversionState {
  return { phase: { type: "plain-text" }, pendingText: "", completed: [] };
}

function toRawCall(call: OpenCall): RawToolCall {
  return {
    id: call.id,
    toolName: call.name,
    argumentsText: call.argumentsText,
  };
}

export function hasParseableArguments(argumentsText: string): boolean {
  try {
    const value: unknown = JSON.parse(argumentsText);
    return typeof value === "object" && value !== null && !Array.isArray(value);
  } catch {
    return false;
  }
}

function openCall(phase: StreamPhase): OpenCall | undefined {
  return phase.type === "plain-text" ? undefined : phase.call;
}

function phaseFor(call: OpenCall): StreamPhase {
  return call.argumentsText === ""
    ? { type: "inside-call", call }
    : { type: "inside-parameter", call };
}

function completeCall(state: ConversionState, call: RawToolCall): StepResult {
  return {
    state: {
      ...state,
      phase: { type: "plain-text" },
      completed: [...state.completed, call],
    },
    outputs: [{ type: "call", call }],
  };
}

function flushText(state: ConversionState): StepResult {
  if (state.pendingText === "") {
    return { state, outputs: [] };
  }
  return {
    state: { ...state, pendingText: "" },
    outputs: [{ type: "text", text: state.pendingText }],
  };
}

function sequence(
  state: ConversionState,
  ...steps: ((current: ConversionState) => StepResult)[]
): StepResult {
  const outputs: StreamOutput[] = [];
  let current = state;
  for (const run of steps) {
    const result = run(current);
    current = result.state;
    outputs.push(...result.outputs);
  }
  return { state: current, outputs };
}

/** Closes the open call, if any, as complete. */
function closeOpenCall(state: ConversionState): StepResult {
  const call = openCall(state.phase);
  return call ? completeCall(state, toRawCall(call)) : { state, outputs: [] };
}

function receiveText(
  state: ConversionState,
  text: string,
  { bufferLines }: StepOptions
): StepResult {
  const pending = state.pendingText + text;
  if (!bufferLines) {
    return pending === ""
      ? { state, outputs: [] }
      : {
          state: { ...state, pendingText: "" },
          outputs: [{ type: "text", text: pending }],
        };
  }
  const boundary = pending.lastIndexOf("\n");
  if (boundary === -1) {
    return { state: { ...state, pendingText: pending }, outputs: [] };
  }
  return {
    state: { ...state, pendingText: pending.slice(boundary + 1) },
    outputs: [{ type: "text", text: pending.slice(0, boundary + 1) }],
  };
}

function receiveToolCallDelta(
  state: ConversionState,
  delta: Extract<StreamEvent, { type: "tool-call-delta" }>
): StepResult {
  const current = openCall(state.phase);
  const index = delta.index ?? current?.index ?? 0;

  if (current && current.index === index) {
    const call: OpenCall = {
      index,
      id: current.id || (delta.id ?? ""),
      name: current.name + (delta.name ?? ""),
      argumentsText: current.argumentsText + (delta.argumentsText ?? ""),
    };
    return { state: { ...state, phase: phaseFor(call) }, outputs: [] };
  }

  const call: OpenCall = {
    index,
    id: delta.id ?? "",
    name: delta.name ?? "",
    argumentsText: delta.argumentsText ?? "",
  };
  return sequence(state, closeOpenCall, flushText, (next) => ({
    state: { ...next, phase: phaseFor(call) },
    outputs: [],
  }));
}

function receiveFinish(state: ConversionState, reason: string): StepResult {
  const call = openCall(state.phase);
  const withReason = { ...state, finishReason: reason };
  if (!call) {
    return flushText(withReason);
  }

  if (reason === "length" && !hasParseableArguments(call.argumentsText)) {
    return sequence(
      { ...withReason, phase: { type: "plain-text" } },
      flushText,
      (next) => ({
        state: next,
        outputs: [{ type: "truncated", call: toRawCall(call) }],
      })
    );
  }

  const argumentsText =
    call.argumentsText.trim() === "" ? "{}" : call.argumentsText;
  return sequence(
    withReason,
    (next) => completeCall(next, { ...toRawCall(call), argumentsText }),
    flushText
  );
}

function receiveEnd(state: ConversionState): StepResult {
  const call = openCall(state.phase);
  if (!call) {
    return flushText(state);
  }
  if (hasParseableArguments(call.argumentsText)) {
    return sequence(state, closeOpenCall, flushText);
  }
  return sequence(
    { ...state, phase: { type: "plain-text" } },
    flushText,
    (next) => ({
      state: next,
      outputs: [{ type: "truncated", call: toRawCall(call) }],
    })
  );
}

/**
 * Advances one choice's conversion by one event. Pure: the input state is
 * never modified.
 *
 * Text closes an open call before it is taken in. A delta for another call
 * index closes the open call and starts the next. `finish` closes the open
 * call (empty arguments read as `{}`) unless the backend stopped for length
 * with incomplete arguments; `end` closes it only when its arguments parse.
 * A call that is not closed is reported as truncated and never emitted.
 */
export function step(
  state: ConversionState,
  event: StreamEvent,
  options: StepOptions
): StepResult {
  switch (event.type) {
    case "text":
      return sequence(state, closeOpenCall, (next) =>
        receiveText(next, event.text, options)
      );
    case "tool-call-delta":
      return receiveToolCallDelta(state, event);
    case "finish":
      return receiveFinish(state, event.reason);
    case "end":
      return receiveEnd(state);
    default:
      return { state, outputs: [] };
  }
}
