export type DebugLevel = "off" | "stream" | "parse";

function normalizeBooleanString(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return;
}

export function getDebugLevel(): DebugLevel {
  const envVal =
    (typeof process !== "undefined" &&
      process.env &&
      process.env.DEBUG_TOOL_ADAPTER) ||
    "off";
  const envLower = String(envVal).toLowerCase();
  if (envLower === "stream" || envLower === "parse" || envLower === "off") {
    return envLower;
  }
  const boolEnv = normalizeBooleanString(envLower);
  if (boolEnv === true) {
    return "stream";
  }
  if (envLower === "2") {
    return "parse";
  }
  return "off";
}

function color(code: number) {
  return (text: string) => `\u001b[${code}m${text}\u001b[0m`;
}

// ANSI color codes
const ANSI_GRAY = 90;
const ANSI_YELLOW = 33;
const ANSI_CYAN = 36;
const ANSI_BG_BLUE = 44;

const cGray = color(ANSI_GRAY);
const cYellow = color(ANSI_YELLOW);
const cCyan = color(ANSI_CYAN);
const cBgBlue = color(ANSI_BG_BLUE);

const MAX_SNIPPET_LENGTH = 800;

function safeStringify(value: unknown): string {
  try {
    const text =
      typeof value === "string" ? value : JSON.stringify(value, null, 2);
    return `\n${text}`;
  } catch {
    return String(value);
  }
}

function truncateSnippet(snippet: string): string {
  if (snippet.length <= MAX_SNIPPET_LENGTH) {
    return snippet;
  }
  const head = snippet.slice(0, MAX_SNIPPET_LENGTH);
  const dropped = snippet.length - MAX_SNIPPET_LENGTH;
  return `${head}\n…[truncated ${dropped} chars]`;
}

export function logDiagnostic({
  kind,
  message,
  snippet,
}: {
  kind: string;
  message: string;
  snippet?: string;
}) {
  if (getDebugLevel() !== "parse") {
    return;
  }

  console.log(
    cGray("[debug:adapter:diag]"),
    cBgBlue(`[${kind}]`),
    cYellow(message)
  );
  if (snippet) {
    console.log(cGray("[debug:adapter:snippet]"), truncateSnippet(snippet));
  }
}

export function logRawChunk(part: unknown) {
  // Backend chunk as received
  console.log(cGray("[debug:adapter:raw]"), cYellow(safeStringify(part)));
}

export function logConvertedChunk(part: unknown) {
  // Chunk as relayed to the client
  console.log(cGray("[debug:adapter:out]"), cCyan(safeStringify(part)));
}
