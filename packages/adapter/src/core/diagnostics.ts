import type { OutgoingSnapshot } from "./types";
import { logDiagnostic } from "./utils/debug";

/**
 * Recoverable conditions met while translating one request. None of them
 * fails the request; they exist so operators can see what was degraded.
 */
export type AdapterDiagnostic =
  | {
      kind: "malformed-catalog-entry";
      toolName: string;
      message: string;
      snippet?: string;
    }
  | {
      kind: "unparseable-history-markup";
      toolName: string;
      message: string;
      snippet: string;
    }
  | {
      kind: "invalid-rule-pattern";
      ruleName?: string;
      role: string;
      pattern: string;
      message: string;
    }
  | {
      kind: "schema-validation-failure";
      direction: "history" | "completion";
      toolName: string;
      issues: string[];
    }
  | {
      kind: "truncated-tool-call";
      toolName: string;
      toolCallId: string;
      argumentsText: string;
    };

export type DiagnosticKind = AdapterDiagnostic["kind"];

export interface DiagnosticHooks {
  onDiagnostic?: (diagnostic: AdapterDiagnostic) => void;
  /** Observes the final outgoing messages and tool definitions. */
  onOutgoing?: (snapshot: OutgoingSnapshot) => void;
}

export type ReportDiagnostic = (diagnostic: AdapterDiagnostic) => void;

function describe(diagnostic: AdapterDiagnostic): string {
  switch (diagnostic.kind) {
    case "malformed-catalog-entry":
    case "unparseable-history-markup":
      return `${diagnostic.toolName}: ${diagnostic.message}`;
    case "invalid-rule-pattern":
      return `${diagnostic.ruleName ?? diagnostic.pattern}: ${
        diagnostic.message
      }`;
    case "schema-validation-failure":
      return `${diagnostic.toolName} (${
        diagnostic.direction
      }): ${diagnostic.issues.join("; ")}`;
    case "truncated-tool-call":
      return `${diagnostic.toolName} (${
        diagnostic.toolCallId
      }) ended before its arguments were complete`;
    default:
      return "unknown diagnostic";
  }
}

export function createDiagnosticReporter(
  hooks: DiagnosticHooks | undefined
): ReportDiagnostic {
  return (diagnostic) => {
    logDiagnostic({
      kind: diagnostic.kind,
      message: describe(diagnostic),
      snippet:
        "snippet" in diagnostic
          ? diagnostic.snippet
          : "argumentsText" in diagnostic
            ? diagnostic.argumentsText
            : undefined,
    });
    hooks?.onDiagnostic?.(diagnostic);
  };
}
