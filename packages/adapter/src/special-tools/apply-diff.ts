import { extractLabeledBlock } from "../catalog/markdown-sections";
import {
  isRecord,
  type NamedArguments,
  type SpecialToolAdapter,
  stringField,
  withArrayProperty,
} from "./types";

const TOOL_NAME = "apply_diff";

const MARKER_LINE_REGEX = /^(<<<<<<< SEARCH|=======|>>>>>>> REPLACE)$/gm;

interface DiffBlock {
  startLine: string;
  search: string;
  replace: string;
}

const DIFF_BLOCK_SOURCE = [
  "<<<<<<< SEARCH\\n",
  ":start_line:[ \\t]*(?<startLine>.*?)\\n",
  "-------\\n",
  "(?<search>[\\s\\S]*?)\\n",
  "=======\\n",
  "(?<replace>[\\s\\S]*?)\\n",
  ">>>>>>> REPLACE",
].join("");

function diffBlocks(text: string): DiffBlock[] {
  const pattern = new RegExp(DIFF_BLOCK_SOURCE, "g");
  return [...text.matchAll(pattern)].map((match) => ({
    startLine: match.groups?.startLine ?? "",
    search: match.groups?.search ?? "",
    replace: match.groups?.replace ?? "",
  }));
}

function escapeMarkers(text: string): string {
  return text.replace(MARKER_LINE_REGEX, "\\$1");
}

/**
 * `apply_diff`: `<<<<<<< SEARCH` blocks with a `:start_line:` header are
 * exchanged for `[{ start_line, SEARCH, REPLACE }]`. Marker lines inside a
 * block's text are backslash-escaped when rendered.
 */
export const applyDiffAdapter: SpecialToolAdapter = {
  toolName: TOOL_NAME,

  refine({ block, definition }) {
    if (definition.name !== TOOL_NAME) {
      return;
    }
    const format = extractLabeledBlock(block.body, "Diff format:");
    const example = diffBlocks(format)[0];
    if (!example) {
      return;
    }
    const refined = withArrayProperty(definition, "diff", {
      type: "object",
      properties: {
        start_line: { type: "string", description: example.startLine },
        SEARCH: { type: "string", description: example.search },
        REPLACE: { type: "string", description: example.replace },
      },
      required: ["start_line", "SEARCH", "REPLACE"],
    });
    return refined ? { definitions: [refined], promptRemovals: [] } : undefined;
  },

  toStructured(call: NamedArguments): NamedArguments {
    const diff = call.arguments.diff;
    if (call.toolName !== TOOL_NAME || typeof diff !== "string") {
      return call;
    }
    const blocks = diffBlocks(diff);
    if (blocks.length === 0) {
      return call;
    }
    return {
      toolName: call.toolName,
      arguments: {
        ...call.arguments,
        diff: blocks.map(({ startLine, search, replace }) => ({
          start_line: startLine,
          SEARCH: search,
          REPLACE: replace,
        })),
      },
    };
  },

  toMarkup(call: NamedArguments): NamedArguments {
    const diff = call.arguments.diff;
    if (
      call.toolName !== TOOL_NAME ||
      diff == null ||
      typeof diff === "string"
    ) {
      return call;
    }
    const blocks = (Array.isArray(diff) ? diff : [diff])
      .filter(isRecord)
      .map((item) => {
        const startLine = stringField(item, "start_line") || "0";
        return [
          "<<<<<<< SEARCH",
          `:start_line:${startLine}`,
          "-------",
          escapeMarkers(stringField(item, "SEARCH")),
          "=======",
          escapeMarkers(stringField(item, "REPLACE")),
          ">>>>>>> REPLACE",
        ].join("\n");
      });
    return {
      toolName: call.toolName,
      arguments: { ...call.arguments, diff: blocks.join("\n") },
    };
  },
};
