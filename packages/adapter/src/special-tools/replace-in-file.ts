import { extractLabeledBlock } from "../catalog/markdown-sections";
import {
  isRecord,
  type NamedArguments,
  type SpecialToolAdapter,
  stringField,
  withArrayProperty,
} from "./types";

const TOOL_NAME = "replace_in_file";

interface SearchReplaceBlock {
  search: string;
  replace: string;
}

const SEARCH_REPLACE_SOURCE = [
  "(?<indent>[ \\t]*)------- SEARCH\\n",
  "(?<search>[\\s\\S]*?)\\n",
  "\\k<indent>=======\\n",
  "(?<replace>[\\s\\S]*?)\\n",
  "\\k<indent>\\+\\+\\+\\+\\+\\+\\+ REPLACE",
].join("");

function searchReplaceBlocks(text: string): SearchReplaceBlock[] {
  const pattern = new RegExp(SEARCH_REPLACE_SOURCE, "g");
  return [...text.matchAll(pattern)].map((match) => ({
    search: match.groups?.search ?? "",
    replace: match.groups?.replace ?? "",
  }));
}

/**
 * `replace_in_file`: the `diff` text of `------- SEARCH` / `=======` /
 * `+++++++ REPLACE` blocks is exchanged for `[{ SEARCH, REPLACE }]`.
 */
export const replaceInFileAdapter: SpecialToolAdapter = {
  toolName: TOOL_NAME,

  refine({ block, definition }) {
    if (definition.name !== TOOL_NAME) {
      return;
    }
    const example = searchReplaceBlocks(
      extractLabeledBlock(block.body, "Parameters:")
    )[0];
    if (!example) {
      return;
    }
    const refined = withArrayProperty(definition, "diff", {
      type: "object",
      properties: {
        SEARCH: { type: "string", description: example.search },
        REPLACE: { type: "string", description: example.replace },
      },
      required: ["SEARCH", "REPLACE"],
    });
    return refined ? { definitions: [refined], promptRemovals: [] } : undefined;
  },

  toStructured(call: NamedArguments): NamedArguments {
    const diff = call.arguments.diff;
    if (call.toolName !== TOOL_NAME || typeof diff !== "string") {
      return call;
    }
    const blocks = searchReplaceBlocks(diff);
    if (blocks.length === 0) {
      return call;
    }
    return {
      toolName: call.toolName,
      arguments: {
        ...call.arguments,
        diff: blocks.map(({ search, replace }) => ({
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
      .map((item) =>
        [
          "------- SEARCH",
          stringField(item, "SEARCH"),
          "=======",
          stringField(item, "REPLACE"),
          "+++++++ REPLACE",
        ].join("\n")
      );
    return {
      toolName: call.toolName,
      arguments: { ...call.arguments, diff: blocks.join("\n") },
    };
  },
};
