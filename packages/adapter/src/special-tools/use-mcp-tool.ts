import {
  extractMcpSection,
  MCP_TOOL_PREFIX,
  parseMcpServers,
} from "../catalog/mcp-servers";
import {
  isRecord,
  type NamedArguments,
  type SpecialToolAdapter,
} from "./types";

const MCP_CALL_NAME_REGEX = /^use_mcp_tool\.([^.]+)\.(.+)$/;

function parseInnerArguments(
  value: unknown
): Record<string, unknown> | undefined {
  if (isRecord(value)) {
    return value;
  }
  if (typeof value !== "string") {
    return;
  }
  try {
    const parsed: unknown = JSON.parse(value.trim());
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return;
  }
}

/**
 * `use_mcp_tool`: the generic call is replaced by one definition per tool of
 * each connected MCP server, named `use_mcp_tool.<server>.<tool>`, whose
 * arguments are the tool's own.
 */
export const useMcpToolAdapter: SpecialToolAdapter = {
  toolName: MCP_TOOL_PREFIX,

  refine({ definition, prompt }) {
    if (definition.name !== MCP_TOOL_PREFIX) {
      return;
    }
    const { definitions, listings } = parseMcpServers(
      extractMcpSection(prompt)
    );
    if (definitions.length === 0) {
      return;
    }
    return { definitions, promptRemovals: listings };
  },

  toStructured(call: NamedArguments): NamedArguments {
    if (call.toolName !== MCP_TOOL_PREFIX) {
      return call;
    }
    const { server_name: server, tool_name: tool } = call.arguments;
    const inner = parseInnerArguments(call.arguments.arguments);
    if (typeof server !== "string" || typeof tool !== "string" || !inner) {
      return call;
    }
    return {
      toolName: `${MCP_TOOL_PREFIX}.${server.trim()}.${tool.trim()}`,
      arguments: inner,
    };
  },

  toMarkup(call: NamedArguments): NamedArguments {
    const match = MCP_CALL_NAME_REGEX.exec(call.toolName);
    if (!match) {
      return call;
    }
    return {
      toolName: MCP_TOOL_PREFIX,
      arguments: {
        server_name: match[1] ?? "",
        tool_name: match[2] ?? "",
        arguments: JSON.stringify(call.arguments),
      },
    };
  },
};
