import type { JSONSchema7 } from "@ai-sdk/provider";
import type { ToolDefinition } from "../core/types";
import { describeParameters } from "../core/utils/json-schema";

export const MCP_TOOL_PREFIX = "use_mcp_tool";

export interface McpServerCatalog {
  definitions: ToolDefinition[];
  /** `### Available Tools` listings now carried by the definitions. */
  listings: string[];
}

export function extractMcpSection(prompt: string): string {
  const start = /^#[ \t]+Connected MCP Servers[ \t]*$/m.exec(prompt);
  if (!start) {
    return "";
  }
  const from = start.index + start[0].length;
  const rest = prompt.slice(from);
  const end =
    /^## Creating an MCP Server\b/m.exec(rest) ??
    /^====[ \t]*$/m.exec(rest) ??
    /^#[ \t]+\S/m.exec(rest);
  return prompt.slice(start.index, end ? from + end.index : prompt.length);
}

/**
 * Reads the JSON object at the start of `text` and ignores whatever follows
 * it. Returns undefined when no complete object is found.
 */
export function readLeadingJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  if (start === -1 || text.slice(0, start).trim() !== "") {
    return;
  }
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth++;
    } else if (char === "}") {
      depth--;
      if (depth === 0) {
        try {
          return JSON.parse(text.slice(start, i + 1));
        } catch {
          return;
        }
      }
    }
  }
  return;
}

function isSchemaObject(value: unknown): value is JSONSchema7 {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const MCP_TOOL_ENTRY_REGEX =
  /^-[ \t]+([^:\n]+):[ \t]+([\s\S]+?)\n\s+Input Schema:[ \t]*\n(?=\s*\{)/gm;

function availableToolsListing(serverBody: string): string {
  const headings = [...serverBody.matchAll(/^### Available Tools[ \t]*\n/gm)];
  const last = headings.at(-1);
  if (!last) {
    return "";
  }
  const listing = serverBody.slice((last.index ?? 0) + last[0].length);
  const end = /^### (?:Resource Templates|Direct Resources)\b/m.exec(listing);
  return end ? listing.slice(0, end.index) : listing;
}

/**
 * Parses a `# Connected MCP Servers` section. Every tool listed under a
 * server's `### Available Tools` becomes a definition named
 * `use_mcp_tool.<server>.<tool>` whose input schema is the listed one. Tools
 * whose schema is not a JSON object are passed over.
 */
export function parseMcpServers(section: string): McpServerCatalog {
  const catalog: McpServerCatalog = { definitions: [], listings: [] };
  const servers = [
    ...section.matchAll(/^##[ \t]+([^(\n]+?)(?:[ \t]+\(`(.+?)`\))?[ \t]*$/gm),
  ];

  servers.forEach((server, i) => {
    const serverName = server[1]?.trim() ?? "";
    const bodyStart = (server.index ?? 0) + server[0].length;
    const bodyEnd = servers[i + 1]?.index ?? section.length;
    const listing = availableToolsListing(section.slice(bodyStart, bodyEnd));
    if (!listing.trim()) {
      return;
    }

    const entries = [...listing.matchAll(MCP_TOOL_ENTRY_REGEX)];
    entries.forEach((entry, j) => {
      const schemaStart = (entry.index ?? 0) + entry[0].length;
      const schemaEnd = entries[j + 1]?.index ?? listing.length;
      const schema = readLeadingJsonObject(
        listing.slice(schemaStart, schemaEnd)
      );
      if (!isSchemaObject(schema)) {
        return;
      }
      catalog.definitions.push({
        name: `${MCP_TOOL_PREFIX}.${serverName}.${entry[1]?.trim() ?? ""}`,
        description: entry[2]?.trim() ?? "",
        parameters: describeParameters(schema),
        inputSchema: schema,
      });
    });
    catalog.listings.push(listing);
  });

  return catalog;
}
