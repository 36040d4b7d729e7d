import { describe, expect, it } from "vitest";

import { extractCatalog } from "../../catalog/catalog-extractor";
import { ToolCatalog } from "../../catalog/tool-catalog";
import type { AdapterDiagnostic } from "../../core/diagnostics";
import { findToolBlocks } from "../../xml/tool-tag-scanner";
import {
  assistantPrompt,
  mcpPrompt,
  readFilePrompt,
} from "../fixtures/prompts";

describe("extractCatalog", () => {
  it("returns an empty catalog when there is no Tools section", () => {
    const prompt = "You are helpful.\n\n# Rules\n\nBe brief.";
    const { catalog, prompt: rewritten } = extractCatalog(prompt);

    expect(catalog.isEmpty).toBe(true);
    expect(rewritten).toBe(prompt);
  });

  it("infers a definition from bullets and a usage sample", () => {
    const { catalog } = extractCatalog(readFilePrompt);

    expect(catalog.tools).toEqual([
      {
        name: "read_file",
        description: "Read a file.",
        parameters: [
          {
            name: "path",
            type: "string",
            required: true,
            description: "File path",
            schema: { type: "string", description: "File path" },
          },
        ],
        inputSchema: {
          type: "object",
          properties: { path: { type: "string", description: "File path" } },
          required: ["path"],
        },
      },
    ]);
    expect(catalog.markupToolNames).toEqual(["read_file"]);
  });

  it("rewrites usage samples and drops documentation blocks", () => {
    const { prompt } = extractCatalog(readFilePrompt);

    expect(prompt).toBe(
      [
        "Intro.",
        "",
        "# Tools",
        "",
        "## read_file",
        "Usage:",
        'read_file arguments: {"path":"File path here"}',
        "",
        "# Rules",
        "",
        "Be careful.",
      ].join("\n")
    );
  });

  it("leaves the prompt alone when rewriting is disabled", () => {
    const { catalog, prompt } = extractCatalog(readFilePrompt, {
      rewritePrompt: false,
    });

    expect(prompt).toBe(readFilePrompt);
    expect(catalog.tool("read_file")).toBeDefined();
  });

  it("adds documented parameters missing from every sample as optional", () => {
    const { catalog } = extractCatalog(assistantPrompt);

    expect(catalog.tool("read_file")?.inputSchema).toEqual({
      type: "object",
      properties: {
        path: { type: "string", description: "The path of the file to read" },
        limit: {
          type: "number",
          description: "Maximum lines to read (number)",
        },
      },
      required: ["path"],
    });
  });

  it("builds a schema from bullets when a tool has no sample", () => {
    const { catalog } = extractCatalog(assistantPrompt);

    expect(catalog.tool("list_files")?.inputSchema).toEqual({
      type: "object",
      properties: {
        path: { type: "string", description: "Directory to list" },
        recursive: {
          type: "boolean",
          description: "Whether to recurse (boolean)",
        },
      },
      required: ["path"],
    });
  });

  it("infers nested objects and repeated elements", () => {
    const { catalog } = extractCatalog(assistantPrompt);

    expect(catalog.tool("ask_followup_question")?.inputSchema).toEqual({
      type: "object",
      properties: {
        question: { type: "string", description: "The question to ask" },
        follow_up: {
          type: "object",
          properties: {
            suggest: { type: "array", items: { type: "string" } },
          },
          required: ["suggest"],
          description: "A list of suggested answers",
        },
      },
      required: ["question", "follow_up"],
    });
  });

  it("keeps whitespace of string values when rewriting samples", () => {
    const { prompt } = extractCatalog(assistantPrompt);

    const completion = { result: "\nYour final result description here\n" };
    const question = {
      question: "Your question here",
      follow_up: { suggest: ["First answer", "Second answer"] },
    };

    expect(prompt).toContain(
      `attempt_completion arguments: ${JSON.stringify(completion)}`
    );
    expect(prompt).toContain(
      `ask_followup_question arguments: ${JSON.stringify(question)}`
    );
    expect(prompt).not.toContain("# Tool Use Formatting");
    expect(prompt).toContain("# Tool Use Guidelines");
  });

  it("skips tools with only malformed samples and ignores duplicates", () => {
    const diagnostics: AdapterDiagnostic[] = [];
    const prompt = [
      "# Tools",
      "",
      "## broken_tool",
      "Description: Broken.",
      "Usage:",
      "<broken_tool><a>x</b></broken_tool>",
      "",
      "## read_file",
      "Description: Read a file.",
      "Usage:",
      "<read_file><path>a</path></read_file>",
      "",
      "## read_file",
      "Description: Again.",
      "Usage:",
      "<read_file><other>b</other></read_file>",
      "",
    ].join("\n");

    const { catalog } = extractCatalog(prompt, {
      report: (diagnostic) => diagnostics.push(diagnostic),
    });

    expect(catalog.tools.map((tool) => tool.name)).toEqual(["read_file"]);
    expect(catalog.tool("read_file")?.description).toBe("Read a file.");
    expect(diagnostics).toEqual([
      {
        kind: "malformed-catalog-entry",
        toolName: "broken_tool",
        message: "usage sample is not well-formed markup",
        snippet: "<broken_tool><a>x</b></broken_tool>",
      },
      {
        kind: "malformed-catalog-entry",
        toolName: "broken_tool",
        message: "no usable usage sample; tool skipped",
      },
      {
        kind: "malformed-catalog-entry",
        toolName: "read_file",
        message: "tool is documented more than once; later entry ignored",
      },
    ]);
  });

  it("reads bold labels", () => {
    const prompt = [
      "# Tools",
      "",
      "## search_files",
      "**Description:** Search the workspace.",
      "**Parameters:**",
      "- regex: (required) Pattern to search for",
      "**Usage:**",
      "<search_files><regex>pattern</regex></search_files>",
    ].join("\n");

    const tool = extractCatalog(prompt).catalog.tool("search_files");
    expect(tool?.description).toBe("Search the workspace.");
    expect(tool?.parameters.map((parameter) => parameter.description)).toEqual([
      "Pattern to search for",
    ]);
  });

  describe("MCP servers", () => {
    it("replaces use_mcp_tool by one definition per server tool", () => {
      const { catalog } = extractCatalog(mcpPrompt);

      expect(catalog.markupToolNames).toEqual(["use_mcp_tool"]);
      expect(catalog.tools).toEqual([
        {
          name: "use_mcp_tool.weather.get_forecast",
          description: "Get the forecast for a city",
          parameters: [
            {
              name: "city",
              type: "string",
              required: true,
              schema: { type: "string" },
            },
            {
              name: "days",
              type: "number",
              required: false,
              schema: { type: "integer" },
            },
          ],
          inputSchema: {
            type: "object",
            properties: {
              city: { type: "string" },
              days: { type: "integer" },
            },
            required: ["city"],
          },
        },
      ]);
    });

    it("removes the server tool listings from the prompt", () => {
      const { prompt } = extractCatalog(mcpPrompt);

      expect(prompt).toContain("### Available Tools\n====\n\nRULES");
      expect(prompt).toContain(
        "use_mcp_tool.server name here.tool name here arguments: " +
          '{"param1":"value1"}'
      );
    });
  });
});

describe("ToolCatalog", () => {
  it("matches markup blocks of its own tools only", () => {
    const { catalog } = extractCatalog(readFilePrompt);
    const text = "<read_file><path>a</path></read_file> <list_files/>";

    expect(
      findToolBlocks(text, catalog.toolBlockPattern).map((block) => block.name)
    ).toEqual(["read_file"]);
    expect(ToolCatalog.empty().toolBlockPattern).toBeUndefined();
  });
});
