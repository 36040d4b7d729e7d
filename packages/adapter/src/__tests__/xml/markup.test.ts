import type { JSONSchema7 } from "@ai-sdk/provider";
import { describe, expect, it } from "vitest";

import { parseToolMarkup } from "../../xml/markup-parser";
import { renderToolMarkup } from "../../xml/markup-renderer";
import {
  compileToolBlockPattern,
  findToolBlocks,
} from "../../xml/tool-tag-scanner";

const readFileSchema: JSONSchema7 = {
  type: "object",
  properties: { path: { type: "string" } },
  required: ["path"],
};

const writeFileSchema: JSONSchema7 = {
  type: "object",
  properties: { path: { type: "string" }, content: { type: "string" } },
  required: ["path", "content"],
};

const filesSchema: JSONSchema7 = {
  type: "object",
  properties: {
    files: {
      type: "array",
      items: { type: "object", properties: { path: { type: "string" } } },
    },
  },
};

const attributeSchema: JSONSchema7 = {
  type: "object",
  properties: {
    file: {
      type: "object",
      properties: { value: { type: "string" }, encoding: { type: "string" } },
    },
  },
};

describe("parseToolMarkup", () => {
  it("reads a call documented in the catalog", () => {
    expect(
      parseToolMarkup(
        "<read_file><path>a.txt</path></read_file>",
        "read_file",
        readFileSchema
      )
    ).toEqual({ ok: true, arguments: { path: "a.txt" } });
  });

  it("ignores formatting whitespace between elements", () => {
    expect(
      parseToolMarkup(
        "<read_file>\n  <path>src/a b.ts</path>\n</read_file>",
        "read_file",
        readFileSchema
      )
    ).toEqual({ ok: true, arguments: { path: "src/a b.ts" } });
  });

  it("takes values verbatim, including raw markup characters", () => {
    const result = parseToolMarkup(
      "<write_to_file><path>x.ts</path>" +
        "<content>if (a < b && c) {}\n</content></write_to_file>",
      "write_to_file",
      writeFileSchema
    );
    expect(result).toEqual({
      ok: true,
      arguments: { path: "x.ts", content: "if (a < b && c) {}\n" },
    });
  });

  it("returns the id element separately", () => {
    expect(
      parseToolMarkup(
        "<read_file><id>call_1</id><path>a</path></read_file>",
        "read_file",
        readFileSchema
      )
    ).toEqual({ ok: true, arguments: { path: "a" }, id: "call_1" });
  });

  it("rejects an unclosed parameter", () => {
    expect(
      parseToolMarkup(
        "<read_file><path>a.txt</read_file>",
        "read_file",
        readFileSchema
      )
    ).toEqual({
      ok: false,
      reason: "unbalanced or interleaved parameter tags",
    });
  });

  it("rejects markup of another tool", () => {
    expect(parseToolMarkup("<other/>", "read_file", readFileSchema)).toEqual({
      ok: false,
      reason: "not a <read_file> element",
    });
  });

  it("accepts a self-closing call", () => {
    expect(
      parseToolMarkup("<list_files/>", "list_files", { type: "object" })
    ).toEqual({ ok: true, arguments: {} });
  });

  it("collects repeated elements into an array", () => {
    expect(
      parseToolMarkup(
        "<t><files><path>a</path></files><files><path>b</path></files></t>",
        "t",
        filesSchema
      )
    ).toEqual({
      ok: true,
      arguments: { files: [{ path: "a" }, { path: "b" }] },
    });
  });

  it("reads attributes into a value object", () => {
    expect(
      parseToolMarkup(
        '<t><file encoding="utf8">x</file></t>',
        "t",
        attributeSchema
      )
    ).toEqual({
      ok: true,
      arguments: { file: { value: "x", encoding: "utf8" } },
    });
  });

  it("decodes JSON for arrays declared without items", () => {
    expect(
      parseToolMarkup('<t><tags>["a","b"]</tags></t>', "t", {
        type: "object",
        properties: { tags: { type: "array" } },
      })
    ).toEqual({ ok: true, arguments: { tags: ["a", "b"] } });
  });

  it("trims values of non-string leaves", () => {
    expect(
      parseToolMarkup("<t><count> 3 </count></t>", "t", {
        type: "object",
        properties: { count: { type: "number" } },
      })
    ).toEqual({ ok: true, arguments: { count: "3" } });
  });

  it("merges attributes of the call element", () => {
    expect(
      parseToolMarkup('<t mode="fast"><path>a</path></t>', "t", readFileSchema)
    ).toEqual({ ok: true, arguments: { path: "a", mode: "fast" } });
  });
});

describe("renderToolMarkup", () => {
  it("renders parameter elements with no formatting", () => {
    expect(
      renderToolMarkup("read_file", { path: "a.txt" }, readFileSchema)
    ).toBe("<read_file><path>a.txt</path></read_file>");
  });

  it("renders the id only when asked to", () => {
    expect(
      renderToolMarkup("read_file", { path: "a.txt" }, readFileSchema, {
        id: "call_1",
      })
    ).toBe("<read_file><path>a.txt</path></read_file>");
    expect(
      renderToolMarkup("read_file", { path: "a.txt" }, readFileSchema, {
        includeCallId: true,
        id: "call_1",
      })
    ).toBe("<read_file><id>call_1</id><path>a.txt</path></read_file>");
  });

  it("renders declared parameters first, in declaration order", () => {
    expect(
      renderToolMarkup(
        "write_to_file",
        { content: "c", path: "p" },
        writeFileSchema
      )
    ).toBe("<write_to_file><path>p</path><content>c</content></write_to_file>");
  });

  it("omits nulls and encodes undeclared objects as JSON", () => {
    expect(
      renderToolMarkup("t", { path: null, extra: { a: 1 } }, readFileSchema)
    ).toBe('<t><extra>{"a":1}</extra></t>');
  });

  it("repeats array items and writes attributes", () => {
    expect(
      renderToolMarkup(
        "t",
        { files: [{ path: "a" }, { path: "b" }] },
        filesSchema
      )
    ).toBe(
      "<t><files><path>a</path></files><files><path>b</path></files></t>"
    );
    expect(
      renderToolMarkup(
        "t",
        { file: { value: "x", encoding: "utf8" } },
        attributeSchema
      )
    ).toBe('<t><file encoding="utf8">x</file></t>');
  });

  it("quotes attribute values that contain quotes", () => {
    const single = { file: { value: "x", encoding: 'say "hi"' } };
    const both = { file: { value: "x", encoding: `it's "q"` } };
    const singleMarkup = renderToolMarkup("t", single, attributeSchema);
    const bothMarkup = renderToolMarkup("t", both, attributeSchema);

    expect(singleMarkup).toBe(`<t><file encoding='say "hi"'>x</file></t>`);
    expect(bothMarkup).toBe(
      '<t><file encoding="it\'s &quot;q&quot;">x</file></t>'
    );
    expect(parseToolMarkup(singleMarkup, "t", attributeSchema)).toEqual({
      ok: true,
      arguments: single,
    });
    expect(parseToolMarkup(bothMarkup, "t", attributeSchema)).toEqual({
      ok: true,
      arguments: both,
    });
  });

  it("produces markup the parser reads back", () => {
    const args = {
      path: "notes.md",
      content: "# Title\n\n<b>bold</b> & more\n",
    };
    const markup = renderToolMarkup("write_to_file", args, writeFileSchema);

    expect(parseToolMarkup(markup, "write_to_file", writeFileSchema)).toEqual({
      ok: true,
      arguments: args,
    });
  });
});

describe("findToolBlocks", () => {
  it("finds complete blocks only", () => {
    const text = [
      "Let me check.",
      "<read_file><path>a</path></read_file>",
      "then <list_files/> and <read_file><path>b",
    ].join("\n");
    const pattern = compileToolBlockPattern(["read_file", "list_files"]);
    const blocks = findToolBlocks(text, pattern);

    expect(blocks.map((block) => [block.name, block.markup])).toEqual([
      ["read_file", "<read_file><path>a</path></read_file>"],
      ["list_files", "<list_files/>"],
    ]);
    expect(blocks[0]?.start).toBe(14);
  });

  it("finds nothing without tool names", () => {
    expect(compileToolBlockPattern([])).toBeUndefined();
    expect(findToolBlocks("<read_file/>", undefined)).toEqual([]);
  });
});
