import {
  convertArrayToReadableStream,
  convertReadableStreamToArray,
} from "@ai-sdk/provider-utils/test";
import { describe, expect, it, vi } from "vitest";

import type { AdapterDiagnostic } from "../../core/diagnostics";
import { RequestValidationError } from "../../core/errors";
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatRequest,
} from "../../core/openai-schemas";
import type { ReplacementRule } from "../../core/types";
import { createToolCallAdapter } from "../../tool-call-adapter";
import { readFilePrompt } from "../fixtures/prompts";

const greetingRules: ReplacementRule[] = [
  { role: "user", pattern: "ID:(?P<user_id>\\d+)" },
  {
    role: "completion",
    trigger: "user_id",
    ref: ["user"],
    pattern: "Hello",
    replacement: "Hello #{user_id}!",
  },
];

function request(overrides: Partial<ChatRequest> = {}): ChatRequest {
  return {
    model: "test-model",
    temperature: 0.2,
    messages: [
      { role: "system", content: readFilePrompt },
      { role: "user", content: "ID:42 please read a.txt" },
      {
        role: "assistant",
        content: "<read_file><id>call_1</id><path>a.txt</path></read_file>",
      },
      { role: "user", content: "[read_file for 'a.txt'] Result:\nhello" },
    ],
    ...overrides,
  };
}

function textCompletion(content: string): ChatCompletion {
  return {
    id: "chatcmpl-1",
    object: "chat.completion",
    created: 1,
    model: "test-model",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content },
        finish_reason: "stop",
      },
    ],
  };
}

describe("createToolCallAdapter", () => {
  it("builds the backend request from the client's markup conversation", () => {
    const adapter = createToolCallAdapter();
    const translated = adapter.translateRequest(request());

    expect(translated.request.model).toBe("test-model");
    expect(translated.request.temperature).toBe(0.2);
    expect(translated.request.tool_choice).toBe("auto");
    expect(translated.request.tools).toEqual([
      {
        type: "function",
        function: {
          name: "read_file",
          description: "Read a file.",
          parameters: {
            type: "object",
            properties: { path: { type: "string", description: "File path" } },
            required: ["path"],
            additionalProperties: false,
          },
          strict: true,
        },
      },
    ]);
    expect(translated.request.messages.slice(2)).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "call_1",
            type: "function",
            function: { name: "read_file", arguments: '{"path":"a.txt"}' },
          },
        ],
      },
      {
        role: "tool",
        content: "[read_file for 'a.txt'] Result:\nhello",
        tool_call_id: "call_1",
      },
    ]);
    expect(translated.request.messages[0]?.content).not.toContain(
      "# Tool Use Formatting"
    );
  });

  it("sends schemas as documented when strict mode is off", () => {
    const translated = createToolCallAdapter({
      strict: false,
      forceToolChoice: true,
    }).translateRequest(request());

    expect(translated.request.tool_choice).toBe("required");
    expect(translated.tools[0]?.function).toEqual({
      name: "read_file",
      description: "Read a file.",
      parameters: {
        type: "object",
        properties: { path: { type: "string", description: "File path" } },
        required: ["path"],
      },
    });
  });

  it("relays the client's own tools when the prompt documents none", () => {
    const clientTools = [
      {
        type: "function" as const,
        function: { name: "lookup", parameters: { type: "object" } },
      },
    ];
    const translated = createToolCallAdapter().translateRequest({
      messages: [{ role: "user", content: "hi" }],
      tools: clientTools,
      tool_choice: "none",
    });

    expect(translated.request.tools).toEqual(clientTools);
    expect(translated.request.tool_choice).toBe("none");
    expect(translated.tools).toEqual([]);
    expect(translated.toolChoice).toBeUndefined();
  });

  it("replaces the client's tools when the prompt documents tools", () => {
    const translated = createToolCallAdapter().translateRequest(
      request({
        tools: [
          {
            type: "function",
            function: { name: "lookup", parameters: { type: "object" } },
          },
        ],
        tool_choice: "none",
      })
    );

    expect(
      translated.request.tools?.map((tool) => tool.function.name)
    ).toEqual(["read_file"]);
    expect(translated.request.tool_choice).toBe("auto");
  });

  it("accepts a bare message list", () => {
    const translated = createToolCallAdapter().translateRequest([
      { role: "user", content: "hi" },
    ]);
    expect(translated.request).toEqual({
      messages: [{ role: "user", content: "hi" }],
    });
  });

  it("rejects a request without messages", () => {
    const adapter = createToolCallAdapter();

    expect(() =>
      adapter.translateRequest(JSON.parse('{"model":"test-model"}'))
    ).toThrow(RequestValidationError);
  });

  it("reports the outgoing messages and tools", () => {
    const onOutgoing = vi.fn();
    const translated = createToolCallAdapter({ onOutgoing }).translateRequest(
      request()
    );

    expect(onOutgoing).toHaveBeenCalledTimes(1);
    expect(onOutgoing).toHaveBeenCalledWith({
      messages: translated.messages,
      tools: translated.tools,
    });
  });

  it("applies completion rules with the captures of its own request", () => {
    const adapter = createToolCallAdapter({ rules: greetingRules });
    const withId = adapter.translateRequest(request());
    const withoutId = adapter.translateRequest(
      request({ messages: [{ role: "user", content: "hi" }] })
    );

    expect(
      withId.translateResponse(textCompletion("Hello")).choices[0]?.message
        .content
    ).toBe("Hello #42!");
    expect(
      withoutId.translateResponse(textCompletion("Hello")).choices[0]?.message
        .content
    ).toBe("Hello");
  });

  it("applies user rules to outgoing messages", () => {
    const translated = createToolCallAdapter({
      rules: [{ role: "user", pattern: "please ", replacement: "" }],
    }).translateRequest(request());

    expect(translated.request.messages[1]?.content).toBe("ID:42 read a.txt");
  });

  it("translates a streamed response", async () => {
    const diagnostics: AdapterDiagnostic[] = [];
    const translated = createToolCallAdapter({
      onDiagnostic: (diagnostic) => diagnostics.push(diagnostic),
    }).translateRequest(request());
    const chunks: ChatCompletionChunk[] = [
      {
        id: "chatcmpl-1",
        choices: [
          {
            index: 0,
            delta: {
              tool_calls: [
                {
                  index: 0,
                  id: "call_2",
                  type: "function",
                  function: {
                    name: "read_file",
                    arguments: '{"path":"b.txt"}',
                  },
                },
              ],
            },
            finish_reason: null,
          },
        ],
      },
      {
        id: "chatcmpl-1",
        choices: [{ index: 0, delta: {}, finish_reason: "tool_calls" }],
      },
    ];

    const output = await convertReadableStreamToArray(
      translated.translateResponse(convertArrayToReadableStream(chunks))
    );

    expect(output).toEqual([
      {
        id: "chatcmpl-1",
        choices: [
          {
            index: 0,
            delta: { content: "<read_file><path>b.txt</path></read_file>" },
            finish_reason: "stop",
          },
        ],
      },
    ]);
    expect(diagnostics).toEqual([]);
  });
});
