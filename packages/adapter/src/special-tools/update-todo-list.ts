import { extractLabeledBlock } from "../catalog/markdown-sections";
import {
  isRecord,
  type NamedArguments,
  type SpecialToolAdapter,
  stringField,
  withArrayProperty,
} from "./types";

const TOOL_NAME = "update_todo_list";

interface TodoItem {
  todo: string;
  status: string;
}

const TODO_LINE_REGEX = /^\[(?<status>[^\]\n]+)\][ \t]*(?<todo>.+?)$/gm;

function todoItems(text: string): TodoItem[] {
  return [...text.matchAll(TODO_LINE_REGEX)].map((match) => ({
    todo: match.groups?.todo ?? "",
    status: match.groups?.status ?? "",
  }));
}

/** `update_todo_list`: `[status] text` lines ⇄ `[{ todo, status }]`. */
export const updateTodoListAdapter: SpecialToolAdapter = {
  toolName: TOOL_NAME,

  refine({ block, definition }) {
    if (definition.name !== TOOL_NAME) {
      return;
    }
    const example = ["Usage Example:", "Usage:", "Example:"]
      .map((label) => todoItems(extractLabeledBlock(block.body, label))[0])
      .find((item) => item !== undefined);
    if (!example) {
      return;
    }
    const refined = withArrayProperty(
      definition,
      "todos",
      {
        type: "object",
        properties: {
          todo: { type: "string", description: example.todo },
          status: { type: "string", description: example.status },
        },
        required: ["todo", "status"],
      },
      { required: true }
    );
    return refined ? { definitions: [refined], promptRemovals: [] } : undefined;
  },

  toStructured(call: NamedArguments): NamedArguments {
    const todos = call.arguments.todos;
    if (call.toolName !== TOOL_NAME || typeof todos !== "string") {
      return call;
    }
    const items = todoItems(todos);
    if (items.length === 0) {
      return call;
    }
    return {
      toolName: call.toolName,
      arguments: { ...call.arguments, todos: items },
    };
  },

  toMarkup(call: NamedArguments): NamedArguments {
    const todos = call.arguments.todos;
    if (
      call.toolName !== TOOL_NAME ||
      todos == null ||
      typeof todos === "string"
    ) {
      return call;
    }
    const lines = (Array.isArray(todos) ? todos : [todos])
      .filter(isRecord)
      .map((item) => {
        const status =
          /^\[?(.*?)\]?$/.exec(stringField(item, "status") || " ")?.[1] || " ";
        return `[${status}] ${stringField(item, "todo").replace(/\n/g, " ")}`;
      });
    return {
      toolName: call.toolName,
      arguments: { ...call.arguments, todos: lines.join("\n") },
    };
  },
};
