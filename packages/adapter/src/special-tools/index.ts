import { applyDiffAdapter } from "./apply-diff";
import { replaceInFileAdapter } from "./replace-in-file";
import type { SpecialToolAdapter } from "./types";
import { updateTodoListAdapter } from "./update-todo-list";
import { useMcpToolAdapter } from "./use-mcp-tool";

export { applyDiffAdapter } from "./apply-diff";
export { replaceInFileAdapter } from "./replace-in-file";
export type {
  NamedArguments,
  RefineContext,
  Refinement,
  SpecialToolAdapter,
} from "./types";
export { updateTodoListAdapter } from "./update-todo-list";
export { useMcpToolAdapter } from "./use-mcp-tool";

export const defaultSpecialTools: readonly SpecialToolAdapter[] = [
  updateTodoListAdapter,
  applyDiffAdapter,
  replaceInFileAdapter,
  useMcpToolAdapter,
];
