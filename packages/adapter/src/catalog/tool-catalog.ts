import type { ToolDefinition } from "../core/types";
import type {
  NamedArguments,
  SpecialToolAdapter,
} from "../special-tools/types";
import { compileToolBlockPattern } from "../xml/tool-tag-scanner";

/**
 * The tools recognised for one request, seen from both sides: the grammar the
 * client documents (`markupTools`) and the definitions the backend is given
 * (`tools`). Special-tool adapters convert arguments between the two.
 */
export class ToolCatalog {
  private readonly markupByName: ReadonlyMap<string, ToolDefinition>;
  private readonly toolsByName: ReadonlyMap<string, ToolDefinition>;
  /** Matches complete markup blocks of this catalog's tools. */
  readonly toolBlockPattern: RegExp | undefined;

  constructor(
    readonly markupTools: readonly ToolDefinition[],
    readonly tools: readonly ToolDefinition[],
    private readonly adapters: readonly SpecialToolAdapter[] = []
  ) {
    this.markupByName = new Map(markupTools.map((tool) => [tool.name, tool]));
    this.toolsByName = new Map(tools.map((tool) => [tool.name, tool]));
    this.toolBlockPattern = compileToolBlockPattern(this.markupToolNames);
  }

  static empty(): ToolCatalog {
    return new ToolCatalog([], []);
  }

  get isEmpty(): boolean {
    return this.tools.length === 0;
  }

  get markupToolNames(): string[] {
    return [...this.markupByName.keys()];
  }

  markupTool(name: string): ToolDefinition | undefined {
    return this.markupByName.get(name);
  }

  tool(name: string): ToolDefinition | undefined {
    return this.toolsByName.get(name);
  }

  toStructured(call: NamedArguments): NamedArguments {
    return this.adapters.reduce(
      (current, adapter) => adapter.toStructured(current),
      call
    );
  }

  toMarkup(call: NamedArguments): NamedArguments {
    return this.adapters.reduce(
      (current, adapter) => adapter.toMarkup(current),
      call
    );
  }
}
