import type { ReportDiagnostic } from "../core/diagnostics";
import type { ToolDefinition } from "../core/types";
import { describeParameters } from "../core/utils/json-schema";
import { defaultSpecialTools } from "../special-tools";
import type { Refinement, SpecialToolAdapter } from "../special-tools/types";
import { parseToolMarkup } from "../xml/markup-parser";
import { parseSample, type SampleElement } from "../xml/sample-parser";
import {
  extractSection,
  removeDocumentationBlocks,
  splitToolBlocks,
  type ToolDocBlock,
} from "./markdown-sections";
import {
  flattenParameterInfo,
  parseParameterBullets,
} from "./parameter-bullets";
import {
  addUndemonstratedParameters,
  inferSchemaFromBullets,
  inferSchemaFromSamples,
} from "./schema-inference";
import { ToolCatalog } from "./tool-catalog";

export interface CatalogExtractionOptions {
  specialTools?: readonly SpecialToolAdapter[];
  /**
   * Rewrite the prompt so it documents structured calls instead of markup.
   * @default true
   */
  rewritePrompt?: boolean;
  report?: ReportDiagnostic;
}

export interface CatalogExtraction {
  catalog: ToolCatalog;
  /** The prompt to send on, rewritten unless disabled. */
  prompt: string;
}

interface DocumentedTool {
  block: ToolDocBlock;
  definition: ToolDefinition;
  samples: string[];
}

function buildDefinition(
  block: ToolDocBlock,
  report: ReportDiagnostic | undefined
): DocumentedTool | undefined {
  const nodes = [
    ...parseParameterBullets(block.parameters),
    ...parseParameterBullets(block.optionalParameters, { optional: true }),
  ];
  const info = flattenParameterInfo(nodes);

  const parsed: SampleElement[] = [];
  const samples: string[] = [];
  for (const sample of block.samples) {
    const element = parseSample(sample, block.name);
    if (element) {
      parsed.push(element);
      samples.push(sample);
    } else {
      report?.({
        kind: "malformed-catalog-entry",
        toolName: block.name,
        message: "usage sample is not well-formed markup",
        snippet: sample,
      });
    }
  }
  if (block.samples.length > 0 && parsed.length === 0) {
    return;
  }

  const inputSchema =
    parsed.length > 0
      ? addUndemonstratedParameters(inferSchemaFromSamples(parsed, info), nodes)
      : inferSchemaFromBullets(nodes);

  return {
    block,
    samples,
    definition: {
      name: block.name,
      description: block.description,
      parameters: describeParameters(inputSchema),
      inputSchema,
    },
  };
}

function replaceAll(text: string, search: string, replacement: string): string {
  return search ? text.split(search).join(replacement) : text;
}

/**
 * Builds the request's catalog from the `# Tools` section of `prompt`. A
 * prompt without one yields an empty catalog and is returned unchanged. A
 * tool block that cannot be understood is reported and left out.
 *
 * When rewriting, the `Tool Use Formatting` section and each tool's
 * Description and Parameters blocks are removed (the backend receives them
 * as definitions) and every usage sample becomes `<name> arguments: <json>`.
 */
export function extractCatalog(
  prompt: string,
  {
    specialTools = defaultSpecialTools,
    rewritePrompt = true,
    report,
  }: CatalogExtractionOptions = {}
): CatalogExtraction {
  const toolsSection = extractSection(prompt, "Tools");
  if (!toolsSection) {
    return { catalog: ToolCatalog.empty(), prompt };
  }

  const documented: DocumentedTool[] = [];
  const seen = new Set<string>();
  for (const block of splitToolBlocks(toolsSection)) {
    if (seen.has(block.name)) {
      report?.({
        kind: "malformed-catalog-entry",
        toolName: block.name,
        message: "tool is documented more than once; later entry ignored",
      });
      continue;
    }
    const tool = buildDefinition(block, report);
    if (!tool) {
      report?.({
        kind: "malformed-catalog-entry",
        toolName: block.name,
        message: "no usable usage sample; tool skipped",
      });
      continue;
    }
    seen.add(block.name);
    documented.push(tool);
  }

  const tools: ToolDefinition[] = [];
  const promptRemovals: string[] = [];
  for (const { block, definition } of documented) {
    let refinement: Refinement | undefined;
    for (const adapter of specialTools) {
      refinement = adapter.refine({ block, definition, prompt });
      if (refinement) {
        break;
      }
    }
    tools.push(...(refinement?.definitions ?? [definition]));
    promptRemovals.push(...(refinement?.promptRemovals ?? []));
  }

  const catalog = new ToolCatalog(
    documented.map((tool) => tool.definition),
    tools,
    specialTools
  );
  if (!rewritePrompt) {
    return { catalog, prompt };
  }

  let rewritten = prompt;
  const formatting = extractSection(rewritten, "Tool Use Formatting");
  if (formatting) {
    rewritten = rewritten.replace(formatting, () => "");
  }
  for (const { block } of documented) {
    const stripped = removeDocumentationBlocks(block.body);
    rewritten = rewritten.replace(block.body, () => stripped);
  }
  for (const removal of promptRemovals) {
    rewritten = replaceAll(rewritten, removal, "");
  }
  for (const { definition, samples } of documented) {
    for (const sample of samples) {
      const parsed = parseToolMarkup(
        sample,
        definition.name,
        definition.inputSchema
      );
      if (!parsed.ok) {
        continue;
      }
      const call = catalog.toStructured({
        toolName: definition.name,
        arguments: parsed.arguments,
      });
      rewritten = replaceAll(
        rewritten,
        sample,
        `${call.toolName} arguments: ${JSON.stringify(call.arguments)}`
      );
    }
  }

  return { catalog, prompt: rewritten };
}
