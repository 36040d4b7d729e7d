import { escapeRegExp } from "../core/utils/regex";

/**
 * Returns the section starting at the heading titled `title` (any level) up
 * to the next heading of the same or a higher level, heading line included.
 * Empty when the heading is absent.
 */
export function extractSection(doc: string, title: string): string {
  const heading = new RegExp(
    `^(#{1,6})[ \\t]+${escapeRegExp(title)}\\b[^\\n]*$`,
    "m"
  ).exec(doc);
  if (!heading) {
    return "";
  }
  const level = heading[1]?.length ?? 1;
  const start = heading.index;
  const afterHeading = start + heading[0].length;

  const next = new RegExp(`^#{1,${level}}[ \\t]+\\S`, "m").exec(
    doc.slice(afterHeading)
  );
  const end = next ? afterHeading + next.index : doc.length;
  return doc.slice(start, end);
}

const NEXT_LABELS = [
  "(?:Required |Optional )?Parameters?:",
  "##?\\s+",
  "Usages?:",
  "(?:Usage )?Examples?(?:\\b[\\w ]+)?:",
].join("|");

const LABEL_STOP = `(?=^(?:\\*\\*)?(?:${NEXT_LABELS})|$(?![\\s\\S]))`;

/**
 * Text following a `Label:` line (the label may be bold) up to the next
 * known label, heading or the end of `body`, trimmed.
 */
export function extractLabeledBlock(body: string, label: string): string {
  const head = `^(?:\\*\\*)?${escapeRegExp(label)}(?:\\*\\*)?`;
  const pattern = new RegExp(`${head}\\s*([\\s\\S]*?)${LABEL_STOP}`, "m");
  return pattern.exec(body)?.[1]?.trim() ?? "";
}

const DOCUMENTATION_LABEL =
  "(?:Required |Optional )?(?:Description|Parameter)s?:";

const DOCUMENTATION_BLOCK_REGEX = new RegExp(
  `^(?:\\*\\*)?${DOCUMENTATION_LABEL}(?:\\*\\*)?\\s*[\\s\\S]*?${LABEL_STOP}`,
  "gm"
);

/** Drops every Description and Parameters block, labels included. */
export function removeDocumentationBlocks(text: string): string {
  return text.replace(DOCUMENTATION_BLOCK_REGEX, "");
}

export interface ToolDocBlock {
  name: string;
  /** Everything below the `## name` heading. */
  body: string;
  description: string;
  /** Parameter bullets; entries of an optional list come flagged optional. */
  parameters: string;
  optionalParameters: string;
  /** `<name>…</name>` usage samples, as written. */
  samples: string[];
}

function extractSamples(text: string, toolName: string): string[] {
  const name = escapeRegExp(toolName);
  const pattern = new RegExp(`<${name}\\b[\\s\\S]*?<\\/${name}>`, "gi");
  return [...text.matchAll(pattern)].map((match) => match[0]);
}

/** Splits a `# Tools` section into its `## tool_name` blocks. */
export function splitToolBlocks(toolsSection: string): ToolDocBlock[] {
  const headings = [...toolsSection.matchAll(/^##[ \t]+(\w+)[ \t]*$/gm)];

  return headings.map((heading, i) => {
    const bodyStart = (heading.index ?? 0) + heading[0].length;
    const bodyEnd = headings[i + 1]?.index ?? toolsSection.length;
    const body = toolsSection.slice(bodyStart, bodyEnd);
    const name = heading[1] ?? "";

    const parameters = [
      extractLabeledBlock(body, "Parameters:"),
      extractLabeledBlock(body, "Required Parameters:"),
    ]
      .filter(Boolean)
      .join("\n");

    return {
      name,
      body,
      description: extractLabeledBlock(body, "Description:"),
      parameters,
      optionalParameters: extractLabeledBlock(body, "Optional Parameters:"),
      samples: extractSamples(removeDocumentationBlocks(body), name),
    };
  });
}
