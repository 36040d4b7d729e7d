import { XMLParser, XMLValidator } from "fast-xml-parser";

/** One element of a documented usage sample, in document order. */
export interface SampleElement {
  tag: string;
  attributes: string[];
  children: SampleElement[];
  text: string;
}

const ATTRIBUTE_PREFIX = "@_";
const TEXT_NODE = "#text";

const sampleParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  textNodeName: TEXT_NODE,
  trimValues: true,
});

/**
 * Usage samples in tool documentation are written for humans, not XML
 * parsers. Placeholders such as `(<path>)` become backticked text, bare `&`
 * and stray `<` are escaped.
 */
export function repairSample(sample: string): string {
  return sample
    .trim()
    .replace(/\(([^()]*)\)/g, (group, inner: string) =>
      /<\/?[\w.-]*\s*\/?>/.test(inner)
        ? `(${inner.replace(/<(\/?[\w.-]*)\s*(\/?)>/g, "`$1$2`")})`
        : group
    )
    .replace(/&(?![A-Za-z]+;|#\d+;|#x[0-9A-Fa-f]+;)/g, "&amp;")
    .replace(/<(?![A-Za-z_/!?])/g, "&lt;");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toElements(tag: string, value: unknown): SampleElement[] {
  if (Array.isArray(value)) {
    return value.flatMap((item) => toElements(tag, item));
  }
  if (!isRecord(value)) {
    return [
      {
        tag,
        attributes: [],
        children: [],
        text: value === undefined || value === null ? "" : String(value),
      },
    ];
  }

  const element: SampleElement = {
    tag,
    attributes: [],
    children: [],
    text: "",
  };
  for (const [key, child] of Object.entries(value)) {
    if (key === TEXT_NODE) {
      element.text = String(child);
    } else if (key.startsWith(ATTRIBUTE_PREFIX)) {
      element.attributes.push(key.slice(ATTRIBUTE_PREFIX.length));
    } else {
      element.children.push(...toElements(key, child));
    }
  }
  return [element];
}

/**
 * Parses a usage sample whose root must be `<toolName>`. Returns undefined
 * when the sample is not well-formed even after repair.
 */
export function parseSample(
  sample: string,
  toolName: string
): SampleElement | undefined {
  const xml = repairSample(sample);
  if (XMLValidator.validate(xml) !== true) {
    return;
  }
  const parsed: unknown = sampleParser.parse(xml);
  if (!isRecord(parsed) || !(toolName in parsed)) {
    return;
  }
  return toElements(toolName, parsed[toolName])[0];
}
