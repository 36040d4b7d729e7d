import type {
  ContentPart,
  MessageContent,
  TextContentPart,
} from "../openai-schemas";

export function isTextPart(part: ContentPart): part is TextContentPart {
  return part.type === "text" && typeof part.text === "string";
}

/**
 * Text of a message as one string; text parts are joined by newlines and
 * non-text parts are ignored.
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  if (!content) {
    return "";
  }
  return content
    .filter(isTextPart)
    .map((part) => part.text)
    .join("\n");
}

export function firstText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  const first = content?.find(isTextPart);
  return first?.text ?? "";
}

/**
 * Applies `rewrite` to every piece of text in `content`, leaving non-text
 * parts untouched.
 */
export function mapContentText(
  content: MessageContent,
  rewrite: (text: string) => string
): MessageContent {
  if (typeof content === "string") {
    return rewrite(content);
  }
  if (!content) {
    return content;
  }
  return content.map((part) =>
    isTextPart(part) && part.text ? { ...part, text: rewrite(part.text) } : part
  );
}
