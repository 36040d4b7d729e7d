import { createIdGenerator } from "@ai-sdk/provider-utils";

const callIdGenerator = createIdGenerator({
  prefix: "call",
  separator: "_",
  size: 24,
});

/**
 * Ids for calls recovered from client markup, which carries none of its own
 * unless an `<id>` element was rendered into it.
 */
export function generateToolCallId(): string {
  return callIdGenerator();
}
