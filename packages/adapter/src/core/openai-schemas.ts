import { z } from "zod";

/**
 * OpenAI chat-completions wire shapes as seen by the adapter.
 *
 * Every object is `passthrough` so fields the adapter does not interpret
 * (sampling options, logprobs, provider extensions) survive the round trip.
 */

export const textContentPartSchema = z
  .object({
    type: z.literal("text"),
    text: z.string(),
  })
  .passthrough();

export const contentPartSchema = z.union([
  textContentPartSchema,
  z.object({ type: z.string() }).passthrough(),
]);

export const messageContentSchema = z
  .union([z.string(), z.array(contentPartSchema)])
  .nullish();

export const wireToolCallSchema = z
  .object({
    id: z.string(),
    type: z.literal("function"),
    function: z
      .object({
        name: z.string(),
        arguments: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

export const messageRoleSchema = z.enum([
  "system",
  "user",
  "assistant",
  "tool",
]);

export const chatMessageSchema = z
  .object({
    role: messageRoleSchema,
    content: messageContentSchema,
    tool_calls: z.array(wireToolCallSchema).optional(),
    tool_call_id: z.string().optional(),
  })
  .passthrough();

export const wireToolSchema = z
  .object({
    type: z.literal("function"),
    function: z
      .object({
        name: z.string(),
        description: z.string().optional(),
        parameters: z.record(z.unknown()),
        strict: z.boolean().optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const chatRequestSchema = z
  .object({
    model: z.string().optional(),
    messages: z.array(chatMessageSchema),
    stream: z.boolean().nullish(),
    tools: z.array(wireToolSchema).optional(),
    tool_choice: z.unknown().optional(),
  })
  .passthrough();

export const completionMessageSchema = z
  .object({
    role: z.string().nullish(),
    content: z.string().nullish(),
    tool_calls: z.array(wireToolCallSchema).nullish(),
  })
  .passthrough();

export const chatCompletionSchema = z
  .object({
    id: z.string().nullish(),
    object: z.string().nullish(),
    created: z.number().nullish(),
    model: z.string().nullish(),
    choices: z.array(
      z
        .object({
          index: z.number(),
          message: completionMessageSchema,
          finish_reason: z.string().nullish(),
        })
        .passthrough()
    ),
    usage: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export const toolCallDeltaSchema = z
  .object({
    index: z.number().nullish(),
    id: z.string().nullish(),
    type: z.string().nullish(),
    function: z
      .object({
        name: z.string().nullish(),
        arguments: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const chatCompletionChunkSchema = z
  .object({
    id: z.string().nullish(),
    object: z.string().nullish(),
    created: z.number().nullish(),
    model: z.string().nullish(),
    choices: z.array(
      z
        .object({
          index: z.number(),
          delta: z
            .object({
              role: z.string().nullish(),
              content: z.string().nullish(),
              tool_calls: z.array(toolCallDeltaSchema).nullish(),
            })
            .passthrough()
            .nullish(),
          finish_reason: z.string().nullish(),
        })
        .passthrough()
    ),
    usage: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type TextContentPart = z.infer<typeof textContentPartSchema>;
export type ContentPart = z.infer<typeof contentPartSchema>;
export type MessageContent = z.infer<typeof messageContentSchema>;
export type WireToolCall = z.infer<typeof wireToolCallSchema>;
export type MessageRole = z.infer<typeof messageRoleSchema>;
export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type WireTool = z.infer<typeof wireToolSchema>;
export type ChatRequest = z.infer<typeof chatRequestSchema>;
export type ChatCompletion = z.infer<typeof chatCompletionSchema>;
export type ChatCompletionChoice = ChatCompletion["choices"][number];
export type ToolCallDelta = z.infer<typeof toolCallDeltaSchema>;
export type ChatCompletionChunk = z.infer<typeof chatCompletionChunkSchema>;
export type ChatCompletionChunkChoice = ChatCompletionChunk["choices"][number];
