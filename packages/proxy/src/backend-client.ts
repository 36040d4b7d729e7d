import { APICallError, EmptyResponseBodyError } from "@ai-sdk/provider";
import {
  combineHeaders,
  extractResponseHeaders,
  type FetchFunction,
  getFromApi,
  postJsonToApi,
  type ResponseHandler,
} from "@ai-sdk/provider-utils";
import {
  type BackendRequest,
  type ChatCompletion,
  type ChatCompletionChunk,
  chatCompletionChunkSchema,
  chatCompletionSchema,
} from "@native-tool-adapter/core";
import type { EventSourceMessage } from "eventsource-parser";
import { EventSourceParserStream } from "eventsource-parser/stream";
import { z } from "zod";
import { BackendStreamError } from "./errors.js";
import { parseJsonText } from "./response-utils.js";

export interface BackendClientOptions {
  /** e.g. `https://api.openai.com/v1` */
  baseURL: string;
  apiKey?: string;
  headers?: Record<string, string | undefined>;
  /** Custom fetch, for tests or proxies. */
  fetch?: FetchFunction;
}

export interface BackendCallOptions {
  abortSignal?: AbortSignal;
}

export interface BackendClient {
  complete(
    request: BackendRequest,
    options?: BackendCallOptions
  ): Promise<ChatCompletion>;
  stream(
    request: BackendRequest,
    options?: BackendCallOptions
  ): Promise<ReadableStream<ChatCompletionChunk>>;
  listModels(options?: BackendCallOptions): Promise<Record<string, unknown>>;
}

const backendErrorSchema = z
  .object({
    error: z.object({ message: z.string() }).passthrough(),
  })
  .passthrough();

const modelListSchema = z.record(z.unknown());

const failedResponseHandler: ResponseHandler<APICallError> = async ({
  response,
  url,
  requestBodyValues,
}) => {
  const responseHeaders = extractResponseHeaders(response);
  const responseBody = await response.text();
  const parsed = backendErrorSchema.safeParse(parseJsonText(responseBody));
  return {
    responseHeaders,
    value: new APICallError({
      message: parsed.success
        ? parsed.data.error.message
        : response.statusText || `Backend responded with ${response.status}`,
      url,
      requestBodyValues,
      statusCode: response.status,
      responseHeaders,
      responseBody,
      isRetryable: response.status === 429 || response.status >= 500,
    }),
  };
};

function jsonResponseHandler<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): ResponseHandler<T> {
  return async ({ response, url, requestBodyValues }) => {
    const responseHeaders = extractResponseHeaders(response);
    const responseBody = await response.text();
    const rawValue = parseJsonText(responseBody);
    const parsed = schema.safeParse(rawValue);
    if (!parsed.success) {
      throw new APICallError({
        message: "Invalid JSON response",
        cause: parsed.error,
        url,
        requestBodyValues,
        responseHeaders,
        responseBody,
      });
    }
    return { responseHeaders, value: parsed.data, rawValue };
  };
}

const chunkStreamHandler: ResponseHandler<
  ReadableStream<ChatCompletionChunk>
> = async ({ response }) => {
  const responseHeaders = extractResponseHeaders(response);
  if (!response.body) {
    throw new EmptyResponseBodyError({});
  }

  return {
    responseHeaders,
    value: response.body
      .pipeThrough(new TextDecoderStream())
      .pipeThrough(new EventSourceParserStream())
      .pipeThrough(
        new TransformStream<EventSourceMessage, ChatCompletionChunk>({
          transform({ data }, controller) {
            if (data === "[DONE]") {
              return;
            }
            const parsed = chatCompletionChunkSchema.safeParse(
              parseJsonText(data)
            );
            if (!parsed.success) {
              controller.error(
                new BackendStreamError(
                  "Invalid chunk from backend",
                  parsed.error
                )
              );
              return;
            }
            controller.enqueue(parsed.data);
          },
        })
      ),
  };
};

/**
 * Client for an OpenAI-compatible chat-completions backend. Non-success
 * responses throw `APICallError` carrying the backend's status and body.
 */
export function createBackendClient(
  options: BackendClientOptions
): BackendClient {
  const baseURL = options.baseURL.replace(/\/+$/, "");
  const headers = () =>
    combineHeaders(
      options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {},
      options.headers
    );

  return {
    async complete(request, { abortSignal } = {}) {
      const { value } = await postJsonToApi({
        url: `${baseURL}/chat/completions`,
        headers: headers(),
        body: { ...request, stream: false },
        failedResponseHandler,
        successfulResponseHandler: jsonResponseHandler(chatCompletionSchema),
        abortSignal,
        fetch: options.fetch,
      });
      return value;
    },

    async stream(request, { abortSignal } = {}) {
      const { value } = await postJsonToApi({
        url: `${baseURL}/chat/completions`,
        headers: headers(),
        body: { ...request, stream: true },
        failedResponseHandler,
        successfulResponseHandler: chunkStreamHandler,
        abortSignal,
        fetch: options.fetch,
      });
      return value;
    },

    async listModels({ abortSignal } = {}) {
      const { value } = await getFromApi({
        url: `${baseURL}/models`,
        headers: headers(),
        failedResponseHandler,
        successfulResponseHandler: jsonResponseHandler(modelListSchema),
        abortSignal,
        fetch: options.fetch,
      });
      return value;
    },
  };
}
