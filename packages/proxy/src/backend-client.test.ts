import { APICallError } from "@ai-sdk/provider";
import { convertReadableStreamToArray } from "@ai-sdk/provider-utils/test";
import { describe, expect, it } from "vitest";
import { createBackendClient } from "./backend-client.js";
import { BackendStreamError } from "./errors.js";
import {
  createFakeFetch,
  jsonResponse,
  sseResponse,
} from "./test/fake-backend.js";

const baseURL = "https://backend.test/v1";

const completion = {
  id: "chatcmpl-1",
  object: "chat.completion",
  created: 1,
  model: "test-model",
  choices: [
    {
      index: 0,
      message: { role: "assistant", content: "Hi" },
      finish_reason: "stop",
    },
  ],
};

const request = {
  model: "test-model",
  messages: [{ role: "user" as const, content: "Hello" }],
};

describe("createBackendClient", () => {
  it("posts a non-streaming request with the API key", async () => {
    const { fetch, calls } = createFakeFetch(() => jsonResponse(completion));
    const client = createBackendClient({
      baseURL: "https://backend.test/v1/",
      apiKey: "test-secret",
      fetch,
    });

    expect(await client.complete(request)).toEqual(completion);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("https://backend.test/v1/chat/completions");
    expect(calls[0]?.method).toBe("POST");
    expect(calls[0]?.headers.get("authorization")).toBe("Bearer test-secret");
    expect(calls[0]?.body).toEqual({ ...request, stream: false });
  });

  it("throws the backend's error with its status and body", async () => {
    const errorBody = {
      error: { message: "Rate limited", type: "rate_limit" },
    };
    const { fetch } = createFakeFetch(() => jsonResponse(errorBody, 429));
    const client = createBackendClient({ baseURL, fetch });

    const error = await client
      .complete(request)
      .catch((caught: unknown) => caught);

    expect(APICallError.isInstance(error)).toBe(true);
    expect(error).toMatchObject({
      message: "Rate limited",
      statusCode: 429,
      responseBody: JSON.stringify(errorBody),
      isRetryable: true,
    });
  });

  it("rejects a response that is not a completion", async () => {
    const { fetch } = createFakeFetch(() => jsonResponse({ choices: "none" }));
    const client = createBackendClient({ baseURL, fetch });

    const error = await client
      .complete(request)
      .catch((caught: unknown) => caught);

    expect(APICallError.isInstance(error)).toBe(true);
    expect(error).toMatchObject({ message: "Invalid JSON response" });
  });

  it("streams chunks until [DONE]", async () => {
    const first = {
      id: "c1",
      choices: [{ index: 0, delta: { content: "Hi" }, finish_reason: null }],
    };
    const last = {
      id: "c1",
      choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
    };
    const { fetch, calls } = createFakeFetch(() =>
      sseResponse([JSON.stringify(first), JSON.stringify(last), "[DONE]"])
    );
    const client = createBackendClient({ baseURL, fetch });

    const stream = await client.stream(request);

    expect(await convertReadableStreamToArray(stream)).toEqual([first, last]);
    expect(calls[0]?.body).toEqual({ ...request, stream: true });
  });

  it("fails the stream on an unreadable event", async () => {
    const { fetch } = createFakeFetch(() => sseResponse(["not json"]));
    const client = createBackendClient({ baseURL, fetch });

    const stream = await client.stream(request);

    await expect(convertReadableStreamToArray(stream)).rejects.toThrow(
      BackendStreamError
    );
  });

  it("lists the backend's models", async () => {
    const models = {
      object: "list",
      data: [{ id: "test-model", object: "model" }],
    };
    const { fetch, calls } = createFakeFetch(() => jsonResponse(models));
    const client = createBackendClient({ baseURL, fetch });

    expect(await client.listModels()).toEqual(models);
    expect(calls[0]?.url).toBe("https://backend.test/v1/models");
    expect(calls[0]?.method).toBe("GET");
  });
});
