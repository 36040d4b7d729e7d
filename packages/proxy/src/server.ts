import { APICallError } from "@ai-sdk/provider";
import cors from "@fastify/cors";
import {
  type ChatCompletionChunk,
  chatRequestSchema,
  createToolCallAdapter,
  type ReplacementRule,
  type ToolCallAdapter,
} from "@native-tool-adapter/core";
import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from "fastify";
import type { BackendClient } from "./backend-client.js";
import type { DumpSink } from "./dump-sink.js";
import {
  errorBody,
  errorMessage,
  parseJsonText,
  sseFrame,
} from "./response-utils.js";
import type { Logger } from "./types.js";

export interface ProxyServerOptions {
  backend: BackendClient;
  rules?: readonly ReplacementRule[];
  /** @default true */
  strict?: boolean;
  /** @default false */
  forceToolChoice?: boolean;
  includeCallId?: boolean;
  port?: number;
  host?: string;
  cors?: boolean;
  logger?: Logger;
  dumpSink?: DumpSink;
}

function describeRequest(body: {
  model?: string;
  stream?: boolean | null;
  messages: unknown[];
  tools?: unknown[];
}) {
  return {
    model: body.model,
    stream: Boolean(body.stream),
    messageCount: body.messages.length,
    clientToolCount: body.tools?.length ?? 0,
  };
}

export class ToolCallProxyServer {
  private readonly fastify: FastifyInstance;
  private readonly options: ProxyServerOptions;
  private readonly logger: Logger;
  private readonly adapter: ToolCallAdapter;

  constructor(options: ProxyServerOptions) {
    this.options = {
      port: 8000,
      host: "0.0.0.0",
      cors: true,
      ...options,
    };
    this.logger = options.logger ?? console;
    this.adapter = createToolCallAdapter({
      rules: options.rules ?? [],
      strict: options.strict ?? true,
      forceToolChoice: options.forceToolChoice ?? false,
      includeCallId: options.includeCallId ?? false,
      onDiagnostic: (diagnostic) => {
        this.logger.warn(`[adapter] ${diagnostic.kind}`, diagnostic);
      },
      onOutgoing: (snapshot) => {
        this.options.dumpSink?.record(snapshot);
      },
    });

    this.fastify = Fastify();

    if (this.options.cors) {
      void this.fastify.register(cors);
    }

    this.fastify.setErrorHandler((error: FastifyError, _request, reply) => {
      const statusCode = error.statusCode ?? 500;
      if (statusCode >= 400 && statusCode < 500) {
        return reply
          .code(statusCode)
          .send(errorBody(error.message, "invalid_request_error"));
      }
      this.logger.error("[proxy] Request handling error:", error);
      return reply
        .code(500)
        .send(errorBody("Internal server error", "server_error"));
    });

    this.setupRoutes();
  }

  /** The underlying Fastify instance, e.g. for `inject` in tests. */
  get app(): FastifyInstance {
    return this.fastify;
  }

  private setupRoutes(): void {
    this.fastify.get("/health", async () => ({
      status: "ok",
      timestamp: new Date().toISOString(),
    }));

    this.fastify.post("/v1/chat/completions", (request, reply) =>
      this.handleChatCompletion(request, reply)
    );

    this.fastify.get("/v1/models", async (_request, reply) => {
      try {
        return reply.send(await this.options.backend.listModels());
      } catch (error) {
        return this.sendBackendError(reply, error);
      }
    });
  }

  private async handleChatCompletion(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply> {
    const parsed = chatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply
        .code(400)
        .send(errorBody("Messages array is required", "invalid_request_error"));
    }
    const body = parsed.data;
    this.logger.debug("[proxy] Incoming request", describeRequest(body));

    const translated = this.adapter.translateRequest(body);
    if (!body.stream) {
      try {
        const completion = await this.options.backend.complete(
          translated.request
        );
        return reply.send(translated.translateResponse(completion));
      } catch (error) {
        return this.sendBackendError(reply, error);
      }
    }

    const abort = new AbortController();
    let upstream: ReadableStream<ChatCompletionChunk>;
    try {
      upstream = await this.options.backend.stream(translated.request, {
        abortSignal: abort.signal,
      });
    } catch (error) {
      return this.sendBackendError(reply, error);
    }

    reply.hijack();
    reply.raw.on("close", () => {
      if (!reply.raw.writableEnded) {
        abort.abort();
      }
    });
    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      ...(this.options.cors ? { "Access-Control-Allow-Origin": "*" } : {}),
    });

    const reader = translated.translateResponse(upstream).getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        reply.raw.write(sseFrame(value));
      }
      reply.raw.write(sseFrame("[DONE]"));
    } catch (error) {
      if (!abort.signal.aborted) {
        this.logger.error("[proxy] Streaming error:", error);
        reply.raw.write(
          sseFrame(errorBody(errorMessage(error), "upstream_error"))
        );
      }
    } finally {
      reply.raw.end();
    }
    return reply;
  }

  private sendBackendError(reply: FastifyReply, error: unknown): FastifyReply {
    if (
      APICallError.isInstance(error) &&
      error.statusCode !== undefined &&
      error.statusCode >= 400
    ) {
      const relayed = parseJsonText(error.responseBody ?? "");
      return reply
        .code(error.statusCode)
        .send(
          typeof relayed === "object" && relayed !== null
            ? relayed
            : errorBody(error.message, "upstream_error")
        );
    }
    this.logger.error("[proxy] Backend request failed:", error);
    return reply
      .code(502)
      .send(errorBody(errorMessage(error), "upstream_error"));
  }

  async start(): Promise<void> {
    const { host, port } = this.options;
    await this.fastify.listen({ port, host });

    this.logger.info(`🚀 Tool call proxy running on http://${host}:${port}`);
    this.logger.info(
      `📡 Endpoint: http://${host}:${port}/v1/chat/completions`
    );
    this.logger.info(`🏥 Health: http://${host}:${port}/health`);
  }

  async stop(): Promise<void> {
    await this.fastify.close();
    await this.options.dumpSink?.flush();
    this.logger.info("🛑 Server stopped");
  }
}
