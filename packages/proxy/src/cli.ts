#!/usr/bin/env node
import { createBackendClient } from "./backend-client.js";
import { loadConfig } from "./config.js";
import { DumpSink } from "./dump-sink.js";
import { ToolCallProxyServer } from "./server.js";
import { loadSettings } from "./settings-loader.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const settings = await loadSettings({
    path: config.settingPath,
    logger: console,
  });

  const server = new ToolCallProxyServer({
    backend: createBackendClient({
      baseURL: config.targetBaseURL,
      apiKey: config.targetApiKey,
    }),
    rules: settings.rules,
    strict: config.strict,
    forceToolChoice: config.forceToolChoice,
    host: config.host,
    port: config.port,
    logger: console,
    ...(config.dumpDir ? { dumpSink: new DumpSink(config.dumpDir) } : {}),
  });

  const shutdown = () => {
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Error stopping server:", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await server.start();
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
