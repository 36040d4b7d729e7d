export { createBackendClient } from "./backend-client.js";
export type {
  BackendCallOptions,
  BackendClient,
  BackendClientOptions,
} from "./backend-client.js";
export { loadConfig, proxyEnvSchema } from "./config.js";
export type { ProxyConfig } from "./config.js";
export { DumpSink } from "./dump-sink.js";
export { BackendStreamError, ProxyConfigError } from "./errors.js";
export { ToolCallProxyServer } from "./server.js";
export type { ProxyServerOptions } from "./server.js";
export { loadSettings } from "./settings-loader.js";
export type { SettingsLoadOptions } from "./settings-loader.js";
export type { ErrorBody, Logger } from "./types.js";
