export { extractCatalog } from "./catalog/catalog-extractor";
export type {
  CatalogExtraction,
  CatalogExtractionOptions,
} from "./catalog/catalog-extractor";
export { ToolCatalog } from "./catalog/tool-catalog";
export {
  downgradeToText,
  renderBackendCall,
} from "./completion/call-renderer";
export { translateCompletion } from "./completion/completion-parser";
export { createStreamConverter } from "./completion/stream-converter";
export {
  createConversionState,
  step,
} from "./completion/stream-state";
export type {
  ConversionState,
  StreamEvent,
  StreamOutput,
  StreamPhase,
} from "./completion/stream-state";
export type {
  AdapterDiagnostic,
  DiagnosticHooks,
  DiagnosticKind,
} from "./core/diagnostics";
export { AdapterSettingsError, RequestValidationError } from "./core/errors";
export {
  chatCompletionChunkSchema,
  chatCompletionSchema,
  chatMessageSchema,
  chatRequestSchema,
} from "./core/openai-schemas";
export type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatMessage,
  ChatRequest,
  WireTool,
  WireToolCall,
} from "./core/openai-schemas";
export type {
  BackendRequest,
  BackendTool,
  OutgoingSnapshot,
  RawToolCall,
  ReplacementRule,
  RuleRole,
  ToolCall,
  ToolChoicePolicy,
  ToolDefinition,
  ToolParameter,
} from "./core/types";
export { convertHistory } from "./history/history-converter";
export { transformRequest } from "./request-transformer";
export { CaptureContext } from "./rules/capture-context";
export { applyRules, rewriteMessages } from "./rules/rule-engine";
export {
  parseLegacyJsonSettings,
  parseYamlSettings,
} from "./rules/rule-settings";
export type { AdapterSettings } from "./rules/rule-settings";
export { pruneNulls } from "./schema/prune-nulls";
export { strictifySchema } from "./schema/strictify";
export { validateArguments } from "./schema/validate";
export { defaultSpecialTools } from "./special-tools";
export type {
  NamedArguments,
  SpecialToolAdapter,
} from "./special-tools";
export { createToolCallAdapter } from "./tool-call-adapter";
export type {
  ResponseTranslator,
  ToolCallAdapter,
  ToolCallAdapterOptions,
  TranslatedRequest,
} from "./tool-call-adapter";
export { parseToolMarkup } from "./xml/markup-parser";
export { renderToolMarkup } from "./xml/markup-renderer";
