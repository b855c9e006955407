// Engine
export { ConversationEngine } from "./agent/runtime.js";
export type {
  ConversationEngineOptions,
  GenerateTextOptions,
  StreamTextOptions,
} from "./agent/runtime.js";
export type { GenerationOptions, TextProvider } from "./agent/providers.js";

// Messages and results
export type {
  AssistantMessage,
  ContentPart,
  FinishReason,
  GenerateTextResult,
  Message,
  MessageRole,
  SSEEvent,
  SystemMessage,
  TextChunk,
  TextResult,
  ToolCall,
  ToolChoice,
  ToolMessage,
  Usage,
  UserMessage,
} from "./agent/types.js";
export {
  assistantMessage,
  isRecord,
  parseToolArguments,
  serializeMessage,
  systemMessage,
  toolMessage,
  userMessage,
  validateConversation,
} from "./agent/messages.js";
export { addUsage, sumUsage, usageFromProvider, ZERO_USAGE } from "./agent/usage.js";
export { hasToolCalls, isComplete, isTruncated, parseFinishReason } from "./agent/results.js";

// Streaming
export { fromAsyncIterable, fromReadableStream, SSEStream } from "./agent/stream-parser.js";
export type { ByteSource, SSEStreamOptions } from "./agent/stream-parser.js";
export {
  collectText,
  continueChunk,
  finalChunk,
  firstChunk,
  reconcileTextChunks,
} from "./agent/text-stream.js";
export type { DeltaExtractor, TextDelta } from "./agent/text-stream.js";

// Tools
export { defineTool, ToolRegistry } from "./agent/tools.js";
export type { PlainToolDefinition, SchemaToolDefinition, Tool } from "./agent/tools.js";
export { ToolExecutionPolicy } from "./agent/tool-policy.js";
export type {
  ArgumentSanitizer,
  ConfirmationCallback,
  PolicyDecision,
} from "./agent/tool-policy.js";
export { ToolExecutor, toolResultContent } from "./agent/tool-executor.js";
export type { ToolResult } from "./agent/tool-executor.js";

// Events
export {
  EventBus,
  isCritical,
  memoryLimitWarning,
  noopEventDispatcher,
} from "./agent/events.js";
export type {
  EngineEventName,
  EngineEvents,
  EngineOperation,
  EventDispatcher,
  EventHandler,
  MemoryLimitWarning,
} from "./agent/events.js";

// Transport
export { HttpTransport } from "./agent/transport.js";
export type { RequestContext, TransportConfig } from "./agent/transport.js";
export { isRetryable, parseRetryAfter, retryDelay, withRetry } from "./agent/retry.js";
export type { RetryListener } from "./agent/retry.js";

// Config
export { EngineConfigSchema, LoggingSchema, RetrySchema } from "./config/schema.js";
export type {
  EngineConfig,
  EngineConfigInput,
  LoggingConfig,
  RetryConfig,
} from "./config/types.js";
export { DEFAULT_ENGINE_CONFIG } from "./config/defaults.js";
export { loadEngineConfig, parseEngineConfig } from "./config/loader.js";

// Infrastructure
export { createLogger, redactSensitive } from "./infra/logger.js";
export type { AppLogger, LoggerOptions, LogLevel } from "./infra/logger.js";
export {
  AIError,
  ConfigError,
  InputValidationError,
  MemoryLimitExceededError,
  ProviderError,
  ProviderUnavailableError,
  RateLimitError,
  StreamingError,
  ToolExecutionError,
  ToolSecurityError,
} from "./infra/errors.js";
export type { ProviderErrorDetails, ToolSecurityReason } from "./infra/errors.js";
