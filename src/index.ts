// Decoding
export { BlockTracker } from "./providers/anthropic/blocks.js";
export type { BlockKind, BlockState } from "./providers/anthropic/blocks.js";
export { StreamEventType } from "./providers/anthropic/events.js";
export {
  getServerToolStrategy,
  SERVER_TOOL_STRATEGIES,
} from "./providers/anthropic/serverTools.js";
export type { ServerToolStrategy } from "./providers/anthropic/serverTools.js";
export { createStreamSession, StreamSession } from "./providers/anthropic/StreamSession.js";
export type { SessionState, StreamSessionOptions } from "./providers/anthropic/StreamSession.js";
export { UsageAccumulator } from "./providers/anthropic/usage.js";
export type { UsageIteration } from "./providers/anthropic/usage.js";
export { convertStopReason } from "./providers/anthropic/utils.js";
export { parseServerSentEvents, readResponseBody } from "./providers/sse.js";

// Requests
export { createStreamingRequest } from "./providers/anthropic/createStreamingRequest.js";
export type { StreamingMessagesClient } from "./providers/anthropic/createStreamingRequest.js";
export { anthropic } from "./providers/anthropic/provider.js";
export {
  AnthropicProviderConfigSchema,
  parseProviderConfig,
  resolveProviderConfig,
} from "./providers/config.js";

// Types
export { SpoolStopReason } from "./providers/types.js";
export type {
  AnthropicProviderConfig,
  EventSource,
  RawEvent,
  StreamingProvider,
  StreamingRequestParams,
  Usage,
} from "./providers/types.js";
export type {
  AnyStreamChunk,
  StreamChunkType,
  StreamCompleteChunk,
  StreamTextDeltaChunk,
  StreamThinkingDeltaChunk,
  StreamToolCallCompleteChunk,
} from "./messages/streaming/types.js";
export { collectStream, MessageBuilder } from "./messages/streaming/message-builder.js";
export type {
  ContentPartText,
  ContentPartThinking,
  ContentPartToolCall,
  SpoolAssistantMessage,
} from "./messages/types.js";

// Errors
export {
  ProviderStreamError,
  SpoolError,
  StreamPayloadError,
  ToolArgumentsError,
} from "./errors/SpoolError.js";

// Tracing
export { SimpleWriter, Tracer } from "./tracer/index.js";
export type {
  EventLevel,
  SimpleWriterOptions,
  SpanData,
  SpanEvent,
  StreamResult,
  TraceWriter,
  TracingContext,
} from "./tracer/index.js";
