export type SpanStatus = "ok" | "error";

export type EventLevel = "debug" | "info" | "warn" | "error";

// Free-form; "llm" for provider requests, "internal" for spans writers may hide
export type SpanType = string;

export interface SpanEvent {
  name: string;
  timestamp: number;
  level: EventLevel;
  attributes?: Record<string, unknown>;
}

export interface SpanData {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  type?: SpanType;
  startTime: number;
  endTime?: number;
  status: SpanStatus;
  events: SpanEvent[];
  result?: SpanResult;
}

export interface SpanOptions {
  type?: SpanType;
}

export type SpanResult = StreamResult;

/** Summary of one decoded stream, set when the stream ends or fails. */
export interface StreamResult {
  kind: "stream";
  model: string;
  chunks: number;
  toolCalls: number;
  finishReason?: string;
  usage?: TokenUsage;
}

export interface TokenUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface TraceWriter {
  onSpanStart(span: SpanData): void;
  onSpanUpdate?(span: SpanData): void;
  onSpanEnd(span: SpanData): void;
  onEvent?(span: SpanData, event: SpanEvent): void;
}

/**
 * What a decoding session or a streaming request sees of a span: leveled log
 * events, a typed result and child spans.
 */
export interface TracingContext {
  startSpan(name: string, options?: SpanOptions): TracingContext;
  end(status?: SpanStatus): void;

  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  setResult(result: SpanResult): void;
}
