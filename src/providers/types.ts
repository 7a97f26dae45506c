import type { MessageCreateParamsStreaming } from "@anthropic-ai/sdk/resources/messages.js";
import type { AnyStreamChunk } from "../messages/streaming/types.js";
import type { TracingContext } from "../tracer/types.js";

/*
 Vendor specific configuration
 */
export type AnthropicProviderConfig = { "api-key": string; "base-url"?: string };

/*
 Wire level
 */

/** One framed record from the event source: the SSE `event:` name and its `data:` payload. */
export interface RawEvent {
  event: string;
  data: string;
}

export type EventSource = AsyncIterator<RawEvent, unknown, undefined>;

/*
 Decoded output
 */

export enum SpoolStopReason {
  Stop = "stop",
  Length = "length",
  ToolCalls = "tool_calls",
  Other = "other",
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  inputDetails: {
    noCacheTokens: number;
    cacheReadTokens: number;
    cacheWriteTokens: number;
  };
}

/** A fully built Messages request; `stream: true` is set when it is sent. */
export type StreamingRequestParams = Omit<MessageCreateParamsStreaming, "stream">;

export interface StreamingProvider {
  get name(): string;

  createStreamingRequest(params: {
    request: StreamingRequestParams;
    context: { tracer?: TracingContext };
    signal?: AbortSignal;
  }): AsyncGenerator<AnyStreamChunk, void, unknown>;
}
