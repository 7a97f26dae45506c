import { ProviderStreamError, SpoolError, StreamPayloadError } from "../../errors/SpoolError.js";
import type { AnyStreamChunk, StreamToolCallCompleteChunk } from "../../messages/streaming/types.js";
import type { TracingContext } from "../../tracer/types.js";
import type { EventSource, RawEvent } from "../types.js";
import { BlockTracker } from "./blocks.js";
import {
  ContentBlockDeltaEventSchema,
  ContentBlockStartEventSchema,
  ContentBlockStopEventSchema,
  decodePayload,
  ErrorEventSchema,
  MessageDeltaEventSchema,
  MessageStartEventSchema,
  StreamEventType,
} from "./events.js";
import type { ServerToolStrategy } from "./serverTools.js";
import { UsageAccumulator } from "./usage.js";
import { convertStopReason } from "./utils.js";

export type SessionState =
  | { status: "idle" }
  | { status: "awaiting-event" }
  | { status: "done" }
  | { status: "failed"; error: unknown };

export interface StreamSessionOptions {
  tracer?: TracingContext;
  /** Overrides the built-in table of provider-executed tool strategies */
  serverTools?: Readonly<Record<string, ServerToolStrategy>>;
}

const END_OF_MESSAGE = Symbol("end-of-message");

/**
 * Pull-driven decoder for one streamed message. Each call to `next()` returns
 * the next semantic chunk, reading as many events from the source as it takes
 * to produce one. Once the stream ends or fails, every later call returns the
 * same outcome without reading again.
 *
 * A session has a single consumer: a `next()` issued while another one is
 * still waiting on the source is rejected.
 */
export class StreamSession implements AsyncIterableIterator<AnyStreamChunk> {
  readonly usage = new UsageAccumulator();

  private source: EventSource;
  private tracer?: TracingContext;
  private blocks: BlockTracker;
  // Chunks produced outside the one-event-one-chunk flow, drained before the next read
  private pending: AnyStreamChunk[] = [];
  private emittedToolCalls = new Set<string>();
  private state: SessionState = { status: "idle" };

  constructor(source: EventSource, options: StreamSessionOptions = {}) {
    this.source = source;
    this.tracer = options.tracer;
    this.blocks = new BlockTracker({ tracer: options.tracer, serverTools: options.serverTools });
  }

  get status(): SessionState["status"] {
    return this.state.status;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  async next(): Promise<IteratorResult<AnyStreamChunk, undefined>> {
    switch (this.state.status) {
      case "done":
        return { done: true, value: undefined };
      case "failed":
        throw this.state.error;
      case "awaiting-event":
        throw new SpoolError("next() called while a previous call is still reading the stream", {
          code: "CONCURRENT_READ",
        });
    }

    this.state = { status: "awaiting-event" };

    let chunk: AnyStreamChunk | null;
    try {
      chunk = await this.advance();
    } catch (error) {
      this.fail(error);
      throw error;
    }

    // close() may have run while the source was being read
    if (this.state.status !== "awaiting-event") {
      return { done: true, value: undefined };
    }
    if (chunk === null) {
      this.finish();
      return { done: true, value: undefined };
    }

    this.state = { status: "idle" };
    return { done: false, value: chunk };
  }

  async return(): Promise<IteratorResult<AnyStreamChunk, undefined>> {
    await this.close();
    return { done: true, value: undefined };
  }

  /** Ends the session and releases the event source. */
  async close(): Promise<void> {
    if (this.state.status === "done" || this.state.status === "failed") return;

    const reading = this.state.status === "awaiting-event";
    this.finish();

    if (reading) {
      // An async generator runs return() only after its pending next() settles
      this.source.return?.().catch((error: unknown) => {
        this.tracer?.warn("failed to release the event source", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
      return;
    }
    await this.source.return?.();
  }

  private async advance(): Promise<AnyStreamChunk | null> {
    for (;;) {
      const queued = this.pending.shift();
      if (queued) return queued;

      const result = await this.source.next();
      if (result.done) {
        return null;
      }

      const outcome = this.dispatch(result.value);
      if (outcome === END_OF_MESSAGE) {
        await this.source.return?.();
        return null;
      }
      if (outcome !== null && this.admit(outcome)) {
        return outcome;
      }
    }
  }

  private dispatch(raw: RawEvent): AnyStreamChunk | null | typeof END_OF_MESSAGE {
    switch (raw.event) {
      case StreamEventType.Ping:
        return null;

      case StreamEventType.MessageStart: {
        const { message } = decodePayload(raw.event, raw.data, MessageStartEventSchema);
        this.usage.addStart(message.usage);

        for (const part of message.content ?? []) {
          if (part.type !== "tool_use") continue;
          if (part.id === undefined || part.name === undefined) {
            throw new StreamPayloadError(raw.event, "tool_use content is missing its id or name");
          }
          const chunk: StreamToolCallCompleteChunk = {
            type: "tool-call-complete",
            data: { id: part.id, name: part.name, arguments: part.input ?? {} },
          };
          if (this.admit(chunk)) {
            this.pending.push(chunk);
          }
        }
        return null;
      }

      case StreamEventType.ContentBlockStart:
        return this.blocks.start(decodePayload(raw.event, raw.data, ContentBlockStartEventSchema));

      case StreamEventType.ContentBlockDelta:
        return this.blocks.delta(decodePayload(raw.event, raw.data, ContentBlockDeltaEventSchema));

      case StreamEventType.ContentBlockStop:
        return this.blocks.stop(decodePayload(raw.event, raw.data, ContentBlockStopEventSchema).index);

      case StreamEventType.MessageDelta: {
        const { delta, usage } = decodePayload(raw.event, raw.data, MessageDeltaEventSchema);
        this.usage.addDelta(usage);

        if (!delta.stop_reason) {
          return null;
        }
        return {
          type: "complete",
          data: {
            finishReason: convertStopReason(delta.stop_reason),
            usage: this.usage.toUsage(),
          },
        };
      }

      case StreamEventType.MessageStop:
        return END_OF_MESSAGE;

      case StreamEventType.Error: {
        const { error } = decodePayload(raw.event, raw.data, ErrorEventSchema);
        throw new ProviderStreamError(error.type, error.message);
      }

      default:
        this.tracer?.debug("skipping unknown stream event", { event: raw.event });
        return null;
    }
  }

  /** A tool call id goes out once per session; anything else always passes. */
  private admit(chunk: AnyStreamChunk): boolean {
    if (chunk.type !== "tool-call-complete") return true;

    if (this.emittedToolCalls.has(chunk.data.id)) {
      this.tracer?.warn("dropping repeated tool call", { id: chunk.data.id, name: chunk.data.name });
      return false;
    }
    this.emittedToolCalls.add(chunk.data.id);
    return true;
  }

  private finish(): void {
    const open = this.blocks.clear();
    if (open > 0) {
      this.tracer?.warn("stream ended with open content blocks", { open });
    }
    this.pending = [];
    this.state = { status: "done" };
  }

  private fail(error: unknown): void {
    this.blocks.clear();
    this.pending = [];
    this.state = { status: "failed", error };
    this.tracer?.error("stream failed", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Opens a decoding session over a framed event source, which may be an async
 * iterable (such as the result of `parseServerSentEvents`) or a bare iterator.
 */
export function createStreamSession(
  source: AsyncIterable<RawEvent> | EventSource,
  options: StreamSessionOptions = {},
): StreamSession {
  const iterator = isAsyncIterable(source) ? source[Symbol.asyncIterator]() : source;
  return new StreamSession(iterator, options);
}

function isAsyncIterable(
  source: AsyncIterable<RawEvent> | EventSource,
): source is AsyncIterable<RawEvent> {
  return Symbol.asyncIterator in source;
}
