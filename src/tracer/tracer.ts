import { randomUUID } from "node:crypto";
import type {
  EventLevel,
  SpanData,
  SpanOptions,
  SpanResult,
  SpanStatus,
  SpanType,
  TraceWriter,
  TracingContext,
} from "./types.js";

export const levelOrder: Record<EventLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Hands out root spans and fans their lifecycle out to the registered writers.
 * Events below `minLevel` are dropped before any writer sees them.
 */
export class Tracer {
  minLevel: EventLevel;
  private writers: TraceWriter[] = [];

  constructor(options: { minLevel?: EventLevel; writers?: TraceWriter[] } = {}) {
    this.minLevel = options.minLevel ?? "info";
    for (const writer of options.writers ?? []) {
      this.addWriter(writer);
    }
  }

  addWriter(writer: TraceWriter): void {
    if (!this.writers.includes(writer)) {
      this.writers.push(writer);
    }
  }

  removeWriter(writer: TraceWriter): void {
    this.writers = this.writers.filter((w) => w !== writer);
  }

  startSpan(name: string, options?: SpanOptions): TracingContext {
    return Span.open(this, { traceId: randomUUID(), name, type: options?.type });
  }

  /** @internal */
  _dispatch(notify: (writer: TraceWriter) => void): void {
    for (const writer of this.writers) {
      notify(writer);
    }
  }

  /** @internal */
  _accepts(level: EventLevel): boolean {
    return levelOrder[level] >= levelOrder[this.minLevel];
  }
}

interface SpanIdentity {
  traceId: string;
  parentSpanId?: string;
  name: string;
  type?: SpanType;
}

class Span implements TracingContext {
  private ended = false;

  private constructor(
    private readonly data: SpanData,
    private readonly tracer: Tracer,
  ) {}

  static open(tracer: Tracer, identity: SpanIdentity): Span {
    const data: SpanData = {
      ...identity,
      spanId: randomUUID(),
      startTime: performance.now(),
      status: "ok",
      events: [],
    };
    tracer._dispatch((w) => w.onSpanStart(data));
    return new Span(data, tracer);
  }

  startSpan(name: string, options?: SpanOptions): TracingContext {
    return Span.open(this.tracer, {
      traceId: this.data.traceId,
      parentSpanId: this.data.spanId,
      name,
      type: options?.type,
    });
  }

  end(status: SpanStatus = "ok"): void {
    if (this.ended) return;

    this.ended = true;
    this.data.endTime = performance.now();
    this.data.status = status;
    this.tracer._dispatch((w) => w.onSpanEnd(this.data));
  }

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log("error", message, attributes);
  }

  setResult(result: SpanResult): void {
    if (this.ended) return;

    this.data.result = result;
    this.tracer._dispatch((w) => w.onSpanUpdate?.(this.data));
  }

  private log(level: EventLevel, name: string, attributes?: Record<string, unknown>): void {
    if (this.ended || !this.tracer._accepts(level)) return;

    const event = { name, level, attributes, timestamp: performance.now() };
    this.data.events.push(event);
    this.tracer._dispatch((w) => w.onEvent?.(this.data, event));
  }
}
