import { Tracer } from "../../src/tracer/tracer.js";
import type { SpanData, SpanEvent, SpanStatus, TraceWriter } from "../../src/tracer/types.js";

export type LifecycleEvent =
  | { type: "span:start"; name: string; spanId: string; parentSpanId?: string; spanType?: string }
  | { type: "span:end"; name: string; spanId: string; status: SpanStatus }
  | { type: "span:update"; name: string; spanId: string };

export class RecordingWriter implements TraceWriter {
  timeline: LifecycleEvent[] = [];
  spans: Map<string, SpanData> = new Map();
  events: SpanEvent[] = [];

  onSpanStart(span: SpanData): void {
    this.timeline.push({
      type: "span:start",
      name: span.name,
      spanId: span.spanId,
      parentSpanId: span.parentSpanId,
      spanType: span.type,
    });
  }

  onSpanEnd(span: SpanData): void {
    this.timeline.push({
      type: "span:end",
      name: span.name,
      spanId: span.spanId,
      status: span.status,
    });
    this.spans.set(span.spanId, structuredClone(span));
  }

  onSpanUpdate(span: SpanData): void {
    this.timeline.push({
      type: "span:update",
      name: span.name,
      spanId: span.spanId,
    });
  }

  onEvent(_span: SpanData, event: SpanEvent): void {
    this.events.push(event);
  }

  messages(level?: SpanEvent["level"]): string[] {
    return this.events.filter((e) => !level || e.level === level).map((e) => e.name);
  }
}

export function createTracerAndWriter(minLevel: SpanEvent["level"] = "debug") {
  const writer = new RecordingWriter();
  const tracer = new Tracer({ minLevel, writers: [writer] });
  return { writer, tracer, span: tracer.startSpan("test") };
}
