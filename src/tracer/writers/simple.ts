import { levelOrder } from "../tracer.js";
import type { EventLevel, SpanData, SpanEvent, TraceWriter } from "../types.js";

export interface SimpleWriterOptions {
  /** Minimum event level to display (default: "info") */
  minLevel?: EventLevel;
  /** Show internal spans (default: false) */
  showInternal?: boolean;
  /** Show timestamps (default: true) */
  showTimestamp?: boolean;
  /** Show duration on span end (default: true) */
  showDuration?: boolean;
  /** Custom output function (default: console.log) */
  output?: (line: string) => void;
}

export class SimpleWriter implements TraceWriter {
  private minLevel: EventLevel;
  private showInternal: boolean;
  private showTimestamp: boolean;
  private showDuration: boolean;
  private output: (line: string) => void;

  // Span hierarchy, for depth calculation and event bubbling
  private spans: Map<string, SpanData> = new Map();
  private visibleDepths: Map<string, number> = new Map();

  constructor(options: SimpleWriterOptions = {}) {
    this.minLevel = options.minLevel ?? "info";
    this.showInternal = options.showInternal ?? false;
    this.showTimestamp = options.showTimestamp ?? true;
    this.showDuration = options.showDuration ?? true;
    this.output = options.output ?? console.log;
  }

  private isSpanVisible(span: SpanData): boolean {
    return span.type !== "internal" || this.showInternal;
  }

  /**
   * Nearest visible ancestor of a span, or null at root level.
   */
  private findVisibleAncestor(span: SpanData): SpanData | null {
    let currentId = span.parentSpanId;
    while (currentId) {
      const parent = this.spans.get(currentId);
      if (!parent) break;
      if (this.isSpanVisible(parent)) {
        return parent;
      }
      currentId = parent.parentSpanId;
    }
    return null;
  }

  private depthOf(span: SpanData): number {
    if (this.isSpanVisible(span)) {
      return this.visibleDepths.get(span.spanId) ?? 0;
    }
    const ancestor = this.findVisibleAncestor(span);
    return ancestor ? (this.visibleDepths.get(ancestor.spanId) ?? 0) : 0;
  }

  private formatTimestamp(): string {
    if (!this.showTimestamp) return "";
    const now = new Date();
    const time = now.toTimeString().slice(0, 8);
    const ms = now.getMilliseconds().toString().padStart(3, "0");
    return `[${time}.${ms}] `;
  }

  private formatDuration(span: SpanData): string {
    if (!this.showDuration || span.endTime === undefined) return "";
    const duration = span.endTime - span.startTime;
    if (duration < 1000) {
      return ` (${Math.round(duration)}ms)`;
    }
    return ` (${(duration / 1000).toFixed(2)}s)`;
  }

  private formatSpanName(span: SpanData): string {
    return span.type ? `[${span.type}] ${span.name}` : span.name;
  }

  onSpanStart(span: SpanData): void {
    this.spans.set(span.spanId, span);
    if (!this.isSpanVisible(span)) return;

    const ancestor = this.findVisibleAncestor(span);
    const depth = ancestor ? (this.visibleDepths.get(ancestor.spanId) ?? 0) + 1 : 0;
    this.visibleDepths.set(span.spanId, depth);

    const indent = "  ".repeat(depth);
    this.output(`${this.formatTimestamp()}${indent}START ${this.formatSpanName(span)}`);
  }

  onSpanEnd(span: SpanData): void {
    this.spans.set(span.spanId, span);
    if (!this.isSpanVisible(span)) return;

    const indent = "  ".repeat(this.depthOf(span));
    const timestamp = this.formatTimestamp();
    const status = span.status === "error" ? " [ERROR]" : "";
    this.output(
      `${timestamp}${indent}END   ${this.formatSpanName(span)}${this.formatDuration(span)}${status}`,
    );

    if (span.result?.kind === "stream") {
      const result = span.result;
      const parts: string[] = [
        `model=${result.model}`,
        `chunks=${result.chunks}`,
        `toolCalls=${result.toolCalls}`,
      ];
      if (result.finishReason) {
        parts.push(`finishReason=${result.finishReason}`);
      }
      if (result.usage?.inputTokens !== undefined) {
        parts.push(`inputTokens=${result.usage.inputTokens}`);
      }
      if (result.usage?.outputTokens !== undefined) {
        parts.push(`outputTokens=${result.usage.outputTokens}`);
      }
      this.output(`${timestamp}${indent}  INFO  stream complete ${parts.join(" ")}`);
    }
  }

  onSpanUpdate(span: SpanData): void {
    // No live rewriting, only keep the latest data
    this.spans.set(span.spanId, span);
  }

  onEvent(span: SpanData, event: SpanEvent): void {
    if (levelOrder[event.level] < levelOrder[this.minLevel]) return;
    this.spans.set(span.spanId, span);

    const indent = "  ".repeat(this.depthOf(span) + 1);
    const level = event.level.toUpperCase().padEnd(5);
    let line = `${this.formatTimestamp()}${indent}${level} ${event.name}`;

    const attrs = event.attributes ? Object.entries(event.attributes) : [];
    if (attrs.length > 0) {
      line += ` ${attrs.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ")}`;
    }

    this.output(line);
  }
}
