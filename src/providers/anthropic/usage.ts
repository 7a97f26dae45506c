import type { Usage } from "../types.js";
import type { MessageDeltaEvent, MessageStartEvent } from "./events.js";

export interface UsageIteration {
  type: string;
  inputTokens: number;
  outputTokens: number;
}

/**
 * Token figures for one message arrive split across events: input and cache
 * counts in message_start, output counts (and the iteration breakdown, when the
 * provider ran a compaction pass first) in message_delta.
 */
export class UsageAccumulator {
  inputTokens = 0;
  cacheReadTokens = 0;
  cacheWriteTokens = 0;
  outputTokens = 0;
  iterations: UsageIteration[] = [];

  addStart(usage: MessageStartEvent["message"]["usage"]): void {
    if (!usage) return;
    this.inputTokens = usage.input_tokens ?? 0;
    this.cacheReadTokens = usage.cache_read_input_tokens ?? 0;
    this.cacheWriteTokens = usage.cache_creation_input_tokens ?? 0;
  }

  /**
   * The counts in message_delta are cumulative, so any figure present replaces
   * what was recorded before.
   */
  addDelta(usage: MessageDeltaEvent["usage"]): void {
    if (!usage) return;
    if (usage.output_tokens != null) this.outputTokens = usage.output_tokens;
    if (usage.input_tokens != null) this.inputTokens = usage.input_tokens;
    if (usage.cache_read_input_tokens != null) this.cacheReadTokens = usage.cache_read_input_tokens;
    if (usage.cache_creation_input_tokens != null) {
      this.cacheWriteTokens = usage.cache_creation_input_tokens;
    }
    if (usage.iterations && usage.iterations.length > 0) {
      this.iterations = usage.iterations.map((iteration) => ({
        type: iteration.type,
        inputTokens: iteration.input_tokens,
        outputTokens: iteration.output_tokens,
      }));
    }
  }

  toUsage(): Usage {
    let noCacheTokens = this.inputTokens;
    let outputTokens = this.outputTokens;

    // The top-level counters leave out the compaction iteration; the sum covers everything billed
    if (this.iterations.length > 0) {
      noCacheTokens = 0;
      outputTokens = 0;
      for (const iteration of this.iterations) {
        noCacheTokens += iteration.inputTokens;
        outputTokens += iteration.outputTokens;
      }
    }

    const inputTokens = noCacheTokens + this.cacheReadTokens + this.cacheWriteTokens;
    return {
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      inputDetails: {
        noCacheTokens,
        cacheReadTokens: this.cacheReadTokens,
        cacheWriteTokens: this.cacheWriteTokens,
      },
    };
  }
}
