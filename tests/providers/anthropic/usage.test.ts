import { describe, expect, test } from "vitest";
import { UsageAccumulator } from "../../../src/providers/anthropic/usage.js";

describe("UsageAccumulator", () => {
  test("should default every figure to zero", () => {
    const usage = new UsageAccumulator();

    expect(usage.toUsage()).toEqual({
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
      inputDetails: { noCacheTokens: 0, cacheReadTokens: 0, cacheWriteTokens: 0 },
    });
  });

  test("should combine start and delta figures", () => {
    const usage = new UsageAccumulator();

    usage.addStart({ input_tokens: 12, cache_read_input_tokens: 30, cache_creation_input_tokens: null });
    usage.addDelta({ output_tokens: 8 });

    expect(usage.toUsage()).toEqual({
      inputTokens: 42,
      outputTokens: 8,
      totalTokens: 50,
      inputDetails: { noCacheTokens: 12, cacheReadTokens: 30, cacheWriteTokens: 0 },
    });
  });

  test("should let cumulative delta figures replace earlier ones", () => {
    const usage = new UsageAccumulator();

    usage.addStart({ input_tokens: 5 });
    usage.addDelta({ output_tokens: 3 });
    usage.addDelta({ output_tokens: 11, input_tokens: 6, cache_creation_input_tokens: 2 });

    expect(usage.toUsage()).toEqual({
      inputTokens: 8,
      outputTokens: 11,
      totalTokens: 19,
      inputDetails: { noCacheTokens: 6, cacheReadTokens: 0, cacheWriteTokens: 2 },
    });
  });

  test("should sum iterations in place of the flat counts", () => {
    const usage = new UsageAccumulator();

    usage.addStart({ input_tokens: 1000, cache_read_input_tokens: 50 });
    usage.addDelta({
      output_tokens: 400,
      iterations: [
        { type: "compaction", input_tokens: 180000, output_tokens: 3500 },
        { type: "message", input_tokens: 23000, output_tokens: 1000 },
      ],
    });

    const result = usage.toUsage();

    expect(result.inputDetails.noCacheTokens).toBe(203000);
    expect(result.inputTokens).toBe(203050);
    expect(result.outputTokens).toBe(4500);
    expect(result.totalTokens).toBe(result.inputTokens + result.outputTokens);
    expect(usage.iterations).toEqual([
      { type: "compaction", inputTokens: 180000, outputTokens: 3500 },
      { type: "message", inputTokens: 23000, outputTokens: 1000 },
    ]);
  });

  test("should ignore missing usage objects", () => {
    const usage = new UsageAccumulator();

    usage.addStart(undefined);
    usage.addDelta(null);

    expect(usage.toUsage().totalTokens).toBe(0);
  });
});
