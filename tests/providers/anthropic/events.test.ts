import { describe, expect, test } from "vitest";
import { StreamPayloadError } from "../../../src/errors/SpoolError.js";
import {
  ContentBlockDeltaEventSchema,
  decodePayload,
  MessageDeltaEventSchema,
  MessageStartEventSchema,
} from "../../../src/providers/anthropic/events.js";

describe("decodePayload", () => {
  test("should decode a message_start payload and drop fields it does not use", () => {
    const data = JSON.stringify({
      type: "message_start",
      message: {
        id: "msg_1",
        model: "test-model",
        content: [],
        usage: { input_tokens: 25, output_tokens: 1, cache_read_input_tokens: null },
      },
    });

    expect(decodePayload("message_start", data, MessageStartEventSchema)).toEqual({
      message: { content: [], usage: { input_tokens: 25, cache_read_input_tokens: null } },
    });
  });

  test("should accept a null compaction content", () => {
    const data = '{"index":2,"delta":{"type":"compaction_delta","content":null}}';

    expect(decodePayload("content_block_delta", data, ContentBlockDeltaEventSchema)).toEqual({
      index: 2,
      delta: { type: "compaction_delta", content: null },
    });
  });

  test("should decode a message_delta with iterations", () => {
    const data = JSON.stringify({
      delta: { stop_reason: "end_turn" },
      usage: { output_tokens: 9, iterations: [{ type: "message", input_tokens: 4, output_tokens: 9 }] },
    });

    expect(decodePayload("message_delta", data, MessageDeltaEventSchema)).toEqual({
      delta: { stop_reason: "end_turn" },
      usage: { output_tokens: 9, iterations: [{ type: "message", input_tokens: 4, output_tokens: 9 }] },
    });
  });

  test("should name the event type when the payload is not JSON", () => {
    expect(() => decodePayload("message_delta", "{", MessageDeltaEventSchema)).toThrow(
      /^Failed to parse message_delta event: invalid JSON/,
    );
  });

  test("should list the offending path when the shape is wrong", () => {
    let caught: unknown;
    try {
      decodePayload("content_block_delta", '{"index":-1,"delta":{"type":"text_delta"}}', ContentBlockDeltaEventSchema);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(StreamPayloadError);
    if (caught instanceof StreamPayloadError) {
      expect(caught.eventType).toBe("content_block_delta");
      expect(caught.message).toContain("  - index: ");
    }
  });
});
