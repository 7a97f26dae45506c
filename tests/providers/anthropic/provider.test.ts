import { afterEach, describe, expect, test, vi } from "vitest";
import { collectStream } from "../../../src/messages/streaming/message-builder.js";
import type { StreamingMessagesClient } from "../../../src/providers/anthropic/createStreamingRequest.js";
import { anthropic, createProvider } from "../../../src/providers/anthropic/provider.js";
import { SpoolStopReason } from "../../../src/providers/types.js";
import {
  blockStopEvent,
  messageDeltaEvent,
  messageStartEvent,
  messageStopEvent,
  serverToolUseStartEvent,
  inputJsonDeltaEvent,
  textDeltaEvent,
  textStartEvent,
} from "../../helpers/events.js";

function clientReturning(sse: string): StreamingMessagesClient {
  return {
    messages: {
      create() {
        return {
          asResponse: async () => ({
            body: new ReadableStream<Uint8Array>({
              start(controller) {
                controller.enqueue(new TextEncoder().encode(sse));
                controller.close();
              },
            }),
          }),
        };
      },
    },
  };
}

describe("anthropic provider", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("should create a provider from an explicit key", () => {
    const provider = anthropic({ "api-key": "test-secret" });

    expect(provider.name).toBe("anthropic");
  });

  test("should refuse to start without an api key", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");

    expect(() => anthropic()).toThrow(/api-key/);
  });

  test("should stream a message through an injected client", async () => {
    const sse = [
      messageStartEvent({ inputTokens: 7 }),
      textStartEvent(0),
      textDeltaEvent(0, "Hello"),
      textDeltaEvent(0, " there"),
      blockStopEvent(0),
      messageDeltaEvent("end_turn", { output_tokens: 2 }),
      messageStopEvent(),
    ]
      .map((e) => `event: ${e.event}\ndata: ${e.data}\n\n`)
      .join("");
    const provider = createProvider(clientReturning(sse));

    const message = await collectStream(
      provider.createStreamingRequest({
        request: { model: "test-model", max_tokens: 64, messages: [{ role: "user", content: "Hi" }] },
        context: {},
      }),
    );

    expect(message).toEqual({
      role: "assistant",
      content: [{ type: "text", text: "Hello there" }],
      toolCalls: [],
      finishReason: SpoolStopReason.Stop,
      usage: {
        inputTokens: 7,
        outputTokens: 2,
        totalTokens: 9,
        inputDetails: { noCacheTokens: 7, cacheReadTokens: 0, cacheWriteTokens: 0 },
      },
    });
  });

  test("should hand its server tool table to every request", async () => {
    const sse = [
      serverToolUseStartEvent(0, "srvtoolu_1", "web_fetch"),
      inputJsonDeltaEvent(0, '{"url":"http://localhost/"}'),
      blockStopEvent(0),
      messageStopEvent(),
    ]
      .map((e) => `event: ${e.event}\ndata: ${e.data}\n\n`)
      .join("");
    const provider = createProvider(clientReturning(sse), {
      serverTools: { web_fetch: { name: "fetch", injectTypeDiscriminator: true } },
    });

    const message = await collectStream(
      provider.createStreamingRequest({
        request: { model: "test-model", max_tokens: 64, messages: [{ role: "user", content: "Fetch it" }] },
        context: {},
      }),
    );

    expect(message.toolCalls).toEqual([
      {
        type: "tool-call",
        id: "srvtoolu_1",
        name: "fetch",
        parameters: { type: "web_fetch", url: "http://localhost/" },
      },
    ]);
  });
});
