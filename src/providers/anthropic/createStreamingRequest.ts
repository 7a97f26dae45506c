import type { MessageCreateParamsStreaming } from "@anthropic-ai/sdk/resources/messages.js";
import { SpoolError } from "../../errors/SpoolError.js";
import type { AnyStreamChunk, StreamCompleteChunk } from "../../messages/streaming/types.js";
import type { SpanStatus, TracingContext } from "../../tracer/types.js";
import { parseServerSentEvents, readResponseBody } from "../sse.js";
import type { StreamingRequestParams } from "../types.js";
import type { ServerToolStrategy } from "./serverTools.js";
import { createStreamSession } from "./StreamSession.js";

/**
 * The part of the Anthropic SDK client a streaming request needs. The raw
 * response is taken so that the SSE body is framed and decoded here rather
 * than by the SDK.
 */
export interface StreamingMessagesClient {
  messages: {
    create(
      body: MessageCreateParamsStreaming,
      options?: { signal?: AbortSignal | null },
    ): { asResponse(): Promise<{ body: ReadableStream<Uint8Array> | null }> };
  };
}

export async function* createStreamingRequest(params: {
  client: StreamingMessagesClient;
  request: StreamingRequestParams;
  runtime: { tracer?: TracingContext };
  signal?: AbortSignal;
  serverTools?: Readonly<Record<string, ServerToolStrategy>>;
}): AsyncGenerator<AnyStreamChunk, void, unknown> {
  const { client, request, runtime, signal, serverTools } = params;
  const span = runtime.tracer?.startSpan("anthropic.stream", { type: "llm" });
  span?.debug("Anthropic streaming request", { model: request.model, maxTokens: request.max_tokens });

  let status: SpanStatus = "ok";
  let chunks = 0;
  let toolCalls = 0;
  let completion: StreamCompleteChunk | undefined;

  try {
    const response = await client.messages.create({ ...request, stream: true }, { signal }).asResponse();
    if (!response.body) {
      throw new SpoolError("Streaming response has no body", { code: "MISSING_RESPONSE_BODY" });
    }

    const session = createStreamSession(parseServerSentEvents(readResponseBody(response.body)), {
      tracer: span,
      serverTools,
    });

    for await (const chunk of session) {
      chunks++;
      if (chunk.type === "tool-call-complete") toolCalls++;
      if (chunk.type === "complete") completion = chunk;
      yield chunk;
    }
  } catch (error) {
    status = "error";
    throw error;
  } finally {
    span?.setResult({
      kind: "stream",
      model: request.model,
      chunks,
      toolCalls,
      ...(completion && {
        finishReason: completion.data.finishReason,
        usage: {
          inputTokens: completion.data.usage.inputTokens,
          outputTokens: completion.data.usage.outputTokens,
          totalTokens: completion.data.usage.totalTokens,
        },
      }),
    });
    span?.end(status);
  }
}
