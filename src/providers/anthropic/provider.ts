import AnthropicSDK from "@anthropic-ai/sdk";
import type { TracingContext } from "../../tracer/types.js";

import type { AnyStreamChunk } from "../../messages/streaming/types.js";
import { resolveProviderConfig } from "../config.js";
import type { AnthropicProviderConfig, StreamingProvider, StreamingRequestParams } from "../types.js";
import { createStreamingRequest, type StreamingMessagesClient } from "./createStreamingRequest.js";
import type { ServerToolStrategy } from "./serverTools.js";

export const NAME = "anthropic" as const;

export function anthropic(
  config: Partial<AnthropicProviderConfig> = {},
  options: { serverTools?: Readonly<Record<string, ServerToolStrategy>> } = {},
): StreamingProvider {
  const resolved = resolveProviderConfig(config);
  const client = new AnthropicSDK({
    apiKey: resolved["api-key"],
    baseURL: resolved["base-url"],
  });
  return createProvider(client, options);
}

/** @internal */
export function createProvider(
  client: StreamingMessagesClient,
  options: { serverTools?: Readonly<Record<string, ServerToolStrategy>> } = {},
): StreamingProvider {
  return {
    name: NAME,

    createStreamingRequest(params: {
      request: StreamingRequestParams;
      context: { tracer?: TracingContext };
      signal?: AbortSignal;
    }): AsyncGenerator<AnyStreamChunk, void, unknown> {
      const { request, context, signal } = params;
      return createStreamingRequest({
        client,
        request,
        runtime: context,
        signal,
        serverTools: options.serverTools,
      });
    },
  };
}
