import type { SpoolStopReason, Usage } from "../../providers/types.js";

export interface StreamTextDeltaChunk {
  type: "text-delta";
  data: {
    text: string;
  };
}

export interface StreamThinkingDeltaChunk {
  type: "thinking-delta";
  data: {
    text: string;
  };
}

export interface StreamToolCallCompleteChunk {
  type: "tool-call-complete";
  data: {
    id: string;
    name: string;
    arguments: Record<string, unknown>;
  };
}

export interface StreamCompleteChunk {
  type: "complete";
  data: {
    finishReason: SpoolStopReason;
    usage: Usage;
  };
}

export type AnyStreamChunk =
  | StreamTextDeltaChunk
  | StreamThinkingDeltaChunk
  | StreamToolCallCompleteChunk
  | StreamCompleteChunk;

export type StreamChunkType = AnyStreamChunk["type"];
