import { SpoolStopReason } from "../types.js";

export function convertStopReason(reason: string): SpoolStopReason {
  switch (reason) {
    case "end_turn":
    case "stop_sequence":
      return SpoolStopReason.Stop;
    case "max_tokens":
    case "model_context_window_exceeded":
      return SpoolStopReason.Length;
    case "tool_use":
      return SpoolStopReason.ToolCalls;
    case "pause_turn":
    case "refusal":
    default:
      return SpoolStopReason.Other;
  }
}
