import type { SpoolStopReason, Usage } from "../providers/types.js";

export interface SpoolAssistantMessage {
  role: "assistant";
  content: Array<ContentPartText | ContentPartThinking>;
  toolCalls: Array<ContentPartToolCall>;
  finishReason?: SpoolStopReason;
  usage?: Usage;
}

export interface ContentPartText {
  type: "text";
  text: string;
}

export interface ContentPartThinking {
  type: "thinking";
  text: string;
}

export interface ContentPartToolCall {
  type: "tool-call";
  id: string;
  name: string;
  parameters: Record<string, unknown>;
}
