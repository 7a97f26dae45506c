import type { SpoolStopReason, Usage } from "../../providers/types.js";
import type { ContentPartText, ContentPartThinking, ContentPartToolCall, SpoolAssistantMessage } from "../types.js";
import type { AnyStreamChunk } from "./types.js";

/**
 * Folds a chunk sequence into an assistant message. Consecutive deltas of the
 * same kind extend one content part; a change of kind starts a new part.
 */
export class MessageBuilder {
  private parts: Array<ContentPartText | ContentPartThinking> = [];
  private toolCalls: Array<ContentPartToolCall> = [];
  private finishReason?: SpoolStopReason;
  private usage?: Usage;
  private isComplete = false;

  addChunk(chunk: AnyStreamChunk): void {
    switch (chunk.type) {
      case "text-delta":
        this.appendText("text", chunk.data.text);
        break;

      case "thinking-delta":
        this.appendText("thinking", chunk.data.text);
        break;

      case "tool-call-complete":
        this.toolCalls.push({
          type: "tool-call",
          id: chunk.data.id,
          name: chunk.data.name,
          parameters: chunk.data.arguments,
        });
        break;

      case "complete":
        this.isComplete = true;
        this.finishReason = chunk.data.finishReason;
        this.usage = chunk.data.usage;
        break;
    }
  }

  get text(): string {
    return this.parts
      .filter((p): p is ContentPartText => p.type === "text")
      .map((p) => p.text)
      .join("");
  }

  get current(): SpoolAssistantMessage {
    return {
      role: "assistant",
      content: this.parts.map((p) => ({ ...p })),
      toolCalls: [...this.toolCalls],
      ...(this.finishReason && { finishReason: this.finishReason }),
      ...(this.usage && { usage: this.usage }),
    };
  }

  /** The finished message, or null until a complete chunk has been added. */
  get complete(): SpoolAssistantMessage | null {
    if (!this.isComplete) return null;
    return this.current;
  }

  private appendText(type: "text" | "thinking", text: string): void {
    if (text === "") return;

    const last = this.parts[this.parts.length - 1];
    if (last && last.type === type) {
      last.text += text;
    } else {
      this.parts.push({ type, text });
    }
  }
}

export async function collectStream(
  chunks: AsyncIterable<AnyStreamChunk>,
): Promise<SpoolAssistantMessage> {
  const builder = new MessageBuilder();
  for await (const chunk of chunks) {
    builder.addChunk(chunk);
  }
  return builder.current;
}
