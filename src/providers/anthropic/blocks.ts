import { StreamPayloadError, ToolArgumentsError } from "../../errors/SpoolError.js";
import type {
  StreamTextDeltaChunk,
  StreamThinkingDeltaChunk,
  StreamToolCallCompleteChunk,
} from "../../messages/streaming/types.js";
import type { TracingContext } from "../../tracer/types.js";
import type { ContentBlockDeltaEvent, ContentBlockStartEvent } from "./events.js";
import { getServerToolStrategy, SERVER_TOOL_STRATEGIES, type ServerToolStrategy } from "./serverTools.js";

export type BlockKind =
  | "text"
  | "reasoning"
  | "redacted-reasoning"
  | "tool-call"
  | "provider-tool-call"
  | "mcp-tool-use"
  | "mcp-tool-result"
  | "opaque";

interface PassiveBlockState {
  kind: Exclude<BlockKind, "tool-call" | "provider-tool-call">;
}

interface ToolCallBlockState {
  kind: "tool-call" | "provider-tool-call";
  id: string;
  /** Name emitted on the tool-call chunk */
  name: string;
  /** Raw provider name, only used for framing fixes */
  providerName: string;
  buffer: string;
  isFirstFragment: boolean;
  /** Arguments arrived whole in content_block_start */
  prepopulated: boolean;
  injectTypeDiscriminator: boolean;
  // The injected discriminator still needs a "," unless the object turns out empty
  pendingSeparator: boolean;
}

export type BlockState = PassiveBlockState | ToolCallBlockState;

function isToolCallBlock(block: BlockState): block is ToolCallBlockState {
  return block.kind === "tool-call" || block.kind === "provider-tool-call";
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Index-keyed table of the content blocks that are currently open, and the
 * accumulation of their streamed fragments.
 */
export class BlockTracker {
  private blocks = new Map<number, BlockState>();
  private tracer?: TracingContext;
  private serverTools: Readonly<Record<string, ServerToolStrategy>>;

  constructor(
    options: {
      tracer?: TracingContext;
      serverTools?: Readonly<Record<string, ServerToolStrategy>>;
    } = {},
  ) {
    this.tracer = options.tracer;
    this.serverTools = options.serverTools ?? SERVER_TOOL_STRATEGIES;
  }

  get size(): number {
    return this.blocks.size;
  }

  get(index: number): Readonly<BlockState> | undefined {
    return this.blocks.get(index);
  }

  /**
   * Opens a block. Only an MCP tool use produces a chunk here, since its
   * arguments are complete from the start.
   */
  start(event: ContentBlockStartEvent): StreamToolCallCompleteChunk | null {
    const { index, content_block: block } = event;

    const previous = this.blocks.get(index);
    if (previous) {
      this.tracer?.warn("content block restarted before stop", {
        index,
        previousKind: previous.kind,
      });
    }

    switch (block.type) {
      case "text":
        this.blocks.set(index, { kind: "text" });
        return null;

      case "thinking":
        this.blocks.set(index, { kind: "reasoning" });
        return null;

      case "redacted_thinking":
        this.blocks.set(index, { kind: "redacted-reasoning" });
        return null;

      case "tool_use": {
        const { id, name } = requireIdentity(index, block);
        this.blocks.set(index, createToolCallBlock("tool-call", id, name, name, false, block.input));
        return null;
      }

      case "server_tool_use": {
        const { id, name } = requireIdentity(index, block);
        const strategy = getServerToolStrategy(name, this.serverTools);
        this.blocks.set(
          index,
          createToolCallBlock(
            "provider-tool-call",
            id,
            strategy.name,
            name,
            strategy.injectTypeDiscriminator,
            block.input,
          ),
        );
        return null;
      }

      case "mcp_tool_use": {
        const { id, name } = requireIdentity(index, block);
        this.blocks.set(index, { kind: "mcp-tool-use" });
        return {
          type: "tool-call-complete",
          data: { id, name, arguments: block.input ?? {} },
        };
      }

      case "mcp_tool_result":
        this.blocks.set(index, { kind: "mcp-tool-result" });
        return null;

      case "compaction":
        this.blocks.set(index, { kind: "opaque" });
        return null;

      default:
        this.tracer?.debug("unknown content block type", { index, type: block.type });
        this.blocks.set(index, { kind: "opaque" });
        return null;
    }
  }

  delta(event: ContentBlockDeltaEvent): StreamTextDeltaChunk | StreamThinkingDeltaChunk | null {
    const { index, delta } = event;

    switch (delta.type) {
      case "text_delta":
        return { type: "text-delta", data: { text: delta.text ?? "" } };

      case "thinking_delta":
        return { type: "thinking-delta", data: { text: delta.thinking ?? "" } };

      case "input_json_delta":
        this.appendArguments(index, delta.partial_json ?? "");
        return null;

      case "compaction_delta":
        if (delta.content !== null && delta.content !== undefined) {
          return { type: "text-delta", data: { text: delta.content } };
        }
        return null;

      case "signature_delta":
      case "citations_delta":
        return null;

      default:
        this.tracer?.debug("skipping unknown delta type", { index, type: delta.type });
        return null;
    }
  }

  /**
   * Closes a block. Buffered tool calls are parsed and emitted exactly once;
   * every other kind closes silently.
   */
  stop(index: number): StreamToolCallCompleteChunk | null {
    const block = this.blocks.get(index);
    this.blocks.delete(index);

    if (!block) {
      this.tracer?.debug("content_block_stop for a block that is not open", { index });
      return null;
    }
    if (!isToolCallBlock(block)) {
      return null;
    }

    return {
      type: "tool-call-complete",
      data: {
        id: block.id,
        name: block.name,
        arguments: parseArguments(block),
      },
    };
  }

  /** Drops every open block, returning how many were still open. */
  clear(): number {
    const open = this.blocks.size;
    this.blocks.clear();
    return open;
  }

  private appendArguments(index: number, fragment: string): void {
    // Providers send empty fragments on purpose, and they must not consume the first-fragment slot
    if (fragment === "") return;

    const block = this.blocks.get(index);
    if (!block || !isToolCallBlock(block)) {
      this.tracer?.debug("argument fragment for a block that does not buffer", {
        index,
        kind: block?.kind ?? null,
      });
      return;
    }
    if (block.prepopulated) {
      this.tracer?.warn("argument fragment for a tool call that was complete at start", {
        index,
        toolCallId: block.id,
      });
      return;
    }

    let text = fragment;
    if (block.isFirstFragment) {
      block.isFirstFragment = false;
      if (block.injectTypeDiscriminator && text.startsWith("{")) {
        block.buffer += `{"type":${JSON.stringify(block.providerName)}`;
        block.pendingSeparator = true;
        text = text.slice(1);
      }
    }

    if (block.pendingSeparator) {
      const rest = text.trimStart();
      if (rest !== "") {
        if (!rest.startsWith("}")) {
          block.buffer += ",";
        }
        block.pendingSeparator = false;
      }
    }

    block.buffer += text;
  }
}

function createToolCallBlock(
  kind: ToolCallBlockState["kind"],
  id: string,
  name: string,
  providerName: string,
  injectTypeDiscriminator: boolean,
  input: Record<string, unknown> | null | undefined,
): ToolCallBlockState {
  // Anthropic sends `input: {}` on every tool block; only a non-empty object is a pre-populated call
  const prepopulated = input !== null && input !== undefined && Object.keys(input).length > 0;
  return {
    kind,
    id,
    name,
    providerName,
    buffer: prepopulated ? JSON.stringify(input) : "",
    isFirstFragment: !prepopulated,
    prepopulated,
    injectTypeDiscriminator,
    pendingSeparator: false,
  };
}

function requireIdentity(
  index: number,
  block: ContentBlockStartEvent["content_block"],
): { id: string; name: string } {
  if (block.id === undefined || block.name === undefined) {
    throw new StreamPayloadError(
      "content_block_start",
      `${block.type} block at index ${index} is missing its id or name`,
    );
  }
  return { id: block.id, name: block.name };
}

function parseArguments(block: ToolCallBlockState): Record<string, unknown> {
  if (block.buffer === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(block.buffer);
  } catch (e) {
    throw new ToolArgumentsError({
      toolName: block.name,
      toolCallId: block.id,
      buffer: block.buffer,
      cause: e,
    });
  }

  if (!isJsonObject(parsed)) {
    throw new ToolArgumentsError({ toolName: block.name, toolCallId: block.id, buffer: block.buffer });
  }
  return parsed;
}
