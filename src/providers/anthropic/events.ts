import { z } from "zod";
import { StreamPayloadError } from "../../errors/SpoolError.js";
import { formatZodError } from "../../utils/zod.js";

export const StreamEventType = {
  Ping: "ping",
  MessageStart: "message_start",
  ContentBlockStart: "content_block_start",
  ContentBlockDelta: "content_block_delta",
  ContentBlockStop: "content_block_stop",
  MessageDelta: "message_delta",
  MessageStop: "message_stop",
  Error: "error",
} as const;

export type StreamEventType = (typeof StreamEventType)[keyof typeof StreamEventType];

const BlockIndexSchema = z.number().int().nonnegative();
const TokenCountSchema = z.number().nonnegative().nullish();
const JsonObjectSchema = z.record(z.string(), z.unknown());

/* ============================================================================
 * message_start
 * ========================================================================== */

export const MessageStartEventSchema = z.object({
  message: z.object({
    usage: z
      .object({
        input_tokens: TokenCountSchema,
        cache_read_input_tokens: TokenCountSchema,
        cache_creation_input_tokens: TokenCountSchema,
      })
      .nullish(),
    // Deferred (programmatic) tool calls can arrive whole in the initial message
    content: z
      .array(
        z.object({
          type: z.string(),
          id: z.string().optional(),
          name: z.string().optional(),
          input: JsonObjectSchema.nullish(),
        }),
      )
      .nullish(),
  }),
});

export type MessageStartEvent = z.infer<typeof MessageStartEventSchema>;

/* ============================================================================
 * content_block_start / content_block_delta / content_block_stop
 * ========================================================================== */

export const ContentBlockStartEventSchema = z.object({
  index: BlockIndexSchema,
  content_block: z.object({
    type: z.string(),
    id: z.string().optional(),
    name: z.string().optional(),
    input: JsonObjectSchema.nullish(),
  }),
});

export type ContentBlockStartEvent = z.infer<typeof ContentBlockStartEventSchema>;

export const ContentBlockDeltaEventSchema = z.object({
  index: BlockIndexSchema,
  delta: z.object({
    type: z.string(),
    text: z.string().optional(),
    partial_json: z.string().optional(),
    thinking: z.string().optional(),
    // null in compaction_delta
    content: z.string().nullish(),
  }),
});

export type ContentBlockDeltaEvent = z.infer<typeof ContentBlockDeltaEventSchema>;

export const ContentBlockStopEventSchema = z.object({
  index: BlockIndexSchema,
});

export type ContentBlockStopEvent = z.infer<typeof ContentBlockStopEventSchema>;

/* ============================================================================
 * message_delta
 * ========================================================================== */

export const UsageIterationSchema = z.object({
  type: z.string(),
  input_tokens: z.number().nonnegative(),
  output_tokens: z.number().nonnegative(),
});

export const MessageDeltaEventSchema = z.object({
  delta: z.object({
    stop_reason: z.string().nullish(),
  }),
  usage: z
    .object({
      output_tokens: TokenCountSchema,
      input_tokens: TokenCountSchema,
      cache_read_input_tokens: TokenCountSchema,
      cache_creation_input_tokens: TokenCountSchema,
      iterations: z.array(UsageIterationSchema).nullish(),
    })
    .nullish(),
});

export type MessageDeltaEvent = z.infer<typeof MessageDeltaEventSchema>;

/* ============================================================================
 * error
 * ========================================================================== */

export const ErrorEventSchema = z.object({
  error: z.object({
    type: z.string(),
    message: z.string(),
  }),
});

export type ErrorEvent = z.infer<typeof ErrorEventSchema>;

/**
 * Decodes the JSON payload of a recognized event. Anything that is not JSON, or
 * does not match the schema for its event type, is a StreamPayloadError.
 */
export function decodePayload<T>(eventType: string, data: string, schema: z.ZodType<T>): T {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (e) {
    throw new StreamPayloadError(
      eventType,
      `invalid JSON (${e instanceof Error ? e.message : String(e)})`,
      e,
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new StreamPayloadError(eventType, `unexpected shape\n${formatZodError(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}
