export class SpoolError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.code = options?.code || "SPOOL_ERROR";
    this.details = options?.details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.cause !== undefined && { cause: serializeError(this.cause) }),
    };
  }
}

/**
 * A recognized stream event whose payload is not valid JSON or does not match
 * the shape expected for its event type.
 */
export class StreamPayloadError extends SpoolError {
  public readonly eventType: string;

  constructor(eventType: string, reason: string, cause?: unknown) {
    super(`Failed to parse ${eventType} event: ${reason}`, {
      code: "INVALID_EVENT_PAYLOAD",
      details: { eventType },
      cause,
    });
    this.eventType = eventType;
  }
}

/**
 * The accumulated argument buffer of a tool call did not parse as a JSON object.
 */
export class ToolArgumentsError extends SpoolError {
  public readonly toolName: string;

  constructor(params: { toolName: string; toolCallId: string; buffer: string; cause?: unknown }) {
    const { toolName, toolCallId, buffer, cause } = params;
    const reason = cause instanceof Error ? cause.message : "expected a JSON object";
    super(`Failed to parse tool call arguments for ${toolName}: ${reason}\nRaw buffer: ${buffer}`, {
      code: "INVALID_TOOL_ARGUMENTS",
      details: { toolName, toolCallId },
      cause,
    });
    this.toolName = toolName;
  }
}

/** The provider reported an error in-band, through an `error` stream event. */
export class ProviderStreamError extends SpoolError {
  public readonly errorType: string;

  constructor(errorType: string, message: string) {
    super(`Provider stream error (${errorType}): ${message}`, {
      code: "PROVIDER_ERROR",
      details: { errorType },
    });
    this.errorType = errorType;
  }
}

function serializeError(error: unknown): unknown {
  if (error instanceof SpoolError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
      ...("cause" in error && error.cause !== undefined && { cause: serializeError(error.cause) }),
    };
  }
  return error;
}
