import type { RawEvent } from "./types.js";

/**
 * Frames a server-sent-events byte stream into `(event, data)` records.
 *
 * Lines may end in `\n`, `\r\n` or `\r`, and may be split anywhere across
 * chunks. Multiple `data:` lines of one event are joined with `\n`; comments
 * (`:` lines), `id:` and `retry:` are ignored, and an event without data is
 * not dispatched. A trailing event that is not terminated by a blank line is
 * discarded, as the SSE format requires.
 */
export async function* parseServerSentEvents(
  body: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<RawEvent, void, undefined> {
  const decoder = new TextDecoder();
  let buffer = "";
  let eventName: string | undefined;
  let dataLines: string[] = [];

  function* drain(final: boolean): Generator<RawEvent> {
    for (;;) {
      const end = findLineEnd(buffer, final);
      if (end === null) return;

      const line = buffer.slice(0, end.index);
      buffer = buffer.slice(end.index + end.length);

      if (line === "") {
        if (dataLines.length > 0) {
          yield { event: eventName || "message", data: dataLines.join("\n") };
        }
        eventName = undefined;
        dataLines = [];
        continue;
      }
      if (line.startsWith(":")) continue;

      const colon = line.indexOf(":");
      const field = colon === -1 ? line : line.slice(0, colon);
      let value = colon === -1 ? "" : line.slice(colon + 1);
      if (value.startsWith(" ")) value = value.slice(1);

      if (field === "event") {
        eventName = value;
      } else if (field === "data") {
        dataLines.push(value);
      }
    }
  }

  for await (const piece of body) {
    buffer += typeof piece === "string" ? piece : decoder.decode(piece, { stream: true });
    yield* drain(false);
  }

  buffer += decoder.decode();
  yield* drain(true);
}

/**
 * Position and width of the first line terminator. A lone `\r` at the end of
 * the buffer could be the first half of `\r\n`, so it only counts once the
 * input has ended.
 */
function findLineEnd(buffer: string, final: boolean): { index: number; length: number } | null {
  for (let i = 0; i < buffer.length; i++) {
    const char = buffer[i];
    if (char === "\n") {
      return { index: i, length: 1 };
    }
    if (char === "\r") {
      if (i + 1 < buffer.length) {
        return { index: i, length: buffer[i + 1] === "\n" ? 2 : 1 };
      }
      return final ? { index: i, length: 1 } : null;
    }
  }
  return null;
}

/**
 * Reads a fetch response body chunk by chunk. Stopping early cancels the body,
 * which releases the underlying connection.
 */
export async function* readResponseBody(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = body.getReader();
  let settled = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        settled = true;
        return;
      }
      yield value;
    }
  } catch (error) {
    settled = true;
    throw error;
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
