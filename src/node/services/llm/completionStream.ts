import type { CompletionChunkFrame } from "./types";

const FRAME_PREFIX = "data: ";

function isChunkFrame(value: unknown): value is CompletionChunkFrame {
  return (
    typeof value === "object" &&
    value !== null &&
    "content" in value &&
    typeof value.content === "string"
  );
}

/**
 * Extract the text chunk from one line of a streamed completion.
 *
 * Returns null for anything that is not a `data: {json}` frame with a
 * non-empty string `content` — keep-alives, blank lines, `[DONE]`, broken
 * JSON and the final `stop` frame are all dropped without error.
 */
export function parseCompletionFrame(line: string): string | null {
  const trimmed = line.endsWith("\r") ? line.slice(0, -1) : line;
  if (!trimmed.startsWith(FRAME_PREFIX)) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(trimmed.slice(FRAME_PREFIX.length));
  } catch {
    return null;
  }

  if (!isChunkFrame(payload) || payload.content.length === 0) {
    return null;
  }
  return payload.content;
}

/**
 * Turn a streamed /completion response body into text chunks, one per
 * well-formed frame, in arrival order.
 *
 * Stopping iteration early returns the underlying body iterator, which
 * cancels the stream and lets the connection go.
 */
export async function* readCompletionChunks(
  body: AsyncIterable<Uint8Array>,
  onData?: () => void
): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffer = "";

  for await (const bytes of body) {
    onData?.();
    buffer += decoder.decode(bytes, { stream: true });

    const lines = buffer.split("\n");
    buffer = lines.pop() ?? ""; // Keep incomplete last line

    for (const line of lines) {
      const chunk = parseCompletionFrame(line);
      if (chunk !== null) {
        yield chunk;
      }
    }
  }

  buffer += decoder.decode();
  const tail = parseCompletionFrame(buffer);
  if (tail !== null) {
    yield tail;
  }
}
