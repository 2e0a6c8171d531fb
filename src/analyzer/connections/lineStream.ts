import { Readable } from "node:stream";
import { LogLineStream } from "./types";

function chunkText(chunk: unknown): string {
  if (typeof chunk === "string") return chunk;
  if (Buffer.isBuffer(chunk)) return chunk.toString("utf8");
  return String(chunk);
}

/** Re-chunks text into lines; a trailing partial line is emitted at the end. */
export async function* splitLines(chunks: AsyncIterable<unknown>): AsyncGenerator<string> {
  let buffered = "";
  for await (const chunk of chunks) {
    buffered += chunkText(chunk);
    let idx = buffered.indexOf("\n");
    while (idx >= 0) {
      yield buffered.slice(0, idx).replace(/\r$/, "");
      buffered = buffered.slice(idx + 1);
      idx = buffered.indexOf("\n");
    }
  }
  if (buffered.length > 0) yield buffered.replace(/\r$/, "");
}

export function linesFromText(text: string): LogLineStream {
  let closed = false;
  const lines = text.split(/\r?\n/);
  if (lines.length && lines[lines.length - 1] === "") lines.pop();

  return {
    async *[Symbol.asyncIterator]() {
      for (const line of lines) {
        if (closed) return;
        yield line;
      }
    },
    close() {
      closed = true;
    }
  };
}

/**
 * Wraps a readable that something else writes into (e.g. a follow request
 * piped into a PassThrough). `onClose` aborts the producer.
 */
export function linesFromReadable(readable: Readable, onClose: () => void): LogLineStream {
  let closed = false;
  return {
    [Symbol.asyncIterator]: () => splitLines(readable)[Symbol.asyncIterator](),
    close() {
      if (closed) return;
      closed = true;
      onClose();
      readable.destroy();
    }
  };
}
