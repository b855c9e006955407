import { StreamingError } from "../infra/errors.js";
import type { SSEEvent } from "./types.js";

/**
 * SSE (Server-Sent Events) parser for provider streaming responses.
 * Turns a chunked byte source into discrete events, one per
 * `\n\n`-terminated block.
 */

const READ_SIZE = 1024;
const DEFAULT_MAX_BUFFER_SIZE = 1024 * 1024;

/**
 * Pull-based byte source. `read` may resolve with an empty chunk before the
 * end of the stream; `eof` reports whether more data can arrive.
 */
export interface ByteSource {
  read(maxBytes: number): Promise<Uint8Array | string>;
  eof(): boolean;
  close(): void | Promise<void>;
}

export interface SSEStreamOptions {
  /** Throw on malformed input instead of falling back to best-effort values. */
  strictParsing?: boolean;
  /** Upper bound, in characters, for an unterminated block held in memory. */
  maxBufferSize?: number;
}

export class SSEStream {
  private readonly strictParsing: boolean;
  private readonly maxBufferSize: number;
  private cancelled = false;
  private closed = false;
  private consumed = false;

  constructor(
    private readonly source: ByteSource,
    options: SSEStreamOptions = {},
  ) {
    this.strictParsing = options.strictParsing ?? false;
    this.maxBufferSize = options.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE;
  }

  /**
   * Stop producing events and close the source. Cooperative: a read already
   * in flight is not interrupted, but nothing read after this point is
   * parsed.
   */
  async cancel(): Promise<void> {
    this.cancelled = true;
    await this.closeSource();
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Parse the stream. Single pass: a second call throws.
   */
  async *events(): AsyncGenerator<SSEEvent, void, undefined> {
    if (this.consumed) {
      throw new StreamingError("SSE stream has already been consumed");
    }
    this.consumed = true;

    const decoder = new TextDecoder();
    let buffer = "";

    try {
      reading: while (!this.cancelled && !this.source.eof()) {
        let chunk: Uint8Array | string;
        try {
          chunk = await this.source.read(READ_SIZE);
        } catch (err) {
          if (this.cancelled) break;
          throw err;
        }

        const text =
          typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
        if (text === "") continue;

        buffer += text;

        let boundary = buffer.indexOf("\n\n");
        while (boundary !== -1) {
          if (this.cancelled) break reading;

          const block = buffer.slice(0, boundary);
          buffer = buffer.slice(boundary + 2);

          const event = this.parseBlock(block);
          if (event) yield event;

          boundary = buffer.indexOf("\n\n");
        }

        if (buffer.length > this.maxBufferSize) {
          throw new StreamingError(
            `SSE stream buffer exceeded ${this.maxBufferSize} characters without an event boundary`,
          );
        }
      }

      if (!this.cancelled) {
        buffer += decoder.decode();
        if (buffer.trim() !== "") {
          if (this.strictParsing) {
            throw StreamingError.malformed(
              "stream ended without proper termination (missing \\n\\n)",
              buffer,
            );
          }
          const event = this.parseBlock(buffer);
          if (event) yield event;
        }
      }
    } finally {
      await this.closeSource();
    }
  }

  private async closeSource(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.source.close();
  }

  private parseBlock(block: string): SSEEvent | null {
    const dataLines: string[] = [];
    let event: string | undefined;
    let id: string | undefined;
    let retry: number | undefined;
    let hasField = false;

    for (const line of block.split("\n")) {
      if (line === "" || line.startsWith(":")) continue;

      const colon = line.indexOf(":");
      const field = colon === -1 ? line : line.slice(0, colon);
      let value = colon === -1 ? "" : line.slice(colon + 1);
      // Exactly one leading space is part of the separator.
      if (value.startsWith(" ")) value = value.slice(1);

      switch (field) {
        case "data":
          dataLines.push(value);
          hasField = true;
          break;
        case "event":
          event = value;
          hasField = true;
          break;
        case "id":
          if (!value.includes("\0")) {
            id = value;
            hasField = true;
          } else if (this.strictParsing) {
            throw StreamingError.malformed("id field contains null character", block);
          }
          break;
        case "retry":
          if (/^\d+$/.test(value)) {
            retry = Number.parseInt(value, 10);
            hasField = true;
          } else if (this.strictParsing && value !== "") {
            throw StreamingError.malformed("retry field must be an integer", block);
          }
          break;
        default:
          break;
      }
    }

    if (!hasField) return null;

    const joined = dataLines.join("\n");
    let data: unknown = joined;
    if (joined.startsWith("{") || joined.startsWith("[")) {
      try {
        data = JSON.parse(joined);
      } catch (err) {
        if (this.strictParsing) {
          const reason = err instanceof Error ? err.message : String(err);
          throw StreamingError.malformed(`JSON parse error - ${reason}`, joined, err);
        }
      }
    }

    return {
      data,
      ...(event !== undefined && { event }),
      ...(id !== undefined && { id }),
      ...(retry !== undefined && { retry }),
    };
  }
}

/**
 * Adapt a WHATWG stream (e.g. a fetch Response body). Chunks larger than
 * `maxBytes` are handed out over several reads.
 */
export function fromReadableStream(body: ReadableStream<Uint8Array>): ByteSource {
  const reader = body.getReader();
  let pending: Uint8Array | null = null;
  let done = false;

  return {
    async read(maxBytes) {
      if (pending === null) {
        const result = await reader.read();
        if (result.done) {
          done = true;
          return new Uint8Array(0);
        }
        pending = result.value;
      }
      const chunk = pending.subarray(0, maxBytes);
      pending = pending.length > maxBytes ? pending.subarray(maxBytes) : null;
      return chunk;
    },
    eof: () => done && pending === null,
    async close() {
      done = true;
      pending = null;
      await reader.cancel();
    },
  };
}

/**
 * Adapt any async iterable of chunks, such as a Node `Readable`.
 */
export function fromAsyncIterable(
  iterable: AsyncIterable<Uint8Array | string>,
): ByteSource {
  const iterator = iterable[Symbol.asyncIterator]();
  let pending: Uint8Array | string | null = null;
  let done = false;

  return {
    async read(maxBytes) {
      if (pending === null) {
        const result = await iterator.next();
        if (result.done) {
          done = true;
          return "";
        }
        pending = result.value;
      }
      const chunk: Uint8Array | string =
        typeof pending === "string" ? pending.slice(0, maxBytes) : pending.subarray(0, maxBytes);
      pending = pending.length > maxBytes ? pending.slice(maxBytes) : null;
      return chunk;
    },
    eof: () => done && pending === null,
    async close() {
      done = true;
      pending = null;
      await iterator.return?.();
    },
  };
}
