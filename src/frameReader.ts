/**
 * Push-style frame extraction from arbitrarily chunked bytes.
 *
 * Contract:
 *  - Yields only frames that pass `parseFrame` (length and checksum OK)
 *  - Bytes before a start marker are discarded as `InvalidStartByte`
 *  - A frame failing length or checksum checks loses its start marker only,
 *    so a genuine frame starting inside it is still found
 *  - An incomplete trailing frame stays buffered until more bytes arrive
 */

import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import { type FrameParseError, InvalidStartByteError } from "./errors.ts";
import type { Frame } from "./frame.ts";
import { findFrameStart, type ParseOptions, parseFrame } from "./frameParser.ts";

/** Configuration of a {@link FrameReader}. */
export type FrameReaderOptions = ParseOptions;

/** One item produced by {@link FrameReader.drain}. */
export type FrameReadEvent =
  | { type: "frame"; frame: Frame }
  | { type: "discard"; error: FrameParseError; bytes: Uint8Array };

function concat(a: Uint8Array, b: Uint8Array | readonly number[]): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a);
  out.set(b, a.length);
  return out;
}

export class FrameReader {
  #buffer: Uint8Array = new Uint8Array(0);
  readonly #options: FrameReaderOptions;

  constructor(options: FrameReaderOptions = {}) {
    this.#options = options;
  }

  /** Number of bytes buffered but not yet consumed. */
  get pending(): number {
    return this.#buffer.length;
  }

  /** Append received bytes. */
  push(chunk: Uint8Array | readonly number[]): void {
    this.#buffer = concat(this.#buffer, chunk);
  }

  /** Drop everything buffered. */
  reset(): void {
    this.#buffer = new Uint8Array(0);
  }

  /**
   * Extract every complete frame currently buffered, reporting discarded
   * bytes along the way. Stops when the buffer is empty or holds only the
   * beginning of a frame.
   */
  *drain(): Generator<FrameReadEvent, void, unknown> {
    while (this.#buffer.length > 0) {
      const start = findFrameStart(this.#buffer);
      if (start !== 0) {
        const end = start === -1 ? this.#buffer.length : start;
        const bytes = this.#buffer.slice(0, end);
        this.#buffer = this.#buffer.slice(end);
        yield {
          bytes,
          error: new InvalidStartByteError(bytes[0]),
          type: "discard",
        };
        continue;
      }

      const parsed = parseFrame(this.#buffer, this.#options);
      if (isErr(parsed)) {
        const error = unwrapErr(parsed);
        if (error.kind === "Incomplete") return;
        const bytes = this.#buffer.slice(0, 1);
        this.#buffer = this.#buffer.slice(1);
        yield { bytes, error, type: "discard" };
        continue;
      }

      const { frame, rest } = unwrapOk(parsed);
      this.#buffer = rest.slice();
      yield { frame, type: "frame" };
    }
  }
}
