/**
 * Async adapter from a byte-chunk source to frames.
 *
 * Keeps concerns (where the bytes come from) separate from the framing logic
 * in {@link FrameReader}. Any `AsyncIterable<Uint8Array>` works: a serial
 * port stream, a socket, or a test generator.
 */
import type { FrameParseError } from "./errors.ts";
import type { Frame } from "./frame.ts";
import { FrameReader, type FrameReaderOptions } from "./frameReader.ts";

export interface FrameStreamOptions extends FrameReaderOptions {
  /** Stop consuming the source once aborted. */
  signal?: AbortSignal;
  /** Called for every run of bytes dropped while resynchronising. */
  onDiscard?: (error: FrameParseError, bytes: Uint8Array) => void;
}

/**
 * Async generator that consumes raw byte chunks and yields validated frames.
 *
 * Completes when the source ends (a partial trailing frame is dropped) or
 * as soon as `signal` aborts, even while waiting on the source. A read still
 * pending at that point is abandoned; the source is closed otherwise.
 */
export async function* frameStream(
  source: AsyncIterable<Uint8Array>,
  options: FrameStreamOptions = {},
): AsyncGenerator<Frame, void, unknown> {
  const { signal, onDiscard, ...readerOptions } = options;
  const reader = new FrameReader(readerOptions);
  const iterator = source[Symbol.asyncIterator]();

  const listeners = new AbortController();
  const aborted = new Promise<IteratorReturnResult<undefined>>((resolve) => {
    signal?.addEventListener(
      "abort",
      () => resolve({ done: true, value: undefined }),
      { once: true, signal: listeners.signal },
    );
  });
  let abandoned = false;

  try {
    while (!signal?.aborted) {
      const result = await Promise.race([iterator.next(), aborted]);
      if (result.done) {
        abandoned = signal?.aborted ?? false;
        return;
      }
      reader.push(result.value);
      for (const event of reader.drain()) {
        if (signal?.aborted) return;
        if (event.type === "frame") {
          yield event.frame;
        } else {
          onDiscard?.(event.error, event.bytes);
        }
      }
    }
  } finally {
    listeners.abort();
    if (!abandoned) await iterator.return?.();
  }
}
