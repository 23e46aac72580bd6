import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import type { BsbError } from "./errors.ts";
import { EventEmitter } from "./eventEmitter.ts";
import { defaultRegistry, type FieldRegistry } from "./fieldRegistry.ts";
import { decodeFrame, formatFieldValue } from "./fieldValue.ts";
import type { Frame } from "./frame.ts";
import { serializeFrame } from "./frameBuilder.ts";
import { FrameReader, type FrameReaderOptions } from "./frameReader.ts";
import { packetTypeLabel } from "./packetTypes.ts";
import type { FieldValue } from "./types/bsb.ts";
import { formatBytes, formatFieldId } from "./utils/format.ts";

/** Category of a monitor log line. */
export type LogType = "Info" | "Error" | "Received" | "Sent";

export type LogEntry = { timestamp: string; type: LogType; message: string };

/**
 * Event types emitted by the bus monitor.
 */
type BusMonitorEvents = {
  frame: [Frame];
  value: [FieldValue, Frame];
  error: [BsbError];
  send: [Uint8Array];
  log: [LogEntry];
};

export interface BusMonitorOptions extends FrameReaderOptions {
  /** Registry used to decode frames (default: bundled table). */
  registry?: FieldRegistry;
  now?: () => Date; // DI for testing
  maxLogEntries?: number; // default 100, 0 keeps none
}

/**
 * Decodes a passively observed byte stream into field values.
 *
 * Bytes are handed in through {@link BusMonitor.feed}; the monitor does no
 * I/O of its own. Every frame, decoded value and error is emitted as an event
 * and summarised in a bounded log.
 */
export class BusMonitor extends EventEmitter<BusMonitorEvents> {
  readonly #reader: FrameReader;
  readonly #registry: FieldRegistry;
  readonly #now: () => Date;
  readonly #maxLogEntries: number;
  #logs: LogEntry[] = [];

  constructor(options: BusMonitorOptions = {}) {
    super();
    const {
      registry = defaultRegistry,
      now = () => new Date(),
      maxLogEntries = 100,
      ...readerOptions
    } = options;
    this.#reader = new FrameReader(readerOptions);
    this.#registry = registry;
    this.#now = now;
    this.#maxLogEntries = maxLogEntries;
  }

  /** Most recent log entries, oldest first. */
  get logs(): readonly LogEntry[] {
    return this.#logs;
  }

  clearLogs(): void {
    this.#logs = [];
  }

  /**
   * Consume received bytes. Returns the values decoded from the frames that
   * completed with this chunk.
   */
  feed(chunk: Uint8Array | readonly number[]): FieldValue[] {
    this.#reader.push(chunk);
    const values: FieldValue[] = [];

    for (const event of this.#reader.drain()) {
      if (event.type === "discard") {
        this.#fail(event.error, `${formatBytes(event.bytes)}: `);
        continue;
      }

      const { frame } = event;
      this.#log("Received", formatBytes(serializeFrame(frame)));
      this.emit("frame", frame);

      const decoded = decodeFrame(frame, this.#registry);
      if (isErr(decoded)) {
        this.#fail(unwrapErr(decoded), `${packetTypeLabel(frame.packetType)} `);
        continue;
      }
      const value = unwrapOk(decoded);
      values.push(value);
      this.#log(
        "Info",
        `${packetTypeLabel(frame.packetType)} ${formatFieldId(frame.fieldId)} ${formatFieldValue(value)}`,
      );
      this.emit("value", value, frame);
    }

    return values;
  }

  /**
   * Serialize an outgoing frame, log it and emit it for whoever writes to the
   * bus.
   */
  send(frame: Frame): Uint8Array {
    const bytes = serializeFrame(frame);
    this.#log("Sent", formatBytes(bytes));
    this.emit("send", bytes);
    return bytes;
  }

  #fail(error: BsbError, prefix: string): void {
    this.#log("Error", `${prefix}${error.message}`);
    this.emit("error", error);
  }

  #log(type: LogType, message: string): void {
    const entry: LogEntry = {
      message,
      timestamp: this.#now().toISOString(),
      type,
    };
    if (this.#maxLogEntries > 0) {
      const keep = this.#maxLogEntries - 1;
      this.#logs = [...this.#logs.slice(this.#logs.length - keep), entry];
    }
    this.emit("log", entry);
  }
}
