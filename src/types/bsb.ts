/**
 * Data-type tag of a field: selects the payload layout.
 */
export type DataType =
  | { kind: "Setting" }
  | { kind: "Number" }
  | { kind: "Float"; divisor: number }
  | { kind: "DateTime" }
  | { kind: "Schedule" }
  | { kind: "Enum" };

/** Tag name of a {@link DataType}. */
export type DataTypeKind = DataType["kind"];

/**
 * Registry entry describing one field.
 */
export interface FieldDescriptor {
  /** 32-bit field identifier. */
  readonly id: number;
  /** Display name, e.g. `water_pressure`. */
  readonly name: string;
  /** Operator-facing program number shown on the controller. */
  readonly prognr: number;
  readonly dataType: DataType;
  /** Hierarchical path, e.g. `system/water_pressure`. */
  readonly path: string;
}

/**
 * Calendar date and time as carried by DateTime payloads.
 */
export interface CalendarDateTime {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31, valid for the month */
  day: number;
  /** Monday = 1 .. Sunday = 7, carried verbatim */
  weekday: number;
  hour: number;
  minute: number;
  second: number;
}

/** Hour and minute of a schedule boundary. */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

/** One active time range of a schedule. */
export interface TimeRange {
  start: TimeOfDay;
  end: TimeOfDay;
}

/**
 * Decoded payload. The variant is fixed by the field's data type, never by
 * the payload bytes.
 */
export type PayloadValue =
  | { type: "Setting"; flag: number; value: number }
  | { type: "Number"; flag: number; value: number }
  | { type: "Float"; flag: number; value: number; divisor: number }
  | {
      type: "DateTime";
      flag: number;
      dateTime: CalendarDateTime;
      /** Trailing byte of unknown meaning, preserved on re-encode. */
      reserved: number;
    }
  | { type: "Schedule"; ranges: TimeRange[] }
  | { type: "Enum"; flag: number; value: number };

/** A decoded value bound to the field it belongs to. */
export interface FieldValue {
  readonly fieldId: number;
  readonly name: string;
  readonly path: string;
  readonly value: PayloadValue;
}

/** Name/value pair in text form, e.g. for publishing to a message broker. */
export interface NamedValue {
  name: string;
  value: string;
}
