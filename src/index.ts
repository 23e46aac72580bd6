// Public API: frame codec (parse + serialize) and field value decoding.

export { calculateCRC16, verifyCRC16 } from "./crc.ts";
export {
  BsbError,
  type BsbErrorKind,
  ChecksumMismatchError,
  type FrameParseError,
  IncompleteFrameError,
  InvalidDateTimeError,
  InvalidFieldTableError,
  InvalidFieldValueError,
  InvalidLengthError,
  InvalidScheduleError,
  InvalidStartByteError,
  isRetryable,
  type PayloadDecodeError,
  type PayloadEncodeError,
  PayloadTooShortError,
  UnknownFieldError,
  ValueOutOfRangeError,
} from "./errors.ts";
export { EventEmitter } from "./eventEmitter.ts";
export { defaultRegistry, FieldRegistry } from "./fieldRegistry.ts";
export {
  createFieldValue,
  decodeFrame,
  defaultFieldValue,
  encodeFieldValue,
  type FieldValueParseError,
  type FrameAddressing,
  formatFieldValue,
  fromNamedValue,
  parseFieldValue,
  parseFieldValueText,
  toNamedValue,
} from "./fieldValue.ts";
export {
  createFrame,
  createGetFrame,
  createSetFrame,
  DEFAULT_MAX_FRAME_LENGTH,
  type Frame,
  type FrameInit,
  framesEqual,
  MIN_FRAME_LENGTH,
  START_OF_FRAME,
} from "./frame.ts";
export { serializeFrame } from "./frameBuilder.ts";
export {
  findFrameStart,
  type ParsedFrame,
  type ParseOptions,
  parseFrame,
} from "./frameParser.ts";
export {
  type FrameReadEvent,
  FrameReader,
  type FrameReaderOptions,
} from "./frameReader.ts";
export {
  BusMonitor,
  type BusMonitorOptions,
  type LogEntry,
  type LogType,
} from "./monitor.ts";
export {
  isPacketType,
  PACKET_TYPES,
  type PacketType,
  type PacketTypeName,
  packetTypeLabel,
} from "./packetTypes.ts";
export {
  createDateTime,
  type DateTimeParts,
  dateTimeFromDate,
  dateTimeToDate,
  decodePayload,
  defaultPayloadValue,
  encodePayload,
  formatDateTime,
  formatPayloadValue,
  isoWeekday,
  matchesDataType,
  MAX_SCHEDULE_RANGES,
  type PayloadParseError,
  parsePayloadValue,
  payloadFlag,
  roundHalfEven,
  SCHEDULE_END_MARKER,
  withFlag,
} from "./payloadCodec.ts";
export { type FrameStreamOptions, frameStream } from "./stream.ts";
export type {
  CalendarDateTime,
  DataType,
  DataTypeKind,
  FieldDescriptor,
  FieldValue,
  NamedValue,
  PayloadValue,
  TimeOfDay,
  TimeRange,
} from "./types/bsb.ts";
export { formatBytes, formatFieldId } from "./utils/format.ts";
