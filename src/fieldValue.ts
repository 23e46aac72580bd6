/**
 * Field values: frames decoded through the registry into named, typed values,
 * and the way back.
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import {
  InvalidFieldValueError,
  type PayloadDecodeError,
  type PayloadEncodeError,
  UnknownFieldError,
  type ValueOutOfRangeError,
} from "./errors.ts";
import { defaultRegistry, type FieldRegistry } from "./fieldRegistry.ts";
import { createFrame, type Frame } from "./frame.ts";
import {
  decodePayload,
  defaultPayloadValue,
  encodePayload,
  formatPayloadValue,
  matchesDataType,
  type PayloadParseError,
  parsePayloadValue,
} from "./payloadCodec.ts";
import type {
  FieldDescriptor,
  FieldValue,
  NamedValue,
  PayloadValue,
} from "./types/bsb.ts";

/** Addressing a caller supplies when turning a value back into a frame. */
export interface FrameAddressing {
  destination: number;
  source: number;
  packetType: number;
}

function bind(descriptor: FieldDescriptor, value: PayloadValue): FieldValue {
  return Object.freeze({
    fieldId: descriptor.id,
    name: descriptor.name,
    path: descriptor.path,
    value,
  });
}

/**
 * Bind `value` to a known field. Fails when the field is unknown or the value
 * is not the variant the field's data type decodes to.
 */
export function createFieldValue(
  fieldId: number,
  value: PayloadValue,
  registry: FieldRegistry = defaultRegistry,
): Result<FieldValue, UnknownFieldError | InvalidFieldValueError> {
  const descriptor = registry.lookup(fieldId);
  if (!descriptor) {
    return createErr(new UnknownFieldError(fieldId));
  }
  if (!matchesDataType(value, descriptor.dataType)) {
    return createErr(
      new InvalidFieldValueError(
        `${value.type} value does not match ${descriptor.name} (${descriptor.dataType.kind})`,
      ),
    );
  }
  return createOk(bind(descriptor, value));
}

/**
 * Decode a frame's payload using the data type registered for its field id.
 * Unknown fields are an error; no type is guessed.
 */
export function decodeFrame(
  frame: Frame,
  registry: FieldRegistry = defaultRegistry,
): Result<FieldValue, UnknownFieldError | PayloadDecodeError> {
  const descriptor = registry.lookup(frame.fieldId);
  if (!descriptor) {
    return createErr(new UnknownFieldError(frame.fieldId));
  }
  const decoded = decodePayload(frame.payload, descriptor.dataType);
  if (isErr(decoded)) return decoded;
  return createOk(bind(descriptor, unwrapOk(decoded)));
}

/**
 * Build a frame carrying `fieldValue`. Addressing and packet type are not
 * part of a value and come from the caller.
 */
export function encodeFieldValue(
  fieldValue: FieldValue,
  addressing: FrameAddressing,
): Result<Frame, PayloadEncodeError | ValueOutOfRangeError> {
  const payload = encodePayload(fieldValue.value);
  if (isErr(payload)) return payload;
  return createFrame({
    ...addressing,
    fieldId: fieldValue.fieldId,
    payload: unwrapOk(payload),
  });
}

/** `"<name>: <value>"`, e.g. `water_pressure: 1.5`. */
export function formatFieldValue(fieldValue: FieldValue): string {
  return `${fieldValue.name}: ${formatPayloadValue(fieldValue.value)}`;
}

/** Errors returned when reading a value from its text form. */
export type FieldValueParseError = UnknownFieldError | PayloadParseError;

/**
 * Parse the value text of a known field, e.g. `"1.5"` for `water_pressure`.
 */
export function parseFieldValueText(
  text: string,
  fieldId: number,
  registry: FieldRegistry = defaultRegistry,
): Result<FieldValue, FieldValueParseError> {
  const descriptor = registry.lookup(fieldId);
  if (!descriptor) {
    return createErr(new UnknownFieldError(fieldId));
  }
  return fromDescriptorText(descriptor, text);
}

function fromDescriptorText(
  descriptor: FieldDescriptor,
  text: string,
): Result<FieldValue, FieldValueParseError> {
  const value = parsePayloadValue(text, descriptor.dataType);
  if (isErr(value)) return value;
  return createOk(bind(descriptor, unwrapOk(value)));
}

/**
 * Reverse of {@link formatFieldValue}: `"water_pressure: 1.5"` → value.
 */
export function parseFieldValue(
  text: string,
  registry: FieldRegistry = defaultRegistry,
): Result<FieldValue, FieldValueParseError> {
  const separator = text.indexOf(":");
  if (separator === -1) {
    return createErr(
      new InvalidFieldValueError(`"${text}" is not "<name>: <value>"`),
    );
  }
  const name = text.slice(0, separator).trim();
  const descriptor = registry.lookupByName(name);
  if (!descriptor) {
    return createErr(new UnknownFieldError(name));
  }
  return fromDescriptorText(descriptor, text.slice(separator + 1));
}

/** Name and value text of a field value. */
export function toNamedValue(fieldValue: FieldValue): NamedValue {
  return {
    name: fieldValue.name,
    value: formatPayloadValue(fieldValue.value),
  };
}

/** Reverse of {@link toNamedValue}. */
export function fromNamedValue(
  namedValue: NamedValue,
  registry: FieldRegistry = defaultRegistry,
): Result<FieldValue, FieldValueParseError> {
  const descriptor = registry.lookupByName(namedValue.name);
  if (!descriptor) {
    return createErr(new UnknownFieldError(namedValue.name));
  }
  return fromDescriptorText(descriptor, namedValue.value);
}

/** Zero value of a field's data type. */
export function defaultFieldValue(descriptor: FieldDescriptor): FieldValue {
  return bind(descriptor, defaultPayloadValue(descriptor.dataType));
}
