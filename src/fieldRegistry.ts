/**
 * Field registry: immutable lookup from field id to descriptor.
 *
 * The table is generated ahead of time (one row per field) and shipped as
 * `data/fields.json`. It is validated and indexed once at module load and
 * never mutated afterwards.
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapErr,
  unwrapOk,
} from "option-t/plain_result";
import fieldTable from "../data/fields.json";
import { InvalidFieldTableError } from "./errors.ts";
import type { DataType, DataTypeKind, FieldDescriptor } from "./types/bsb.ts";

const DATA_TYPE_KINDS: readonly DataTypeKind[] = [
  "Setting",
  "Number",
  "Float",
  "DateTime",
  "Schedule",
  "Enum",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDataTypeKind(value: unknown): value is DataTypeKind {
  return DATA_TYPE_KINDS.some((kind) => kind === value);
}

function parseFieldId(value: unknown): number | undefined {
  const id =
    typeof value === "string" && /^0x[0-9a-f]{1,8}$/i.test(value)
      ? Number.parseInt(value.slice(2), 16)
      : value;
  if (
    typeof id === "number" &&
    Number.isInteger(id) &&
    id >= 0 &&
    id <= 0xffffffff
  ) {
    return id;
  }
  return undefined;
}

function parseRow(
  row: unknown,
  index: number,
): Result<FieldDescriptor, InvalidFieldTableError> {
  if (!isRecord(row)) {
    return createErr(new InvalidFieldTableError("not an object", index));
  }
  const id = parseFieldId(row.id);
  if (id === undefined) {
    return createErr(
      new InvalidFieldTableError(`invalid id ${String(row.id)}`, index),
    );
  }
  const { name, prognr, path, divisor } = row;
  if (typeof name !== "string" || name === "") {
    return createErr(new InvalidFieldTableError("missing name", index));
  }
  if (typeof prognr !== "number" || !Number.isInteger(prognr) || prognr < 0) {
    return createErr(new InvalidFieldTableError("invalid prognr", index));
  }
  if (typeof path !== "string") {
    return createErr(new InvalidFieldTableError("missing path", index));
  }
  const kind = row.dataType;
  if (!isDataTypeKind(kind)) {
    return createErr(
      new InvalidFieldTableError(`unknown data type ${String(kind)}`, index),
    );
  }

  let dataType: DataType;
  if (kind === "Float") {
    if (
      typeof divisor !== "number" ||
      !Number.isInteger(divisor) ||
      divisor <= 0
    ) {
      return createErr(
        new InvalidFieldTableError("Float requires a positive divisor", index),
      );
    }
    dataType = Object.freeze({ divisor, kind: "Float" });
  } else {
    dataType = Object.freeze({ kind });
  }

  return createOk(Object.freeze({ dataType, id, name, path, prognr }));
}

/**
 * Read-only index of field descriptors.
 */
export class FieldRegistry {
  readonly #byId: ReadonlyMap<number, FieldDescriptor>;
  readonly #byName: ReadonlyMap<string, FieldDescriptor>;

  private constructor(descriptors: readonly FieldDescriptor[]) {
    this.#byId = new Map(
      descriptors.map((d): [number, FieldDescriptor] => [d.id, d]),
    );
    this.#byName = new Map(
      descriptors.map((d): [string, FieldDescriptor] => [d.name, d]),
    );
  }

  /**
   * Index already-built descriptors. Duplicate ids or names are rejected.
   */
  static fromDescriptors(
    descriptors: readonly FieldDescriptor[],
  ): Result<FieldRegistry, InvalidFieldTableError> {
    const ids = new Set<number>();
    const names = new Set<string>();
    for (const [index, descriptor] of descriptors.entries()) {
      if (ids.has(descriptor.id)) {
        return createErr(
          new InvalidFieldTableError(
            `duplicate id 0x${descriptor.id.toString(16).toUpperCase()}`,
            index,
          ),
        );
      }
      if (names.has(descriptor.name)) {
        return createErr(
          new InvalidFieldTableError(`duplicate name ${descriptor.name}`, index),
        );
      }
      ids.add(descriptor.id);
      names.add(descriptor.name);
    }
    return createOk(new FieldRegistry(descriptors));
  }

  /**
   * Validate raw table rows (`id` as number or `0x` hex string, `name`,
   * `prognr`, `dataType`, `divisor` for Float, `path`) and index them.
   */
  static fromTable(
    rows: unknown,
  ): Result<FieldRegistry, InvalidFieldTableError> {
    if (!Array.isArray(rows)) {
      return createErr(new InvalidFieldTableError("table is not an array"));
    }
    const descriptors: FieldDescriptor[] = [];
    for (const [index, row] of rows.entries()) {
      const parsed = parseRow(row, index);
      if (isErr(parsed)) return parsed;
      descriptors.push(unwrapOk(parsed));
    }
    return FieldRegistry.fromDescriptors(descriptors);
  }

  /** Descriptor for `fieldId`, if the field is known. */
  lookup(fieldId: number): FieldDescriptor | undefined {
    return this.#byId.get(fieldId);
  }

  /** Descriptor with the given display name, if any. */
  lookupByName(name: string): FieldDescriptor | undefined {
    return this.#byName.get(name);
  }

  /** All descriptors in table order. */
  entries(): Iterable<FieldDescriptor> {
    return this.#byId.values();
  }

  get size(): number {
    return this.#byId.size;
  }
}

function loadDefaultRegistry(): FieldRegistry {
  const loaded = FieldRegistry.fromTable(fieldTable);
  if (isErr(loaded)) {
    throw unwrapErr(loaded);
  }
  return unwrapOk(loaded);
}

/** Registry built from the bundled field table. */
export const defaultRegistry: FieldRegistry = loadDefaultRegistry();
