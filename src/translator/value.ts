/**
 * Conversion between the backend's structured-value model and plain JSON-like
 * values. Both directions are pure and recursive.
 */

import type { Struct, StructValue } from "../protocols/backend/types.js";

export type NativeValue = null | number | string | boolean | NativeValue[] | NativeObject;
export interface NativeObject {
  [key: string]: NativeValue;
}

/** A native value that has no structured-value representation. */
export class ConversionError extends Error {
  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`${path}: ${reason}`);
    this.name = "ConversionError";
  }
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

function joinPath(path: string, key: string): string {
  return IDENTIFIER.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

function describe(input: unknown): string {
  if (input === null) return "null";
  if (Array.isArray(input)) return "array";
  return typeof input;
}

function unrecognized(_value: never): null {
  return null;
}

// ---- structured -> native ----

export function valueToNative(value: StructValue | undefined): NativeValue {
  if (value === undefined) return null;
  switch (value.kind) {
    case "null":
      return null;
    case "number":
    case "string":
    case "bool":
      return value.value;
    case "struct":
      return structToNative(value.value) ?? null;
    case "list":
      return value.value.map((item) => valueToNative(item));
    default:
      return unrecognized(value);
  }
}

/** An absent struct stays absent; it never becomes an empty object. */
export function structToNative(struct: Struct | undefined): NativeObject | undefined {
  if (struct === undefined) return undefined;
  return Object.fromEntries(
    Object.entries(struct.fields).map(([key, value]) => [key, valueToNative(value)])
  );
}

// ---- native -> structured ----

function isPlainObject(input: object): boolean {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === null || proto === Object.prototype;
}

function recordToStruct(record: object, path: string, seen: Set<object>): Struct {
  if (Object.getOwnPropertySymbols(record).length > 0) {
    throw new ConversionError(path, "non-string map key");
  }
  const fields: [string, StructValue][] = [];
  for (const [key, value] of Object.entries(record)) {
    // Omitted members are dropped; explicit nulls are kept.
    if (value === undefined) continue;
    fields.push([key, toValue(value, joinPath(path, key), seen)]);
  }
  return { fields: Object.fromEntries(fields) };
}

function mapToStruct(map: Map<unknown, unknown>, path: string, seen: Set<object>): Struct {
  const fields: [string, StructValue][] = [];
  for (const [key, value] of map) {
    if (typeof key !== "string") {
      throw new ConversionError(path, `non-string map key ${String(key)}`);
    }
    if (value === undefined) continue;
    fields.push([key, toValue(value, joinPath(path, key), seen)]);
  }
  return { fields: Object.fromEntries(fields) };
}

function objectToValue(input: object, path: string, seen: Set<object>): StructValue {
  if (seen.has(input)) throw new ConversionError(path, "cyclic structure");
  seen.add(input);
  try {
    if (Array.isArray(input)) {
      return {
        kind: "list",
        value: Array.from(input, (item: unknown, index: number) => toValue(item, `${path}[${index}]`, seen)),
      };
    }
    if (input instanceof Map) {
      return { kind: "struct", value: mapToStruct(input, path, seen) };
    }
    if (!isPlainObject(input)) {
      const name = typeof input.constructor === "function" ? input.constructor.name : "instance";
      throw new ConversionError(path, `unsupported object ${name}`);
    }
    return { kind: "struct", value: recordToStruct(input, path, seen) };
  } finally {
    seen.delete(input);
  }
}

function toValue(input: unknown, path: string, seen: Set<object>): StructValue {
  if (input === null) return { kind: "null" };
  switch (typeof input) {
    case "number":
      if (!Number.isFinite(input)) {
        throw new ConversionError(path, `unsupported number ${String(input)}`);
      }
      return { kind: "number", value: input };
    case "bigint":
      if (input > MAX_SAFE || input < MIN_SAFE) {
        throw new ConversionError(path, `integer ${input.toString()} out of range`);
      }
      return { kind: "number", value: Number(input) };
    case "string":
      return { kind: "string", value: input };
    case "boolean":
      return { kind: "bool", value: input };
    case "object":
      return objectToValue(input, path, seen);
    default:
      throw new ConversionError(path, `unsupported type ${typeof input}`);
  }
}

export function nativeToValue(input: unknown, path = "$"): StructValue {
  return toValue(input, path, new Set());
}

/** Convert an object (or string-keyed Map) into a Struct. Anything else is a ConversionError. */
export function nativeToStruct(input: unknown, path = "$"): Struct {
  const value = nativeToValue(input, path);
  if (value.kind !== "struct") {
    throw new ConversionError(path, `expected an object, got ${describe(input)}`);
  }
  return value.value;
}
