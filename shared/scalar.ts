import {
  INT_PATTERN,
  type ScalarInput,
  type ScalarValue,
  type SerializedScalar,
  type TaggedScalar,
} from "./schema";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

function clampInt64(value: bigint): bigint {
  if (value < INT64_MIN) return INT64_MIN;
  if (value > INT64_MAX) return INT64_MAX;
  return value;
}

/**
 * Builds a 64-bit int. Numbers are truncated (non-finite ones become 0),
 * decimal strings are parsed exactly, and everything is clamped to the
 * signed 64-bit range.
 */
export function intValue(value: number | bigint | string): ScalarValue {
  if (typeof value === "bigint") {
    return { kind: "int", value: clampInt64(value) };
  }
  if (typeof value === "string") {
    return { kind: "int", value: INT_PATTERN.test(value) ? clampInt64(BigInt(value)) : 0n };
  }
  if (!Number.isFinite(value)) {
    return { kind: "int", value: 0n };
  }
  return { kind: "int", value: clampInt64(BigInt(Math.trunc(value))) };
}

export function floatValue(value: number): ScalarValue {
  return { kind: "float", value };
}

export function boolValue(value: boolean): ScalarValue {
  return { kind: "bool", value };
}

export function textValue(value: string): ScalarValue {
  return { kind: "text", value };
}

/** Accepts both the in-memory form and the wire form (int as number or decimal string). */
export function isTaggedScalar(input: unknown): input is ScalarValue | TaggedScalar {
  if (!input || typeof input !== "object" || !("kind" in input) || !("value" in input)) {
    return false;
  }
  const { kind, value } = input;
  switch (kind) {
    case "int":
      return (
        typeof value === "bigint" ||
        (typeof value === "number" && Number.isInteger(value)) ||
        (typeof value === "string" && INT_PATTERN.test(value))
      );
    case "float":
      return typeof value === "number";
    case "bool":
      return typeof value === "boolean";
    case "text":
      return typeof value === "string";
    default:
      return false;
  }
}

/**
 * Converts caller input into a fresh tagged scalar. Integral numbers become
 * `int`, everything else numeric becomes `float`; use {@link floatValue} to
 * keep a whole number as a float.
 */
export function toScalarValue(input: ScalarInput): ScalarValue {
  if (typeof input === "bigint") {
    return intValue(input);
  }
  if (typeof input === "number") {
    return Number.isInteger(input) ? intValue(input) : floatValue(input);
  }
  if (typeof input === "boolean") {
    return boolValue(input);
  }
  if (typeof input === "string") {
    return textValue(input);
  }
  if (input.kind === "int") {
    return intValue(input.value);
  }
  return { ...input };
}

export function serializeScalar(value: ScalarValue): SerializedScalar {
  if (value.kind === "int") {
    return { kind: "int", value: value.value.toString() };
  }
  return { ...value };
}
