/**
 * Literal decoders: corpus text to the encodings the Noir primitives take.
 *
 * Integers travel as bigint so the i64 bound check is exact. Floats travel as
 * raw IEEE-754 bit patterns (number for binary32, bigint for binary64) so that
 * signed zero and NaN payloads survive untouched.
 */

import { DateTimeValue, fromEpochMicros, parseDateTimeLexical, toEpochMicros } from "./expression/datetime";
import { parseDayTimeDurationLexical } from "./expression/duration";
import { EvaluationError } from "./errors";

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;
export const I8_MIN = -128n;
export const I8_MAX = 127n;

export type FloatWidth = "float" | "double";

export type EncodedLiteral =
  | { kind: "integer"; value: bigint }
  | { kind: "boolean"; value: boolean }
  | { kind: "float"; bits: number }
  | { kind: "double"; bits: bigint }
  | { kind: "dateTime"; utcMicros: bigint; tzOffsetMinutes: number }
  | { kind: "duration"; micros: bigint };

export type EncodedDateTime = Extract<EncodedLiteral, { kind: "dateTime" }>;

export interface DecodedFloat {
  value: number;
  width: FloatWidth;
}

export interface EpochDateTime {
  utcMicros: bigint;
  tzOffsetMinutes: number;
}

export function fitsInI64(value: bigint): boolean {
  return value >= I64_MIN && value <= I64_MAX;
}

export function fitsInI8(value: bigint): boolean {
  return value >= I8_MIN && value <= I8_MAX;
}

const INTEGER_WRAPPER = /^xs:integer\s*\(\s*['"]?(-?\d+)['"]?\s*\)/;
const BARE_INTEGER = /^-?\d+$/;

/**
 * Bare signed integer or `xs:integer(...)` wrapper
 */
export function parseInteger(text: string): bigint | undefined {
  const value = text.trim();
  const wrapped = INTEGER_WRAPPER.exec(value);
  if (wrapped) {
    return BigInt(wrapped[1]);
  }
  if (BARE_INTEGER.test(value)) {
    return BigInt(value);
  }
  return undefined;
}

const BOOLEAN_WRAPPER = /^xs:boolean\s*\(['"]?(true|false)['"]?\)/;

export function parseBoolean(text: string): boolean | undefined {
  const value = text.trim().toLowerCase();
  if (value === "true" || value === "true()" || value === "fn:true()") {
    return true;
  }
  if (value === "false" || value === "false()" || value === "fn:false()") {
    return false;
  }
  const wrapped = BOOLEAN_WRAPPER.exec(value);
  if (wrapped) {
    return wrapped[1] === "true";
  }
  return undefined;
}

const FLOAT_WRAPPER = /^xs:(float|double)\s*\(\s*['"]?([^'")\s]+)['"]?\s*\)/;
const FLOAT_LEXICAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const BARE_EXPONENT = /^-?\d+\.?\d*[eE][+-]?\d+$/;
const BARE_DECIMAL = /^-?\d+\.\d+$/;

function decodeSpecial(inner: string): number | undefined {
  switch (inner.toUpperCase()) {
    case "NAN":
      return NaN;
    case "INF":
    case "+INF":
      return Infinity;
    case "-INF":
      return -Infinity;
    default:
      return undefined;
  }
}

/**
 * `xs:float(...)` / `xs:double(...)` wrapper, or a bare decimal or exponent
 * literal (read as double)
 */
export function parseFloatLiteral(text: string): DecodedFloat | undefined {
  const value = text.trim();
  const wrapped = FLOAT_WRAPPER.exec(value);
  if (wrapped) {
    const width: FloatWidth = wrapped[1] === "float" ? "float" : "double";
    const inner = wrapped[2];
    if (FLOAT_LEXICAL.test(inner)) {
      return { value: Number(inner), width };
    }
    const special = decodeSpecial(inner);
    return special === undefined ? undefined : { value: special, width };
  }
  if (BARE_EXPONENT.test(value) || BARE_DECIMAL.test(value)) {
    return { value: Number(value), width: "double" };
  }
  return undefined;
}

export function floatToBits(value: number): number {
  const view = new DataView(new ArrayBuffer(4));
  view.setFloat32(0, value);
  return view.getUint32(0);
}

export function bitsToFloat(bits: number): number {
  const view = new DataView(new ArrayBuffer(4));
  view.setUint32(0, bits);
  return view.getFloat32(0);
}

export function doubleToBits(value: number): bigint {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  return view.getBigUint64(0);
}

export function bitsToDouble(bits: bigint): number {
  const view = new DataView(new ArrayBuffer(8));
  view.setBigUint64(0, bits);
  return view.getFloat64(0);
}

/**
 * True when a finite double rounds to an infinite binary32
 */
export function overflowsFloat32(value: number): boolean {
  return Number.isFinite(value) && !Number.isFinite(Math.fround(value));
}

const DATETIME_WRAPPER = /^xs:dateTime\s*\(\s*['"]([^'"]*)['"]\s*\)$/;

/**
 * Decode a dateTime literal, bare or wrapped in `xs:dateTime('...')`.
 * A literal without a timezone is taken as UTC.
 */
export function parseDateTime(text: string): EpochDateTime | undefined {
  const value = text.trim();
  const wrapped = DATETIME_WRAPPER.exec(value);
  const lexical = wrapped ? wrapped[1] : value;
  try {
    return epochFromValue(parseDateTimeLexical(lexical));
  } catch (error) {
    if (error instanceof EvaluationError) {
      return undefined;
    }
    throw error;
  }
}

export function epochFromValue(value: DateTimeValue): EpochDateTime {
  return { utcMicros: toEpochMicros(value), tzOffsetMinutes: value.tzOffsetMinutes ?? 0 };
}

/**
 * Encode an evaluated dateTime, or undefined when it precedes the epoch
 */
export function encodeDateTime(value: DateTimeValue): EncodedDateTime | undefined {
  const { utcMicros, tzOffsetMinutes } = epochFromValue(value);
  if (utcMicros < 0n) {
    return undefined;
  }
  return { kind: "dateTime", utcMicros, tzOffsetMinutes };
}

/**
 * Local date and time fields for an encoded instant and its retained offset
 */
export function dateTimeFromEpoch(utcMicros: bigint, tzOffsetMinutes: number): DateTimeValue {
  return fromEpochMicros(utcMicros, tzOffsetMinutes);
}

const DURATION_WRAPPER = /^xs:dayTimeDuration\s*\(\s*['"]([^'"]+)['"]\s*\)$/;

/**
 * Signed microseconds of a day-time duration, bare or wrapped in
 * `xs:dayTimeDuration('...')`
 */
export function parseDuration(text: string): bigint | undefined {
  const value = text.trim();
  const wrapped = DURATION_WRAPPER.exec(value);
  try {
    return parseDayTimeDurationLexical(wrapped ? wrapped[1] : value);
  } catch (error) {
    if (error instanceof EvaluationError) {
      return undefined;
    }
    throw error;
  }
}

export type OperandVariant = "integer" | "float" | "double";

/**
 * Apparent numeric variant of an expression from its text alone
 */
export function detectOperandType(expression: string): OperandVariant {
  const text = expression.trim();
  if (text.includes("xs:float")) {
    return "float";
  }
  if (text.includes("xs:double")) {
    return "double";
  }
  if (/xs:(decimal|integer|int|long)/.test(text)) {
    return "integer";
  }
  if (/\d+[eE][+-]?\d+/.test(text) || /\d+\.\d+/.test(text)) {
    return "double";
  }
  return "integer";
}
