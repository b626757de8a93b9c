/**
 * Atomic values produced by the expression evaluator
 */

import { DateTimeValue } from "./datetime";
import { formatDayTimeDuration } from "./duration";

export type XPathValue =
  | { kind: "integer"; value: bigint }
  | { kind: "decimal"; value: number; text: string }
  | { kind: "float"; value: number }
  | { kind: "double"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "string"; value: string }
  | { kind: "dateTime"; value: DateTimeValue }
  | { kind: "dayTimeDuration"; micros: bigint };

export type ValueKind = XPathValue["kind"];

export type NumericValue = Extract<XPathValue, { kind: "integer" | "decimal" | "float" | "double" }>;

export function isNumeric(value: XPathValue): value is NumericValue {
  return (
    value.kind === "integer" ||
    value.kind === "decimal" ||
    value.kind === "float" ||
    value.kind === "double"
  );
}

export function numericToNumber(value: NumericValue): number {
  return value.kind === "integer" ? Number(value.value) : value.value;
}

/**
 * Exact integer value of a numeric, or undefined when it has a fractional
 * part or is not finite
 */
export function integralValue(value: NumericValue): bigint | undefined {
  if (value.kind === "integer") {
    return value.value;
  }
  if (value.kind === "decimal") {
    const match = /^([+-]?)(\d*)(?:\.(\d*))?$/.exec(value.text);
    if (match && /^0*$/.test(match[3] ?? "")) {
      const digits = match[2] === "" ? "0" : match[2];
      const magnitude = BigInt(digits);
      return match[1] === "-" ? -magnitude : magnitude;
    }
    if (match) {
      return undefined;
    }
  }
  if (!Number.isFinite(value.value) || !Number.isInteger(value.value)) {
    return undefined;
  }
  return BigInt(value.value);
}

export function describeValue(value: XPathValue): string {
  switch (value.kind) {
    case "integer":
      return `xs:integer(${value.value.toString()})`;
    case "decimal":
      return `xs:decimal(${value.text})`;
    case "float":
      return `xs:float(${value.value})`;
    case "double":
      return `xs:double(${value.value})`;
    case "boolean":
      return `xs:boolean(${value.value})`;
    case "string":
      return `xs:string("${value.value}")`;
    case "dateTime":
      return `xs:dateTime(${value.value.year}-${value.value.month}-${value.value.day})`;
    case "dayTimeDuration":
      return `xs:dayTimeDuration("${formatDayTimeDuration(value.micros)}")`;
  }
}
