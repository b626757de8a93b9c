/**
 * Operand evaluation and re-encoding shared by the translation handlers
 */

import { EvaluationError } from "../errors";
import { ExprNode } from "../expression/ast";
import { evaluate } from "../expression/evaluator";
import { NumericValue, XPathValue, describeValue, integralValue, isNumeric, numericToNumber } from "../expression/values";
import {
  EpochDateTime,
  FloatWidth,
  doubleToBits,
  encodeDateTime,
  fitsInI64,
  floatToBits,
  overflowsFloat32,
} from "../literals";
import { Rejection, RejectionCode, TranslationRecord, TranslationResult } from "../types";

export type Outcome<T> = { ok: true; value: T } | { ok: false; rejection: Rejection };

export function reject(code: RejectionCode, reason: string): { ok: false; rejection: Rejection } {
  return { ok: false, rejection: { code, reason } };
}

export function accept(record: TranslationRecord): TranslationResult {
  return { ok: true, record };
}

export function evaluateOperand(node: ExprNode): Outcome<XPathValue> {
  try {
    return { ok: true, value: evaluate(node) };
  } catch (error) {
    if (error instanceof EvaluationError) {
      return reject("evaluation-error", `${error.code}: ${error.message}`);
    }
    throw error;
  }
}

function expectNumeric(value: XPathValue): Outcome<NumericValue> {
  if (!isNumeric(value)) {
    return reject("operand-kind", `Expected a numeric operand, got ${describeValue(value)}`);
  }
  return { ok: true, value };
}

/**
 * Integer operand within i64. Integral decimal and floating values are
 * accepted; a fractional one is not.
 */
export function integerOperand(node: ExprNode): Outcome<bigint> {
  const evaluated = evaluateOperand(node);
  if (!evaluated.ok) return evaluated;
  const numeric = expectNumeric(evaluated.value);
  if (!numeric.ok) return numeric;

  const integer = integralValue(numeric.value);
  if (integer === undefined) {
    return reject("operand-kind", `Operand ${describeValue(numeric.value)} is not integral`);
  }
  if (!fitsInI64(integer)) {
    return reject("out-of-range", `Operand ${integer} does not fit in i64`);
  }
  return { ok: true, value: integer };
}

/**
 * IEEE-754 bit pattern of a numeric operand at the given width, as Noir
 * literal text
 */
export function floatBitsOperand(node: ExprNode, width: FloatWidth): Outcome<string> {
  const evaluated = evaluateOperand(node);
  if (!evaluated.ok) return evaluated;
  const numeric = expectNumeric(evaluated.value);
  if (!numeric.ok) return numeric;
  return encodeFloat(numeric.value, width);
}

export function encodeFloat(value: NumericValue, width: FloatWidth): Outcome<string> {
  const number = numericToNumber(value);
  if (width === "double") {
    return { ok: true, value: doubleToBits(number).toString() };
  }
  if (overflowsFloat32(number)) {
    return reject("out-of-range", `${describeValue(value)} overflows a 32-bit float`);
  }
  return { ok: true, value: floatToBits(number).toString() };
}

export function booleanOperand(node: ExprNode): Outcome<boolean> {
  const evaluated = evaluateOperand(node);
  if (!evaluated.ok) return evaluated;
  if (evaluated.value.kind !== "boolean") {
    return reject("operand-kind", `Expected a boolean operand, got ${describeValue(evaluated.value)}`);
  }
  return { ok: true, value: evaluated.value.value };
}

export function dateTimeOperand(node: ExprNode): Outcome<EpochDateTime> {
  const evaluated = evaluateOperand(node);
  if (!evaluated.ok) return evaluated;
  return encodeDateTimeValue(evaluated.value);
}

export function encodeDateTimeValue(value: XPathValue): Outcome<EpochDateTime> {
  if (value.kind !== "dateTime") {
    return reject("operand-kind", `Expected an xs:dateTime operand, got ${describeValue(value)}`);
  }
  if (value.value.year > 9999) {
    return reject("out-of-range", `Year ${value.value.year} is beyond 9999`);
  }
  const encoded = encodeDateTime(value.value);
  if (encoded === undefined) {
    return reject("pre-epoch", `${describeValue(value)} precedes 1970-01-01T00:00:00Z`);
  }
  return { ok: true, value: { utcMicros: encoded.utcMicros, tzOffsetMinutes: encoded.tzOffsetMinutes } };
}

export function durationOperand(node: ExprNode): Outcome<bigint> {
  const evaluated = evaluateOperand(node);
  if (!evaluated.ok) return evaluated;
  return encodeDurationValue(evaluated.value);
}

export function encodeDurationValue(value: XPathValue): Outcome<bigint> {
  if (value.kind !== "dayTimeDuration") {
    return reject("operand-kind", `Expected an xs:dayTimeDuration operand, got ${describeValue(value)}`);
  }
  if (!fitsInI64(value.micros)) {
    return reject("out-of-range", `Duration of ${value.micros} microseconds does not fit in i64`);
  }
  return { ok: true, value: value.micros };
}

export function dateTimeSetup(name: string, value: EpochDateTime): string {
  return `let ${name} = datetime_from_epoch_microseconds_with_tz(${value.utcMicros}, ${value.tzOffsetMinutes});`;
}

export function durationSetup(name: string, micros: bigint): string {
  return `let ${name} = duration_from_microseconds(${micros});`;
}

export function floatSetup(name: string, width: FloatWidth, bits: string): string {
  const type = width === "float" ? "XsdFloat" : "XsdDouble";
  return `let ${name} = ${type}::from_bits(${bits});`;
}

export function callExpression(primitive: string, args: Array<string | bigint | boolean>): string {
  return `${primitive}(${args.map((arg) => arg.toString()).join(", ")})`;
}
