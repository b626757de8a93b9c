/**
 * Evaluator for literal sub-expressions of the token tree.
 *
 * There is no dynamic context: variables, paths and node constructors are
 * evaluation errors. What is covered is what conformance operands are built
 * from (literals, xs: constructors and casts, arithmetic, comparisons and a
 * handful of fn: functions).
 */

import { EvaluationError } from "../errors";
import { COMPARISON_SYMBOLS, ExprNode, effectiveSymbol, functionArgs, namespacePrefix } from "./ast";
import { parseDateTimeLexical, toEpochMicros } from "./datetime";
import { parseDayTimeDurationLexical } from "./duration";
import { NumericValue, XPathValue, isNumeric, numericToNumber } from "./values";

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

const INTEGER_SUBTYPES = new Map<string, [bigint, bigint] | null>([
  ["integer", null],
  ["long", [I64_MIN, I64_MAX]],
  ["int", [-(2n ** 31n), 2n ** 31n - 1n]],
  ["short", [-32768n, 32767n]],
  ["byte", [-128n, 127n]],
]);

type NumericKind = NumericValue["kind"];

export function evaluate(node: ExprNode): XPathValue {
  switch (node.kind) {
    case "literal":
      return evaluateLiteral(node.symbol, node.text);
    case "variable":
      throw new EvaluationError(`Variable $${node.name} is not bound`, "XPST0008");
    case "name":
      throw new EvaluationError(`Name "${node.symbol}" cannot be evaluated`, "XPST0003");
    case "sequence":
      if (node.children.length === 1) {
        return evaluate(node.children[0]);
      }
      throw new EvaluationError(`Sequences of ${node.children.length} items are not supported`, "XPTY0004");
    case "cast": {
      const [operand, typeName] = node.children;
      const target = typeName.children[1].symbol;
      if (typeName.children[0].symbol !== "xs") {
        throw new EvaluationError(`Unknown cast target ${typeName.children[0].symbol}:${target}`, "XPST0051");
      }
      if (node.symbol === "castable") {
        try {
          castTo(evaluate(operand), target);
          return { kind: "boolean", value: true };
        } catch (error) {
          if (error instanceof EvaluationError) {
            return { kind: "boolean", value: false };
          }
          throw error;
        }
      }
      return castTo(evaluate(operand), target);
    }
    case "function":
    case "qualifier":
      return evaluateCall(node);
    case "operator":
      return evaluateOperator(node.symbol, node.children);
  }
}

function evaluateLiteral(symbol: string, text: string): XPathValue {
  switch (symbol) {
    case "(integer)":
      return { kind: "integer", value: BigInt(text) };
    case "(decimal)":
      return { kind: "decimal", value: Number(text), text };
    case "(double)":
      return { kind: "double", value: Number(text) };
    default:
      return { kind: "string", value: text };
  }
}

function evaluateCall(node: ExprNode): XPathValue {
  const prefix = namespacePrefix(node);
  const name = effectiveSymbol(node);
  const args = functionArgs(node).map((arg) => evaluate(arg));

  if (prefix === "xs") {
    if (args.length !== 1) {
      throw new EvaluationError(`xs:${name} expects one argument`, "XPST0017");
    }
    return castTo(args[0], name);
  }
  if (prefix !== undefined && prefix !== "fn") {
    throw new EvaluationError(`Unknown function ${prefix}:${name}`, "XPST0017");
  }

  switch (name) {
    case "true":
    case "false":
      expectArity(name, args, 0);
      return { kind: "boolean", value: name === "true" };
    case "not":
      expectArity(name, args, 1);
      return { kind: "boolean", value: !effectiveBooleanValue(args[0]) };
    case "boolean":
      expectArity(name, args, 1);
      return { kind: "boolean", value: effectiveBooleanValue(args[0]) };
    case "abs":
    case "ceiling":
    case "floor":
    case "round":
      expectArity(name, args, 1);
      return roundingFunction(name, args[0]);
    default:
      throw new EvaluationError(`Unsupported function fn:${name}`, "XPST0017");
  }
}

function expectArity(name: string, args: XPathValue[], arity: number): void {
  if (args.length !== arity) {
    throw new EvaluationError(`fn:${name} expects ${arity} argument(s), got ${args.length}`, "XPST0017");
  }
}

function roundingFunction(name: "abs" | "ceiling" | "floor" | "round", arg: XPathValue): XPathValue {
  if (!isNumeric(arg)) {
    throw new EvaluationError(`fn:${name} expects a numeric argument`, "XPTY0004");
  }
  if (arg.kind === "integer") {
    return name === "abs" && arg.value < 0n ? { kind: "integer", value: -arg.value } : arg;
  }
  const apply = (value: number): number => {
    switch (name) {
      case "abs":
        return Math.abs(value);
      case "ceiling":
        return Math.ceil(value);
      case "floor":
        return Math.floor(value);
      case "round":
        return Math.floor(value + 0.5);
    }
  };
  return withNumber(arg.kind, apply(arg.value));
}

export function effectiveBooleanValue(value: XPathValue): boolean {
  switch (value.kind) {
    case "boolean":
      return value.value;
    case "string":
      return value.value.length > 0;
    case "integer":
      return value.value !== 0n;
    case "decimal":
    case "float":
    case "double":
      return value.value !== 0 && !Number.isNaN(value.value);
    default:
      throw new EvaluationError(`No effective boolean value for ${value.kind}`, "FORG0006");
  }
}

function evaluateOperator(symbol: string, children: ExprNode[]): XPathValue {
  if (children.length === 1) {
    const operand = evaluate(children[0]);
    if (!isNumeric(operand)) {
      throw new EvaluationError(`Unary ${symbol} expects a numeric operand`, "XPTY0004");
    }
    if (symbol === "+") {
      return operand;
    }
    return negate(operand);
  }

  if (symbol === "and" || symbol === "or") {
    const left = effectiveBooleanValue(evaluate(children[0]));
    const right = effectiveBooleanValue(evaluate(children[1]));
    return { kind: "boolean", value: symbol === "and" ? left && right : left || right };
  }

  const left = evaluate(children[0]);
  const right = evaluate(children[1]);

  if (COMPARISON_SYMBOLS.has(symbol)) {
    return { kind: "boolean", value: compareValues(symbol, left, right) };
  }

  switch (symbol) {
    case "+":
    case "-":
      if (left.kind === "dayTimeDuration" && right.kind === "dayTimeDuration") {
        const micros = symbol === "+" ? left.micros + right.micros : left.micros - right.micros;
        return { kind: "dayTimeDuration", micros };
      }
      if (symbol === "-" && left.kind === "dateTime" && right.kind === "dateTime") {
        return { kind: "dayTimeDuration", micros: toEpochMicros(left.value) - toEpochMicros(right.value) };
      }
      return arithmetic(symbol, left, right);
    case "*":
    case "div":
    case "idiv":
    case "mod":
      return arithmetic(symbol, left, right);
    default:
      throw new EvaluationError(`Operator "${symbol}" is not supported`, "XPST0003");
  }
}

function negate(value: NumericValue): NumericValue {
  switch (value.kind) {
    case "integer":
      return { kind: "integer", value: -value.value };
    case "decimal":
      return {
        kind: "decimal",
        value: -value.value,
        text: value.text.startsWith("-") ? value.text.slice(1) : `-${value.text}`,
      };
    case "float":
    case "double":
      return { kind: value.kind, value: -value.value };
  }
}

function promote(left: NumericValue, right: NumericValue): NumericKind {
  const order: NumericKind[] = ["integer", "decimal", "float", "double"];
  return order[Math.max(order.indexOf(left.kind), order.indexOf(right.kind))];
}

function withNumber(kind: NumericKind, value: number): NumericValue {
  switch (kind) {
    case "float":
      return { kind: "float", value: Math.fround(value) };
    case "double":
      return { kind: "double", value };
    default:
      return { kind: "decimal", value, text: String(value) };
  }
}

function arithmetic(symbol: string, left: XPathValue, right: XPathValue): XPathValue {
  if (!isNumeric(left) || !isNumeric(right)) {
    throw new EvaluationError(`Cannot apply "${symbol}" to ${left.kind} and ${right.kind}`, "XPTY0004");
  }
  const kind = promote(left, right);

  if (left.kind === "integer" && right.kind === "integer") {
    const a = left.value;
    const b = right.value;
    switch (symbol) {
      case "+":
        return { kind: "integer", value: a + b };
      case "-":
        return { kind: "integer", value: a - b };
      case "*":
        return { kind: "integer", value: a * b };
      case "div":
        if (b === 0n) throw new EvaluationError("Division by zero", "FOAR0001");
        return withNumber("decimal", Number(a) / Number(b));
      case "idiv":
        if (b === 0n) throw new EvaluationError("Integer division by zero", "FOAR0001");
        return { kind: "integer", value: a / b };
      case "mod":
        if (b === 0n) throw new EvaluationError("Modulus by zero", "FOAR0001");
        return { kind: "integer", value: a % b };
    }
  }

  const a = numericToNumber(left);
  const b = numericToNumber(right);
  switch (symbol) {
    case "+":
      return withNumber(kind, a + b);
    case "-":
      return withNumber(kind, a - b);
    case "*":
      return withNumber(kind, a * b);
    case "div":
      if (kind === "decimal" && b === 0) throw new EvaluationError("Division by zero", "FOAR0001");
      return withNumber(kind, a / b);
    case "idiv": {
      if (b === 0) throw new EvaluationError("Integer division by zero", "FOAR0001");
      const quotient = Math.trunc(a / b);
      if (!Number.isFinite(quotient)) throw new EvaluationError("Integer division overflow", "FOAR0002");
      return { kind: "integer", value: BigInt(quotient) };
    }
    case "mod":
      if (kind === "decimal" && b === 0) throw new EvaluationError("Modulus by zero", "FOAR0001");
      return withNumber(kind, a % b);
    default:
      throw new EvaluationError(`Operator "${symbol}" is not supported`, "XPST0003");
  }
}

function compareValues(symbol: string, left: XPathValue, right: XPathValue): boolean {
  let order: number;

  if (isNumeric(left) && isNumeric(right)) {
    if (left.kind === "integer" && right.kind === "integer") {
      order = left.value === right.value ? 0 : left.value < right.value ? -1 : 1;
    } else {
      const a = numericToNumber(left);
      const b = numericToNumber(right);
      if (Number.isNaN(a) || Number.isNaN(b)) {
        return symbol === "ne" || symbol === "!=";
      }
      order = a === b ? 0 : a < b ? -1 : 1;
    }
  } else if (left.kind === "boolean" && right.kind === "boolean") {
    order = Number(left.value) - Number(right.value);
  } else if (left.kind === "string" && right.kind === "string") {
    order = left.value === right.value ? 0 : left.value < right.value ? -1 : 1;
  } else if (left.kind === "dateTime" && right.kind === "dateTime") {
    const a = toEpochMicros(left.value);
    const b = toEpochMicros(right.value);
    order = a === b ? 0 : a < b ? -1 : 1;
  } else if (left.kind === "dayTimeDuration" && right.kind === "dayTimeDuration") {
    order = left.micros === right.micros ? 0 : left.micros < right.micros ? -1 : 1;
  } else {
    throw new EvaluationError(`Cannot compare ${left.kind} with ${right.kind}`, "XPTY0004");
  }

  switch (symbol) {
    case "eq":
    case "=":
      return order === 0;
    case "ne":
    case "!=":
      return order !== 0;
    case "lt":
    case "<":
      return order < 0;
    case "le":
    case "<=":
      return order <= 0;
    case "gt":
    case ">":
      return order > 0;
    default:
      return order >= 0;
  }
}

const DECIMAL_LEXICAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const DOUBLE_LEXICAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function parseDoubleLexical(text: string): number {
  const trimmed = text.trim();
  if (trimmed === "INF" || trimmed === "+INF") return Infinity;
  if (trimmed === "-INF") return -Infinity;
  if (trimmed === "NaN") return NaN;
  if (!DOUBLE_LEXICAL.test(trimmed)) {
    throw new EvaluationError(`Invalid floating-point literal "${text}"`, "FORG0001");
  }
  return Number(trimmed);
}

/**
 * Cast an atomic value to the named xs: type
 */
export function castTo(value: XPathValue, target: string): XPathValue {
  const range = INTEGER_SUBTYPES.get(target);
  if (range !== undefined) {
    const integer = castToInteger(value);
    if (range && (integer < range[0] || integer > range[1])) {
      throw new EvaluationError(`${integer} is out of range for xs:${target}`, "FORG0001");
    }
    return { kind: "integer", value: integer };
  }

  switch (target) {
    case "decimal":
      return castToDecimal(value);
    case "double":
      return { kind: "double", value: castToNumber(value) };
    case "float":
      return { kind: "float", value: Math.fround(castToNumber(value)) };
    case "boolean":
      return castToBoolean(value);
    case "string":
      if (value.kind === "string") return value;
      if (value.kind === "integer" || value.kind === "boolean") {
        return { kind: "string", value: String(value.value) };
      }
      throw new EvaluationError(`Cannot cast ${value.kind} to xs:string`, "XPTY0004");
    case "dateTime":
      if (value.kind === "dateTime") return value;
      if (value.kind === "string") return { kind: "dateTime", value: parseDateTimeLexical(value.value) };
      throw new EvaluationError(`Cannot cast ${value.kind} to xs:dateTime`, "XPTY0004");
    case "dayTimeDuration":
      if (value.kind === "dayTimeDuration") return value;
      if (value.kind === "string") {
        return { kind: "dayTimeDuration", micros: parseDayTimeDurationLexical(value.value) };
      }
      throw new EvaluationError(`Cannot cast ${value.kind} to xs:dayTimeDuration`, "XPTY0004");
    default:
      throw new EvaluationError(`Unsupported cast target xs:${target}`, "XPST0051");
  }
}

function castToInteger(value: XPathValue): bigint {
  switch (value.kind) {
    case "integer":
      return value.value;
    case "boolean":
      return value.value ? 1n : 0n;
    case "string": {
      const trimmed = value.value.trim();
      if (!/^[+-]?\d+$/.test(trimmed)) {
        throw new EvaluationError(`Invalid xs:integer literal "${value.value}"`, "FORG0001");
      }
      return BigInt(trimmed.replace(/^\+/, ""));
    }
    case "decimal":
    case "float":
    case "double":
      if (!Number.isFinite(value.value)) {
        throw new EvaluationError(`Cannot cast ${value.value} to xs:integer`, "FOCA0002");
      }
      return BigInt(Math.trunc(value.value));
    default:
      throw new EvaluationError(`Cannot cast ${value.kind} to xs:integer`, "XPTY0004");
  }
}

function castToDecimal(value: XPathValue): XPathValue {
  switch (value.kind) {
    case "decimal":
      return value;
    case "integer":
      return { kind: "decimal", value: Number(value.value), text: value.value.toString() };
    case "boolean":
      return { kind: "decimal", value: value.value ? 1 : 0, text: value.value ? "1" : "0" };
    case "string": {
      const trimmed = value.value.trim();
      if (!DECIMAL_LEXICAL.test(trimmed)) {
        throw new EvaluationError(`Invalid xs:decimal literal "${value.value}"`, "FORG0001");
      }
      return { kind: "decimal", value: Number(trimmed), text: trimmed.replace(/^\+/, "") };
    }
    case "float":
    case "double":
      if (!Number.isFinite(value.value)) {
        throw new EvaluationError(`Cannot cast ${value.value} to xs:decimal`, "FOCA0002");
      }
      return withNumber("decimal", value.value);
    default:
      throw new EvaluationError(`Cannot cast ${value.kind} to xs:decimal`, "XPTY0004");
  }
}

function castToNumber(value: XPathValue): number {
  switch (value.kind) {
    case "integer":
      return Number(value.value);
    case "decimal":
    case "float":
    case "double":
      return value.value;
    case "boolean":
      return value.value ? 1 : 0;
    case "string":
      return parseDoubleLexical(value.value);
    default:
      throw new EvaluationError(`Cannot cast ${value.kind} to a floating-point type`, "XPTY0004");
  }
}

function castToBoolean(value: XPathValue): XPathValue {
  if (value.kind === "string") {
    const trimmed = value.value.trim();
    if (trimmed === "true" || trimmed === "1") return { kind: "boolean", value: true };
    if (trimmed === "false" || trimmed === "0") return { kind: "boolean", value: false };
    throw new EvaluationError(`Invalid xs:boolean literal "${value.value}"`, "FORG0001");
  }
  if (value.kind === "boolean" || isNumeric(value)) {
    return { kind: "boolean", value: effectiveBooleanValue(value) };
  }
  throw new EvaluationError(`Cannot cast ${value.kind} to xs:boolean`, "XPTY0004");
}
