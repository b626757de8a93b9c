/**
 * Ordered handler table for expression translation.
 *
 * A handler matches on shape only: symbol family, arity and the primitive of
 * the requested operation. The first match owns the expression; its own
 * rejections are final.
 */

import { ExprNode, effectiveSymbol, functionArgs, isFunctionCall, namespacePrefix } from "../expression/ast";
import { FloatWidth, fitsInI8 } from "../literals";
import { OperationSpec, TranslationResult } from "../types";
import {
  accept,
  booleanOperand,
  callExpression,
  dateTimeOperand,
  dateTimeSetup,
  durationOperand,
  durationSetup,
  encodeDateTimeValue,
  encodeDurationValue,
  encodeFloat,
  evaluateOperand,
  floatBitsOperand,
  floatSetup,
  integerOperand,
  reject,
} from "./operands";

export interface HandlerContext {
  node: ExprNode;
  /** Effective operator or function symbol */
  symbol: string;
  /** Operator operands or call arguments */
  operands: ExprNode[];
  operation: OperationSpec;
}

export interface Handler {
  name: string;
  matches(ctx: HandlerContext): boolean;
  translate(ctx: HandlerContext): TranslationResult;
}

const COMPARISON_SUFFIX: Record<string, string | undefined> = {
  eq: "equal",
  "=": "equal",
  lt: "less_than",
  "<": "less_than",
  gt: "greater_than",
  ">": "greater_than",
};

const ARITHMETIC_SUFFIX: Record<string, string | undefined> = {
  "+": "add",
  "-": "subtract",
  "*": "multiply",
  div: "divide",
};

const DATETIME_COMPONENTS: Record<string, string | undefined> = {
  "year-from-dateTime": "year_from_datetime",
  "month-from-dateTime": "month_from_datetime",
  "day-from-dateTime": "day_from_datetime",
  "hours-from-dateTime": "hours_from_datetime",
  "minutes-from-dateTime": "minutes_from_datetime",
  "seconds-from-dateTime": "seconds_from_datetime",
  "timezone-from-dateTime": "timezone_from_datetime",
};

const DURATION_COMPONENTS: Record<string, string | undefined> = {
  "days-from-duration": "days_from_duration",
  "hours-from-duration": "hours_from_duration",
  "minutes-from-duration": "minutes_from_duration",
  "seconds-from-duration": "seconds_from_duration",
};

const INTEGER_ROUNDING: Record<string, string | undefined> = {
  abs: "abs_int",
  ceiling: "ceil_int",
  floor: "floor_int",
  round: "round_int",
};

const FLOAT_ROUNDING: Record<string, string | undefined> = {
  round: "round",
  ceiling: "ceil",
  floor: "floor",
};

function isBinaryOperator(ctx: HandlerContext): boolean {
  return ctx.node.kind === "operator" && ctx.operands.length === 2;
}

function isUnaryOperator(ctx: HandlerContext, symbol: string): boolean {
  return ctx.node.kind === "operator" && ctx.symbol === symbol && ctx.operands.length === 1;
}

/** One-argument call in the default function namespace */
function isUnaryCall(ctx: HandlerContext): boolean {
  const prefix = namespacePrefix(ctx.node);
  return isFunctionCall(ctx.node) && (prefix === undefined || prefix === "fn") && ctx.operands.length === 1;
}

function lookup(table: Record<string, string | undefined>, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/**
 * Primitive named by a symbol's suffix, or undefined when the symbol is not
 * in the table
 */
function primitiveFor(
  table: Record<string, string | undefined>,
  symbol: string,
  build: (suffix: string) => string
): string | undefined {
  const suffix = lookup(table, symbol);
  return suffix === undefined ? undefined : build(suffix);
}

/**
 * Width of a `_float` / `_double` primitive
 */
function primitiveWidth(primitive: string): FloatWidth | undefined {
  if (primitive.endsWith("_float")) return "float";
  if (primitive.endsWith("_double")) return "double";
  return undefined;
}

const datetimeComponent: Handler = {
  name: "datetime-component",
  matches: (ctx) =>
    isUnaryCall(ctx) && lookup(DATETIME_COMPONENTS, ctx.symbol) === ctx.operation.primitive,
  translate: (ctx) => {
    const dt = dateTimeOperand(ctx.operands[0]);
    if (!dt.ok) return dt;
    return accept({
      setup: [dateTimeSetup("dt", dt.value)],
      call: callExpression(ctx.operation.primitive, ["dt"]),
    });
  },
};

const durationComponent: Handler = {
  name: "duration-component",
  matches: (ctx) =>
    isUnaryCall(ctx) && lookup(DURATION_COMPONENTS, ctx.symbol) === ctx.operation.primitive,
  translate: (ctx) => {
    const dur = durationOperand(ctx.operands[0]);
    if (!dur.ok) return dur;
    return accept({
      setup: [durationSetup("dur", dur.value)],
      call: callExpression(ctx.operation.primitive, ["dur"]),
    });
  },
};

function compareBigInt(symbol: string, a: bigint, b: bigint): boolean {
  switch (lookup(COMPARISON_SUFFIX, symbol)) {
    case "equal":
      return a === b;
    case "less_than":
      return a < b;
    default:
      return a > b;
  }
}

const durationComparison: Handler = {
  name: "duration-comparison",
  matches: (ctx) =>
    isBinaryOperator(ctx) &&
    primitiveFor(COMPARISON_SUFFIX, ctx.symbol, (suffix) => `duration_${suffix}`) === ctx.operation.primitive,
  translate: (ctx) => {
    const left = durationOperand(ctx.operands[0]);
    if (!left.ok) return left;
    const right = durationOperand(ctx.operands[1]);
    if (!right.ok) return right;
    return accept({
      setup: [durationSetup("dur1", left.value), durationSetup("dur2", right.value)],
      call: callExpression(ctx.operation.primitive, ["dur1", "dur2"]),
      embeddedExpected: {
        value: String(compareBigInt(ctx.symbol, left.value, right.value)),
        origin: "evaluation",
      },
    });
  },
};

const TEMPORAL_ARITHMETIC: Record<string, string | undefined> = {
  duration_add: "+",
  duration_subtract: "-",
  datetime_add_duration: "+",
  datetime_subtract_duration: "-",
  datetime_difference: "-",
};

const temporalArithmetic: Handler = {
  name: "temporal-arithmetic",
  matches: (ctx) =>
    isBinaryOperator(ctx) && lookup(TEMPORAL_ARITHMETIC, ctx.operation.primitive) === ctx.symbol,
  translate: (ctx) => {
    const { primitive } = ctx.operation;
    const left = evaluateOperand(ctx.operands[0]);
    if (!left.ok) return left;
    const right = evaluateOperand(ctx.operands[1]);
    if (!right.ok) return right;

    if (primitive === "duration_add" || primitive === "duration_subtract") {
      const dur1 = encodeDurationValue(left.value);
      if (!dur1.ok) return dur1;
      const dur2 = encodeDurationValue(right.value);
      if (!dur2.ok) return dur2;
      return accept({
        setup: [durationSetup("dur1", dur1.value), durationSetup("dur2", dur2.value)],
        call: callExpression(primitive, ["dur1", "dur2"]),
      });
    }

    if (primitive === "datetime_difference") {
      const dt1 = encodeDateTimeValue(left.value);
      if (!dt1.ok) return dt1;
      const dt2 = encodeDateTimeValue(right.value);
      if (!dt2.ok) return dt2;
      return accept({
        setup: [dateTimeSetup("dt1", dt1.value), dateTimeSetup("dt2", dt2.value)],
        call: callExpression(primitive, ["dt1", "dt2"]),
      });
    }

    // addition commutes: a duration may come first
    const swap = primitive === "datetime_add_duration" && left.value.kind === "dayTimeDuration";
    const dt = encodeDateTimeValue(swap ? right.value : left.value);
    if (!dt.ok) return dt;
    const dur = encodeDurationValue(swap ? left.value : right.value);
    if (!dur.ok) return dur;
    return accept({
      setup: [dateTimeSetup("dt", dt.value), durationSetup("dur", dur.value)],
      call: callExpression(primitive, ["dt", "dur"]),
    });
  },
};

const datetimeComparison: Handler = {
  name: "datetime-comparison",
  matches: (ctx) =>
    isBinaryOperator(ctx) &&
    primitiveFor(COMPARISON_SUFFIX, ctx.symbol, (suffix) => `datetime_${suffix}`) === ctx.operation.primitive,
  translate: (ctx) => {
    const left = dateTimeOperand(ctx.operands[0]);
    if (!left.ok) return left;
    const right = dateTimeOperand(ctx.operands[1]);
    if (!right.ok) return right;
    return accept({
      setup: [dateTimeSetup("dt1", left.value), dateTimeSetup("dt2", right.value)],
      call: callExpression(ctx.operation.primitive, ["dt1", "dt2"]),
      embeddedExpected: {
        value: String(compareBigInt(ctx.symbol, left.value.utcMicros, right.value.utcMicros)),
        origin: "evaluation",
      },
    });
  },
};

const fnNot: Handler = {
  name: "fn-not",
  matches: (ctx) => isUnaryCall(ctx) && ctx.symbol === "not" && ctx.operation.primitive === "fn_not",
  translate: (ctx) => {
    const arg = booleanOperand(ctx.operands[0]);
    if (!arg.ok) return arg;
    return accept({ setup: [], call: callExpression("fn_not", [arg.value]) });
  },
};

function integerBinary(ctx: HandlerContext): TranslationResult {
  const a = integerOperand(ctx.operands[0]);
  if (!a.ok) return a;
  const b = integerOperand(ctx.operands[1]);
  if (!b.ok) return b;
  return accept({ setup: [], call: callExpression(ctx.operation.primitive, [a.value, b.value]) });
}

const integerMod: Handler = {
  name: "integer-mod",
  matches: (ctx) => isBinaryOperator(ctx) && ctx.symbol === "mod" && ctx.operation.primitive === "numeric_mod_int",
  translate: integerBinary,
};

function floatBinary(ctx: HandlerContext): TranslationResult {
  const width = primitiveWidth(ctx.operation.primitive);
  if (width === undefined) {
    return reject("unrecognized", `${ctx.operation.primitive} is not a floating-point primitive`);
  }
  const a = floatBitsOperand(ctx.operands[0], width);
  if (!a.ok) return a;
  const b = floatBitsOperand(ctx.operands[1], width);
  if (!b.ok) return b;
  return accept({
    setup: [floatSetup("a", width, a.value), floatSetup("b", width, b.value)],
    call: callExpression(ctx.operation.primitive, ["a", "b"]),
  });
}

function matchesWidth(primitive: string, stem: string | undefined): boolean {
  return stem !== undefined && (primitive === `${stem}_float` || primitive === `${stem}_double`);
}

const floatArithmetic: Handler = {
  name: "float-arithmetic",
  matches: (ctx) =>
    isBinaryOperator(ctx) &&
    matchesWidth(ctx.operation.primitive, primitiveFor(ARITHMETIC_SUFFIX, ctx.symbol, (suffix) => `numeric_${suffix}`)),
  translate: floatBinary,
};

const floatComparison: Handler = {
  name: "float-comparison",
  matches: (ctx) =>
    isBinaryOperator(ctx) &&
    matchesWidth(ctx.operation.primitive, primitiveFor(COMPARISON_SUFFIX, ctx.symbol, (suffix) => `numeric_${suffix}`)),
  translate: floatBinary,
};

const integerArithmetic: Handler = {
  name: "integer-arithmetic",
  matches: (ctx) => {
    if (!isBinaryOperator(ctx)) return false;
    const symbol = ctx.symbol === "idiv" ? "div" : ctx.symbol;
    return primitiveFor(ARITHMETIC_SUFFIX, symbol, (suffix) => `numeric_${suffix}_int`) === ctx.operation.primitive;
  },
  translate: integerBinary,
};

const integerRounding: Handler = {
  name: "integer-rounding",
  matches: (ctx) => isUnaryCall(ctx) && lookup(INTEGER_ROUNDING, ctx.symbol) === ctx.operation.primitive,
  translate: (ctx) => {
    const value = integerOperand(ctx.operands[0]);
    if (!value.ok) return value;
    return accept({ setup: [], call: callExpression(ctx.operation.primitive, [value.value]) });
  },
};

const floatRounding: Handler = {
  name: "float-rounding",
  matches: (ctx) => {
    return isUnaryCall(ctx) && matchesWidth(ctx.operation.primitive, lookup(FLOAT_ROUNDING, ctx.symbol));
  },
  translate: (ctx) => {
    const width = primitiveWidth(ctx.operation.primitive) ?? "double";
    const bits = floatBitsOperand(ctx.operands[0], width);
    if (!bits.ok) return bits;
    return accept({
      setup: [floatSetup("val", width, bits.value)],
      call: callExpression(ctx.operation.primitive, ["val"]),
    });
  },
};

function unaryHandler(name: string, symbol: "+" | "-", primitive: string): Handler {
  return {
    name,
    matches: (ctx) => isUnaryOperator(ctx, symbol) && ctx.operation.primitive === primitive,
    translate: (ctx) => {
      const value = integerOperand(ctx.operands[0]);
      if (!value.ok) return value;
      return accept({ setup: [], call: callExpression(primitive, [value.value]) });
    },
  };
}

const integerComparison: Handler = {
  name: "integer-comparison",
  matches: (ctx) =>
    isBinaryOperator(ctx) &&
    primitiveFor(COMPARISON_SUFFIX, ctx.symbol, (suffix) => `numeric_${suffix}_int`) === ctx.operation.primitive,
  translate: integerBinary,
};

function booleanBinary(ctx: HandlerContext): TranslationResult {
  const a = booleanOperand(ctx.operands[0]);
  if (!a.ok) return a;
  const b = booleanOperand(ctx.operands[1]);
  if (!b.ok) return b;
  return accept({ setup: [], call: callExpression(ctx.operation.primitive, [a.value, b.value]) });
}

const booleanEqual: Handler = {
  name: "boolean-equal",
  matches: (ctx) =>
    isBinaryOperator(ctx) &&
    lookup(COMPARISON_SUFFIX, ctx.symbol) === "equal" &&
    ctx.operation.primitive === "boolean_equal",
  translate: booleanBinary,
};

const booleanOrdering: Handler = {
  name: "boolean-ordering",
  matches: (ctx) => {
    const suffix = lookup(COMPARISON_SUFFIX, ctx.symbol);
    return isBinaryOperator(ctx) && suffix !== undefined && suffix !== "equal" && `boolean_${suffix}` === ctx.operation.primitive;
  },
  translate: booleanBinary,
};

const XS_TYPE_NAMES = { integer: "integer", float: "float", double: "double" } as const;

/**
 * Shared tail of both cast forms once the source operand is known
 */
function translateCast(ctx: HandlerContext, source: ExprNode): TranslationResult {
  const { cast, primitive } = ctx.operation;
  if (cast === undefined) {
    return reject("unrecognized", `${ctx.operation.id} is not a cast`);
  }
  const evaluated = evaluateOperand(source);
  if (!evaluated.ok) return evaluated;
  const value = evaluated.value;

  if (cast.from === "integer") {
    if (value.kind !== "integer") {
      return reject("operand-kind", `Cast source must be an xs:integer, got ${value.kind}`);
    }
    if (!fitsInI8(value.value)) {
      return reject("out-of-range", `Cast operand ${value.value} is outside [-128, 127]`);
    }
    return accept({ setup: [], call: callExpression(primitive, [value.value]) });
  }

  if ((value.kind !== "float" && value.kind !== "double") || value.kind !== cast.from) {
    return reject("operand-kind", `Cast source must be an xs:${cast.from}, got ${value.kind}`);
  }
  const bits = encodeFloat(value, cast.from);
  if (!bits.ok) return bits;
  const local = cast.from === "float" ? "f" : "d";
  return accept({
    setup: [floatSetup(local, cast.from, bits.value)],
    call: callExpression(primitive, [local]),
  });
}

const castExpression: Handler = {
  name: "cast",
  matches: (ctx) => {
    const { cast } = ctx.operation;
    if (cast === undefined) return false;
    const target = XS_TYPE_NAMES[cast.to];
    if (ctx.node.kind === "cast") {
      const typeName = ctx.node.children[1];
      return (
        ctx.node.symbol === "cast" &&
        typeName.children[0].symbol === "xs" &&
        typeName.children[1].symbol === target
      );
    }
    return (
      isFunctionCall(ctx.node) &&
      namespacePrefix(ctx.node) === "xs" &&
      ctx.symbol === target &&
      ctx.operands.length === 1
    );
  },
  translate: (ctx) => translateCast(ctx, ctx.operands[0]),
};

export const HANDLERS: readonly Handler[] = [
  datetimeComponent,
  durationComponent,
  durationComparison,
  temporalArithmetic,
  datetimeComparison,
  fnNot,
  integerMod,
  floatArithmetic,
  floatComparison,
  integerArithmetic,
  integerRounding,
  floatRounding,
  unaryHandler("unary-plus", "+", "numeric_unary_plus_int"),
  unaryHandler("unary-minus", "-", "numeric_unary_minus_int"),
  integerComparison,
  booleanEqual,
  booleanOrdering,
  castExpression,
];

export function buildContext(node: ExprNode, operation: OperationSpec): HandlerContext {
  return { node, symbol: effectiveSymbol(node), operands: functionArgs(node), operation };
}

export function findHandler(ctx: HandlerContext): Handler | undefined {
  return HANDLERS.find((handler) => handler.matches(ctx));
}
