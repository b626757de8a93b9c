/**
 * Expression classifier and translator
 *
 * Turns one corpus expression into a Noir call plus the setup statements that
 * materialize its operands, for a single requested operation.
 */

import { ExpressionSyntaxError } from "../errors";
import { ExprNode } from "../expression/ast";
import { parseExpression } from "../expression/parser";
import { describeValue, integralValue, isNumeric } from "../expression/values";
import { detectOperandType } from "../literals";
import { getOperation } from "../operations";
import { OperationSpec, TranslationResult } from "../types";
import { buildContext, findHandler } from "./handlers";
import { evaluateOperand, reject } from "./operands";

export { HANDLERS } from "./handlers";
export type { Handler, HandlerContext } from "./handlers";

export function translate(expression: string, operationId: string): TranslationResult {
  const operation = getOperation(operationId);
  if (!operation) {
    return reject("unknown-operation", `No operation named ${operationId}`);
  }

  const source = expression.trim();
  if (operation.variant !== null) {
    const detected = detectOperandType(source);
    if (detected !== operation.variant) {
      return reject("variant-mismatch", `Expression looks ${detected}, ${operation.id} takes ${operation.variant}`);
    }
  }

  let tree: ExprNode;
  try {
    tree = parseExpression(source);
  } catch (error) {
    if (error instanceof ExpressionSyntaxError) {
      return reject("parse-error", error.message);
    }
    throw error;
  }

  return translateTree(tree, operation, true);
}

/**
 * Dispatch a parsed tree. With `allowEmbedded`, an unmatched
 * `<call> eq <literal>` is retried on its left operand.
 */
export function translateTree(tree: ExprNode, operation: OperationSpec, allowEmbedded: boolean): TranslationResult {
  const ctx = buildContext(tree, operation);
  const handler = findHandler(ctx);
  if (handler) {
    return handler.translate(ctx);
  }

  if (allowEmbedded && tree.kind === "operator" && (tree.symbol === "eq" || tree.symbol === "=")) {
    const [left, right] = tree.children;
    if (tree.children.length === 2 && isLiteralOperand(right)) {
      return translateWithEmbeddedLiteral(left, right, operation);
    }
  }

  return reject("unrecognized", `No translation of '${ctx.symbol}' for ${operation.id}`);
}

function translateWithEmbeddedLiteral(left: ExprNode, right: ExprNode, operation: OperationSpec): TranslationResult {
  const expected = evaluateOperand(right);
  if (!expected.ok) return expected;

  const inner = translateTree(left, operation, false);
  if (!inner.ok) return inner;
  if (inner.record.embeddedExpected) {
    return reject("unrecognized", "Nested comparisons are not translated");
  }

  const value = expected.value;
  let text: string;
  if (value.kind === "boolean") {
    text = String(value.value);
  } else if (isNumeric(value)) {
    const integer = integralValue(value);
    text = value.kind === "decimal" ? value.text : integer !== undefined ? integer.toString() : String(value.value);
  } else {
    return reject("operand-kind", `Comparison literal ${describeValue(value)} is not numeric or boolean`);
  }

  return {
    ok: true,
    record: { ...inner.record, embeddedExpected: { value: text, origin: "operand" } },
  };
}

/**
 * Literal, signed literal, constructor over a literal, or `true()`/`false()`
 */
export function isLiteralOperand(node: ExprNode): boolean {
  switch (node.kind) {
    case "literal":
      return node.symbol !== "(string)";
    case "operator":
      return node.children.length === 1 && isLiteralOperand(node.children[0]);
    case "function":
      return (node.symbol === "true" || node.symbol === "false") && node.children.length === 0;
    case "qualifier": {
      const [prefix, call] = node.children;
      if (call.kind !== "function") return false;
      if (prefix.symbol === "fn") {
        return (call.symbol === "true" || call.symbol === "false") && call.children.length === 0;
      }
      return (
        prefix.symbol === "xs" &&
        call.children.length === 1 &&
        (call.children[0].kind === "literal" || isLiteralOperand(call.children[0]))
      );
    }
    default:
      return false;
  }
}
