/**
 * Token tree produced by the expression parser.
 *
 * Every node carries a `symbol` and ordered `children`. Namespace-qualified
 * names are wrapped in a ":" qualifier node whose second child holds the local
 * name (and, for function calls, the arguments), so `fn:abs(1)` and `abs(1)`
 * resolve to the same effective symbol through {@link effectiveSymbol}.
 */

export type LiteralSymbol = "(integer)" | "(decimal)" | "(double)" | "(string)";

export interface LiteralNode {
  kind: "literal";
  symbol: LiteralSymbol;
  text: string;
  children: [];
}

/** Bare name: a namespace prefix or a type name inside a qualifier */
export interface NameNode {
  kind: "name";
  symbol: string;
  children: [];
}

export interface FunctionNode {
  kind: "function";
  symbol: string;
  children: ExprNode[];
}

export interface QualifierNode {
  kind: "qualifier";
  symbol: ":";
  children: [NameNode, FunctionNode | NameNode];
}

export type OperatorSymbol =
  | "+"
  | "-"
  | "*"
  | "div"
  | "idiv"
  | "mod"
  | "eq"
  | "ne"
  | "lt"
  | "le"
  | "gt"
  | "ge"
  | "="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "and"
  | "or"
  | "to";

export interface OperatorNode {
  kind: "operator";
  symbol: OperatorSymbol;
  children: ExprNode[];
}

export interface CastNode {
  kind: "cast";
  symbol: "cast" | "castable";
  children: [ExprNode, QualifierNode];
}

export interface VariableNode {
  kind: "variable";
  symbol: "$";
  name: string;
  children: [];
}

export interface SequenceNode {
  kind: "sequence";
  symbol: ",";
  children: ExprNode[];
}

export type ExprNode =
  | LiteralNode
  | NameNode
  | FunctionNode
  | QualifierNode
  | OperatorNode
  | CastNode
  | VariableNode
  | SequenceNode;

export const COMPARISON_SYMBOLS: ReadonlySet<string> = new Set([
  "eq",
  "ne",
  "lt",
  "le",
  "gt",
  "ge",
  "=",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
]);

/**
 * Effective operator or function symbol, looking through a qualifier wrapper
 */
export function effectiveSymbol(node: ExprNode): string {
  if (node.kind === "qualifier") {
    return node.children[1].symbol;
  }
  return node.symbol;
}

/**
 * Namespace prefix of a qualified node, or undefined for an unqualified one
 */
export function namespacePrefix(node: ExprNode): string | undefined {
  return node.kind === "qualifier" ? node.children[0].symbol : undefined;
}

/**
 * Arguments of a function call, looking through a qualifier wrapper
 */
export function functionArgs(node: ExprNode): ExprNode[] {
  if (node.kind === "qualifier") {
    return node.children[1].children;
  }
  return node.children;
}

/**
 * True for a (possibly qualified) function call node
 */
export function isFunctionCall(node: ExprNode): boolean {
  if (node.kind === "qualifier") {
    return node.children[1].kind === "function";
  }
  return node.kind === "function";
}
