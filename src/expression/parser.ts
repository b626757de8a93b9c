/**
 * Recursive-descent parser for the XPath 2.0 expression subset
 * Produces the token tree described in ./ast
 */

import { ExpressionSyntaxError } from "../errors";
import {
  CastNode,
  ExprNode,
  FunctionNode,
  NameNode,
  OperatorNode,
  OperatorSymbol,
  QualifierNode,
} from "./ast";
import { Token, tokenize } from "./lexer";

const GENERAL_COMPARISONS = new Set(["=", "!=", "<", "<=", ">", ">="]);
const VALUE_COMPARISONS = new Set(["eq", "ne", "lt", "le", "gt", "ge"]);
const MULTIPLICATIVE = new Set(["div", "idiv", "mod"]);

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExprNode {
    const expr = this.parseExpr();
    const next = this.peek();
    if (next.type !== "eof") {
      throw new ExpressionSyntaxError(`Unexpected token '${next.text}'`, next.position);
    }
    return expr;
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    this.index += 1;
    return token;
  }

  private isSymbol(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === "symbol" && token.text === text;
  }

  private isKeyword(text: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === "name" && token.text === text;
  }

  private expectSymbol(text: string): Token {
    const token = this.advance();
    if (token.type !== "symbol" || token.text !== text) {
      throw new ExpressionSyntaxError(`Expected '${text}' but found '${token.text}'`, token.position);
    }
    return token;
  }

  private expectKeyword(text: string): void {
    const token = this.advance();
    if (token.type !== "name" || token.text !== text) {
      throw new ExpressionSyntaxError(`Expected '${text}' but found '${token.text}'`, token.position);
    }
  }

  private parseExpr(): ExprNode {
    const first = this.parseOr();
    if (!this.isSymbol(",")) {
      return first;
    }
    const items: ExprNode[] = [first];
    while (this.isSymbol(",")) {
      this.advance();
      items.push(this.parseOr());
    }
    return { kind: "sequence", symbol: ",", children: items };
  }

  private parseOr(): ExprNode {
    let left = this.parseAnd();
    while (this.isKeyword("or")) {
      this.advance();
      left = binary("or", left, this.parseAnd());
    }
    return left;
  }

  private parseAnd(): ExprNode {
    let left = this.parseComparison();
    while (this.isKeyword("and")) {
      this.advance();
      left = binary("and", left, this.parseComparison());
    }
    return left;
  }

  private parseComparison(): ExprNode {
    const left = this.parseRange();
    const token = this.peek();
    const isGeneral = token.type === "symbol" && GENERAL_COMPARISONS.has(token.text);
    const isValue = token.type === "name" && VALUE_COMPARISONS.has(token.text);
    if (!isGeneral && !isValue) {
      return left;
    }
    this.advance();
    return binary(asOperator(token), left, this.parseRange());
  }

  private parseRange(): ExprNode {
    const left = this.parseAdditive();
    if (!this.isKeyword("to")) {
      return left;
    }
    this.advance();
    return binary("to", left, this.parseAdditive());
  }

  private parseAdditive(): ExprNode {
    let left = this.parseMultiplicative();
    while (this.isSymbol("+") || this.isSymbol("-")) {
      const op = this.advance();
      left = binary(asOperator(op), left, this.parseMultiplicative());
    }
    return left;
  }

  private parseMultiplicative(): ExprNode {
    let left = this.parseCastable();
    for (;;) {
      const token = this.peek();
      const isStar = token.type === "symbol" && token.text === "*";
      const isWord = token.type === "name" && MULTIPLICATIVE.has(token.text);
      if (!isStar && !isWord) {
        return left;
      }
      this.advance();
      left = binary(asOperator(token), left, this.parseCastable());
    }
  }

  private parseCastable(): ExprNode {
    const operand = this.parseCast();
    if (!(this.isKeyword("castable") && this.isKeyword("as", 1))) {
      return operand;
    }
    this.advance();
    this.advance();
    return this.castNode("castable", operand);
  }

  private parseCast(): ExprNode {
    const operand = this.parseUnary();
    if (!(this.isKeyword("cast") && this.isKeyword("as", 1))) {
      return operand;
    }
    this.advance();
    this.advance();
    return this.castNode("cast", operand);
  }

  private castNode(symbol: CastNode["symbol"], operand: ExprNode): CastNode {
    const typeName = this.parseName();
    if (typeName.kind !== "qualifier") {
      throw new ExpressionSyntaxError("Cast target must be a prefixed type name", this.peek().position);
    }
    // optional occurrence indicator
    if (this.isSymbol("?")) {
      this.advance();
    }
    return { kind: "cast", symbol, children: [operand, typeName] };
  }

  private parseUnary(): ExprNode {
    if (this.isSymbol("-") || this.isSymbol("+")) {
      const op = this.advance();
      const operand = this.parseUnary();
      const node: OperatorNode = { kind: "operator", symbol: asOperator(op), children: [operand] };
      return node;
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ExprNode {
    const token = this.peek();

    switch (token.type) {
      case "integer":
        this.advance();
        return { kind: "literal", symbol: "(integer)", text: token.text, children: [] };
      case "decimal":
        this.advance();
        return { kind: "literal", symbol: "(decimal)", text: token.text, children: [] };
      case "double":
        this.advance();
        return { kind: "literal", symbol: "(double)", text: token.text, children: [] };
      case "string":
        this.advance();
        return { kind: "literal", symbol: "(string)", text: token.text, children: [] };
      case "variable":
        this.advance();
        return { kind: "variable", symbol: "$", name: token.text, children: [] };
      case "name":
        return this.parseCallOrName();
      case "symbol":
        if (token.text === "(") {
          this.advance();
          if (this.isSymbol(")")) {
            this.advance();
            return { kind: "sequence", symbol: ",", children: [] };
          }
          const inner = this.parseExpr();
          this.expectSymbol(")");
          return inner;
        }
        break;
      default:
        break;
    }

    throw new ExpressionSyntaxError(`Unexpected token '${token.text || "end of input"}'`, token.position);
  }

  private parseCallOrName(): ExprNode {
    const start = this.peek();
    const name = this.parseName();
    if (!this.isSymbol("(")) {
      throw new ExpressionSyntaxError("Path expressions are not supported", start.position);
    }
    this.advance();
    const args: ExprNode[] = [];
    if (!this.isSymbol(")")) {
      args.push(this.parseOr());
      while (this.isSymbol(",")) {
        this.advance();
        args.push(this.parseOr());
      }
    }
    this.expectSymbol(")");

    if (name.kind === "qualifier") {
      const call: FunctionNode = { kind: "function", symbol: name.children[1].symbol, children: args };
      return { kind: "qualifier", symbol: ":", children: [name.children[0], call] };
    }
    return { kind: "function", symbol: name.symbol, children: args };
  }

  /**
   * NCName or prefix:local with no whitespace around the colon
   */
  private parseName(): NameNode | QualifierNode {
    const first = this.advance();
    if (first.type !== "name") {
      throw new ExpressionSyntaxError(`Expected a name but found '${first.text}'`, first.position);
    }
    const prefix: NameNode = { kind: "name", symbol: first.text, children: [] };

    const colon = this.peek();
    const local = this.peek(1);
    const adjacent =
      colon.type === "symbol" &&
      colon.text === ":" &&
      colon.position === first.position + first.text.length &&
      local.type === "name" &&
      local.position === colon.position + 1;
    if (!adjacent) {
      return prefix;
    }
    this.advance();
    this.advance();
    return {
      kind: "qualifier",
      symbol: ":",
      children: [prefix, { kind: "name", symbol: local.text, children: [] }],
    };
  }
}

function binary(symbol: OperatorSymbol, left: ExprNode, right: ExprNode): OperatorNode {
  return { kind: "operator", symbol, children: [left, right] };
}

function asOperator(token: Token): OperatorSymbol {
  switch (token.text) {
    case "+":
    case "-":
    case "*":
    case "div":
    case "idiv":
    case "mod":
    case "eq":
    case "ne":
    case "lt":
    case "le":
    case "gt":
    case "ge":
    case "=":
    case "!=":
    case "<":
    case "<=":
    case ">":
    case ">=":
    case "and":
    case "or":
    case "to":
      return token.text;
    default:
      throw new ExpressionSyntaxError(`Unknown operator '${token.text}'`, token.position);
  }
}

export function parseExpression(source: string): ExprNode {
  return new Parser(tokenize(source)).parse();
}
