/**
 * Tokenizer for the XPath 2.0 subset used by conformance test expressions
 */

import { ExpressionSyntaxError } from "../errors";

export type TokenType =
  | "integer"
  | "decimal"
  | "double"
  | "string"
  | "name"
  | "variable"
  | "symbol"
  | "eof";

export interface Token {
  type: TokenType;
  text: string;
  position: number;
}

const SYMBOLS = ["!=", "<=", ">=", "<<", ">>", "(", ")", ",", "+", "-", "*", "=", "<", ">", ":", "?"];

function isNameStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isNameChar(ch: string): boolean {
  return /[A-Za-z0-9_.\-]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];

    if (/\s/.test(ch)) {
      pos += 1;
      continue;
    }

    // (: comments :) nest
    if (source.startsWith("(:", pos)) {
      let depth = 1;
      let cursor = pos + 2;
      while (cursor < source.length && depth > 0) {
        if (source.startsWith("(:", cursor)) {
          depth += 1;
          cursor += 2;
        } else if (source.startsWith(":)", cursor)) {
          depth -= 1;
          cursor += 2;
        } else {
          cursor += 1;
        }
      }
      if (depth > 0) {
        throw new ExpressionSyntaxError("Unterminated comment", pos);
      }
      pos = cursor;
      continue;
    }

    if (isDigit(ch) || (ch === "." && isDigit(source[pos + 1] ?? ""))) {
      tokens.push(readNumber(source, pos));
      pos += tokens[tokens.length - 1].text.length;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const { token, end } = readString(source, pos);
      tokens.push(token);
      pos = end;
      continue;
    }

    if (ch === "$") {
      let cursor = pos + 1;
      while (cursor < source.length && (isNameChar(source[cursor]) || source[cursor] === ":")) {
        cursor += 1;
      }
      if (cursor === pos + 1) {
        throw new ExpressionSyntaxError("Expected variable name", pos);
      }
      tokens.push({ type: "variable", text: source.slice(pos + 1, cursor), position: pos });
      pos = cursor;
      continue;
    }

    if (isNameStart(ch)) {
      let cursor = pos + 1;
      while (cursor < source.length && isNameChar(source[cursor])) {
        cursor += 1;
      }
      // names never end in '-' or '.'
      while (cursor > pos + 1 && (source[cursor - 1] === "-" || source[cursor - 1] === ".")) {
        cursor -= 1;
      }
      tokens.push({ type: "name", text: source.slice(pos, cursor), position: pos });
      pos = cursor;
      continue;
    }

    const symbol = SYMBOLS.find((candidate) => source.startsWith(candidate, pos));
    if (symbol) {
      tokens.push({ type: "symbol", text: symbol, position: pos });
      pos += symbol.length;
      continue;
    }

    throw new ExpressionSyntaxError(`Unexpected character '${ch}'`, pos);
  }

  tokens.push({ type: "eof", text: "", position: source.length });
  return tokens;
}

function readNumber(source: string, start: number): Token {
  const match = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/.exec(source.slice(start));
  if (!match) {
    throw new ExpressionSyntaxError("Malformed numeric literal", start);
  }
  const text = match[0];
  const next = source[start + text.length] ?? "";
  if (isNameStart(next)) {
    throw new ExpressionSyntaxError(`Malformed numeric literal '${text}${next}'`, start);
  }

  let type: TokenType = "integer";
  if (match[3]) {
    type = "double";
  } else if (text.includes(".")) {
    type = "decimal";
  }
  return { type, text, position: start };
}

function readString(source: string, start: number): { token: Token; end: number } {
  const quote = source[start];
  let cursor = start + 1;
  let value = "";

  while (cursor < source.length) {
    const ch = source[cursor];
    if (ch === quote) {
      if (source[cursor + 1] === quote) {
        value += quote;
        cursor += 2;
        continue;
      }
      return {
        token: { type: "string", text: value, position: start },
        end: cursor + 1,
      };
    }
    value += ch;
    cursor += 1;
  }

  throw new ExpressionSyntaxError("Unterminated string literal", start);
}
