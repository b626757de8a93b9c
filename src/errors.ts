/**
 * Error types raised by the expression layer and the tooling
 */

export class ExpressionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(`${message} at offset ${position}`);
    this.name = "ExpressionSyntaxError";
  }
}

/**
 * Raised when a sub-expression cannot be reduced to a value. The code follows
 * the XPath error namespace where one applies (FOAR0001, FORG0001, ...).
 */
export class EvaluationError extends Error {
  constructor(
    message: string,
    public readonly code: string = "XPST0017"
  ) {
    super(message);
    this.name = "EvaluationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
