/**
 * xpath-conformance-gen: translation core
 * Exports the operation catalog, the translator and the assertion synthesizer
 */

export * from "./types";
export { ConfigError, EvaluationError, ExpressionSyntaxError } from "./errors";

export { allOperations, buildCatalog, getOperation, listOperations } from "./operations";
export { translate, translateTree, isLiteralOperand } from "./translate";

export {
  UNSUPPORTED_DEPENDENCIES,
  equalityAssertion,
  findUnsupportedDependency,
  generateTest,
  renderSkipComment,
  renderTestFunction,
  sanitizeTestName,
  synthesizeAssertion,
  truncateDescription,
} from "./assertions";

export {
  EncodedLiteral,
  EpochDateTime,
  I64_MAX,
  I64_MIN,
  bitsToDouble,
  bitsToFloat,
  dateTimeFromEpoch,
  detectOperandType,
  doubleToBits,
  encodeDateTime,
  fitsInI64,
  fitsInI8,
  floatToBits,
  parseBoolean,
  parseDateTime,
  parseDuration,
  parseFloatLiteral,
  parseInteger,
} from "./literals";

export { parseExpression } from "./expression/parser";
export { evaluate } from "./expression/evaluator";
export { ExprNode } from "./expression/ast";
export { XPathValue } from "./expression/values";
