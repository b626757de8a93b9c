/**
 * Shared types for test translation
 */

export type ResultKind = "equals" | "true" | "false" | "error" | "unsupported";

/**
 * One conformance test case as read from the corpus
 */
export interface TestCase {
  name: string;
  description: string;
  expression: string;
  /** Expected value text; the error code for `error` results */
  expectedResult: string;
  resultKind: ResultKind;
  /** `type:value` pairs, test-set dependencies first */
  dependencies: string[];
}

export type NumericVariant = "integer" | "float" | "double";

export type ReturnCategory =
  | "boolean"
  | "integer"
  | "unsignedInteger"
  | "float"
  | "double"
  | "optionalInteger"
  | "datetime"
  | "duration";

export interface CastSignature {
  from: NumericVariant;
  to: NumericVariant;
}

export interface OperationSpec {
  /** Namespace-qualified operation id, e.g. `op:numeric-add` */
  id: string;
  /** Corpus file, relative to the corpus root */
  sourceFile: string;
  /** Noir function the generated tests call */
  primitive: string;
  variant: NumericVariant | null;
  cast?: CastSignature;
  returns: ReturnCategory;
}

export type RejectionCode =
  | "unknown-operation"
  | "variant-mismatch"
  | "parse-error"
  | "unrecognized"
  | "evaluation-error"
  | "operand-kind"
  | "out-of-range"
  | "pre-epoch"
  | "unsupported-dependency"
  | "unsupported-result"
  | "category-mismatch"
  | "unsigned-negative"
  | "unparsable-expected"
  | "negated-comparison";

export interface Rejection {
  code: RejectionCode;
  reason: string;
}

export interface EmbeddedExpected {
  value: string;
  /**
   * `evaluation`: truth value of the whole comparison expression.
   * `operand`: literal right operand of `<call> eq <literal>`.
   */
  origin: "evaluation" | "operand";
}

export interface TranslationRecord {
  setup: string[];
  call: string;
  embeddedExpected?: EmbeddedExpected;
}

export type TranslationResult = { ok: true; record: TranslationRecord } | { ok: false; rejection: Rejection };

export interface GeneratedTest {
  identifier: string;
  description: string;
  setup: string[];
  assertion: string[];
}

export interface SkipRecord {
  testName: string;
  operationId: string;
  code: RejectionCode;
  reason: string;
  expression: string;
  expected: string;
}

export type GenerationOutcome = { ok: true; test: GeneratedTest } | { ok: false; skip: SkipRecord };
