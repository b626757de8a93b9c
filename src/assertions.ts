/**
 * Assertion synthesis and Noir test rendering
 */

import {
  FloatWidth,
  doubleToBits,
  fitsInI64,
  floatToBits,
  overflowsFloat32,
  parseBoolean,
  parseFloatLiteral,
  parseInteger,
} from "./literals";
import { getOperation } from "./operations";
import { translate } from "./translate";
import { Outcome, reject } from "./translate/operands";
import {
  GeneratedTest,
  GenerationOutcome,
  OperationSpec,
  RejectionCode,
  SkipRecord,
  TestCase,
  TranslationRecord,
} from "./types";

/** Dependency markers the target has no counterpart for */
export const UNSUPPORTED_DEPENDENCIES = ["schemaValidation", "schemaImport", "staticTyping"] as const;

export function findUnsupportedDependency(dependencies: string[]): string | undefined {
  return dependencies.find((dep) => UNSUPPORTED_DEPENDENCIES.some((marker) => dep.includes(marker)));
}

/**
 * Noir identifier for a corpus test name
 */
export function sanitizeTestName(name: string): string {
  let identifier = name.replace(/[-.]/g, "_").replace(/[^a-zA-Z0-9_]/g, "");
  if (identifier === "") {
    return "test_unnamed";
  }
  if (/^\d/.test(identifier)) {
    identifier = `test_${identifier}`;
  }
  return identifier.toLowerCase();
}

/**
 * Single-line description, at most 80 characters; cut back to the last space
 * when that leaves more than 60
 */
export function truncateDescription(description: string): string {
  let text = description.replace(/\r?\n/g, " ").replace(/"/g, "'");
  if (text.length > 80) {
    text = text.slice(0, 80);
    const lastSpace = text.lastIndexOf(" ");
    if (lastSpace > 60) {
      text = text.slice(0, lastSpace);
    }
  }
  return text;
}

/**
 * Exact integer for integer-returning primitives: a bare or `xs:integer`
 * literal, or a bare decimal with a zero fraction
 */
function parseIntegralExpected(text: string): bigint | undefined {
  const integer = parseInteger(text);
  if (integer !== undefined) {
    return integer;
  }
  const decimal = /^(-?\d+)\.0+$/.exec(text.trim());
  return decimal ? BigInt(decimal[1]) : undefined;
}

function mismatchOrUnparsable(text: string, operation: OperationSpec): Outcome<never> {
  if (parseInteger(text) !== undefined || parseFloatLiteral(text) !== undefined || parseBoolean(text) !== undefined) {
    return reject("category-mismatch", `Expected value ${text} does not fit ${operation.primitive} (${operation.returns})`);
  }
  return reject("unparsable-expected", `Cannot parse expected value ${text}`);
}

function floatAssertion(call: string, value: number, width: FloatWidth): Outcome<string[]> {
  const type = width === "float" ? "XsdFloat" : "XsdDouble";
  // +0 and -0 compare equal through the zero constant
  if (value === 0) {
    return { ok: true, value: [`assert(${call} == ${type}::zero());`] };
  }
  if (width === "float") {
    if (overflowsFloat32(value)) {
      return reject("out-of-range", `Expected value ${value} overflows a 32-bit float`);
    }
    return { ok: true, value: [`assert(${call}.to_bits() == ${floatToBits(value)});`] };
  }
  return { ok: true, value: [`assert(${call}.to_bits() == ${doubleToBits(value)});`] };
}

/**
 * Assertion lines for an `equals` expectation, by the primitive's return
 * category
 */
export function equalityAssertion(call: string, expected: string, operation: OperationSpec): Outcome<string[]> {
  switch (operation.returns) {
    case "boolean": {
      const value = parseBoolean(expected);
      if (value === undefined) return mismatchOrUnparsable(expected, operation);
      return { ok: true, value: [`assert(${call} == ${value});`] };
    }
    case "integer":
    case "unsignedInteger": {
      const value = parseIntegralExpected(expected);
      if (value === undefined) return mismatchOrUnparsable(expected, operation);
      if (operation.returns === "unsignedInteger" && value < 0n) {
        return reject("unsigned-negative", `Negative expected value ${value} for unsigned ${operation.primitive}`);
      }
      if (!fitsInI64(value)) {
        return reject("out-of-range", `Expected value ${value} does not fit in i64`);
      }
      return { ok: true, value: [`assert(${call} == ${value});`] };
    }
    case "float":
    case "double": {
      const decoded = parseFloatLiteral(expected);
      const integer = decoded === undefined ? parseInteger(expected) : undefined;
      if (decoded === undefined && integer === undefined) {
        return mismatchOrUnparsable(expected, operation);
      }
      const value = decoded !== undefined ? decoded.value : Number(integer);
      return floatAssertion(call, value, operation.returns);
    }
    case "optionalInteger": {
      let value = parseInteger(expected);
      if (value === undefined) {
        const decoded = parseFloatLiteral(expected);
        if (decoded === undefined || !Number.isFinite(decoded.value)) {
          return mismatchOrUnparsable(expected, operation);
        }
        value = BigInt(Math.trunc(decoded.value));
      }
      if (!fitsInI64(value)) {
        return reject("out-of-range", `Expected value ${value} does not fit in i64`);
      }
      return { ok: true, value: [`assert(${call}.is_some());`, `assert(${call}.unwrap() == ${value});`] };
    }
    case "datetime":
    case "duration":
      return reject("category-mismatch", `${operation.primitive} returns a ${operation.returns}, which has no literal form`);
  }
}

function declaresFalse(testCase: TestCase): boolean {
  return (
    testCase.resultKind === "false" ||
    (testCase.resultKind === "equals" && parseBoolean(testCase.expectedResult) === false)
  );
}

/**
 * Combine a translation with the declared result. An embedded expectation
 * wins over the declared one.
 */
export function synthesizeAssertion(
  record: TranslationRecord,
  testCase: TestCase,
  operation: OperationSpec
): Outcome<string[]> {
  const { call, embeddedExpected } = record;

  if (embeddedExpected) {
    if (embeddedExpected.origin === "operand") {
      if (declaresFalse(testCase)) {
        return reject("negated-comparison", `Declared result is false for '${testCase.expression}'`);
      }
      return equalityAssertion(call, embeddedExpected.value, operation);
    }
    const truth = parseBoolean(embeddedExpected.value);
    if (truth === undefined) {
      return reject("unparsable-expected", `Cannot parse embedded expected value ${embeddedExpected.value}`);
    }
    return { ok: true, value: [`assert(${call} == ${truth});`] };
  }

  switch (testCase.resultKind) {
    case "true":
    case "false":
      if (operation.returns !== "boolean") {
        return reject(
          "category-mismatch",
          `Result assert-${testCase.resultKind} needs a boolean primitive, ${operation.primitive} returns ${operation.returns}`
        );
      }
      return { ok: true, value: [`assert(${call} == ${testCase.resultKind});`] };
    case "equals":
      return equalityAssertion(call, testCase.expectedResult, operation);
    case "error":
      return reject("unsupported-result", `Expected error ${testCase.expectedResult}`);
    case "unsupported":
      return reject("unsupported-result", "Compound or unsupported result assertion");
  }
}

function skip(testCase: TestCase, operationId: string, code: RejectionCode, reason: string): GenerationOutcome {
  return {
    ok: false,
    skip: {
      testName: testCase.name,
      operationId,
      code,
      reason,
      expression: testCase.expression,
      expected: testCase.expectedResult,
    },
  };
}

/**
 * Translate and assert one test case; never partially built
 */
export function generateTest(testCase: TestCase, operationId: string): GenerationOutcome {
  const operation = getOperation(operationId);
  if (!operation) {
    return skip(testCase, operationId, "unknown-operation", `No operation named ${operationId}`);
  }

  const dependency = findUnsupportedDependency(testCase.dependencies);
  if (dependency !== undefined) {
    return skip(testCase, operationId, "unsupported-dependency", `Depends on ${dependency}`);
  }
  if (testCase.resultKind === "error" || testCase.resultKind === "unsupported") {
    const reason =
      testCase.resultKind === "error"
        ? `Expected error ${testCase.expectedResult}`
        : "Compound or unsupported result assertion";
    return skip(testCase, operationId, "unsupported-result", reason);
  }

  const translation = translate(testCase.expression, operationId);
  if (!translation.ok) {
    return skip(testCase, operationId, translation.rejection.code, translation.rejection.reason);
  }

  const assertion = synthesizeAssertion(translation.record, testCase, operation);
  if (!assertion.ok) {
    return skip(testCase, operationId, assertion.rejection.code, assertion.rejection.reason);
  }

  const test: GeneratedTest = {
    identifier: sanitizeTestName(testCase.name),
    description: truncateDescription(testCase.description),
    setup: translation.record.setup,
    assertion: assertion.value,
  };
  return { ok: true, test };
}

export function renderTestFunction(test: GeneratedTest): string {
  const lines = ["#[test]", `fn ${test.identifier}() {`];
  if (test.description) {
    lines.push(`    // ${test.description}`);
  }
  for (const statement of [...test.setup, ...test.assertion]) {
    lines.push(`    ${statement}`);
  }
  lines.push("}");
  return lines.join("\n");
}

function singleLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Comment block kept for manual triage of a skipped test
 */
export function renderSkipComment(record: SkipRecord): string {
  return [
    `// SKIP: ${sanitizeTestName(record.testName)}`,
    `// Reason: [${record.code}] ${singleLine(record.reason)}`,
    `// Expression: ${singleLine(record.expression)}`,
    `// Expected: ${singleLine(record.expected)}`,
  ].join("\n");
}
