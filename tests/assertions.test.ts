/**
 * Test suite for assertion synthesis and Noir rendering
 */

import { describe, it, expect } from "@jest/globals";
import {
  equalityAssertion,
  findUnsupportedDependency,
  generateTest,
  renderSkipComment,
  renderTestFunction,
  sanitizeTestName,
  synthesizeAssertion,
  truncateDescription,
} from "../src/assertions";
import { getOperation } from "../src/operations";
import { OperationSpec, TestCase } from "../src/types";

function operation(id: string): OperationSpec {
  const spec = getOperation(id);
  if (!spec) {
    throw new Error(`Missing operation ${id}`);
  }
  return spec;
}

function testCase(overrides: Partial<TestCase> = {}): TestCase {
  return {
    name: "op-numeric-add-1",
    description: "Simple addition",
    expression: "5 + 3",
    expectedResult: "8",
    resultKind: "equals",
    dependencies: [],
    ...overrides,
  };
}

describe("sanitizeTestName", () => {
  it("should lowercase and replace separators", () => {
    expect(sanitizeTestName("K-NumericAdd-1")).toBe("k_numericadd_1");
    expect(sanitizeTestName("cbcl.numeric-add.002")).toBe("cbcl_numeric_add_002");
  });

  it("should prefix names that start with a digit", () => {
    expect(sanitizeTestName("1-test")).toBe("test_1_test");
  });

  it("should name empty identifiers", () => {
    expect(sanitizeTestName("@@")).toBe("test_unnamed");
  });
});

describe("truncateDescription", () => {
  it("should flatten newlines and double quotes", () => {
    expect(truncateDescription('Adds "two"\nintegers')).toBe("Adds 'two' integers");
  });

  it("should cut long text back to a word boundary", () => {
    const text = "Evaluation of the numeric addition operator with two operands that overflow the range";

    expect(truncateDescription(text)).toBe("Evaluation of the numeric addition operator with two operands that overflow the");
  });

  it("should keep a hard cut when the last space is too early", () => {
    const text = `short ${"x".repeat(90)}`;

    expect(truncateDescription(text)).toBe(`short ${"x".repeat(74)}`);
  });
});

describe("findUnsupportedDependency", () => {
  it("should find schema and static typing markers", () => {
    expect(findUnsupportedDependency(["spec:XP20+", "feature:schemaValidation"])).toBe("feature:schemaValidation");
    expect(findUnsupportedDependency(["spec:XP20+"])).toBeUndefined();
  });
});

describe("equalityAssertion", () => {
  it("should assert integers directly", () => {
    expect(equalityAssertion("f()", "8", operation("op:numeric-add"))).toEqual({ ok: true, value: ["assert(f() == 8);"] });
  });

  it("should accept decimals with a zero fraction for integer results", () => {
    expect(equalityAssertion("f()", "8.00", operation("op:numeric-add"))).toEqual({
      ok: true,
      value: ["assert(f() == 8);"],
    });
  });

  it("should tell a wrong category from unparsable text", () => {
    expect(equalityAssertion("f()", "8.5", operation("op:numeric-add"))).toEqual({
      ok: false,
      rejection: { code: "category-mismatch", reason: "Expected value 8.5 does not fit numeric_add_int (integer)" },
    });
    expect(equalityAssertion("f()", "abc", operation("op:numeric-add"))).toEqual({
      ok: false,
      rejection: { code: "unparsable-expected", reason: "Cannot parse expected value abc" },
    });
  });

  it("should refuse negative values for unsigned results", () => {
    expect(equalityAssertion("f()", "-1", operation("fn:month-from-dateTime"))).toEqual({
      ok: false,
      rejection: { code: "unsigned-negative", reason: "Negative expected value -1 for unsigned month_from_datetime" },
    });
  });

  it("should compare float results by bit pattern", () => {
    expect(equalityAssertion("f()", "xs:float(4)", operation("op:numeric-add-float"))).toEqual({
      ok: true,
      value: ["assert(f().to_bits() == 1082130432);"],
    });
    expect(equalityAssertion("f()", "xs:float('INF')", operation("op:numeric-add-float"))).toEqual({
      ok: true,
      value: ["assert(f().to_bits() == 2139095040);"],
    });
  });

  it("should compare double results by bit pattern", () => {
    expect(equalityAssertion("f()", "2.5", operation("op:numeric-add-double"))).toEqual({
      ok: true,
      value: ["assert(f().to_bits() == 4612811918334230528);"],
    });
  });

  it("should compare zeros through the zero constant", () => {
    expect(equalityAssertion("f()", "0", operation("op:numeric-add-float"))).toEqual({
      ok: true,
      value: ["assert(f() == XsdFloat::zero());"],
    });
    expect(equalityAssertion("f()", "-0.0", operation("op:numeric-add-double"))).toEqual({
      ok: true,
      value: ["assert(f() == XsdDouble::zero());"],
    });
  });

  it("should reject float expectations beyond binary32", () => {
    expect(equalityAssertion("f()", "1e39", operation("op:numeric-add-float"))).toEqual({
      ok: false,
      rejection: { code: "out-of-range", reason: "Expected value 1e+39 overflows a 32-bit float" },
    });
  });

  it("should unwrap optional integers", () => {
    expect(equalityAssertion("f(d)", "3", operation("xs:integer-from-double"))).toEqual({
      ok: true,
      value: ["assert(f(d).is_some());", "assert(f(d).unwrap() == 3);"],
    });
  });

  it("should reject non-finite optional integers", () => {
    const result = equalityAssertion("f(d)", "xs:double('NaN')", operation("xs:integer-from-double"));

    expect(result.ok ? undefined : result.rejection.code).toBe("category-mismatch");
  });

  it("should reject results without a literal form", () => {
    expect(equalityAssertion("f()", "2000-01-01T00:00:00Z", operation("op:add-dayTimeDuration-to-dateTime"))).toEqual({
      ok: false,
      rejection: {
        code: "category-mismatch",
        reason: "datetime_add_duration returns a datetime, which has no literal form",
      },
    });
  });

  it("should assert booleans", () => {
    expect(equalityAssertion("f()", "fn:true()", operation("fn:not"))).toEqual({
      ok: true,
      value: ["assert(f() == true);"],
    });
  });
});

describe("synthesizeAssertion", () => {
  it("should let an evaluated comparison override the declared result", () => {
    const record = { setup: [], call: "datetime_equal(dt1, dt2)", embeddedExpected: { value: "false", origin: "evaluation" as const } };

    expect(synthesizeAssertion(record, testCase({ resultKind: "true" }), operation("op:dateTime-equal"))).toEqual({
      ok: true,
      value: ["assert(datetime_equal(dt1, dt2) == false);"],
    });
  });

  it("should assert against an embedded literal operand", () => {
    const record = { setup: [], call: "abs_int(-5)", embeddedExpected: { value: "5", origin: "operand" as const } };

    expect(synthesizeAssertion(record, testCase({ resultKind: "true" }), operation("fn:abs"))).toEqual({
      ok: true,
      value: ["assert(abs_int(-5) == 5);"],
    });
  });

  it("should skip negated embedded comparisons", () => {
    const record = { setup: [], call: "abs_int(-5)", embeddedExpected: { value: "4", origin: "operand" as const } };

    expect(
      synthesizeAssertion(record, testCase({ expression: "fn:abs(-5) eq 4", resultKind: "false" }), operation("fn:abs"))
    ).toEqual({
      ok: false,
      rejection: { code: "negated-comparison", reason: "Declared result is false for 'fn:abs(-5) eq 4'" },
    });
  });

  it("should need a boolean primitive for assert-true", () => {
    const record = { setup: [], call: "abs_int(-5)" };

    expect(synthesizeAssertion(record, testCase({ resultKind: "true" }), operation("fn:abs"))).toEqual({
      ok: false,
      rejection: {
        code: "category-mismatch",
        reason: "Result assert-true needs a boolean primitive, abs_int returns integer",
      },
    });
  });

  it("should assert declared booleans", () => {
    const record = { setup: [], call: "fn_not(true)" };

    expect(synthesizeAssertion(record, testCase({ resultKind: "false" }), operation("fn:not"))).toEqual({
      ok: true,
      value: ["assert(fn_not(true) == false);"],
    });
  });
});

describe("generateTest", () => {
  it("should build a complete test", () => {
    expect(generateTest(testCase(), "op:numeric-add")).toEqual({
      ok: true,
      test: {
        identifier: "op_numeric_add_1",
        description: "Simple addition",
        setup: [],
        assertion: ["assert(numeric_add_int(5, 3) == 8);"],
      },
    });
  });

  it("should assert a declared true for a boolean primitive", () => {
    const outcome = generateTest(
      testCase({ name: "fn-not-3", expression: "fn:not(true())", resultKind: "true", expectedResult: "true" }),
      "fn:not"
    );

    expect(outcome.ok ? outcome.test.assertion : undefined).toEqual(["assert(fn_not(true) == true);"]);
  });

  it("should assert the evaluated truth of a dateTime comparison", () => {
    const outcome = generateTest(
      testCase({
        name: "op-dateTime-equal-1",
        expression: "xs:dateTime('2002-03-07T10:00:00Z') eq xs:dateTime('2002-03-07T09:00:00Z')",
        resultKind: "true",
        expectedResult: "true",
      }),
      "op:dateTime-equal"
    );

    expect(outcome).toEqual({
      ok: true,
      test: {
        identifier: "op_datetime_equal_1",
        description: "Simple addition",
        setup: [
          "let dt1 = datetime_from_epoch_microseconds_with_tz(1015495200000000, 0);",
          "let dt2 = datetime_from_epoch_microseconds_with_tz(1015491600000000, 0);",
        ],
        assertion: ["assert(datetime_equal(dt1, dt2) == false);"],
      },
    });
  });

  it("should check dependencies before the result kind", () => {
    const outcome = generateTest(
      testCase({ resultKind: "error", expectedResult: "FOAR0001", dependencies: ["feature:schemaValidation"] }),
      "op:numeric-add"
    );

    expect(outcome).toEqual({
      ok: false,
      skip: {
        testName: "op-numeric-add-1",
        operationId: "op:numeric-add",
        code: "unsupported-dependency",
        reason: "Depends on feature:schemaValidation",
        expression: "5 + 3",
        expected: "FOAR0001",
      },
    });
  });

  it("should skip expected errors", () => {
    const outcome = generateTest(testCase({ resultKind: "error", expectedResult: "FOAR0002" }), "op:numeric-add");

    expect(outcome.ok ? undefined : outcome.skip.reason).toBe("Expected error FOAR0002");
  });

  it("should skip unknown operations first", () => {
    const outcome = generateTest(testCase({ dependencies: ["feature:staticTyping"] }), "op:nothing");

    expect(outcome.ok ? undefined : outcome.skip.code).toBe("unknown-operation");
  });

  it("should pass translation rejections through", () => {
    const outcome = generateTest(testCase({ expression: "1.5 + 2" }), "op:numeric-add");

    expect(outcome.ok ? undefined : outcome.skip.code).toBe("variant-mismatch");
  });
});

describe("renderTestFunction", () => {
  it("should render setup and assertions in the body", () => {
    const rendered = renderTestFunction({
      identifier: "fn_year_1",
      description: "Year of a dateTime",
      setup: ["let dt = datetime_from_epoch_microseconds_with_tz(0, 0);"],
      assertion: ["assert(year_from_datetime(dt) == 1970);"],
    });

    expect(rendered).toBe(
      [
        "#[test]",
        "fn fn_year_1() {",
        "    // Year of a dateTime",
        "    let dt = datetime_from_epoch_microseconds_with_tz(0, 0);",
        "    assert(year_from_datetime(dt) == 1970);",
        "}",
      ].join("\n")
    );
  });

  it("should omit an empty description", () => {
    const rendered = renderTestFunction({ identifier: "t", description: "", setup: [], assertion: ["assert(true);"] });

    expect(rendered).toBe("#[test]\nfn t() {\n    assert(true);\n}");
  });
});

describe("renderSkipComment", () => {
  it("should keep the details on single lines", () => {
    expect(
      renderSkipComment({
        testName: "op-numeric-add-7",
        operationId: "op:numeric-add",
        code: "variant-mismatch",
        reason: "Expression looks double,\n op:numeric-add takes integer",
        expression: "1.5\n  + 2",
        expected: "3.5",
      })
    ).toBe(
      [
        "// SKIP: op_numeric_add_7",
        "// Reason: [variant-mismatch] Expression looks double, op:numeric-add takes integer",
        "// Expression: 1.5 + 2",
        "// Expected: 3.5",
      ].join("\n")
    );
  });
});
