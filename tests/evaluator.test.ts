import { describe, it, expect } from "@jest/globals";
import { castTo, effectiveBooleanValue, evaluate } from "../src/expression/evaluator";
import { parseExpression } from "../src/expression/parser";
import { EvaluationError } from "../src/errors";
import { XPathValue } from "../src/expression/values";

function run(source: string): XPathValue {
  return evaluate(parseExpression(source));
}

function errorCode(source: string): string | undefined {
  try {
    run(source);
  } catch (error) {
    if (error instanceof EvaluationError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

describe("evaluate", () => {
  describe("integer arithmetic", () => {
    it("should stay exact", () => {
      expect(run("xs:integer('12') + 1")).toEqual({ kind: "integer", value: 13n });
      expect(run("9223372036854775807 + 1")).toEqual({ kind: "integer", value: 9223372036854775808n });
    });

    it("should truncate integer division toward zero", () => {
      expect(run("7 idiv 2")).toEqual({ kind: "integer", value: 3n });
      expect(run("-7 idiv 2")).toEqual({ kind: "integer", value: -3n });
      expect(run("-7 mod 2")).toEqual({ kind: "integer", value: -1n });
    });

    it("should produce a decimal from div", () => {
      expect(run("1 div 4")).toEqual({ kind: "decimal", value: 0.25, text: "0.25" });
    });

    it("should raise FOAR0001 on integer division by zero", () => {
      expect(errorCode("1 div 0")).toBe("FOAR0001");
      expect(errorCode("1 idiv 0")).toBe("FOAR0001");
      expect(errorCode("1 mod 0")).toBe("FOAR0001");
    });
  });

  describe("numeric promotion", () => {
    it("should promote integer and decimal to decimal", () => {
      expect(run("1.5 + 1")).toEqual({ kind: "decimal", value: 2.5, text: "2.5" });
    });

    it("should round float results to binary32", () => {
      expect(run("xs:float(0.1)")).toEqual({ kind: "float", value: 0.10000000149011612 });
    });

    it("should follow IEEE rules for double division by zero", () => {
      expect(run("xs:double(1) div 0")).toEqual({ kind: "double", value: Infinity });
    });
  });

  describe("constructors and casts", () => {
    it("should keep the lexical form of decimals", () => {
      expect(run("xs:decimal('1.50')")).toEqual({ kind: "decimal", value: 1.5, text: "1.50" });
    });

    it("should range-check integer subtypes", () => {
      expect(run("xs:int('2147483647')")).toEqual({ kind: "integer", value: 2147483647n });
      expect(() => run("xs:int('2147483648')")).toThrow("2147483648 is out of range for xs:int");
    });

    it("should evaluate castable without raising", () => {
      expect(run("'12' castable as xs:integer")).toEqual({ kind: "boolean", value: true });
      expect(run("'abc' castable as xs:integer")).toEqual({ kind: "boolean", value: false });
      expect(run("xs:dayTimeDuration('PT1H') castable as xs:integer")).toEqual({ kind: "boolean", value: false });
    });

    it("should cast strings to booleans", () => {
      expect(castTo({ kind: "string", value: "1" }, "boolean")).toEqual({ kind: "boolean", value: true });
      expect(() => castTo({ kind: "string", value: "yes" }, "boolean")).toThrow('Invalid xs:boolean literal "yes"');
    });

    it("should reject unknown targets", () => {
      expect(errorCode("xs:gYear('2001')")).toBe("XPST0051");
    });
  });

  describe("functions", () => {
    it("should round half up", () => {
      expect(run("fn:round(2.5)")).toEqual({ kind: "decimal", value: 3, text: "3" });
      expect(run("round(-2.5)")).toEqual({ kind: "decimal", value: -2, text: "-2" });
    });

    it("should keep integers through abs", () => {
      expect(run("fn:abs(-5)")).toEqual({ kind: "integer", value: 5n });
    });

    it("should negate the effective boolean value", () => {
      expect(run("fn:not(0)")).toEqual({ kind: "boolean", value: true });
      expect(run("not('a')")).toEqual({ kind: "boolean", value: false });
    });

    it("should reject unsupported functions", () => {
      expect(() => run("fn:string-length('a')")).toThrow("Unsupported function fn:string-length");
    });
  });

  describe("comparisons", () => {
    it("should combine comparisons with and/or", () => {
      expect(run("1 lt 2 and 3 gt 4")).toEqual({ kind: "boolean", value: false });
      expect(run("1 lt 2 or 3 gt 4")).toEqual({ kind: "boolean", value: true });
    });

    it("should treat NaN as unequal to everything", () => {
      expect(run("xs:double('NaN') eq xs:double('NaN')")).toEqual({ kind: "boolean", value: false });
      expect(run("xs:double('NaN') ne xs:double('NaN')")).toEqual({ kind: "boolean", value: true });
    });

    it("should compare dateTimes as instants", () => {
      expect(run("xs:dateTime('2002-03-07T10:00:00+01:00') eq xs:dateTime('2002-03-07T09:00:00Z')")).toEqual({
        kind: "boolean",
        value: true,
      });
    });

    it("should refuse mixed kinds", () => {
      expect(errorCode("1 eq 'a'")).toBe("XPTY0004");
    });
  });

  describe("temporal arithmetic", () => {
    it("should subtract dateTimes into a duration", () => {
      expect(run("xs:dateTime('2002-03-07T10:00:00Z') - xs:dateTime('2002-03-07T09:00:00Z')")).toEqual({
        kind: "dayTimeDuration",
        micros: 3600000000n,
      });
    });

    it("should add durations", () => {
      expect(run("xs:dayTimeDuration('PT1H') + xs:dayTimeDuration('PT30M')")).toEqual({
        kind: "dayTimeDuration",
        micros: 5400000000n,
      });
    });
  });

  describe("unsupported constructs", () => {
    it("should report unbound variables", () => {
      expect(() => run("$x")).toThrow("Variable $x is not bound");
      expect(errorCode("$x")).toBe("XPST0008");
    });

    it("should reject multi-item sequences", () => {
      expect(errorCode("(1, 2)")).toBe("XPTY0004");
    });

    it("should reject range expressions", () => {
      expect(() => run("1 to 3")).toThrow('Operator "to" is not supported');
    });
  });
});

describe("effectiveBooleanValue", () => {
  it("should follow the XPath rules for atomic values", () => {
    expect(effectiveBooleanValue({ kind: "string", value: "" })).toBe(false);
    expect(effectiveBooleanValue({ kind: "integer", value: 2n })).toBe(true);
    expect(effectiveBooleanValue({ kind: "double", value: NaN })).toBe(false);
  });

  it("should raise FORG0006 for durations", () => {
    expect(() => effectiveBooleanValue({ kind: "dayTimeDuration", micros: 1n })).toThrow(EvaluationError);
  });
});
