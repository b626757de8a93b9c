import { describe, it, expect } from "@jest/globals";
import { allOperations, buildCatalog, getOperation, listOperations } from "../src";

describe("operation catalog", () => {
  it("should describe each operation", () => {
    expect(getOperation("op:numeric-add")).toEqual({
      id: "op:numeric-add",
      sourceFile: "op/numeric-add.xml",
      primitive: "numeric_add_int",
      variant: "integer",
      cast: undefined,
      returns: "integer",
    });
  });

  it("should carry cast signatures", () => {
    expect(getOperation("xs:integer-from-float")?.cast).toEqual({ from: "float", to: "integer" });
    expect(getOperation("xs:integer-from-float")?.returns).toBe("optionalInteger");
  });

  it("should share corpus files between variants", () => {
    expect(getOperation("fn:round-double")?.sourceFile).toBe("fn/round.xml");
    expect(getOperation("fn:round")?.sourceFile).toBe("fn/round.xml");
  });

  it("should return undefined for unknown ids", () => {
    expect(getOperation("fn:string-length")).toBeUndefined();
  });

  it("should list every id in sorted order", () => {
    const ids = listOperations();

    expect(ids).toHaveLength(66);
    expect(ids.slice(0, 3)).toEqual(["fn:abs", "fn:ceiling", "fn:ceiling-double"]);
    expect(ids[ids.length - 1]).toBe("xs:integer-from-float");
  });

  it("should freeze entries", () => {
    const operations = allOperations();

    expect(operations).toHaveLength(66);
    expect(operations.every((operation) => Object.isFrozen(operation))).toBe(true);
  });

  describe("buildCatalog", () => {
    const entry = {
      id: "fn:abs",
      sourceFile: "fn/abs.xml",
      primitive: "abs_int",
      variant: "integer",
      returns: "integer",
    };

    it("should reject duplicate ids", () => {
      expect(() => buildCatalog({ operations: [entry, entry] })).toThrow("Duplicate operation id fn:abs");
    });

    it("should reject casts that also declare a variant", () => {
      expect(() => buildCatalog({ operations: [{ ...entry, cast: { from: "integer", to: "float" } }] })).toThrow(
        "cast operations carry no numeric variant"
      );
    });

    it("should reject malformed entries", () => {
      expect(() => buildCatalog({ operations: [{ ...entry, returns: "string" }] })).toThrow();
    });
  });
});
