/**
 * Test suite for gate-count benchmarking
 */

import { describe, it, expect, afterEach, beforeEach } from "@jest/globals";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  appendRecord,
  calledFunctions,
  formatComparison,
  formatSummary,
  getGitCommit,
  loadBenchmarkCatalog,
  loadHistory,
  measureBenchmark,
  parseInfoTable,
  renderBenchmarkMain,
  renderBenchmarkManifest,
  runBenchmarks,
} from "../tooling/lib/benchmark";
import { Logger } from "../tooling/lib/logger";
import { CommandOptions, CommandResult, CommandRunner } from "../tooling/lib/process";
import { BenchmarkRecord } from "../tooling/lib/types";

const INFO_OUTPUT = [
  "+---------+----------+----------------------+--------------+-----------------+",
  "| Package | Function | Expression Width     | ACIR Opcodes | Brillig Opcodes |",
  "+---------+----------+----------------------+--------------+-----------------+",
  "| bench   | main     | Bounded { width: 4 } | 12           | 0               |",
  "+---------+----------+----------------------+--------------+-----------------+",
].join("\n");

const ok = (stdout = ""): CommandResult => ({ status: 0, stdout, stderr: "" });

/** Answers git and nargo the way a healthy toolchain would */
class FakeToolchain implements CommandRunner {
  readonly calls: string[] = [];

  constructor(private readonly overrides: Record<string, CommandResult> = {}) {}

  run(command: string, args: string[], _options?: CommandOptions): CommandResult {
    const key = [command, ...args].join(" ");
    this.calls.push(key);
    const override = this.overrides[key];
    if (override) return override;
    if (key === "git rev-parse HEAD") return ok("0123456789abcdef0123\n");
    if (key.endsWith(" info")) return ok(INFO_OUTPUT);
    return ok();
  }
}

function record(timestamp: string, commit: string, benchmarks: BenchmarkRecord["benchmarks"]): BenchmarkRecord {
  return { timestamp, git_commit: commit, benchmarks };
}

describe("benchmark catalog", () => {
  it("should load the bundled benchmarks", () => {
    const catalog = loadBenchmarkCatalog();

    expect(catalog.size).toBe(16);
    expect(catalog.get("abs_int")).toEqual({ inputs: "a: pub i64", body: "abs_int(a)", returnType: "pub i64" });
  });

  it("should reject entries without a body", () => {
    expect(() => loadBenchmarkCatalog({ benchmarks: { broken: { inputs: "", body: "", returnType: "pub u8" } } })).toThrow();
  });
});

describe("program rendering", () => {
  it("should list called functions once, in order", () => {
    const body = [
      "let a = datetime_from_epoch_microseconds(a_micros);",
      "let b = datetime_from_epoch_microseconds(b_micros);",
      "datetime_equal(a, b)",
    ].join("\n");

    expect(calledFunctions(body)).toEqual(["datetime_from_epoch_microseconds", "datetime_equal"]);
  });

  it("should render a bin manifest", () => {
    expect(renderBenchmarkManifest("abs_int", "xpath", "/opt/xpath")).toBe(
      '[package]\nname = "abs_int"\ntype = "bin"\nauthors = ["benchmark"]\n\n[dependencies]\nxpath = { path = "/opt/xpath" }\n'
    );
  });

  it("should render main with the imports it needs", () => {
    const main = renderBenchmarkMain(
      { inputs: "micros: pub Field", body: "let dt = datetime_from_epoch_microseconds(micros);\nyear_from_datetime(dt)", returnType: "pub i32" },
      "xpath"
    );

    expect(main).toBe(
      [
        "use xpath::{",
        "    datetime_from_epoch_microseconds,",
        "    year_from_datetime,",
        "};",
        "",
        "fn main(micros: pub Field) -> pub i32 {",
        "    let dt = datetime_from_epoch_microseconds(micros);",
        "    year_from_datetime(dt)",
        "}",
        "",
      ].join("\n")
    );
  });
});

describe("parseInfoTable", () => {
  it("should read ACIR and Brillig counts of main", () => {
    expect(parseInfoTable(INFO_OUTPUT)).toEqual({ acir_opcodes: 12, brillig_opcodes: 0 });
  });

  it("should leave out counts it cannot read", () => {
    expect(parseInfoTable("| bench | main | Bounded { width: 4 } | 40 | N/A |")).toEqual({ acir_opcodes: 40 });
    expect(parseInfoTable("nothing to see")).toEqual({});
  });
});

describe("measureBenchmark", () => {
  it("should compile then read info", () => {
    const runner = new FakeToolchain();

    expect(measureBenchmark("/tmp/bench", runner, "nargo")).toEqual({ acir_opcodes: 12, brillig_opcodes: 0 });
    expect(runner.calls).toEqual(["nargo compile", "nargo info"]);
  });

  it("should report compile errors", () => {
    const runner = new FakeToolchain({
      "nargo compile": { status: 1, stdout: "", stderr: "error: cannot find `abs_int` in this scope\n" },
    });

    expect(measureBenchmark("/tmp/bench", runner, "nargo")).toEqual({
      error: "error: cannot find `abs_int` in this scope",
    });
    expect(runner.calls).toEqual(["nargo compile"]);
  });
});

describe("getGitCommit", () => {
  it("should shorten the commit hash", () => {
    expect(getGitCommit(new FakeToolchain(), "/repo")).toBe("01234567");
  });

  it("should fall back to unknown", () => {
    const runner = new FakeToolchain({ "git rev-parse HEAD": { status: 128, stdout: "", stderr: "fatal" } });

    expect(getGitCommit(runner, "/repo")).toBe("unknown");
  });
});

describe("runBenchmarks", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), "xpathgen-bench-"));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it("should measure every benchmark into one record", () => {
    const catalog = loadBenchmarkCatalog({
      benchmarks: {
        abs_int: { inputs: "a: pub i64", body: "abs_int(a)", returnType: "pub i64" },
        fn_not: { inputs: "a: pub bool", body: "fn_not(a)", returnType: "pub bool" },
      },
    });
    const logger = new Logger("debug", false);

    const result = runBenchmarks(catalog, {
      runner: new FakeToolchain({ "nargo compile": { status: 1, stdout: "", stderr: "" } }),
      nargoBin: "nargo",
      libraryName: "xpath",
      libraryDir: "/opt/xpath",
      projectRoot: "/repo",
      logger,
      workDir,
      now: () => new Date("2024-05-01T12:00:00Z"),
    });

    expect(result).toEqual({
      timestamp: "2024-05-01T12:00:00.000Z",
      git_commit: "01234567",
      benchmarks: {
        abs_int: { error: "nargo compile exited with 1" },
        fn_not: { error: "nargo compile exited with 1" },
      },
    });
    expect(existsSync(join(workDir, "abs_int", "src", "main.nr"))).toBe(true);
    expect(logger.getEntriesAtLevel("warn").map((entry) => entry.message)).toEqual([
      "Benchmarking abs_int... ERROR: nargo compile exited with 1...",
      "Benchmarking fn_not... ERROR: nargo compile exited with 1...",
    ]);
  });

  it("should report parsed counts", () => {
    const catalog = loadBenchmarkCatalog({
      benchmarks: { abs_int: { inputs: "a: pub i64", body: "abs_int(a)", returnType: "pub i64" } },
    });
    const logger = new Logger("info", false);

    const result = runBenchmarks(catalog, {
      runner: new FakeToolchain(),
      nargoBin: "nargo",
      libraryName: "xpath",
      libraryDir: "/opt/xpath",
      projectRoot: "/repo",
      logger,
      workDir,
    });

    expect(result.benchmarks).toEqual({ abs_int: { acir_opcodes: 12, brillig_opcodes: 0 } });
    expect(logger.getEntries()[0].message).toBe("Benchmarking abs_int... ACIR: 12, Brillig: 0");
  });
});

describe("benchmark history", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "xpathgen-history-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should treat a missing file as an empty history", () => {
    expect(loadHistory(join(dir, "gate_counts.json"))).toEqual([]);
  });

  it("should read a single record as a history of one", () => {
    const path = join(dir, "gate_counts.json");
    const single = record("2024-05-01T00:00:00.000Z", "aaaaaaaa", { abs_int: { acir_opcodes: 3 } });
    writeFileSync(path, JSON.stringify(single));

    expect(loadHistory(path)).toEqual([single]);
  });

  it("should ignore unreadable files", () => {
    const path = join(dir, "gate_counts.json");
    writeFileSync(path, "{ not json");
    const logger = new Logger("debug", false);

    expect(loadHistory(path, logger)).toEqual([]);
    expect(logger.getEntries()[0].message).toBe(`Ignoring unreadable benchmark history ${path}`);
  });

  it("should append records to the file", () => {
    const path = join(dir, "nested", "gate_counts.json");
    const first = record("2024-05-01T00:00:00.000Z", "aaaaaaaa", { abs_int: { acir_opcodes: 3 } });
    const second = record("2024-05-02T00:00:00.000Z", "bbbbbbbb", { abs_int: { acir_opcodes: 4 } });

    appendRecord(path, first);
    const history = appendRecord(path, second);

    expect(history).toEqual([first, second]);
    expect(JSON.parse(readFileSync(path, "utf8"))).toEqual([first, second]);
  });
});

describe("report formatting", () => {
  it("should compare ACIR counts run over run", () => {
    const previous = record("2024-05-01T00:00:00.000Z", "aaaaaaaa", {
      abs_int: { acir_opcodes: 100 },
      fn_not: { acir_opcodes: 10 },
    });
    const current = record("2024-05-02T00:00:00.000Z", "bbbbbbbb", {
      abs_int: { acir_opcodes: 120 },
      numeric_add_int: { acir_opcodes: 5 },
    });

    const lines = formatComparison(previous, current).split("\n");

    expect(lines[3]).toBe("Old: 2024-05-01T00:00:00.000Z (aaaaaaaa)");
    expect(lines[6]).toBe("Operation                          Old ACIR     New ACIR       Change");
    expect(lines.slice(8, 11)).toEqual([
      "abs_int                                 100          120 +20 (+20.0%)",
      "fn_not                                   10          N/A          N/A",
      "numeric_add_int                         N/A            5          N/A",
    ]);
    expect(lines[12]).toBe("TOTAL                                   100          120 +20 (+20.0%)");
    expect(lines).toHaveLength(14);
  });

  it("should leave out the total when nothing is comparable", () => {
    const previous = record("t1", "aaaaaaaa", { abs_int: { error: "boom" } });
    const current = record("t2", "bbbbbbbb", { abs_int: { acir_opcodes: 7 } });

    const lines = formatComparison(previous, current).split("\n");

    expect(lines.some((line) => line.startsWith("TOTAL"))).toBe(false);
  });

  it("should summarize a run with totals", () => {
    const lines = formatSummary(
      record("2024-05-01T00:00:00.000Z", "aaaaaaaa", {
        fn_not: { acir_opcodes: 7, brillig_opcodes: 3 },
        abs_int: { error: "boom" },
      })
    ).split("\n");

    expect(lines[1]).toBe("XPath GATE COUNT SUMMARY");
    expect(lines[4]).toBe("Git commit: aaaaaaaa");
    expect(lines.slice(6, 7)).toEqual(["Operation                         ACIR Opcodes    Brillig Opcodes"]);
    expect(lines.slice(8, 10)).toEqual([
      "abs_int                                    N/A                N/A",
      "fn_not                                       7                  3",
    ]);
    expect(lines[11]).toBe("TOTAL                                        7                  3");
  });
});
