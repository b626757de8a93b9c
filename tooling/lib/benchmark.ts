/**
 * Gate-count benchmarking
 *
 * Builds one single-call Noir program per primitive, compiles it with nargo
 * and reads the ACIR and Brillig opcode counts off `nargo info`. Runs are
 * appended to a JSON history file and compared run over run.
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { z } from "zod";
import benchmarkData from "../data/benchmarks.json";
import { Logger, globalLogger } from "./logger";
import { CommandRunner, describeFailure, succeeded } from "./process";
import { BenchmarkRecord, BenchmarkSpec, GateCounts } from "./types";
import { errorMessage } from "./utils";

const BenchmarkSpecSchema = z.object({
  inputs: z.string(),
  body: z.string().min(1),
  returnType: z.string().min(1),
});

const BenchmarkCatalogSchema = z.object({
  benchmarks: z.record(BenchmarkSpecSchema),
});

const GateCountsSchema = z.object({
  acir_opcodes: z.number().int().optional(),
  brillig_opcodes: z.number().int().optional(),
  error: z.string().optional(),
});

const BenchmarkRecordSchema = z.object({
  timestamp: z.string(),
  git_commit: z.string(),
  benchmarks: z.record(GateCountsSchema),
});

export function loadBenchmarkCatalog(input: unknown = benchmarkData): Map<string, BenchmarkSpec> {
  const parsed = BenchmarkCatalogSchema.parse(input);
  return new Map(Object.entries(parsed.benchmarks));
}

/**
 * Functions the body calls, in first-use order
 */
export function calledFunctions(body: string): string[] {
  const names = Array.from(body.matchAll(/\b([A-Za-z_][A-Za-z0-9_]*)\s*\(/g), (match) => match[1]);
  return Array.from(new Set(names));
}

export function renderBenchmarkManifest(name: string, libraryName: string, libraryDir: string): string {
  return [
    "[package]",
    `name = "${name}"`,
    'type = "bin"',
    'authors = ["benchmark"]',
    "",
    "[dependencies]",
    `${libraryName} = { path = "${libraryDir}" }`,
    "",
  ].join("\n");
}

export function renderBenchmarkMain(spec: BenchmarkSpec, libraryName: string): string {
  const imports = calledFunctions(spec.body).map((name) => `    ${name},`);
  const body = spec.body.split("\n").map((line) => `    ${line.trim()}`);
  return [
    `use ${libraryName}::{`,
    ...imports,
    "};",
    "",
    `fn main(${spec.inputs}) -> ${spec.returnType} {`,
    ...body,
    "}",
    "",
  ].join("\n");
}

/**
 * Write the bin package for one benchmark under `rootDir`
 */
export function materializeBenchmark(
  rootDir: string,
  name: string,
  spec: BenchmarkSpec,
  libraryName: string,
  libraryDir: string
): string {
  const projectDir = join(rootDir, name);
  mkdirSync(join(projectDir, "src"), { recursive: true });
  writeFileSync(join(projectDir, "Nargo.toml"), renderBenchmarkManifest(name, libraryName, libraryDir));
  writeFileSync(join(projectDir, "src", "main.nr"), renderBenchmarkMain(spec, libraryName));
  return projectDir;
}

function parseCount(cell: string | undefined): number | undefined {
  if (cell === undefined || cell === "N/A" || !/^-?\d+$/.test(cell)) {
    return undefined;
  }
  return Number(cell);
}

/**
 * Read the `main` row of the `nargo info` table:
 * `| Package | Function | Expression Width | ACIR Opcodes | Brillig Opcodes |`
 */
export function parseInfoTable(output: string): GateCounts {
  const counts: GateCounts = {};
  for (const line of output.trim().split("\n")) {
    if (!line.includes("| main") && !line.includes("|main")) continue;

    const cells = line
      .split("|")
      .map((cell) => cell.trim())
      .filter((cell) => cell !== "");
    if (cells.length < 4) continue;

    const acir = parseCount(cells[3]);
    if (acir !== undefined) counts.acir_opcodes = acir;
    const brillig = parseCount(cells[4]);
    if (brillig !== undefined) counts.brillig_opcodes = brillig;
  }
  return counts;
}

/**
 * `nargo compile`, then `nargo info`. A failing step is reported in the
 * counts, never thrown.
 */
export function measureBenchmark(projectDir: string, runner: CommandRunner, nargoBin: string): GateCounts {
  const compile = runner.run(nargoBin, ["compile"], { cwd: projectDir });
  if (!succeeded(compile)) {
    return { error: compile.stderr.trim() || describeFailure(nargoBin, ["compile"], compile) };
  }

  const info = runner.run(nargoBin, ["info"], { cwd: projectDir });
  if (!succeeded(info)) {
    return { error: info.stderr.trim() || describeFailure(nargoBin, ["info"], info) };
  }
  return parseInfoTable(info.stdout);
}

export function getGitCommit(runner: CommandRunner, cwd: string): string {
  const result = runner.run("git", ["rev-parse", "HEAD"], { cwd });
  if (!succeeded(result)) {
    return "unknown";
  }
  return result.stdout.trim().slice(0, 8) || "unknown";
}

export type BenchmarkRunOptions = {
  runner: CommandRunner;
  nargoBin: string;
  libraryName: string;
  libraryDir: string;
  projectRoot: string;
  logger?: Logger;
  /** Scratch directory; a fresh temp directory is created and removed when omitted */
  workDir?: string;
  now?: () => Date;
};

function describeCounts(counts: GateCounts): string {
  if (counts.error !== undefined) {
    return `ERROR: ${counts.error.slice(0, 50)}...`;
  }
  if (counts.acir_opcodes === undefined) {
    return "OK (parsing failed - check raw output)";
  }
  const brillig = counts.brillig_opcodes !== undefined ? `, Brillig: ${counts.brillig_opcodes}` : "";
  return `ACIR: ${counts.acir_opcodes}${brillig}`;
}

export function runBenchmarks(catalog: Map<string, BenchmarkSpec>, options: BenchmarkRunOptions): BenchmarkRecord {
  const logger = options.logger ?? globalLogger;
  const now = options.now ?? (() => new Date());
  const workDir = options.workDir ?? mkdtempSync(join(tmpdir(), "gate-bench-"));

  const record: BenchmarkRecord = {
    timestamp: now().toISOString(),
    git_commit: getGitCommit(options.runner, options.projectRoot),
    benchmarks: {},
  };

  logger.pushContext({ phase: "benchmark" });
  try {
    for (const [name, spec] of catalog) {
      logger.pushContext({ operation: name });
      logger.startTimer(name);
      let counts: GateCounts;
      try {
        const projectDir = materializeBenchmark(workDir, name, spec, options.libraryName, options.libraryDir);
        counts = measureBenchmark(projectDir, options.runner, options.nargoBin);
      } catch (error) {
        counts = { error: errorMessage(error) };
      }
      record.benchmarks[name] = counts;
      logger.endTimer(name, `Benchmarking ${name}... ${describeCounts(counts)}`, counts.error ? "warn" : "info");
      logger.popContext(["operation"]);
    }
  } finally {
    logger.popContext(["phase"]);
    if (options.workDir === undefined) {
      rmSync(workDir, { recursive: true, force: true });
    }
  }
  return record;
}

/**
 * History on disk. A missing or invalid file is an empty history; a single
 * record is a history of one.
 */
export function loadHistory(path: string, logger: Logger = globalLogger): BenchmarkRecord[] {
  if (!existsSync(path)) {
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    logger.warn(`Ignoring unreadable benchmark history ${path}`, { error: errorMessage(error) });
    return [];
  }

  const history = z.array(BenchmarkRecordSchema).safeParse(data);
  if (history.success) {
    return history.data;
  }
  const single = BenchmarkRecordSchema.safeParse(data);
  if (single.success) {
    return [single.data];
  }
  logger.warn(`Ignoring invalid benchmark history ${path}`);
  return [];
}

export function appendRecord(path: string, record: BenchmarkRecord, logger: Logger = globalLogger): BenchmarkRecord[] {
  const history = [...loadHistory(path, logger), record];
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(history, null, 2));
  return history;
}

function signed(value: number, digits?: number): string {
  const text = digits === undefined ? String(value) : value.toFixed(digits);
  return value >= 0 ? `+${text}` : text;
}

function formatChange(oldValue: number, newValue: number): string {
  const diff = newValue - oldValue;
  const pct = oldValue > 0 ? (diff / oldValue) * 100 : 0;
  return `${signed(diff)} (${signed(pct, 1)}%)`;
}

function cell(value: number | undefined): string {
  return value === undefined ? "N/A" : String(value);
}

function sortedNames(...records: BenchmarkRecord[]): string[] {
  const names = new Set<string>();
  for (const record of records) {
    Object.keys(record.benchmarks).forEach((name) => names.add(name));
  }
  return Array.from(names).sort();
}

/**
 * ACIR comparison table between two runs
 */
export function formatComparison(previous: BenchmarkRecord, current: BenchmarkRecord): string {
  const rule = "-".repeat(60);
  const lines = [
    "=".repeat(60),
    "COMPARISON WITH PREVIOUS RUN",
    "=".repeat(60),
    `Old: ${previous.timestamp} (${previous.git_commit})`,
    `New: ${current.timestamp} (${current.git_commit})`,
    rule,
    `${"Operation".padEnd(30)} ${"Old ACIR".padStart(12)} ${"New ACIR".padStart(12)} ${"Change".padStart(12)}`,
    rule,
  ];

  let totalOld = 0;
  let totalNew = 0;
  for (const name of sortedNames(previous, current)) {
    const oldAcir = previous.benchmarks[name]?.acir_opcodes;
    const newAcir = current.benchmarks[name]?.acir_opcodes;
    let change = "N/A";
    if (oldAcir !== undefined && newAcir !== undefined) {
      change = formatChange(oldAcir, newAcir);
      totalOld += oldAcir;
      totalNew += newAcir;
    }
    lines.push(`${name.padEnd(30)} ${cell(oldAcir).padStart(12)} ${cell(newAcir).padStart(12)} ${change.padStart(12)}`);
  }

  lines.push(rule);
  if (totalOld > 0 && totalNew > 0) {
    lines.push(
      `${"TOTAL".padEnd(30)} ${String(totalOld).padStart(12)} ${String(totalNew).padStart(12)} ${formatChange(totalOld, totalNew)}`
    );
  }
  lines.push("=".repeat(60));
  return lines.join("\n");
}

/**
 * ACIR and Brillig table for one run, with totals
 */
export function formatSummary(record: BenchmarkRecord): string {
  const rule = "-".repeat(80);
  const lines = [
    "=".repeat(80),
    "XPath GATE COUNT SUMMARY",
    "=".repeat(80),
    `Timestamp: ${record.timestamp}`,
    `Git commit: ${record.git_commit}`,
    rule,
    `${"Operation".padEnd(30)} ${"ACIR Opcodes".padStart(15)} ${"Brillig Opcodes".padStart(18)}`,
    rule,
  ];

  let totalAcir = 0;
  let totalBrillig = 0;
  for (const name of sortedNames(record)) {
    const counts = record.benchmarks[name];
    totalAcir += counts.acir_opcodes ?? 0;
    totalBrillig += counts.brillig_opcodes ?? 0;
    lines.push(
      `${name.padEnd(30)} ${cell(counts.acir_opcodes).padStart(15)} ${cell(counts.brillig_opcodes).padStart(18)}`
    );
  }

  lines.push(rule);
  lines.push(`${"TOTAL".padEnd(30)} ${String(totalAcir).padStart(15)} ${String(totalBrillig).padStart(18)}`);
  lines.push("=".repeat(80));
  return lines.join("\n");
}
