#!/usr/bin/env node
/**
 * Gate count benchmark for the xpath Noir library
 *
 * Compiles one program per benchmarked primitive and appends the ACIR and
 * Brillig opcode counts to a JSON history for before/after comparisons.
 *
 * Usage:
 *   tsx tooling/benchmark-gates.ts [--output FILE]
 *   tsx tooling/benchmark-gates.ts --summary
 *   tsx tooling/benchmark-gates.ts --compare FILE
 */

import { Command } from "commander";
import { existsSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "../src/errors";
import {
  appendRecord,
  formatComparison,
  formatSummary,
  loadBenchmarkCatalog,
  loadHistory,
  runBenchmarks,
} from "./lib/benchmark";
import { ConfigManager } from "./lib/config";
import { Logger, globalLogger } from "./lib/logger";
import { CommandRunner, SpawnCommandRunner, commandExists } from "./lib/process";
import { errorMessage } from "./lib/utils";

const BenchmarkCliSchema = z.object({
  output: z.string().optional(),
  compare: z.string().optional(),
  summary: z.boolean().default(false),
  root: z.string().optional(),
});

export type BenchmarkCliOptions = z.infer<typeof BenchmarkCliSchema>;

export type BenchmarkCliDependencies = {
  runner?: CommandRunner;
  logger?: Logger;
  print?: (line: string) => void;
  cwd?: string;
  now?: () => Date;
};

export function buildProgram(): Command {
  return new Command()
    .name("xpath-benchmark-gates")
    .description("Benchmark gate counts for XPath operations")
    .option("-o, --output <file>", "Output file for benchmark results (default: gate_counts.json)")
    .option("--compare <file>", "Compare the last two runs recorded in a benchmark file")
    .option("-s, --summary", "Print the latest recorded results without running new benchmarks")
    .option("--root <dir>", "Project root holding xpathgen.config.json");
}

export function parseCliOptions(raw: unknown): BenchmarkCliOptions {
  const parsed = BenchmarkCliSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid options: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  return parsed.data;
}

export function runBenchmarkCli(options: BenchmarkCliOptions, deps: BenchmarkCliDependencies = {}): number {
  const logger = deps.logger ?? globalLogger;
  const print = deps.print ?? ((line: string) => console.log(line));
  const cwd = deps.cwd ?? process.cwd();
  const runner = deps.runner ?? new SpawnCommandRunner();

  const config = new ConfigManager(resolve(cwd, options.root ?? "."));
  config.loadEnvironment();
  logger.setLevel(config.getLogLevel());

  const outputFile = options.output !== undefined ? resolve(cwd, options.output) : config.getHistoryFile();

  if (options.summary) {
    const history = loadHistory(outputFile, logger);
    if (history.length === 0) {
      print(`No benchmark results found at ${outputFile}`);
      print("Run without --summary to generate benchmarks first.");
      return 1;
    }
    print(formatSummary(history[history.length - 1]));
    return 0;
  }

  if (options.compare !== undefined) {
    const history = loadHistory(resolve(cwd, options.compare), logger);
    if (history.length < 2) {
      print("Need at least 2 benchmark runs to compare");
      return 0;
    }
    print(formatComparison(history[history.length - 2], history[history.length - 1]));
    return 0;
  }

  const nargoBin = config.getNargoBin();
  if (!commandExists(runner, nargoBin)) {
    logger.error(`'${nargoBin}' command not found. Please install Noir.`);
    return 1;
  }

  const libraryDir = config.getLibraryDir();
  if (!existsSync(libraryDir)) {
    logger.warn(`Library directory ${libraryDir} does not exist; every benchmark will fail to compile`);
  }

  const record = runBenchmarks(loadBenchmarkCatalog(), {
    runner,
    nargoBin,
    libraryName: config.getLibraryName(),
    libraryDir,
    projectRoot: config.getProjectRoot(),
    logger,
    now: deps.now,
  });

  const history = appendRecord(outputFile, record, logger);
  print(`Results saved to ${outputFile}`);
  if (history.length > 1) {
    print(formatComparison(history[history.length - 2], history[history.length - 1]));
  }
  return 0;
}

async function main(): Promise<void> {
  const program = buildProgram().parse(process.argv);
  process.exitCode = runBenchmarkCli(parseCliOptions(program.opts()));
}

if (require.main === module) {
  main().catch((error) => {
    globalLogger.error(errorMessage(error));
    process.exitCode = 1;
  });
}
