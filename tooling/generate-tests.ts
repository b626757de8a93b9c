#!/usr/bin/env node
/**
 * Generate Noir test packages from the W3C QT3 conformance suite
 *
 * Usage:
 *   tsx tooling/generate-tests.ts                                  # every catalogued operation
 *   tsx tooling/generate-tests.ts --functions op:numeric-add,fn:abs
 *   tsx tooling/generate-tests.ts --skip-clone --qt3-dir ../qt3tests
 *   tsx tooling/generate-tests.ts --list-functions
 */

import { Command } from "commander";
import { writeFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "../src/errors";
import { allOperations, getOperation, listOperations } from "../src/operations";
import { OperationSpec } from "../src/types";
import { TranslationAudit } from "./lib/audit";
import { ConfigManager } from "./lib/config";
import { syncCorpus } from "./lib/corpus-sync";
import { LOG_LEVELS, Logger, globalLogger } from "./lib/logger";
import { generatePackages } from "./lib/pipeline";
import { CommandRunner, SpawnCommandRunner } from "./lib/process";
import { errorMessage } from "./lib/utils";

const GenerateCliSchema = z.object({
  functions: z.string().optional(),
  outputDir: z.string().optional(),
  qt3Dir: z.string().optional(),
  skipClone: z.boolean().default(false),
  listFunctions: z.boolean().default(false),
  chunkSize: z.coerce.number().int().positive().optional(),
  audit: z.string().optional(),
  root: z.string().optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type GenerateCliOptions = z.infer<typeof GenerateCliSchema>;

export type CliDependencies = {
  runner?: CommandRunner;
  logger?: Logger;
  print?: (line: string) => void;
  cwd?: string;
};

export function buildProgram(): Command {
  return new Command()
    .name("xpath-generate-tests")
    .description("Generate Noir tests from qt3tests")
    .option("--functions <ids>", "Comma-separated list of operations to generate tests for")
    .option("--output-dir <dir>", "Output directory for generated test packages")
    .option("--qt3-dir <dir>", "Directory for the qt3tests checkout")
    .option("--skip-clone", "Skip cloning/updating qt3tests")
    .option("--list-functions", "List available operations and exit")
    .option("--chunk-size <n>", "Tests per generated chunk file")
    .option("--audit <file>", "Write a JSON record of generated and skipped tests")
    .option("--root <dir>", "Project root holding xpathgen.config.json")
    .option("--log-level <level>", `One of ${LOG_LEVELS.join(", ")}`);
}

export function parseCliOptions(raw: unknown): GenerateCliOptions {
  const parsed = GenerateCliSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid options: ${detail}`);
  }
  return parsed.data;
}

function selectOperations(functions: string | undefined, logger: Logger): OperationSpec[] {
  if (functions === undefined) {
    return allOperations();
  }

  const selected: OperationSpec[] = [];
  for (const id of functions.split(",").map((part) => part.trim()).filter((part) => part !== "")) {
    const operation = getOperation(id);
    if (operation) {
      selected.push(operation);
    } else {
      logger.warn(`No test file mapping for ${id}`);
    }
  }
  return selected;
}

/**
 * Run the generator and return the process exit code
 */
export function runGenerate(options: GenerateCliOptions, deps: CliDependencies = {}): number {
  const logger = deps.logger ?? globalLogger;
  const print = deps.print ?? ((line: string) => console.log(line));
  const cwd = deps.cwd ?? process.cwd();

  if (options.listFunctions) {
    print("Available functions:");
    for (const id of listOperations()) {
      print(`  ${id}`);
    }
    return 0;
  }

  const config = new ConfigManager(resolve(cwd, options.root ?? "."));
  config.loadEnvironment();
  logger.setLevel(options.logLevel ?? config.getLogLevel());
  for (const issue of config.getIssues()) {
    logger.warn(`Config ignored: ${issue}`);
  }

  const corpusDir = options.qt3Dir !== undefined ? resolve(cwd, options.qt3Dir) : config.getCorpusDir();
  const outputDir = options.outputDir !== undefined ? resolve(cwd, options.outputDir) : config.getOutputDir();

  if (!options.skipClone) {
    syncCorpus(corpusDir, config.getCorpusRepoUrl(), deps.runner ?? new SpawnCommandRunner(), logger);
  }

  const audit = new TranslationAudit();
  const summary = generatePackages(selectOperations(options.functions, logger), {
    corpusDir,
    outputDir,
    chunkSize: options.chunkSize ?? config.getChunkSize(),
    libraryName: config.getLibraryName(),
    libraryPath: config.getLibraryPath(),
    logger,
    audit,
  });

  if (options.audit !== undefined) {
    const auditPath = resolve(cwd, options.audit);
    writeFileSync(auditPath, JSON.stringify(audit.toJSON(), null, 2));
    logger.info(`Wrote audit to ${auditPath}`);
  }

  print("");
  print("Test generation complete!");
  print(`Total tests identified in qt3tests: ${summary.identified}`);
  print(`Total tests generated: ${summary.generated}`);
  return 0;
}

async function main(): Promise<void> {
  const program = buildProgram().parse(process.argv);
  process.exitCode = runGenerate(parseCliOptions(program.opts()));
}

if (require.main === module) {
  main().catch((error) => {
    globalLogger.error(errorMessage(error));
    process.exitCode = 1;
  });
}
