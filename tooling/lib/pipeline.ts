/**
 * Test generation run: read each operation's corpus file, translate every
 * case, emit the packages, then reconcile the workspace manifest
 */

import { generateTest } from "../../src/assertions";
import { GeneratedTest, OperationSpec, SkipRecord, TestCase } from "../../src/types";
import { TranslationAudit } from "./audit";
import { readTestFile, testFilePath } from "./corpus";
import { EmitterOptions, WorkspaceUpdate, emitPackage, updateWorkspaceManifest, workspaceDirFor } from "./emitter";
import { Logger, globalLogger } from "./logger";
import { EmitResult, OperationRun } from "./types";

export type GenerateOptions = EmitterOptions & {
  corpusDir: string;
  logger?: Logger;
  audit?: TranslationAudit;
};

export type GenerateSummary = {
  identified: number;
  generated: number;
  packages: EmitResult[];
  workspace?: WorkspaceUpdate;
};

/**
 * Translate every case of one operation. Never throws for corpus content.
 */
export function translateOperation(
  operation: OperationSpec,
  testCases: TestCase[],
  logger: Logger = globalLogger,
  audit?: TranslationAudit
): OperationRun {
  const tests: GeneratedTest[] = [];
  const skips: SkipRecord[] = [];

  for (const testCase of testCases) {
    const outcome = generateTest(testCase, operation.id);
    if (outcome.ok) {
      tests.push(outcome.test);
      audit?.recordGenerated(operation.id, testCase.name, outcome.test.identifier);
    } else {
      skips.push(outcome.skip);
      audit?.recordSkip(outcome.skip);
      logger.pushContext({ testName: testCase.name });
      logger.debug(`Skipped: ${outcome.skip.reason}`, { code: outcome.skip.code });
      logger.popContext(["testName"]);
    }
  }

  return { operationId: operation.id, tests, skips };
}

export function generatePackages(operations: OperationSpec[], options: GenerateOptions): GenerateSummary {
  const logger = options.logger ?? globalLogger;
  const summary: GenerateSummary = { identified: 0, generated: 0, packages: [] };

  logger.pushContext({ phase: "generate" });
  try {
    for (const operation of operations) {
      logger.pushContext({ operation: operation.id });
      try {
        const testCases = readTestFile(testFilePath(options.corpusDir, operation.sourceFile), logger);
        summary.identified += testCases.length;
        if (testCases.length === 0) {
          logger.info(`No tests found for ${operation.id}`);
          continue;
        }

        const run = translateOperation(operation, testCases, logger, options.audit);
        const result = emitPackage(operation, run.tests, run.skips, options, logger);
        options.audit?.recordPackage(operation.id, result.layout.packageName, result.written, result.testCount);
        summary.generated += result.testCount;
        summary.packages.push(result);
      } finally {
        logger.popContext(["operation"]);
      }
    }

    summary.workspace = updateWorkspaceManifest(workspaceDirFor(options), options.outputDir, logger);
  } finally {
    logger.popContext(["phase"]);
  }
  return summary;
}
