/**
 * Shared type definitions for the generator and benchmark tooling
 */

import { GeneratedTest, SkipRecord } from "../../src/types";

export type PackageLayout = {
  packageName: string;
  /** Member path as listed in the workspace manifest */
  memberPath: string;
  directory: string;
};

export type EmitResult = {
  layout: PackageLayout;
  written: boolean;
  testCount: number;
  skipCount: number;
  chunkCount: number;
  files: string[];
};

export type OperationRun = {
  operationId: string;
  tests: GeneratedTest[];
  skips: SkipRecord[];
};

export type BenchmarkSpec = {
  inputs: string;
  body: string;
  returnType: string;
};

export type GateCounts = {
  acir_opcodes?: number;
  brillig_opcodes?: number;
  error?: string;
};

export type BenchmarkRecord = {
  timestamp: string;
  git_commit: string;
  benchmarks: Record<string, GateCounts>;
};
