/**
 * Configuration loading and path expansion utilities
 */

import { config as loadEnv } from "dotenv";
import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { z } from "zod";
import { LOG_LEVELS, LogLevel, isLogLevel } from "./logger";
import { errorMessage } from "./utils";

export const CONFIG_FILE_NAME = "xpathgen.config.json";

export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_CORPUS_DIR = "qt3tests";
export const DEFAULT_CORPUS_REPO_URL = "https://github.com/w3c/qt3tests.git";
export const DEFAULT_OUTPUT_DIR = "test_packages";
export const DEFAULT_CHUNK_SIZE = 50;
export const DEFAULT_HISTORY_FILE = "gate_counts.json";
export const DEFAULT_LIBRARY_NAME = "xpath";
export const DEFAULT_LIBRARY_PATH = "../../xpath";
export const DEFAULT_LIBRARY_DIR = "xpath";
export const DEFAULT_NARGO_BIN = "nargo";
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export const ENV_CORPUS_DIR = "XPATHGEN_CORPUS_DIR";
export const ENV_NARGO_BIN = "XPATHGEN_NARGO_BIN";
export const ENV_LOG_LEVEL = "XPATHGEN_LOG_LEVEL";

export const ConfigSchema = z.object({
  envSearchPaths: z.array(z.string()).optional(),
  corpusDir: z.string().min(1).optional(),
  corpusRepoUrl: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  chunkSize: z.number().int().positive().optional(),
  historyFile: z.string().min(1).optional(),
  libraryName: z.string().min(1).optional(),
  libraryPath: z.string().min(1).optional(),
  libraryDir: z.string().min(1).optional(),
  nargoBin: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigManager {
  private config: Config;
  private projectRoot: string;
  private env: NodeJS.ProcessEnv;
  private issues: string[] = [];

  constructor(
    projectRoot: string,
    configPath: string = join(projectRoot, CONFIG_FILE_NAME),
    env: NodeJS.ProcessEnv = process.env
  ) {
    this.projectRoot = projectRoot;
    this.env = env;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, "utf8"));
    } catch (error) {
      this.issues.push(`${configPath}: ${errorMessage(error)}`);
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        this.issues.push(`${configPath}: ${issue.path.join(".") || "(root)"} ${issue.message}`);
      }
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }
    return parsed.data;
  }

  /**
   * Problems found while reading the config file; the defaults were used
   */
  getIssues(): string[] {
    return [...this.issues];
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = this.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  /**
   * Load every existing .env file on the search path without overriding
   * variables already set. Returns the files loaded.
   */
  loadEnvironment(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!existsSync(expanded)) {
        continue;
      }
      const result = loadEnv({ path: expanded, override: false });
      if (result.error) {
        this.issues.push(`${expanded}: ${result.error.message}`);
        continue;
      }
      loaded.push(expanded);
    }
    return loaded;
  }

  private fromEnv(name: string): string | undefined {
    const value = this.env[name];
    return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
  }

  getProjectRoot(): string {
    return this.projectRoot;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getCorpusDir(): string {
    return this.expandPath(this.fromEnv(ENV_CORPUS_DIR) ?? this.config.corpusDir ?? DEFAULT_CORPUS_DIR);
  }

  getCorpusRepoUrl(): string {
    return this.config.corpusRepoUrl ?? DEFAULT_CORPUS_REPO_URL;
  }

  getOutputDir(): string {
    return this.expandPath(this.config.outputDir ?? DEFAULT_OUTPUT_DIR);
  }

  getChunkSize(): number {
    return this.config.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  getHistoryFile(): string {
    return this.expandPath(this.config.historyFile ?? DEFAULT_HISTORY_FILE);
  }

  getLibraryName(): string {
    return this.config.libraryName ?? DEFAULT_LIBRARY_NAME;
  }

  getLibraryPath(): string {
    return this.config.libraryPath ?? DEFAULT_LIBRARY_PATH;
  }

  /**
   * Library checkout the benchmark programs build against
   */
  getLibraryDir(): string {
    return this.expandPath(this.config.libraryDir ?? DEFAULT_LIBRARY_DIR);
  }

  getNargoBin(): string {
    return this.fromEnv(ENV_NARGO_BIN) ?? this.config.nargoBin ?? DEFAULT_NARGO_BIN;
  }

  getLogLevel(): LogLevel {
    const fromEnv = this.fromEnv(ENV_LOG_LEVEL);
    if (fromEnv !== undefined && isLogLevel(fromEnv)) {
      return fromEnv;
    }
    return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  getConfig(): Config {
    return this.config;
  }
}
