/**
 * Clone or refresh the corpus checkout with git
 */

import { existsSync } from "fs";
import { Logger, globalLogger } from "./logger";
import { CommandRunner, describeFailure, succeeded } from "./process";

export type SyncAction = "clone" | "pull";

export type SyncResult = {
  action: SyncAction;
  ok: boolean;
  message?: string;
};

/**
 * Shallow clone when the directory is absent, `git pull` inside it
 * otherwise. A failing git command is logged and reported, never thrown.
 */
export function syncCorpus(
  corpusDir: string,
  repoUrl: string,
  runner: CommandRunner,
  logger: Logger = globalLogger
): SyncResult {
  logger.pushContext({ phase: "sync" });
  try {
    const action: SyncAction = existsSync(corpusDir) ? "pull" : "clone";
    const args = action === "pull" ? ["pull"] : ["clone", "--depth", "1", repoUrl, corpusDir];

    if (action === "pull") {
      logger.info(`Corpus exists at ${corpusDir}, pulling latest`);
    } else {
      logger.info(`Cloning corpus to ${corpusDir}`);
    }

    const result = runner.run("git", args, action === "pull" ? { cwd: corpusDir } : {});
    if (!succeeded(result)) {
      const message = describeFailure("git", args, result);
      logger.warn("Corpus sync failed, continuing with the existing checkout", { error: message });
      return { action, ok: false, message };
    }
    return { action, ok: true };
  } finally {
    logger.popContext(["phase"]);
  }
}
