/**
 * Blocking external commands (git, nargo) behind a replaceable runner
 */

import { spawnSync } from "child_process";

export type CommandResult = {
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the command could not be started at all */
  error?: Error;
};

export type CommandOptions = {
  cwd?: string;
};

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): CommandResult;
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: CommandOptions = {}): CommandResult {
    const result = spawnSync(command, args, {
      cwd: options.cwd,
      encoding: "utf8",
    });
    return {
      status: result.status,
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      error: result.error,
    };
  }
}

export function succeeded(result: CommandResult): boolean {
  return result.error === undefined && result.status === 0;
}

/**
 * True when `command --version` starts and exits cleanly
 */
export function commandExists(runner: CommandRunner, command: string): boolean {
  return succeeded(runner.run(command, ["--version"]));
}

/**
 * One-line description of a failed command for logs
 */
export function describeFailure(command: string, args: string[], result: CommandResult): string {
  const invocation = [command, ...args].join(" ");
  if (result.error) {
    return `${invocation}: ${result.error.message}`;
  }
  const output = (result.stderr || result.stdout).trim();
  return `${invocation} exited with ${result.status ?? "signal"}${output ? `: ${output}` : ""}`;
}
