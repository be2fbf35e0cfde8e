/**
 * Child process runner. Every docker, compose, tar, ansible and systemctl
 * invocation goes through here.
 */

import { spawn } from "node:child_process";
import { logger } from "./logger";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunCommandOptions {
  cwd?: string;
  /** Attach the child to this terminal instead of capturing its output */
  inherit?: boolean;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (
  bin: string,
  args: string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

/** Exit code reported when the binary itself cannot be found */
export const COMMAND_NOT_FOUND = 127;

export const runCommand: CommandRunner = (bin, args, options = {}) => {
  logger.debug(`Running: ${bin} ${args.join(" ")}`);

  return new Promise((resolve) => {
    const child = spawn(bin, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: options.inherit ? "inherit" : ["ignore", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err: NodeJS.ErrnoException) => {
      const notFound = err.code === "ENOENT";
      resolve({
        success: false,
        stdout: "",
        stderr: notFound ? `command not found: ${bin}` : err.message,
        exitCode: notFound ? COMMAND_NOT_FOUND : 1,
      });
    });

    child.on("close", (code) => {
      const exitCode = code ?? 1;
      resolve({
        success: exitCode === 0,
        stdout: Buffer.concat(stdout).toString().trim(),
        stderr: Buffer.concat(stderr).toString().trim(),
        exitCode,
      });
    });
  });
};

/**
 * Check that a binary can be launched at all. A non-zero exit still counts as
 * present; only a missing executable does not.
 */
export async function commandExists(
  bin: string,
  probeArgs: string[] = ["--version"],
  runner: CommandRunner = runCommand,
): Promise<boolean> {
  const result = await runner(bin, probeArgs);
  return result.exitCode !== COMMAND_NOT_FOUND;
}
