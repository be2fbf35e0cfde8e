/**
 * Wiring shared by the commands: global options, context loading and the
 * docker-backed capabilities.
 */

import { findAndLoadContext } from "../config/loader";
import { checkExportPreconditions, StackController, TarArchiver } from "../core";
import { DockerClient } from "../docker/client";
import { DockerComposeRunner, detectComposeCommand } from "../docker/compose";
import { DockerVolumeStore } from "../docker/volume-store";
import type { DeploymentContext } from "../types";
import {
  DeployError,
  errorMessage,
  MalformedBundleError,
  PreconditionFailedError,
  RestoreInterruptedError,
} from "../utils/errors";
import { type CommandRunner, runCommand } from "../utils/exec";
import { setLogLevel } from "../utils/logger";
import { ui } from "./ui";

export const GLOBAL_OPTIONS = {
  config: { type: "string", short: "c" },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export interface GlobalArgs {
  config?: string;
  verbose: boolean;
  help: boolean;
  /** Everything after the leading global options, passed through untouched */
  rest: string[];
}

/**
 * Split leading global options from passthrough arguments. Scanning stops at
 * the first argument that is not a global option, or after `--`.
 */
export function splitGlobalArgs(args: string[]): GlobalArgs {
  const result: GlobalArgs = { verbose: false, help: false, rest: [] };

  let i = 0;
  for (; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) break;

    if (arg === "--") {
      i++;
      break;
    }
    if (arg === "-v" || arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "-h" || arg === "--help") {
      result.help = true;
    } else if (arg === "-c" || arg === "--config") {
      const value = args[i + 1];
      if (value === undefined) {
        throw new DeployError(`Option ${arg} requires a path`);
      }
      result.config = value;
      i++;
    } else if (arg.startsWith("--config=")) {
      result.config = arg.slice("--config=".length);
    } else {
      break;
    }
  }

  result.rest = args.slice(i);
  return result;
}

export function applyVerbose(verbose: boolean | undefined): void {
  if (verbose) {
    setLogLevel("debug");
  }
}

export function loadContext(configPath?: string): Promise<DeploymentContext> {
  return findAndLoadContext(configPath);
}

export async function requireDocker(docker: DockerClient): Promise<void> {
  if (!(await docker.isAvailable())) {
    throw new PreconditionFailedError(docker.bin, "Docker daemon not reachable; is Docker running?");
  }
}

/**
 * Compose and env files, checked before any compose command runs
 */
export const requireProjectFiles = checkExportPreconditions;

export interface Runtime {
  ctx: DeploymentContext;
  docker: DockerClient;
  compose: DockerComposeRunner;
  stack: StackController;
  volumes: DockerVolumeStore;
  archiver: TarArchiver;
}

/**
 * Connect to Docker and find the compose CLI. Fails before anything runs when
 * either is unavailable.
 */
export async function createRuntime(
  ctx: DeploymentContext,
  runner: CommandRunner = runCommand,
): Promise<Runtime> {
  const docker = new DockerClient(ctx.docker.bin, runner);
  await requireDocker(docker);

  const command = await detectComposeCommand(ctx.docker.bin, runner);
  const compose = new DockerComposeRunner(command, ctx, runner);

  return {
    ctx,
    docker,
    compose,
    stack: new StackController(compose),
    volumes: new DockerVolumeStore(docker, ctx.docker.helperImage),
    archiver: new TarArchiver("tar", runner),
  };
}

/**
 * Print a failed command's error and return its exit code
 */
export function reportFailure(action: string, error: unknown, verbose: boolean | undefined): number {
  ui.error(`${action} failed: ${errorMessage(error)}`);

  if (error instanceof MalformedBundleError && error.scratchDir) {
    ui.info(`Extracted bundle kept for inspection: ${error.scratchDir}`);
  }
  if (error instanceof RestoreInterruptedError) {
    ui.warn(
      `Volume ${error.volumeName} may be partially overwritten. Import again from a known-good bundle before starting the stack.`,
    );
    ui.info(`Extracted bundle kept for inspection: ${error.scratchDir}`);
  }

  if (verbose) {
    console.error(error);
  }
  return 1;
}
