/**
 * Error taxonomy shared by the CLI and the bundle core.
 *
 * Every error names the step or resource that failed; commands print the
 * message as-is and exit non-zero.
 */

import type { CommandResult } from "./exec";

export class DeployError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DeployError";
  }
}

/**
 * A required external tool or file is absent. Raised before anything is mutated.
 */
export class PreconditionFailedError extends DeployError {
  readonly resource: string;

  constructor(resource: string, reason: string) {
    super(`Missing ${resource} (${reason})`);
    this.name = "PreconditionFailedError";
    this.resource = resource;
  }
}

/**
 * An external tool exited non-zero.
 */
export class ToolFailedError extends DeployError {
  readonly step: string;
  readonly exitCode: number;

  constructor(step: string, result: Pick<CommandResult, "exitCode" | "stderr" | "stdout">) {
    const detail = result.stderr || result.stdout;
    super(`${step} failed (exit code ${result.exitCode})${detail ? `: ${detail}` : ""}`);
    this.name = "ToolFailedError";
    this.step = step;
    this.exitCode = result.exitCode;
  }
}

export class SnapshotFailedError extends DeployError {
  readonly volumeName: string;

  constructor(volumeName: string, reason: string, options?: ErrorOptions) {
    super(`Snapshot of volume "${volumeName}" failed: ${reason}`, options);
    this.name = "SnapshotFailedError";
    this.volumeName = volumeName;
  }
}

export class MissingRequiredFileError extends DeployError {
  readonly paths: string[];

  constructor(paths: string[]) {
    super(`Missing required project file(s): ${paths.join(", ")}`);
    this.name = "MissingRequiredFileError";
    this.paths = paths;
  }
}

export class MalformedBundleError extends DeployError {
  readonly bundlePath: string;
  readonly scratchDir: string | null;

  constructor(bundlePath: string, reason: string, scratchDir: string | null, options?: ErrorOptions) {
    super(`Malformed bundle ${bundlePath}: ${reason}`, options);
    this.name = "MalformedBundleError";
    this.bundlePath = bundlePath;
    this.scratchDir = scratchDir;
  }
}

/**
 * A volume replay failed partway. The volume is left partially overwritten
 * and must not be trusted until a restore from a known-good bundle succeeds.
 */
export class RestoreInterruptedError extends DeployError {
  readonly volumeName: string;
  readonly scratchDir: string;

  constructor(volumeName: string, scratchDir: string, options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Restore of volume "${volumeName}" was interrupted${reason}`, options);
    this.name = "RestoreInterruptedError";
    this.volumeName = volumeName;
    this.scratchDir = scratchDir;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
