/**
 * Docker Compose invocation and compose file inspection
 */

import { readFile } from "node:fs/promises";
import * as yaml from "js-yaml";
import type { ComposeRunner, ComposeRunOptions, ServiceHealth, ServiceStatus } from "../types";
import { PreconditionFailedError } from "../utils/errors";
import { type CommandResult, type CommandRunner, runCommand } from "../utils/exec";
import { logger } from "../utils/logger";

type ComposeServiceDefinition = Record<string, unknown>;

type ComposeVolumeDefinition = Record<string, unknown>;

export interface ComposeFile {
  services: Record<string, ComposeServiceDefinition>;
  volumes: Record<string, ComposeVolumeDefinition | null>;
}

/**
 * Find the compose CLI: the `docker compose` plugin first, then the
 * standalone docker-compose binary.
 */
export async function detectComposeCommand(
  dockerBin: string,
  runner: CommandRunner = runCommand,
): Promise<string[]> {
  const plugin = await runner(dockerBin, ["compose", "version"]);
  if (plugin.success) {
    return [dockerBin, "compose"];
  }

  const standalone = await runner("docker-compose", ["version"]);
  if (standalone.success) {
    return ["docker-compose"];
  }

  throw new PreconditionFailedError(
    "Docker Compose",
    "install Docker Desktop or the docker compose plugin",
  );
}

export interface ComposeTarget {
  projectRoot: string;
  composeFile: string;
  envFile: string;
}

/**
 * Runs compose against one compose file and env file, from the project root
 */
export class DockerComposeRunner implements ComposeRunner {
  constructor(
    private readonly command: string[],
    private readonly target: ComposeTarget,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  run(args: string[], options: ComposeRunOptions = {}): Promise<CommandResult> {
    const [bin, ...prefix] = this.command;
    if (!bin) {
      throw new PreconditionFailedError("Docker Compose", "no compose command configured");
    }

    return this.runner(
      bin,
      [...prefix, "-f", this.target.composeFile, "--env-file", this.target.envFile, ...args],
      { cwd: this.target.projectRoot, inherit: options.interactive },
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a compose file. Returns null if it cannot be read or has no services.
 */
export async function parseComposeFile(composePath: string): Promise<ComposeFile | null> {
  let parsed: unknown;
  try {
    parsed = yaml.load(await readFile(composePath, "utf8"));
  } catch (error) {
    logger.error(`Failed to parse compose file: ${composePath}`, error);
    return null;
  }

  if (!isRecord(parsed) || !isRecord(parsed.services)) {
    logger.error(`No services found in compose file: ${composePath}`);
    return null;
  }

  const volumes: Record<string, ComposeVolumeDefinition | null> = {};
  if (isRecord(parsed.volumes)) {
    for (const [key, def] of Object.entries(parsed.volumes)) {
      volumes[key] = isRecord(def) ? def : null;
    }
  }

  const services: Record<string, ComposeServiceDefinition> = {};
  for (const [name, def] of Object.entries(parsed.services)) {
    services[name] = isRecord(def) ? def : {};
  }

  return { services, volumes };
}

/**
 * Docker volume names declared at the top level of a compose file. A volume
 * with an explicit `name:` (external ones usually) goes by that name.
 */
export function getDeclaredVolumeNames(composeFile: ComposeFile): string[] {
  return Object.entries(composeFile.volumes).map(([key, def]) => {
    const name = def?.name;
    return typeof name === "string" && name ? name : key;
  });
}

export function getServiceNames(composeFile: ComposeFile): string[] {
  return Object.keys(composeFile.services);
}

function toHealth(value: unknown): ServiceHealth {
  if (value === "healthy" || value === "unhealthy" || value === "starting") {
    return value;
  }
  return "none";
}

function toServiceStatus(entry: Record<string, unknown>): ServiceStatus {
  const text = (key: string) => {
    const value = entry[key];
    return typeof value === "string" ? value : "";
  };

  const state = text("State").toLowerCase();
  const health = toHealth(text("Health").toLowerCase());
  const running = state === "running";

  return {
    service: text("Service"),
    container: text("Name"),
    state,
    status: text("Status"),
    health,
    running,
    healthy: health === "healthy" || (health === "none" && running),
  };
}

/**
 * Parse `compose ps --format json`. Older compose releases print one JSON
 * array, newer ones one object per line.
 */
export function parseComposePs(stdout: string): ServiceStatus[] {
  const trimmed = stdout.trim();
  if (!trimmed) {
    return [];
  }

  const entries: unknown[] = [];
  if (trimmed.startsWith("[")) {
    const parsed: unknown = JSON.parse(trimmed);
    if (Array.isArray(parsed)) entries.push(...parsed);
  } else {
    for (const line of trimmed.split("\n").filter(Boolean)) {
      try {
        entries.push(JSON.parse(line));
      } catch {
        logger.debug(`Failed to parse compose ps line: ${line}`);
      }
    }
  }

  return entries.filter(isRecord).map(toServiceStatus);
}
