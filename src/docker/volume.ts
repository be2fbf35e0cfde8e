/**
 * Docker volume operations
 */

import { ToolFailedError } from "../utils/errors";
import { logger } from "../utils/logger";
import type { DockerClient } from "./client";

export interface DockerVolume {
  name: string;
  driver: string;
  mountpoint: string;
  labels: Record<string, string>;
  scope: string;
  createdAt: string;
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

function labelsField(record: Record<string, unknown>): Record<string, string> {
  const labels: Record<string, string> = {};
  const value = record.Labels;
  if (value && typeof value === "object") {
    for (const [key, label] of Object.entries(value)) {
      if (typeof label === "string") labels[key] = label;
    }
  }
  return labels;
}

/**
 * Parse the JSON printed by `docker volume inspect`
 */
export function parseVolumeInspect(stdout: string): DockerVolume | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    return null;
  }

  const volumeData: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
  if (!volumeData || typeof volumeData !== "object") {
    return null;
  }

  const record = Object.fromEntries(Object.entries(volumeData));
  return {
    name: stringField(record, "Name"),
    driver: stringField(record, "Driver"),
    mountpoint: stringField(record, "Mountpoint"),
    labels: labelsField(record),
    scope: stringField(record, "Scope") || "local",
    createdAt: stringField(record, "CreatedAt"),
  };
}

/**
 * Get detailed information about a specific volume
 */
export async function inspectVolume(client: DockerClient, name: string): Promise<DockerVolume | null> {
  const result = await client.run(["volume", "inspect", name]);

  if (!result.success) {
    logger.debug(`Volume not found or error: ${name}`, result.stderr);
    return null;
  }

  const volume = parseVolumeInspect(result.stdout);
  if (!volume) {
    logger.error(`Failed to parse volume inspect output for ${name}`);
  }
  return volume;
}

/**
 * Check if a volume exists
 */
export async function volumeExists(client: DockerClient, name: string): Promise<boolean> {
  const result = await client.run(["volume", "inspect", name]);
  return result.success;
}

export async function createVolume(client: DockerClient, name: string): Promise<void> {
  const result = await client.run(["volume", "create", name]);
  if (!result.success) {
    throw new ToolFailedError(`docker volume create ${name}`, result);
  }
}

/**
 * Create a volume unless it already exists
 * @returns true if the volume was created
 */
export async function createVolumeIfMissing(client: DockerClient, name: string): Promise<boolean> {
  if (await volumeExists(client, name)) {
    logger.info(`Volume already exists: ${name}`);
    return false;
  }

  logger.info(`Creating volume: ${name}`);
  await createVolume(client, name);
  return true;
}
