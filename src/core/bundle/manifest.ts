/**
 * manifest.json inside a bundle. Optional on read: bundles made without one
 * restore exactly as before, bundles with one get their archives verified.
 * A manifest from a newer format is read leniently and only the digests in
 * a known shape are checked.
 */

import * as path from "node:path";
import type { ArchiveDigest, BundleManifest, ProjectPackage, Snapshot } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { PROJECT_ARCHIVE_NAME } from "../../utils/naming";

export const MANIFEST_FILE = "manifest.json";

export const MANIFEST_FORMAT_VERSION = 1;

export function buildManifest(
  project: ProjectPackage,
  snapshots: Snapshot[],
  createdAt: Date,
): BundleManifest {
  const archives: Record<string, ArchiveDigest> = {
    [PROJECT_ARCHIVE_NAME]: { sha256: project.checksum, sizeBytes: project.sizeBytes },
  };
  for (const snapshot of snapshots) {
    archives[snapshot.archiveName] = { sha256: snapshot.checksum, sizeBytes: snapshot.sizeBytes };
  }

  return {
    formatVersion: MANIFEST_FORMAT_VERSION,
    createdAt: createdAt.toISOString(),
    volumes: snapshots.map((s) => s.volumeName),
    archives,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDigest(value: unknown): value is ArchiveDigest {
  return isRecord(value) && typeof value.sha256 === "string" && typeof value.sizeBytes === "number";
}

function readableDigests(archives: Record<string, unknown>): Record<string, ArchiveDigest> {
  const digests: Record<string, ArchiveDigest> = {};
  for (const [name, digest] of Object.entries(archives)) {
    if (isDigest(digest)) {
      digests[name] = { sha256: digest.sha256, sizeBytes: digest.sizeBytes };
    }
  }
  return digests;
}

/**
 * Parse and shape-check a manifest
 * @throws Error describing the first problem found
 */
export function parseManifest(content: string): BundleManifest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`manifest is not valid JSON: ${errorMessage(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new Error("manifest must be an object");
  }

  const { formatVersion, createdAt, volumes, archives } = parsed;

  if (typeof formatVersion !== "number") {
    throw new Error("manifest.formatVersion must be a number");
  }
  if (formatVersion > MANIFEST_FORMAT_VERSION) {
    logger.warn(
      `Bundle manifest format ${formatVersion} is newer than this tool understands (${MANIFEST_FORMAT_VERSION}); ` +
        "verifying only the checksums it can read",
    );
    return {
      formatVersion,
      createdAt: typeof createdAt === "string" ? createdAt : "",
      volumes: Array.isArray(volumes) ? volumes.filter((v): v is string => typeof v === "string") : [],
      archives: isRecord(archives) ? readableDigests(archives) : {},
    };
  }
  if (typeof createdAt !== "string") {
    throw new Error("manifest.createdAt must be a string");
  }
  if (!Array.isArray(volumes) || !volumes.every((v): v is string => typeof v === "string")) {
    throw new Error("manifest.volumes must be an array of strings");
  }
  if (!isRecord(archives)) {
    throw new Error("manifest.archives must be an object");
  }

  for (const [name, digest] of Object.entries(archives)) {
    if (!isDigest(digest)) {
      throw new Error(`manifest.archives.${name} must have sha256 and sizeBytes`);
    }
  }

  return { formatVersion, createdAt, volumes, archives: readableDigests(archives) };
}

/**
 * Compare every archive listed in the manifest with the file next to it
 * @returns archive names that are missing or whose checksum differs
 */
export async function findManifestMismatches(
  innerDir: string,
  manifest: BundleManifest,
): Promise<string[]> {
  const mismatches: string[] = [];

  for (const [name, digest] of Object.entries(manifest.archives)) {
    const archivePath = path.join(innerDir, path.basename(name));
    try {
      if ((await computeFileChecksum(archivePath)) !== digest.sha256) {
        mismatches.push(name);
      }
    } catch {
      mismatches.push(name);
    }
  }

  return mismatches;
}
