/**
 * Bundle type definitions and the capabilities the bundle core runs against
 */

import type { ProjectFileEntry } from "./config";

/**
 * Persistent named storage owned by the container runtime
 */
export interface VolumeStore {
  exists(volumeName: string): Promise<boolean>;
  /** Create an empty volume */
  create(volumeName: string): Promise<void>;
  /**
   * Write a gzip tarball of the volume root to outputDir/archiveName.
   * The volume is only ever opened read-only.
   */
  snapshot(volumeName: string, outputDir: string, archiveName: string): Promise<void>;
  /** Extract a snapshot archive at the volume root, overwriting what it contains */
  replay(volumeName: string, archivePath: string): Promise<void>;
}

/**
 * Gzip tarball creation and extraction
 */
export interface Archiver {
  /** Archive `entries` (relative to cwd) into archivePath, in the given order */
  create(archivePath: string, cwd: string, entries: string[]): Promise<void>;
  extract(archivePath: string, destDir: string): Promise<void>;
}

export interface Snapshot {
  volumeName: string;
  archiveName: string;
  archivePath: string;
  createdAt: Date;
  sizeBytes: number;
  /** SHA256 of the archive */
  checksum: string;
}

export interface ProjectPackage {
  archivePath: string;
  /** Entries that went into the archive, in list order */
  entries: string[];
  /** Optional entries that were absent */
  skipped: string[];
  sizeBytes: number;
  checksum: string;
}

export interface Bundle {
  bundlePath: string;
  bundleName: string;
  /** Name of the single top-level directory inside the bundle */
  innerDir: string;
  volumes: string[];
  createdAt: Date;
  sizeBytes: number;
  checksum: string;
}

export interface ArchiveDigest {
  sha256: string;
  sizeBytes: number;
}

/**
 * manifest.json written next to the archives inside a bundle
 */
export interface BundleManifest {
  formatVersion: number;
  createdAt: string;
  volumes: string[];
  /** Keyed by archive file name */
  archives: Record<string, ArchiveDigest>;
}

export interface ExportOptions {
  /** Explicit bundle path; a timestamped name in bundle.outputDir otherwise */
  out?: string;
  /** Overrides bundle.quiesce */
  quiesce?: boolean;
  /** Overrides the derived project file list */
  projectFiles?: ProjectFileEntry[];
}

export interface ExportResult {
  bundle: Bundle;
  snapshots: Snapshot[];
  project: ProjectPackage;
  /** Services were stopped for the snapshot and started again afterwards */
  quiesced: boolean;
  /** Services were running and left running (data may be inconsistent) */
  ranWhileLive: boolean;
  durationMs: number;
}

export interface RestoreOptions {
  /** Start the stack once everything is restored */
  start?: boolean;
  /** Extract the project package even if the compose file already exists */
  forceExtractProject?: boolean;
}

export interface RestoreResult {
  bundlePath: string;
  volumesRestored: string[];
  /** Volumes that did not exist and were created empty before replay */
  volumesCreated: string[];
  /** Snapshots in the bundle for volumes this deployment does not know */
  volumesIgnored: string[];
  projectExtracted: boolean;
  projectSkippedReason: string | null;
  /** The live env file carries a different encryption key than the bundle */
  encryptionKeyMismatch: boolean;
  started: boolean;
  durationMs: number;
}
