/**
 * Unpacks a bundle: validates its layout, replays every volume snapshot and
 * extracts the project files when the deployment has none yet.
 *
 * Volume replay is not transactional. A failure midway leaves that volume
 * partially overwritten; recovery is re-running the import from a known-good
 * bundle. On any failure the scratch directory is kept for inspection.
 */

import { mkdir, readdir, readFile } from "node:fs/promises";
import * as path from "node:path";
import { getEnvValue, readEnvFile } from "../../config/env-file";
import type { Archiver, DeploymentContext, RestoreOptions, RestoreResult, VolumeStore } from "../../types";
import {
  errorMessage,
  MalformedBundleError,
  PreconditionFailedError,
  RestoreInterruptedError,
} from "../../utils/errors";
import { formatDuration } from "../../utils/format";
import { isFile, makeScratchDir, pathExists, removeDir } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { PROJECT_ARCHIVE_NAME, snapshotArchiveName, volumeNameFromArchive } from "../../utils/naming";
import { toArchivePath } from "../../utils/path";
import { findManifestMismatches, MANIFEST_FILE, parseManifest } from "./manifest";

export type RestorerContext = Pick<
  DeploymentContext,
  "projectRoot" | "composeFile" | "envFile" | "volumes" | "encryptionKeyVar"
>;

export interface RestorerDeps {
  volumes: VolumeStore;
  archiver: Archiver;
  stack: { resume(): Promise<void> };
}

export interface RestorerOptions {
  /** Parent of the scratch directory, the system temp dir by default */
  scratchParent?: string;
}

interface LocatedBundle {
  innerDir: string;
  /** Snapshots present for volumes this deployment does not know */
  ignored: string[];
}

interface ProjectOutcome {
  extracted: boolean;
  skippedReason: string | null;
  keyMismatch: boolean;
}

export class BundleRestorer {
  constructor(
    private readonly ctx: RestorerContext,
    private readonly deps: RestorerDeps,
    private readonly options: RestorerOptions = {},
  ) {}

  async restore(bundlePath: string, options: RestoreOptions = {}): Promise<RestoreResult> {
    const startTime = Date.now();
    const absolute = path.resolve(bundlePath);

    if (!(await isFile(absolute))) {
      throw new PreconditionFailedError(`bundle ${absolute}`, "file not found");
    }

    const scratchDir = await makeScratchDir("n8n-deploy-import-", this.options.scratchParent);
    logger.info(`Extracting bundle to: ${scratchDir}`);

    let located: LocatedBundle;
    const volumesRestored: string[] = [];
    const volumesCreated: string[] = [];
    let project: ProjectOutcome;

    try {
      await this.extractBundle(absolute, scratchDir);
      located = await this.locate(absolute, scratchDir);

      // nothing below runs unless the bundle is complete
      for (const volumeName of this.ctx.volumes) {
        const created = await this.replayVolume(volumeName, located.innerDir, scratchDir);
        if (created) volumesCreated.push(volumeName);
        volumesRestored.push(volumeName);
      }

      project = await this.restoreProject(located.innerDir, scratchDir, options);
    } catch (error) {
      logger.error(`Import failed; scratch directory kept for inspection: ${scratchDir}`);
      throw error;
    }

    await removeDir(scratchDir);
    logger.debug(`Removed import scratch directory ${scratchDir}`);

    let started = false;
    if (options.start) {
      await this.deps.stack.resume();
      started = true;
    }

    const durationMs = Date.now() - startTime;
    logger.info(`Import completed in ${formatDuration(durationMs)}`);

    return {
      bundlePath: absolute,
      volumesRestored,
      volumesCreated,
      volumesIgnored: located.ignored,
      projectExtracted: project.extracted,
      projectSkippedReason: project.skippedReason,
      encryptionKeyMismatch: project.keyMismatch,
      started,
      durationMs,
    };
  }

  private async extractBundle(bundlePath: string, scratchDir: string): Promise<void> {
    try {
      await this.deps.archiver.extract(bundlePath, scratchDir);
    } catch (error) {
      throw new MalformedBundleError(
        bundlePath,
        `cannot be extracted: ${errorMessage(error)}`,
        scratchDir,
        { cause: error },
      );
    }
  }

  /**
   * Find the single inner directory and check it holds the project archive
   * and one snapshot per known volume
   */
  private async locate(bundlePath: string, scratchDir: string): Promise<LocatedBundle> {
    const malformed = (reason: string, cause?: unknown) =>
      new MalformedBundleError(bundlePath, reason, scratchDir, cause ? { cause } : undefined);

    const dirs = (await readdir(scratchDir, { withFileTypes: true }))
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .sort();
    const [inner, ...others] = dirs;
    if (!inner) {
      throw malformed("bundle is missing its inner export directory");
    }
    if (others.length > 0) {
      throw malformed(`expected one inner directory, found ${dirs.join(", ")}`);
    }

    const innerDir = path.join(scratchDir, inner);
    const files = new Set(
      (await readdir(innerDir, { withFileTypes: true })).filter((e) => e.isFile()).map((e) => e.name),
    );

    const missing: string[] = [];
    if (!files.has(PROJECT_ARCHIVE_NAME)) {
      missing.push(PROJECT_ARCHIVE_NAME);
    }
    for (const volumeName of this.ctx.volumes) {
      const archiveName = snapshotArchiveName(volumeName);
      if (!files.has(archiveName)) missing.push(archiveName);
    }
    if (missing.length > 0) {
      throw malformed(`missing ${missing.join(", ")} in ${inner}`);
    }

    if (files.has(MANIFEST_FILE)) {
      let mismatches: string[];
      try {
        const manifest = parseManifest(await readFile(path.join(innerDir, MANIFEST_FILE), "utf8"));
        mismatches = await findManifestMismatches(innerDir, manifest);
      } catch (error) {
        throw malformed(errorMessage(error), error);
      }
      if (mismatches.length > 0) {
        throw malformed(`checksum mismatch for ${mismatches.join(", ")}`);
      }
      logger.debug("Bundle manifest checksums verified");
    }

    const ignored: string[] = [];
    for (const file of files) {
      const volumeName = volumeNameFromArchive(file);
      if (volumeName && !this.ctx.volumes.includes(volumeName)) {
        logger.warn(`Bundle contains a snapshot of unknown volume ${volumeName}; ignoring it`);
        ignored.push(volumeName);
      }
    }

    return { innerDir, ignored };
  }

  /**
   * @returns true if the volume had to be created first
   */
  private async replayVolume(volumeName: string, innerDir: string, scratchDir: string): Promise<boolean> {
    try {
      let created = false;
      if (!(await this.deps.volumes.exists(volumeName))) {
        logger.info(`Creating volume: ${volumeName}`);
        await this.deps.volumes.create(volumeName);
        created = true;
      }

      logger.info(`Restoring ${volumeName} volume...`);
      await this.deps.volumes.replay(volumeName, path.join(innerDir, snapshotArchiveName(volumeName)));
      return created;
    } catch (error) {
      throw new RestoreInterruptedError(volumeName, scratchDir, { cause: error });
    }
  }

  /**
   * Extract project files unless a live configuration is present. Existing
   * files are only overwritten when forced.
   */
  private async restoreProject(
    innerDir: string,
    scratchDir: string,
    options: RestoreOptions,
  ): Promise<ProjectOutcome> {
    const projectArchive = path.join(innerDir, PROJECT_ARCHIVE_NAME);

    if (!(await pathExists(this.ctx.composeFile)) || options.forceExtractProject) {
      logger.info(`Extracting project files into ${this.ctx.projectRoot}`);
      await mkdir(this.ctx.projectRoot, { recursive: true });
      await this.deps.archiver.extract(projectArchive, this.ctx.projectRoot);
      return { extracted: true, skippedReason: null, keyMismatch: false };
    }

    const reason = `${path.basename(this.ctx.composeFile)} exists; skipping project extraction. Use --force-extract to override.`;
    logger.warn(reason);

    const keyMismatch = await this.encryptionKeyDiffers(projectArchive, scratchDir);
    return { extracted: false, skippedReason: reason, keyMismatch };
  }

  /**
   * Compare the encryption key in the bundled env file with the live one.
   * Restored data is unreadable under a different key.
   */
  private async encryptionKeyDiffers(projectArchive: string, scratchDir: string): Promise<boolean> {
    const previewDir = path.join(scratchDir, "project-preview");
    await mkdir(previewDir, { recursive: true });

    try {
      await this.deps.archiver.extract(projectArchive, previewDir);
    } catch (error) {
      logger.warn(`Could not inspect the bundled env file: ${errorMessage(error)}`);
      return false;
    }

    const envName = toArchivePath(this.ctx.envFile, this.ctx.projectRoot);
    const bundled = await readEnvFile(path.join(previewDir, envName));
    const live = await readEnvFile(this.ctx.envFile);
    if (!bundled || !live) {
      return false;
    }

    const key = this.ctx.encryptionKeyVar;
    if (getEnvValue(bundled, key) === getEnvValue(live, key)) {
      return false;
    }

    logger.warn(
      `${key} in ${envName} differs from the bundle's. Restored credentials can only be ` +
        `decrypted with the bundle's key; re-run with --force-extract or copy the key over.`,
    );
    return true;
  }
}
