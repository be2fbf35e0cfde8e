/**
 * Combines a project package and volume snapshots into one bundle file:
 *
 *   <bundle>.tgz
 *   └── export-YYYY-MM-DD-HHMMSS/
 *       ├── project.tgz
 *       ├── <volume>.tgz   (one per volume)
 *       └── manifest.json
 */

import { copyFile, mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { Archiver, Bundle, ProjectPackage, Snapshot } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { DeployError, PreconditionFailedError } from "../../utils/errors";
import { formatBytes } from "../../utils/format";
import { fileSize, makeScratchDir, pathExists, removeDir } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { exportDirName, PROJECT_ARCHIVE_NAME } from "../../utils/naming";
import { buildManifest, MANIFEST_FILE } from "./manifest";

export interface AssemblerOptions {
  /** Parent of the scratch directory, the system temp dir by default */
  scratchParent?: string;
}

export class BundleAssembler {
  constructor(
    private readonly archiver: Archiver,
    private readonly options: AssemblerOptions = {},
  ) {}

  async assemble(
    project: ProjectPackage,
    snapshots: Snapshot[],
    destination: string,
    createdAt: Date = new Date(),
  ): Promise<Bundle> {
    const bundlePath = path.resolve(destination);

    if (await pathExists(bundlePath)) {
      throw new PreconditionFailedError(
        `a free bundle path`,
        `${bundlePath} already exists; choose another --out`,
      );
    }

    const clash = snapshots.find((s) => s.archiveName === PROJECT_ARCHIVE_NAME || s.archiveName === MANIFEST_FILE);
    if (clash) {
      throw new DeployError(`Snapshot of volume ${clash.volumeName} clashes with ${clash.archiveName} in the bundle`);
    }

    const volumes = snapshots.map((s) => s.volumeName);
    const duplicate = volumes.find((name, i) => volumes.indexOf(name) !== i);
    if (duplicate) {
      throw new DeployError(`Volume ${duplicate} was snapshotted more than once`);
    }

    const scratchDir = await makeScratchDir("n8n-deploy-assemble-", this.options.scratchParent);
    const innerDir = exportDirName(createdAt);

    try {
      const workDir = path.join(scratchDir, innerDir);
      await mkdir(workDir);

      await copyFile(project.archivePath, path.join(workDir, PROJECT_ARCHIVE_NAME));
      for (const snapshot of snapshots) {
        await copyFile(snapshot.archivePath, path.join(workDir, snapshot.archiveName));
      }

      const manifest = buildManifest(project, snapshots, createdAt);
      await writeFile(path.join(workDir, MANIFEST_FILE), `${JSON.stringify(manifest, null, 2)}\n`);

      await mkdir(path.dirname(bundlePath), { recursive: true });

      try {
        await this.archiver.create(bundlePath, scratchDir, [innerDir]);
      } catch (error) {
        // never leave a half-written bundle behind
        await removeDir(bundlePath);
        throw error;
      }

      const sizeBytes = await fileSize(bundlePath);
      logger.info(`Bundle created: ${bundlePath} (${formatBytes(sizeBytes)})`);

      return {
        bundlePath,
        bundleName: path.basename(bundlePath),
        innerDir,
        volumes,
        createdAt,
        sizeBytes,
        checksum: await computeFileChecksum(bundlePath),
      };
    } finally {
      await removeDir(scratchDir);
      logger.debug(`Removed assemble scratch directory ${scratchDir}`);
    }
  }
}
