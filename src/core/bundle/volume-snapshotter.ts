/**
 * Captures one named volume into a `<volume>.tgz` archive
 */

import * as path from "node:path";
import type { Snapshot, VolumeStore } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { errorMessage, SnapshotFailedError } from "../../utils/errors";
import { formatBytes } from "../../utils/format";
import { fileSize } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { snapshotArchiveName } from "../../utils/naming";

export class VolumeSnapshotter {
  constructor(private readonly volumes: VolumeStore) {}

  /**
   * Archive the volume's full tree into outputDir. The volume must already
   * exist; snapshots never create volumes.
   */
  async snapshot(volumeName: string, outputDir: string): Promise<Snapshot> {
    if (!(await this.volumes.exists(volumeName))) {
      throw new SnapshotFailedError(volumeName, "volume not found (run init first)");
    }

    logger.info(`Snapshotting volume: ${volumeName}`);

    const archiveName = snapshotArchiveName(volumeName);
    const archivePath = path.join(outputDir, archiveName);
    const createdAt = new Date();

    try {
      await this.volumes.snapshot(volumeName, outputDir, archiveName);
      const sizeBytes = await fileSize(archivePath);
      const checksum = await computeFileChecksum(archivePath);

      logger.info(`Volume ${volumeName} captured: ${archiveName} (${formatBytes(sizeBytes)})`);
      return { volumeName, archiveName, archivePath, createdAt, sizeBytes, checksum };
    } catch (error) {
      throw new SnapshotFailedError(volumeName, errorMessage(error), { cause: error });
    }
  }
}
