/**
 * VolumeStore backed by Docker named volumes. Volume contents are read and
 * written through a throwaway helper container running tar.
 */

import * as path from "node:path";
import type { VolumeStore } from "../types";
import { ToolFailedError } from "../utils/errors";
import type { DockerClient } from "./client";
import { createVolume, volumeExists } from "./volume";

const VOLUME_MOUNT = "/data";
const ARCHIVE_MOUNT = "/backup";

export class DockerVolumeStore implements VolumeStore {
  private imageReady = false;

  constructor(
    private readonly client: DockerClient,
    private readonly helperImage: string = "busybox",
  ) {}

  exists(volumeName: string): Promise<boolean> {
    return volumeExists(this.client, volumeName);
  }

  create(volumeName: string): Promise<void> {
    return createVolume(this.client, volumeName);
  }

  async snapshot(volumeName: string, outputDir: string, archiveName: string): Promise<void> {
    await this.ensureHelperImage();

    const result = await this.client.runContainer({
      image: this.helperImage,
      command: ["tar", "czf", `${ARCHIVE_MOUNT}/${archiveName}`, "-C", VOLUME_MOUNT, "."],
      volumes: [
        { source: volumeName, target: VOLUME_MOUNT, readonly: true },
        { source: path.resolve(outputDir), target: ARCHIVE_MOUNT },
      ],
    });

    if (!result.success) {
      throw new ToolFailedError(`tar of volume ${volumeName}`, result);
    }
  }

  async replay(volumeName: string, archivePath: string): Promise<void> {
    await this.ensureHelperImage();

    const absolute = path.resolve(archivePath);
    const result = await this.client.runContainer({
      image: this.helperImage,
      command: [
        "tar",
        "xzf",
        `${ARCHIVE_MOUNT}/${path.basename(absolute)}`,
        "-C",
        VOLUME_MOUNT,
      ],
      volumes: [
        { source: volumeName, target: VOLUME_MOUNT },
        { source: path.dirname(absolute), target: ARCHIVE_MOUNT, readonly: true },
      ],
    });

    if (!result.success) {
      throw new ToolFailedError(`untar into volume ${volumeName}`, result);
    }
  }

  private async ensureHelperImage(): Promise<void> {
    if (this.imageReady) return;
    if (!(await this.client.ensureImage(this.helperImage))) {
      throw new ToolFailedError(`docker pull ${this.helperImage}`, {
        exitCode: 1,
        stdout: "",
        stderr: "image not available",
      });
    }
    this.imageReady = true;
  }
}
