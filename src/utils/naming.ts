/**
 * Bundle and archive naming
 */

export const PROJECT_ARCHIVE_NAME = "project.tgz";

export const SNAPSHOT_ARCHIVE_SUFFIX = ".tgz";

export const EXPORT_DIR_PREFIX = "export-";

// Docker's own rule for volume names
export const VOLUME_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Local-time timestamp in the form YYYY-MM-DD-HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

export function generateBundleName(prefix: string, date: Date = new Date()): string {
  return `${prefix}-${formatTimestamp(date)}.tgz`;
}

export function exportDirName(date: Date = new Date()): string {
  return `${EXPORT_DIR_PREFIX}${formatTimestamp(date)}`;
}

export function snapshotArchiveName(volumeName: string): string {
  return `${volumeName}${SNAPSHOT_ARCHIVE_SUFFIX}`;
}

/**
 * A volume whose snapshot would land on the project archive's file name
 */
export function isReservedVolumeName(volumeName: string): boolean {
  return snapshotArchiveName(volumeName) === PROJECT_ARCHIVE_NAME;
}

/**
 * Inverse of snapshotArchiveName. Returns null for the project archive and
 * for anything that is not a snapshot.
 */
export function volumeNameFromArchive(fileName: string): string | null {
  if (fileName === PROJECT_ARCHIVE_NAME || !fileName.endsWith(SNAPSHOT_ARCHIVE_SUFFIX)) {
    return null;
  }
  const volumeName = fileName.slice(0, -SNAPSHOT_ARCHIVE_SUFFIX.length);
  return VOLUME_NAME_PATTERN.test(volumeName) ? volumeName : null;
}
