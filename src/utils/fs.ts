import { mkdtemp, rm, stat } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

export async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

export async function isFile(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isFile();
  } catch {
    return false;
  }
}

export async function fileSize(target: string): Promise<number> {
  return (await stat(target)).size;
}

/**
 * Create a private working directory. Callers own its removal.
 */
export async function makeScratchDir(prefix: string, parent: string = os.tmpdir()): Promise<string> {
  return mkdtemp(path.join(parent, prefix));
}

export async function removeDir(target: string): Promise<void> {
  await rm(target, { recursive: true, force: true });
}
