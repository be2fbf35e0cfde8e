import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { TarArchiver } from "../../src/core/archive/tar";
import { DeployError, ToolFailedError } from "../../src/utils/errors";
import { fakeRunner, makeTempDir, removeTempDir } from "../helpers/fakes";

describe("TarArchiver", () => {
  let tempDir: string;
  let sourceDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("tar");
    sourceDir = path.join(tempDir, "source");
    await mkdir(path.join(sourceDir, "nginx", "templates"), { recursive: true });
    await writeFile(path.join(sourceDir, "compose.yml"), "services: {}\n");
    await writeFile(path.join(sourceDir, ".env"), "N8N_ENCRYPTION_KEY=test-secret\n");
    await writeFile(path.join(sourceDir, "nginx", "templates", "n8n.conf.j2"), "server {}\n");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  test("round-trips files and directories with the system tar", async () => {
    const archive = path.join(tempDir, "project.tgz");
    const dest = path.join(tempDir, "dest");
    await mkdir(dest);

    const archiver = new TarArchiver();
    await archiver.create(archive, sourceDir, ["compose.yml", ".env", "nginx"]);
    await archiver.extract(archive, dest);

    expect(await readFile(path.join(dest, ".env"), "utf8")).toBe("N8N_ENCRYPTION_KEY=test-secret\n");
    expect(await readFile(path.join(dest, "nginx", "templates", "n8n.conf.j2"), "utf8")).toBe("server {}\n");
  });

  test("fails on a file that is not a gzip tarball", async () => {
    const garbage = path.join(tempDir, "garbage.tgz");
    await writeFile(garbage, "not an archive");

    await expect(new TarArchiver().extract(garbage, tempDir)).rejects.toBeInstanceOf(ToolFailedError);
  });

  test("fails when an entry is missing", async () => {
    await expect(
      new TarArchiver().create(path.join(tempDir, "x.tgz"), sourceDir, ["missing.txt"]),
    ).rejects.toBeInstanceOf(ToolFailedError);
  });

  test("refuses to create an empty archive", async () => {
    await expect(new TarArchiver().create(path.join(tempDir, "empty.tgz"), sourceDir, [])).rejects.toThrow(
      DeployError,
    );
  });

  test("passes entries in order after -C", async () => {
    const { runner, calls } = fakeRunner();
    await new TarArchiver("gtar", runner).create("/out/p.tgz", "/srv/app", ["compose.yml", ".env"]);

    expect(calls).toEqual([
      { bin: "gtar", args: ["-czf", "/out/p.tgz", "-C", "/srv/app", "compose.yml", ".env"], options: {} },
    ]);
  });
});
