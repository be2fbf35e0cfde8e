import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  DockerComposeRunner,
  detectComposeCommand,
  getDeclaredVolumeNames,
  getServiceNames,
  parseComposeFile,
  parseComposePs,
} from "../../src/docker/compose";
import { PreconditionFailedError } from "../../src/utils/errors";
import { fakeRunner, makeTempDir, removeTempDir } from "../helpers/fakes";

describe("docker compose", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("compose");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  describe("detectComposeCommand", () => {
    test("prefers the docker compose plugin", async () => {
      const { runner } = fakeRunner();
      expect(await detectComposeCommand("docker", runner)).toEqual(["docker", "compose"]);
    });

    test("falls back to docker-compose", async () => {
      const { runner } = fakeRunner((bin) => (bin === "docker" ? { exitCode: 1 } : undefined));
      expect(await detectComposeCommand("docker", runner)).toEqual(["docker-compose"]);
    });

    test("fails when neither is available", async () => {
      const { runner } = fakeRunner(() => ({ exitCode: 127 }));
      await expect(detectComposeCommand("docker", runner)).rejects.toBeInstanceOf(PreconditionFailedError);
    });
  });

  describe("DockerComposeRunner", () => {
    test("passes compose and env files and runs from the project root", async () => {
      const { runner, calls } = fakeRunner();
      const compose = new DockerComposeRunner(
        ["docker", "compose"],
        { projectRoot: "/srv/n8n", composeFile: "/srv/n8n/compose.yml", envFile: "/srv/n8n/.env" },
        runner,
      );

      await compose.run(["logs", "-f"], { interactive: true });

      expect(calls).toEqual([
        {
          bin: "docker",
          args: ["compose", "-f", "/srv/n8n/compose.yml", "--env-file", "/srv/n8n/.env", "logs", "-f"],
          options: { cwd: "/srv/n8n", inherit: true },
        },
      ]);
    });
  });

  describe("parseComposeFile", () => {
    test("reads services and volumes", async () => {
      const composePath = path.join(tempDir, "compose.yml");
      await writeFile(
        composePath,
        `
services:
  n8n:
    image: n8nio/n8n
    volumes:
      - n8n-data:/home/node/.n8n
  postgres:
    image: postgres:16
volumes:
  n8n-data:
    external: true
  db:
    name: postgres-data
`,
      );

      const file = await parseComposeFile(composePath);
      if (!file) throw new Error("Expected compose file to be parsed");

      expect(getServiceNames(file)).toEqual(["n8n", "postgres"]);
      expect(getDeclaredVolumeNames(file)).toEqual(["n8n-data", "postgres-data"]);
    });

    test("returns null without services", async () => {
      const composePath = path.join(tempDir, "empty.yml");
      await writeFile(composePath, "volumes: {}\n");
      expect(await parseComposeFile(composePath)).toBeNull();
    });

    test("returns null for a missing file", async () => {
      expect(await parseComposeFile(path.join(tempDir, "missing.yml"))).toBeNull();
    });
  });

  describe("parseComposePs", () => {
    test("parses JSON lines", () => {
      const stdout = [
        JSON.stringify({ Service: "n8n", Name: "n8n-n8n-1", State: "running", Status: "Up 2 hours", Health: "" }),
        JSON.stringify({
          Service: "postgres",
          Name: "n8n-postgres-1",
          State: "running",
          Status: "Up 2 hours (unhealthy)",
          Health: "unhealthy",
        }),
      ].join("\n");

      expect(parseComposePs(stdout)).toEqual([
        {
          service: "n8n",
          container: "n8n-n8n-1",
          state: "running",
          status: "Up 2 hours",
          health: "none",
          running: true,
          healthy: true,
        },
        {
          service: "postgres",
          container: "n8n-postgres-1",
          state: "running",
          status: "Up 2 hours (unhealthy)",
          health: "unhealthy",
          running: true,
          healthy: false,
        },
      ]);
    });

    test("parses a JSON array", () => {
      const stdout = JSON.stringify([{ Service: "n8n", Name: "c", State: "exited", Status: "Exited (0)" }]);
      const [service] = parseComposePs(stdout);
      expect(service?.running).toBe(false);
      expect(service?.healthy).toBe(false);
    });

    test("empty output means no containers", () => {
      expect(parseComposePs("")).toEqual([]);
    });
  });
});
