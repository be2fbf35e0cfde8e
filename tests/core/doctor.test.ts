import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type DoctorCheck, doctorPassed, runDoctor } from "../../src/core/doctor";
import type { DeploymentContext } from "../../src/types";
import { fakeRunner, makeContext, makeTempDir, removeTempDir } from "../helpers/fakes";

const COMPOSE = `
services:
  n8n:
    image: n8nio/n8n
  postgres:
    image: postgres:16
volumes:
  app-data:
    external: true
`;

function find(checks: DoctorCheck[], name: string): DoctorCheck | undefined {
  return checks.find((c) => c.name === name);
}

describe("runDoctor", () => {
  let root: string;
  let ctx: DeploymentContext;

  beforeEach(async () => {
    root = await makeTempDir("doctor");
    ctx = makeContext(root);
    await writeFile(ctx.composeFile, COMPOSE);
    await writeFile(ctx.envFile, "N8N_ENCRYPTION_KEY=test-secret\n");
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  test("passes with warnings when only optional pieces are missing", async () => {
    // systemctl missing, every volume present
    const { runner } = fakeRunner((bin, args) => {
      if (bin === "systemctl") return { exitCode: 127 };
      if (args[0] === "volume") return { stdout: JSON.stringify([{ Name: args[2], Driver: "local" }]) };
      if (args[0] === "version") return { stdout: "27.1.1" };
      return undefined;
    });

    const checks = await runDoctor(ctx, runner);

    expect(doctorPassed(checks)).toBe(true);
    expect(find(checks, "Docker")).toEqual({ name: "Docker", status: "ok", detail: "server 27.1.1" });
    expect(find(checks, "Compose")).toEqual({ name: "Compose", status: "ok", detail: "docker compose" });
    expect(find(checks, "Volume app-data declared")?.status).toBe("ok");
    expect(find(checks, "Volume db-data declared")).toEqual({
      name: "Volume db-data declared",
      status: "warn",
      detail: "not declared in compose file",
    });
    expect(find(checks, "Service n8n")?.status).toBe("ok");
    expect(find(checks, "Encryption key")).toEqual({
      name: "Encryption key",
      status: "ok",
      detail: "N8N_ENCRYPTION_KEY is set",
    });
    expect(find(checks, "Volume db-data")).toEqual({
      name: "Volume db-data",
      status: "ok",
      detail: "exists (local)",
    });
    expect(find(checks, "nginx template")?.status).toBe("warn");
    expect(find(checks, "nginx upstream")).toBeUndefined();
    expect(checks.some((c) => c.name.startsWith("Host "))).toBe(false);
  });

  test("fails without docker and skips volume checks", async () => {
    const { runner } = fakeRunner((bin) => (bin === "docker" || bin === "docker-compose" ? { exitCode: 1 } : undefined));

    const checks = await runDoctor(ctx, runner);

    expect(doctorPassed(checks)).toBe(false);
    expect(find(checks, "Docker")?.status).toBe("fail");
    expect(find(checks, "Compose")?.status).toBe("fail");
    expect(find(checks, "Volume app-data")).toBeUndefined();
  });

  test("fails when the env file is missing and warns about an unset key", async () => {
    await writeFile(ctx.envFile, "N8N_ENCRYPTION_KEY=\n");
    const { runner } = fakeRunner((bin) => (bin === "systemctl" ? { exitCode: 127 } : undefined));

    const checks = await runDoctor(ctx, runner);
    expect(find(checks, "Encryption key")?.status).toBe("warn");

    const missing = await runDoctor({ ...ctx, envFile: path.join(root, "missing.env") }, runner);
    expect(find(missing, "Env file")).toEqual({
      name: "Env file",
      status: "fail",
      detail: `missing: ${path.join(root, "missing.env")}`,
    });
    expect(doctorPassed(missing)).toBe(false);
  });

  test("checks that the nginx template proxies via the upstream variable", async () => {
    await mkdir(path.dirname(ctx.proxy.template), { recursive: true });
    await writeFile(ctx.proxy.template, "location / {\n  proxy_pass http://{{ n8n_upstream }};\n}\n");
    const { runner } = fakeRunner((bin) => (bin === "systemctl" ? { exitCode: 127 } : undefined));

    expect(find(await runDoctor(ctx, runner), "nginx upstream")?.status).toBe("ok");

    await writeFile(ctx.proxy.template, "location / {\n  proxy_pass http://127.0.0.1:5678;\n}\n");
    expect(find(await runDoctor(ctx, runner), "nginx upstream")?.status).toBe("warn");
  });

  test("warns about an active host web server", async () => {
    const { runner } = fakeRunner((bin, args) =>
      bin === "systemctl" ? { exitCode: args[2] === "nginx" ? 0 : 3 } : undefined,
    );

    const checks = await runDoctor(ctx, runner);
    expect(find(checks, "Host nginx")?.status).toBe("warn");
    expect(find(checks, "Host apache2")).toBeUndefined();
  });
});
