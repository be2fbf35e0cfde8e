/**
 * Preflight checks for a deployment
 */

import { readFile } from "node:fs/promises";
import { getEnvValue, readEnvFile } from "../config/env-file";
import { DockerClient } from "../docker/client";
import {
  detectComposeCommand,
  getDeclaredVolumeNames,
  getServiceNames,
  parseComposeFile,
} from "../docker/compose";
import { inspectVolume } from "../docker/volume";
import type { DeploymentContext } from "../types";
import { errorMessage } from "../utils/errors";
import { COMMAND_NOT_FOUND, type CommandRunner, runCommand } from "../utils/exec";
import { isFile } from "../utils/fs";

export type CheckStatus = "ok" | "warn" | "fail";

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  detail: string;
}

const HOST_WEB_SERVERS = ["nginx", "apache2"];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function doctorPassed(checks: DoctorCheck[]): boolean {
  return !checks.some((c) => c.status === "fail");
}

async function checkFile(name: string, filePath: string, missing: CheckStatus): Promise<DoctorCheck> {
  return (await isFile(filePath))
    ? { name, status: "ok", detail: filePath }
    : { name, status: missing, detail: `missing: ${filePath}` };
}

async function checkComposeContents(ctx: DeploymentContext): Promise<DoctorCheck[]> {
  const composeFile = await parseComposeFile(ctx.composeFile);
  if (!composeFile) {
    return [{ name: "Compose file contents", status: "fail", detail: "cannot be parsed" }];
  }

  const checks: DoctorCheck[] = [];
  const declared = getDeclaredVolumeNames(composeFile);
  for (const volume of ctx.volumes) {
    checks.push(
      declared.includes(volume)
        ? { name: `Volume ${volume} declared`, status: "ok", detail: "in compose file" }
        : { name: `Volume ${volume} declared`, status: "warn", detail: "not declared in compose file" },
    );
  }

  const services = getServiceNames(composeFile);
  for (const service of [ctx.services.app, ctx.services.database]) {
    checks.push(
      services.includes(service)
        ? { name: `Service ${service}`, status: "ok", detail: "in compose file" }
        : { name: `Service ${service}`, status: "warn", detail: "not defined in compose file" },
    );
  }

  return checks;
}

async function checkUpstreamVariable(ctx: DeploymentContext): Promise<DoctorCheck> {
  const name = "nginx upstream";
  const variable = ctx.proxy.upstreamVariable;
  const pattern = new RegExp(`proxy_pass\\s+http://\\{\\{\\s*${escapeRegExp(variable)}\\s*\\}\\}`);
  const content = await readFile(ctx.proxy.template, "utf8");

  return pattern.test(content)
    ? { name, status: "ok", detail: `template proxies via ${variable}` }
    : { name, status: "warn", detail: `template may not proxy via the ${variable} variable` };
}

export async function runDoctor(
  ctx: DeploymentContext,
  runner: CommandRunner = runCommand,
): Promise<DoctorCheck[]> {
  const checks: DoctorCheck[] = [];
  const docker = new DockerClient(ctx.docker.bin, runner);

  const dockerOk = await docker.isAvailable();
  if (dockerOk) {
    const version = await docker.version();
    checks.push({ name: "Docker", status: "ok", detail: version ? `server ${version}` : "reachable" });
  } else {
    checks.push({ name: "Docker", status: "fail", detail: "daemon not reachable" });
  }

  try {
    const command = await detectComposeCommand(ctx.docker.bin, runner);
    checks.push({ name: "Compose", status: "ok", detail: command.join(" ") });
  } catch (error) {
    checks.push({ name: "Compose", status: "fail", detail: errorMessage(error) });
  }

  const composeCheck = await checkFile("Compose file", ctx.composeFile, "fail");
  checks.push(composeCheck);
  if (composeCheck.status === "ok") {
    checks.push(...(await checkComposeContents(ctx)));
  }

  checks.push(await checkFile("Env file", ctx.envFile, "fail"));

  const env = await readEnvFile(ctx.envFile);
  if (env) {
    const key = ctx.encryptionKeyVar;
    checks.push(
      getEnvValue(env, key)
        ? { name: "Encryption key", status: "ok", detail: `${key} is set` }
        : {
            name: "Encryption key",
            status: "warn",
            detail: `${key} is not set; stored credentials depend on a key that is not in the env file`,
          },
    );
  }

  if (dockerOk) {
    for (const volume of ctx.volumes) {
      const info = await inspectVolume(docker, volume);
      checks.push(
        info
          ? { name: `Volume ${volume}`, status: "ok", detail: `exists (${info.driver || "local"})` }
          : { name: `Volume ${volume}`, status: "warn", detail: "does not exist; run init" },
      );
    }
  }

  const templateCheck = await checkFile("nginx template", ctx.proxy.template, "warn");
  checks.push(templateCheck);
  checks.push(await checkFile("nginx ssl include", ctx.proxy.sslInclude, "warn"));
  checks.push(await checkFile("acme deploy hook", ctx.proxy.deployHook, "warn"));
  if (templateCheck.status === "ok") {
    checks.push(await checkUpstreamVariable(ctx));
  }

  for (const service of HOST_WEB_SERVERS) {
    const result = await runner("systemctl", ["is-active", "--quiet", service]);
    if (result.exitCode === COMMAND_NOT_FOUND) {
      break;
    }
    if (result.success) {
      checks.push({
        name: `Host ${service}`,
        status: "warn",
        detail: "service is active; it may block ports 80/443",
      });
    }
  }

  return checks;
}
