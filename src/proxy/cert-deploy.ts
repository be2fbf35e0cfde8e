/**
 * acme.sh deploy hook: installs a renewed certificate for nginx and reloads it
 */

import { copyFile, mkdir } from "node:fs/promises";
import * as path from "node:path";
import type { ProxySettings } from "../types";
import { DeployError, PreconditionFailedError, ToolFailedError } from "../utils/errors";
import { type CommandRunner, runCommand } from "../utils/exec";
import { isFile } from "../utils/fs";
import { logger } from "../utils/logger";
import { isPathWithinDir } from "../utils/path";

export interface CertificateFiles {
  domain: string;
  keyFile: string;
  certFile: string;
  caFile: string;
  fullchainFile: string;
}

export interface CertDeployResult {
  domainDir: string;
  installed: string[];
}

const DOMAIN_PATTERN = /^(\*\.)?[a-zA-Z0-9]([a-zA-Z0-9.-]*[a-zA-Z0-9])?$/;

/**
 * Copy key, cert and fullchain into <sslDir>/<domain>/ and reload nginx.
 * The CA file is accepted for hook compatibility; nginx only needs the chain.
 */
export async function deployCertificate(
  proxy: Pick<ProxySettings, "sslDir" | "reloadCommand">,
  files: CertificateFiles,
  runner: CommandRunner = runCommand,
): Promise<CertDeployResult> {
  if (!DOMAIN_PATTERN.test(files.domain)) {
    throw new DeployError(`Invalid domain: ${files.domain}`);
  }

  const domainDir = path.join(proxy.sslDir, files.domain);
  if (!isPathWithinDir(domainDir, proxy.sslDir)) {
    throw new DeployError(`Domain directory escapes ${proxy.sslDir}: ${files.domain}`);
  }

  const targets: Array<[string, string]> = [
    [files.keyFile, "key.pem"],
    [files.certFile, "cert.pem"],
    [files.fullchainFile, "fullchain.pem"],
  ];

  for (const [source] of targets) {
    if (!(await isFile(source))) {
      throw new PreconditionFailedError(source, `certificate file for ${files.domain}`);
    }
  }

  await mkdir(domainDir, { recursive: true });

  const installed: string[] = [];
  for (const [source, name] of targets) {
    const target = path.join(domainDir, name);
    await copyFile(source, target);
    installed.push(target);
  }

  logger.info(`Certificate has been renewed for ${files.domain}`);

  const [bin, ...args] = proxy.reloadCommand;
  if (bin) {
    const result = await runner(bin, args);
    if (!result.success) {
      throw new ToolFailedError(proxy.reloadCommand.join(" "), result);
    }
    logger.info("nginx reloaded");
  }

  return { domainDir, installed };
}
