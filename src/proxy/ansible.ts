/**
 * Runs the Ansible playbook that installs host nginx and acme.sh
 */

import type { ProxySettings } from "../types";
import { PreconditionFailedError } from "../utils/errors";
import { type CommandRunner, commandExists, runCommand } from "../utils/exec";
import { logger } from "../utils/logger";

export interface BootstrapOptions {
  /** Preview changes: adds --check --diff */
  dryRun?: boolean;
  /** Passed through to ansible-playbook (inventory, user, vars, ...) */
  extraArgs?: string[];
}

export function buildPlaybookArgs(playbook: string, options: BootstrapOptions = {}): string[] {
  return [...(options.dryRun ? ["--check", "--diff"] : []), ...(options.extraArgs ?? []), playbook];
}

/**
 * @returns ansible-playbook's exit code
 */
export async function runProxyBootstrap(
  proxy: Pick<ProxySettings, "ansibleBin" | "playbook">,
  options: BootstrapOptions = {},
  runner: CommandRunner = runCommand,
): Promise<number> {
  if (!(await commandExists(proxy.ansibleBin, ["--version"], runner))) {
    throw new PreconditionFailedError(
      proxy.ansibleBin,
      "install Ansible (pip or system package)",
    );
  }

  const args = buildPlaybookArgs(proxy.playbook, options);
  logger.info(`Running ${proxy.ansibleBin} ${args.join(" ")}`);

  const result = await runner(proxy.ansibleBin, args, { inherit: true });
  return result.exitCode;
}
