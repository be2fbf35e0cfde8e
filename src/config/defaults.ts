/**
 * Default configuration values
 */

import type { DeployConfig } from "../types";

export const CONFIG_FILE_NAMES = [
  "n8n-deploy.config.yaml",
  "n8n-deploy.config.yml",
  "n8n-deploy.config.json",
];

export const DEFAULT_CONFIG: DeployConfig = {
  version: "1",
  projectRoot: ".",
  composeFile: "compose.yml",
  envFile: ".env",
  encryptionKeyVar: "N8N_ENCRYPTION_KEY",
  volumes: ["n8n-data", "postgres-data"],
  docker: {
    bin: "docker",
    helperImage: "busybox",
  },
  services: {
    app: "n8n",
    database: "postgres",
  },
  bundle: {
    prefix: "n8n-bundle",
    outputDir: ".",
    quiesce: true,
  },
  proxy: {
    playbook: "nginx/bootstrap.yml",
    ansibleBin: "ansible-playbook",
    template: "nginx/templates/n8n.conf.j2",
    sslInclude: "nginx/files/includes/ssl.conf",
    deployHook: "nginx/files/acme.sh/deploy/nginx.sh",
    upstreamVariable: "n8n_upstream",
    sslDir: "/etc/nginx/ssl",
    reloadCommand: ["systemctl", "reload", "nginx"],
  },
};

/**
 * Optional project entries packaged alongside the compose and env files
 */
export const OPTIONAL_PROJECT_FILES = ["README.md", "nginx", "local-files"];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Arrays are replaced.
 */
export function deepMerge(target: object, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
