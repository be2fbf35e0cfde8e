/**
 * Configuration validation
 */

import type { DeployConfig } from "../types";
import { DeployError } from "../utils/errors";
import { isReservedVolumeName, VOLUME_NAME_PATTERN } from "../utils/naming";

export class ConfigError extends DeployError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asObject(value: unknown, name: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigError(`${name} must be an object`);
  }
  return value;
}

function requireString(value: unknown, name: string): void {
  if (!value || typeof value !== "string") {
    throw new ConfigError(`${name} must be a non-empty string`);
  }
}

function requireStringArray(value: unknown, name: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(`${name} must be a non-empty array`);
  }
  const items: string[] = [];
  for (const [i, item] of value.entries()) {
    if (!item || typeof item !== "string") {
      throw new ConfigError(`${name}[${i}] must be a non-empty string`);
    }
    items.push(item);
  }
  return items;
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' string field");
    }
  },

  paths: (c) => {
    requireString(c.projectRoot, "projectRoot");
    requireString(c.composeFile, "composeFile");
    requireString(c.envFile, "envFile");
    requireString(c.encryptionKeyVar, "encryptionKeyVar");
  },

  volumes: (c) => {
    const volumes = requireStringArray(c.volumes, "volumes");
    const seen = new Set<string>();
    for (const name of volumes) {
      if (!VOLUME_NAME_PATTERN.test(name)) {
        throw new ConfigError(`volumes: "${name}" is not a valid Docker volume name`);
      }
      if (isReservedVolumeName(name)) {
        throw new ConfigError(`volumes: "${name}" is reserved; its snapshot would replace the project archive`);
      }
      if (seen.has(name)) {
        throw new ConfigError(`volumes: "${name}" is listed more than once`);
      }
      seen.add(name);
    }
  },

  docker: (c) => {
    const docker = asObject(c.docker, "docker");
    requireString(docker.bin, "docker.bin");
    requireString(docker.helperImage, "docker.helperImage");
  },

  services: (c) => {
    const services = asObject(c.services, "services");
    requireString(services.app, "services.app");
    requireString(services.database, "services.database");
  },

  bundle: (c) => {
    const bundle = asObject(c.bundle, "bundle");
    requireString(bundle.prefix, "bundle.prefix");
    requireString(bundle.outputDir, "bundle.outputDir");
    if (typeof bundle.quiesce !== "boolean") {
      throw new ConfigError("bundle.quiesce must be a boolean");
    }
    if (bundle.projectFiles === undefined) {
      return;
    }
    if (!Array.isArray(bundle.projectFiles) || bundle.projectFiles.length === 0) {
      throw new ConfigError("bundle.projectFiles must be a non-empty array");
    }
    for (const [i, entry] of bundle.projectFiles.entries()) {
      const file = asObject(entry, `bundle.projectFiles[${i}]`);
      requireString(file.path, `bundle.projectFiles[${i}].path`);
      if (typeof file.required !== "boolean") {
        throw new ConfigError(`bundle.projectFiles[${i}].required must be a boolean`);
      }
    }
  },

  proxy: (c) => {
    const proxy = asObject(c.proxy, "proxy");
    for (const key of [
      "playbook",
      "ansibleBin",
      "template",
      "sslInclude",
      "deployHook",
      "upstreamVariable",
      "sslDir",
    ]) {
      requireString(proxy[key], `proxy.${key}`);
    }
    requireStringArray(proxy.reloadCommand, "proxy.reloadCommand");
  },
};

/**
 * Validate a configuration object (already merged with defaults)
 */
export function validateConfig(config: unknown): asserts config is DeployConfig {
  const c = asObject(config, "Config");

  for (const validate of Object.values(validators)) {
    validate(c);
  }
}
