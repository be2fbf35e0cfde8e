/**
 * Configuration file loading
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { DeploymentContext } from "../types";
import { errorMessage } from "../utils/errors";
import { isFile } from "../utils/fs";
import { logger } from "../utils/logger";
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG, deepMerge } from "./defaults";
import { applyEnvOverrides, type EnvOverrides, resolveContext } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export interface LoadOptions {
  /** Directory searched for a config file and used as project root without one */
  cwd?: string;
  env?: EnvOverrides;
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

function buildContext(
  parsed: object,
  baseDir: string,
  configPath: string | null,
  env: EnvOverrides,
): DeploymentContext {
  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), parsed);
  validateConfig(merged);
  return resolveContext(applyEnvOverrides(merged, env), baseDir, configPath);
}

/**
 * Load and parse a config file
 */
export async function loadConfig(
  configPath: string,
  env: EnvOverrides = process.env,
): Promise<DeploymentContext> {
  const absolutePath = path.resolve(configPath);

  if (!(await isFile(absolutePath))) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf8");
  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase()) ?? {};

  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${absolutePath}`);
  }

  logger.debug(`Loaded config file ${absolutePath}`);
  return buildContext(parsed, path.dirname(absolutePath), absolutePath, env);
}

/**
 * Find a config file in the given directory
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (await isFile(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Load the given config file, the one found in cwd, or the defaults with cwd
 * as project root. An explicitly given path must exist.
 */
export async function findAndLoadContext(
  configPath?: string,
  options: LoadOptions = {},
): Promise<DeploymentContext> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (configPath) {
    return loadConfig(path.resolve(cwd, configPath), env);
  }

  const found = await findConfigFile(cwd);
  if (found) {
    return loadConfig(found, env);
  }

  logger.debug(`No config file in ${cwd}, using defaults`);
  return buildContext({}, cwd, null, env);
}
