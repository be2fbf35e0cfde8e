/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { DeployConfig, DeploymentContext, ProjectFileEntry } from "../types";
import { isPathWithinDir, toArchivePath } from "../utils/path";
import { OPTIONAL_PROJECT_FILES } from "./defaults";

/**
 * Environment variables that override the config file
 */
export interface EnvOverrides {
  COMPOSE_FILE?: string;
  ENV_FILE?: string;
  DOCKER_BIN?: string;
  ANSIBLE_BIN?: string;
}

export function applyEnvOverrides(config: DeployConfig, env: EnvOverrides): DeployConfig {
  return {
    ...config,
    composeFile: env.COMPOSE_FILE || config.composeFile,
    envFile: env.ENV_FILE || config.envFile,
    docker: { ...config.docker, bin: env.DOCKER_BIN || config.docker.bin },
    proxy: { ...config.proxy, ansibleBin: env.ANSIBLE_BIN || config.proxy.ansibleBin },
  };
}

/**
 * Project files packaged into a bundle when the config does not list them:
 * the compose and env files are required, the rest is packaged when present.
 */
export function defaultProjectFiles(
  projectRoot: string,
  composeFile: string,
  envFile: string,
  configPath: string | null,
): ProjectFileEntry[] {
  const entries: ProjectFileEntry[] = [
    { path: toArchivePath(composeFile, projectRoot), required: true },
    { path: toArchivePath(envFile, projectRoot), required: true },
    ...OPTIONAL_PROJECT_FILES.map((file) => ({ path: file, required: false })),
  ];

  if (configPath && isPathWithinDir(configPath, projectRoot)) {
    entries.push({ path: toArchivePath(configPath, projectRoot), required: false });
  }

  return entries;
}

/**
 * Resolve relative paths to absolute ones. projectRoot is relative to baseDir
 * (the config file's directory); every other path is relative to projectRoot.
 */
export function resolveContext(
  config: DeployConfig,
  baseDir: string,
  configPath: string | null,
): DeploymentContext {
  const projectRoot = path.resolve(baseDir, config.projectRoot);
  const inRoot = (p: string) => path.resolve(projectRoot, p);

  const composeFile = inRoot(config.composeFile);
  const envFile = inRoot(config.envFile);
  const resolvedConfigPath = configPath ? path.resolve(configPath) : null;

  return {
    ...config,
    projectRoot,
    composeFile,
    envFile,
    configPath: resolvedConfigPath,
    bundle: {
      ...config.bundle,
      outputDir: inRoot(config.bundle.outputDir),
      projectFiles:
        config.bundle.projectFiles ??
        defaultProjectFiles(projectRoot, composeFile, envFile, resolvedConfigPath),
    },
    proxy: {
      ...config.proxy,
      playbook: inRoot(config.proxy.playbook),
      template: inRoot(config.proxy.template),
      sslInclude: inRoot(config.proxy.sslInclude),
      deployHook: inRoot(config.proxy.deployHook),
    },
  };
}
