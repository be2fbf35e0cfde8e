/**
 * Configuration type definitions
 */

/**
 * One entry of the project package. Paths are relative to the project root.
 */
export interface ProjectFileEntry {
  path: string;
  /** A missing required entry fails packaging; a missing optional one is skipped */
  required: boolean;
}

export interface DockerSettings {
  /** Docker CLI binary (DOCKER_BIN) */
  bin: string;
  /** Throwaway image used to read and write volume contents */
  helperImage: string;
}

export interface ServiceSettings {
  /** Compose service of the workflow server, default target of `console` */
  app: string;
  /** Compose service running PostgreSQL, target of `psql` */
  database: string;
}

export interface BundleSettings {
  /** Bundle file name prefix */
  prefix: string;
  /** Directory new bundles are written to when no --out is given */
  outputDir: string;
  /** Stop running services while volumes are snapshotted */
  quiesce: boolean;
  /** Files packaged with the bundle; derived from composeFile/envFile when unset */
  projectFiles?: ProjectFileEntry[];
}

export interface ProxySettings {
  /** Ansible playbook that installs and configures host nginx */
  playbook: string;
  /** ansible-playbook binary (ANSIBLE_BIN) */
  ansibleBin: string;
  /** nginx site template rendered by the playbook */
  template: string;
  /** Shared TLS include */
  sslInclude: string;
  /** acme.sh deploy hook shipped with the project */
  deployHook: string;
  /** Template variable the upstream proxy_pass must go through */
  upstreamVariable: string;
  /** Where deployed certificates live on the host */
  sslDir: string;
  /** Command that reloads nginx after a certificate is deployed */
  reloadCommand: string[];
}

/**
 * Tool configuration as written in n8n-deploy.config.yaml
 */
export interface DeployConfig {
  version: string;
  /** Project root, relative to the config file */
  projectRoot: string;
  composeFile: string;
  envFile: string;
  /** Env variable holding the key n8n encrypts credentials with */
  encryptionKeyVar: string;
  /** Every volume the stack persists data in, in snapshot/restore order */
  volumes: string[];
  docker: DockerSettings;
  services: ServiceSettings;
  bundle: BundleSettings;
  proxy: ProxySettings;
}

/**
 * Fully resolved configuration handed to every component. All paths are
 * absolute except projectFiles, which stay relative to projectRoot.
 */
export interface DeploymentContext extends DeployConfig {
  bundle: BundleSettings & { projectFiles: ProjectFileEntry[] };
  /** Config file the context was loaded from, if any */
  configPath: string | null;
}
