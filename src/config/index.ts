/**
 * Configuration module exports
 */

// Defaults
export { CONFIG_FILE_NAMES, DEFAULT_CONFIG, deepMerge } from "./defaults";
// Env file
export { type EnvValues, getEnvValue, parseEnvContent, readEnvFile } from "./env-file";
// Loader
export { ConfigError, findAndLoadContext, findConfigFile, loadConfig } from "./loader";
// Resolver
export { applyEnvOverrides, defaultProjectFiles, resolveContext } from "./resolver";
// Validator
export { validateConfig } from "./validator";
