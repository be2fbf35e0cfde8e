/**
 * Deployment env file access. Values are read, never written: the encryption
 * key in particular must survive every export and import unchanged.
 */

import { readFile } from "node:fs/promises";
import { parse } from "dotenv";
import { pathExists } from "../utils/fs";

export type EnvValues = Record<string, string>;

export function parseEnvContent(content: string): EnvValues {
  return parse(content);
}

/**
 * Read an env file. Returns null when the file does not exist.
 */
export async function readEnvFile(envPath: string): Promise<EnvValues | null> {
  if (!(await pathExists(envPath))) {
    return null;
  }
  return parseEnvContent(await readFile(envPath, "utf8"));
}

/**
 * Look up a variable, treating empty values as unset
 */
export function getEnvValue(values: EnvValues, key: string): string | null {
  const value = values[key];
  return value === undefined || value === "" ? null : value;
}
