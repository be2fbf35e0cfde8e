/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";

export { color };

export const VERSION = pkg.version;

export const CLI_NAME = "n8n-deploy";

/**
 * Display the tool name and version with the command being run
 */
export function banner(command: string): void {
  p.intro(`${color.bold(color.cyan(CLI_NAME))} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(command)}`);
}

export const outro = (message: string) => p.outro(color.green(message));
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const step = (message: string) => p.log.step(message);

export const spinner = p.spinner;
