import * as p from "@clack/prompts";
import { doctorCommand } from "./commands/doctor";
import { exportBundleCommand } from "./commands/export-bundle";
import { importBundleCommand } from "./commands/import-bundle";
import { initCommand } from "./commands/init";
import { proxyCommand } from "./commands/proxy";
import { consoleCommand, execCommand, psqlCommand } from "./commands/shell";
import {
  downCommand,
  logsCommand,
  pullCommand,
  restartCommand,
  startCommand,
  statusCommand,
  stopCommand,
  upgradeCommand,
} from "./commands/stack";
import { CLI_NAME, color, VERSION } from "./ui";

type CommandHandler = (args: string[]) => Promise<number>;

export const COMMANDS: Record<string, CommandHandler> = {
  init: initCommand,
  doctor: doctorCommand,
  pull: pullCommand,
  start: startCommand,
  stop: stopCommand,
  down: downCommand,
  restart: restartCommand,
  status: statusCommand,
  logs: logsCommand,
  upgrade: upgradeCommand,
  console: consoleCommand,
  psql: psqlCommand,
  exec: execCommand,
  "export-bundle": exportBundleCommand,
  "import-bundle": importBundleCommand,
  proxy: proxyCommand,
};

const ALIASES: Record<string, string> = {
  build: "pull",
  up: "start",
  ps: "status",
};

/**
 * Map aliases and the `--command` spelling onto command names. Unknown input
 * is returned unchanged.
 */
export function normalizeCommand(input: string): string {
  const name = input.startsWith("--") ? input.slice(2) : input;
  const resolved = Object.hasOwn(ALIASES, name) ? ALIASES[name] : name;
  if (resolved !== undefined && Object.hasOwn(COMMANDS, resolved)) {
    return resolved;
  }
  return input;
}

function printHelp(): void {
  p.intro(`${color.cyan(CLI_NAME)} ${color.dim(`v${VERSION}`)} - n8n + PostgreSQL deployment manager`);

  p.note(
    `${color.cyan("init")}            Create the data volumes
${color.cyan("doctor")}          Run preflight checks
${color.cyan("pull")}            Pull images ${color.dim("(alias: build)")}
${color.cyan("start")}           Start or update the stack ${color.dim("(alias: up)")}
${color.cyan("stop")}            Gracefully stop services
${color.cyan("down")}            Remove containers and network (keeps volumes)
${color.cyan("restart")}         Restart all services
${color.cyan("status")}          Show container status ${color.dim("(alias: ps)")}
${color.cyan("logs")}            Show logs (all or one service)
${color.cyan("upgrade")}         Pull latest images and recreate containers
${color.cyan("console")}         Shell inside a running service
${color.cyan("psql")}            psql in the database service
${color.cyan("exec")}            Run a command in a service
${color.cyan("export-bundle")}   Create a single-file migration bundle
${color.cyan("import-bundle")}   Restore from a migration bundle
${color.cyan("proxy")}           Host nginx bootstrap and certificate deploy hook`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
    --version   Show version

Every command also accepts -c/--config, -v/--verbose and -h/--help.
Commands can be written as --start, --export-bundle, ...`,
    "Options",
  );

  p.note(
    `${CLI_NAME} init                          ${color.dim("# Create volumes")}
${CLI_NAME} start                         ${color.dim("# Start the stack")}
${CLI_NAME} logs n8n -f                   ${color.dim("# Follow n8n logs")}
${CLI_NAME} export-bundle                 ${color.dim("# Bundle project and volumes")}
${CLI_NAME} import-bundle bundle.tgz      ${color.dim("# Restore on a new host")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan(`${CLI_NAME} <command> --help`)} for command details`);
}

export async function main(args: string[]): Promise<number> {
  const [command, ...commandArgs] = args;

  if (command === undefined) {
    printHelp();
    return 0;
  }

  switch (command) {
    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "--version":
    case "version":
      console.log(VERSION);
      return 0;
  }

  const name = normalizeCommand(command);
  const handler = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (!handler) {
    console.error(`${color.red("Error:")} Unknown command: ${command}`);
    console.error(`Run ${color.cyan(`${CLI_NAME} --help`)} for usage information.`);
    return 1;
  }

  return handler(commandArgs);
}
