import { PreconditionFailedError } from "../../utils/errors";
import type { Runtime } from "../runtime";
import { CLI_NAME } from "../ui";
import { composeInteractive, defineComposeCommand } from "./compose-command";

const PSQL_DEFAULTS = 'psql -U "$POSTGRES_USER" "$POSTGRES_DB"';

async function requireRunning(rt: Runtime, service: string): Promise<void> {
  const running = await rt.stack.runningServices();
  if (!running.includes(service)) {
    throw new PreconditionFailedError(
      `running service ${service}`,
      `start the stack with '${CLI_NAME} start' then retry`,
    );
  }
}

/**
 * bash when the image has it, sh otherwise
 */
async function detectShell(rt: Runtime, service: string): Promise<string> {
  const probe = await rt.compose.run(["exec", "-T", service, "/bin/bash", "-c", "exit 0"]);
  return probe.success ? "/bin/bash" : "/bin/sh";
}

export const consoleCommand = defineComposeCommand({
  name: "console",
  summary: "Open a shell inside a running service",
  usage: "console [SERVICE]",
  description: "Opens bash (or sh when bash is missing) in SERVICE, the app service by default.",
  passthrough: true,
  action: async (rt, args) => {
    const service = args[0] ?? rt.ctx.services.app;
    await requireRunning(rt, service);
    const shell = await detectShell(rt, service);
    return composeInteractive(rt, ["exec", "-it", service, shell]);
  },
});

export const psqlCommand = defineComposeCommand({
  name: "psql",
  summary: "Open psql in the database service",
  usage: "psql [PSQL ARGS...]",
  description:
    "Without arguments, connects as the container's POSTGRES_USER to POSTGRES_DB.\nArguments are passed to psql unchanged.",
  passthrough: true,
  action: async (rt, args) => {
    const service = rt.ctx.services.database;
    await requireRunning(rt, service);

    if (args.length > 0) {
      return composeInteractive(rt, ["exec", "-it", service, "psql", ...args]);
    }

    const shell = await detectShell(rt, service);
    return composeInteractive(rt, ["exec", "-it", service, shell, "-lc", PSQL_DEFAULTS]);
  },
});

export const execCommand = defineComposeCommand({
  name: "exec",
  summary: "Run a command in a service",
  usage: "exec SERVICE [COMMAND...]",
  description: "Runs COMMAND (default /bin/sh) in SERVICE with a terminal attached.",
  passthrough: true,
  action: async (rt, args) => {
    const [service, ...command] = args;
    if (!service) {
      throw new PreconditionFailedError("service name", `usage: ${CLI_NAME} exec SERVICE [COMMAND...]`);
    }
    return composeInteractive(rt, ["exec", "-it", service, ...(command.length > 0 ? command : ["/bin/sh"])]);
  },
});
