/**
 * Shared shape of the commands that drive the compose stack
 */

import { applyVerbose, createRuntime, loadContext, reportFailure, requireProjectFiles, type Runtime, splitGlobalArgs } from "../runtime";
import { CLI_NAME, color, ui } from "../ui";

export interface ComposeCommandSpec {
  name: string;
  summary: string;
  usage: string;
  description: string;
  /** Accept arguments after the global options */
  passthrough?: boolean;
  action: (rt: Runtime, args: string[]) => Promise<number>;
}

/**
 * Run a compose subcommand attached to this terminal and return its exit code
 */
export async function composeInteractive(rt: Runtime, args: string[]): Promise<number> {
  const result = await rt.compose.run(args, { interactive: true });
  return result.exitCode;
}

export function defineComposeCommand(spec: ComposeCommandSpec): (args: string[]) => Promise<number> {
  return async (args) => {
    let verbose = false;
    try {
      const globals = splitGlobalArgs(args);
      verbose = globals.verbose;

      if (globals.help) {
        printHelp(spec);
        return 0;
      }

      applyVerbose(globals.verbose);

      if (!spec.passthrough && globals.rest.length > 0) {
        ui.error(`Unexpected argument: ${globals.rest[0]}`);
        ui.info(`Run ${color.cyan(`${CLI_NAME} ${spec.name} --help`)} for usage`);
        return 1;
      }

      const ctx = await loadContext(globals.config);
      await requireProjectFiles(ctx);
      const rt = await createRuntime(ctx);

      return await spec.action(rt, globals.rest);
    } catch (error) {
      return reportFailure(capitalize(spec.name), error, verbose);
    }
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function printHelp(spec: ComposeCommandSpec): void {
  console.log(`
${color.bold(`${CLI_NAME} ${spec.name}`)} - ${spec.summary}

${color.dim("USAGE:")}
  ${CLI_NAME} ${spec.usage}

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./${CLI_NAME}.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
${spec.description
  .split("\n")
  .map((line) => (line ? `  ${line}` : line))
  .join("\n")}
`);
}
