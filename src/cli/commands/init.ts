import { parseArgs } from "node:util";
import { DockerClient } from "../../docker/client";
import { createVolumeIfMissing } from "../../docker/volume";
import { applyVerbose, GLOBAL_OPTIONS, loadContext, reportFailure, requireDocker, requireProjectFiles } from "../runtime";
import { CLI_NAME, color, ui } from "../ui";

export async function initCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: { ...GLOBAL_OPTIONS },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyVerbose(values.verbose);

  try {
    const ctx = await loadContext(values.config);
    ui.banner("init");

    await requireProjectFiles(ctx);
    const docker = new DockerClient(ctx.docker.bin);
    await requireDocker(docker);

    ui.step("Initializing volumes...");
    for (const volume of ctx.volumes) {
      if (await createVolumeIfMissing(docker, volume)) {
        ui.success(`Created volume: ${volume}`);
      } else {
        ui.info(`Volume already exists: ${volume}`);
      }
    }

    ui.outro(`Done. Run ${color.cyan(`${CLI_NAME} doctor`)} for an extra sanity check.`);
    return 0;
  } catch (error) {
    return reportFailure("Init", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold(`${CLI_NAME} init`)} - Create the data volumes

${color.dim("USAGE:")}
  ${CLI_NAME} init [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./${CLI_NAME}.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Checks that the compose file, the env file and Docker are present, then
  creates every configured volume that does not exist yet. Existing volumes
  are left untouched.
`);
}
