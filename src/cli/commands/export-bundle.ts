import { parseArgs } from "node:util";
import { exportBundle } from "../../core";
import { formatBytes, formatDuration } from "../../utils/format";
import { applyVerbose, createRuntime, GLOBAL_OPTIONS, loadContext, reportFailure, requireProjectFiles } from "../runtime";
import { CLI_NAME, color, formatSummary, ui } from "../ui";

export async function exportBundleCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...GLOBAL_OPTIONS,
      out: { type: "string", short: "o" },
      "no-quiesce": { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyVerbose(values.verbose);

  try {
    const ctx = await loadContext(values.config);
    ui.banner("export-bundle");

    await requireProjectFiles(ctx);
    const rt = await createRuntime(ctx);

    ui.step(`Snapshotting volumes (${ctx.volumes.join(", ")}) and project files...`);
    const result = await exportBundle(
      ctx,
      { volumes: rt.volumes, archiver: rt.archiver, stack: rt.stack },
      { out: values.out, quiesce: values["no-quiesce"] ? false : undefined },
    );

    const { bundle, project } = result;
    ui.note(
      formatSummary([
        { label: "Bundle", value: bundle.bundlePath },
        { label: "Size", value: formatBytes(bundle.sizeBytes) },
        { label: "SHA-256", value: bundle.checksum },
        { label: "Volumes", value: bundle.volumes.join(", ") },
        { label: "Project files", value: project.entries.join(", ") },
        { label: "Not present", value: project.skipped.length > 0 ? project.skipped.join(", ") : null },
        { label: "Services", value: result.quiesced ? "stopped and started again" : null },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Export Summary",
    );

    if (result.ranWhileLive) {
      ui.warn("Volumes were snapshotted while services were running; the database snapshot may be inconsistent.");
    }

    ui.warn("The bundle contains your env file and its secrets. Store and transfer it securely.");
    ui.outro("Export complete!");
    return 0;
  } catch (error) {
    return reportFailure("Export", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold(`${CLI_NAME} export-bundle`)} - Create a single-file migration bundle

${color.dim("USAGE:")}
  ${CLI_NAME} export-bundle [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./${CLI_NAME}.config.yaml)
  -o, --out <file>        Bundle path (default: <prefix>-YYYY-MM-DD-HHMMSS.tgz)
      --no-quiesce        Snapshot without stopping running services
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Stops running services, snapshots every data volume, packages the project
  files (compose file, env file, nginx config, ...) and writes them into one
  .tgz. Services that were running are started again afterwards, also when
  the export fails.

${color.dim("EXAMPLES:")}
  ${CLI_NAME} export-bundle
  ${CLI_NAME} export-bundle --out /srv/migrate/n8n.tgz
`);
}
