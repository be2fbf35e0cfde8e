import { parseArgs } from "node:util";
import { BundleRestorer } from "../../core";
import { formatDuration } from "../../utils/format";
import { applyVerbose, createRuntime, GLOBAL_OPTIONS, loadContext, reportFailure } from "../runtime";
import { CLI_NAME, color, formatSummary, ui } from "../ui";

export async function importBundleCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...GLOBAL_OPTIONS,
      start: { type: "boolean", default: false },
      "force-extract": { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyVerbose(values.verbose);

  const [bundlePath, ...extra] = positionals;
  if (!bundlePath || extra.length > 0) {
    ui.error(bundlePath ? `Unexpected argument: ${extra[0]}` : "Bundle file is required");
    ui.info(`Usage: ${CLI_NAME} import-bundle <file> [--start] [--force-extract]`);
    return 1;
  }

  try {
    const ctx = await loadContext(values.config);
    ui.banner("import-bundle");

    const rt = await createRuntime(ctx);
    const restorer = new BundleRestorer(ctx, {
      volumes: rt.volumes,
      archiver: rt.archiver,
      stack: rt.stack,
    });

    ui.step(`Restoring volumes (${ctx.volumes.join(", ")}) from ${bundlePath}...`);
    const result = await restorer.restore(bundlePath, {
      start: values.start,
      forceExtractProject: values["force-extract"],
    });

    ui.note(
      formatSummary([
        { label: "Bundle", value: result.bundlePath },
        { label: "Volumes restored", value: result.volumesRestored.join(", ") },
        { label: "Volumes created", value: result.volumesCreated.length > 0 ? result.volumesCreated.join(", ") : null },
        { label: "Not restored", value: result.volumesIgnored.length > 0 ? result.volumesIgnored.join(", ") : null },
        { label: "Project files", value: result.projectExtracted ? "extracted" : result.projectSkippedReason },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Import Summary",
    );

    if (result.encryptionKeyMismatch) {
      ui.warn(
        `The env file's ${ctx.encryptionKeyVar} differs from the bundle's. Credentials stored in the restored data cannot be decrypted until the keys match.`,
      );
    }

    if (result.started) {
      ui.outro("Import complete, stack started");
    } else {
      ui.outro(`Import complete. Review project files, then start with: ${color.cyan(`${CLI_NAME} start`)}`);
    }
    return 0;
  } catch (error) {
    return reportFailure("Import", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold(`${CLI_NAME} import-bundle`)} - Restore from a migration bundle

${color.dim("USAGE:")}
  ${CLI_NAME} import-bundle <file> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./${CLI_NAME}.config.yaml)
      --start             Start the stack after a successful import
      --force-extract     Extract project files even if a compose file exists
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Checks that the bundle holds a snapshot of every data volume before touching
  any of them, then replays each snapshot into its volume (creating missing
  volumes). Project files are only extracted when no compose file exists yet.

  The restore is not transactional: if a volume replay fails, that volume is
  left partially overwritten. Import again from a known-good bundle.

${color.dim("EXAMPLES:")}
  ${CLI_NAME} import-bundle n8n-bundle-2024-09-02-120000.tgz
  ${CLI_NAME} import-bundle n8n-bundle-2024-09-02-120000.tgz --start
`);
}
