import { parseArgs } from "node:util";
import { type DoctorCheck, doctorPassed, runDoctor } from "../../core";
import { applyVerbose, GLOBAL_OPTIONS, loadContext, reportFailure } from "../runtime";
import { CLI_NAME, color, ui } from "../ui";

function printCheck(check: DoctorCheck): void {
  const line = `${check.name}: ${color.dim(check.detail)}`;
  switch (check.status) {
    case "ok":
      ui.success(line);
      break;
    case "warn":
      ui.warn(line);
      break;
    case "fail":
      ui.error(line);
      break;
  }
}

export async function doctorCommand(args: string[]): Promise<number> {
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
    ui.banner("doctor");

    const s = ui.spinner();
    s.start("Running preflight checks...");
    const checks = await runDoctor(ctx);
    s.stop("Preflight checks finished");

    for (const check of checks) {
      printCheck(check);
    }

    const failed = checks.filter((c) => c.status === "fail").length;
    const warnings = checks.filter((c) => c.status === "warn").length;

    if (!doctorPassed(checks)) {
      ui.error(`${failed} check(s) failed, ${warnings} warning(s)`);
      return 1;
    }

    ui.outro(warnings > 0 ? `All required checks passed (${warnings} warning(s))` : "All checks passed");
    return 0;
  } catch (error) {
    return reportFailure("Doctor", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold(`${CLI_NAME} doctor`)} - Run preflight checks

${color.dim("USAGE:")}
  ${CLI_NAME} doctor [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./${CLI_NAME}.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Checks performed:
    1. Docker daemon and compose CLI are available
    2. Compose and env files exist; volumes and services are declared
    3. The encryption key is set in the env file
    4. The data volumes exist
    5. nginx template, ssl include and acme.sh deploy hook are present
    6. No host nginx or apache2 is holding ports 80/443

  Exits with 1 when a required check fails; warnings do not fail.
`);
}
