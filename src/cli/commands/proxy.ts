import { parseArgs } from "node:util";
import { deployCertificate, runProxyBootstrap } from "../../proxy";
import { applyVerbose, GLOBAL_OPTIONS, loadContext, reportFailure, splitGlobalArgs } from "../runtime";
import { CLI_NAME, color, ui } from "../ui";

export async function proxyCommand(args: string[]): Promise<number> {
  const [subcommand, ...rest] = args;

  switch (subcommand) {
    case "bootstrap":
      return bootstrapCommand(rest);
    case "deploy-cert":
      return deployCertCommand(rest);
    case undefined:
    case "-h":
    case "--help":
    case "help":
      printHelp();
      return subcommand === undefined ? 1 : 0;
    default:
      ui.error(`Unknown proxy command: ${subcommand}`);
      printHelp();
      return 1;
  }
}

async function bootstrapCommand(args: string[]): Promise<number> {
  let verbose = false;
  try {
    const globals = splitGlobalArgs(args);
    verbose = globals.verbose;

    if (globals.help) {
      printHelp();
      return 0;
    }

    applyVerbose(globals.verbose);

    const dryRun = globals.rest[0] === "--dry-run";
    const extraArgs = dryRun ? globals.rest.slice(1) : globals.rest;

    const ctx = await loadContext(globals.config);
    ui.banner("proxy bootstrap");
    if (dryRun) {
      ui.info("Dry run: ansible runs with --check --diff");
    }

    const exitCode = await runProxyBootstrap(ctx.proxy, { dryRun, extraArgs });
    if (exitCode !== 0) {
      ui.error(`Playbook failed (exit code ${exitCode})`);
      return exitCode;
    }

    ui.outro("Proxy bootstrap complete");
    return 0;
  } catch (error) {
    return reportFailure("Proxy bootstrap", error, verbose);
  }
}

async function deployCertCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: { ...GLOBAL_OPTIONS },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  applyVerbose(values.verbose);

  const [domain, keyFile, certFile, caFile, fullchainFile] = positionals;
  if (!domain || !keyFile || !certFile || !caFile || !fullchainFile || positionals.length > 5) {
    ui.error("Expected exactly: <domain> <key> <cert> <ca> <fullchain>");
    return 1;
  }

  try {
    const ctx = await loadContext(values.config);
    const result = await deployCertificate(ctx.proxy, { domain, keyFile, certFile, caFile, fullchainFile });
    ui.success(`Installed ${result.installed.length} file(s) into ${result.domainDir}`);
    return 0;
  } catch (error) {
    return reportFailure("Certificate deploy", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold(`${CLI_NAME} proxy`)} - Host nginx and certificate tooling

${color.dim("USAGE:")}
  ${CLI_NAME} proxy bootstrap [--dry-run] [ANSIBLE ARGS...]
  ${CLI_NAME} proxy deploy-cert <domain> <key> <cert> <ca> <fullchain>

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./${CLI_NAME}.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  bootstrap     Runs the Ansible playbook that installs host nginx and acme.sh.
                --dry-run adds --check --diff; other arguments go to
                ansible-playbook unchanged.
  deploy-cert   acme.sh deploy hook: copies key, cert and fullchain into the
                nginx ssl directory and reloads nginx.

${color.dim("EXAMPLES:")}
  ${CLI_NAME} proxy bootstrap -i "your.host.name," -u youruser --become -e @vars.yml
  ${CLI_NAME} proxy bootstrap --dry-run -i "your.host.name," -u youruser --become
`);
}
