import { Command, CommanderError, Option, type OutputConfiguration } from "commander";
import type { InviteSummary } from "./admins.js";
import { DEFAULT_ENV_FILE, DEFAULT_LOG_FILE, DEFAULT_REPORT_FILE } from "./config.js";
import {
  ConfigError,
  DependencyError,
  EXIT_FAILURE,
  EXIT_OK,
  UserAbortError,
  errorMessage,
  exitCodeFor,
} from "./errors.js";
import type { BackupOptions } from "./firmware-backup.js";
import type { ReportOptions } from "./firmware-report.js";
import { isOutputFormat, type Output, type OutputFormat } from "./output.js";
import { VERSION } from "./version.js";

/** What every command that talks to the API needs to open a session */
export interface SessionSettings {
  envFile: string;
  logFile: string;
  format: OutputFormat;
}

/** The work behind each command; index.ts wires the real ones */
export interface CliHandlers {
  adminImport(csvFile: string, session: SessionSettings): Promise<InviteSummary>;
  gatewayReport(options: ReportOptions, session: SessionSettings): Promise<unknown>;
  gatewayBackup(options: BackupOptions, session: SessionSettings): Promise<unknown>;
  /** Returns the file written */
  configure(envFile: string, values: Record<string, string>): string;
  mcp(envFile: string): Promise<void>;
}

export interface CliOptions {
  handlers: CliHandlers;
  output: Output;
  /** Where commander writes help and usage errors */
  commanderOutput?: OutputConfiguration;
}

interface SessionFlags {
  env: string;
  log_file: string;
}

interface ReportFlags extends SessionFlags {
  org_id?: string;
  site_id?: string;
  out_file: string;
  datetime?: boolean;
  timestamp?: boolean;
}

interface BackupFlags extends SessionFlags {
  site_id?: string;
  in_file: string;
  autoApprove?: boolean;
}

// ---------------------------------------------------------------------------
// CLI setup
// ---------------------------------------------------------------------------

/**
 * The commander program. `onFailure` is called when a command completed but
 * some of its work did not (an invite that was refused).
 */
export function buildProgram(options: CliOptions, onFailure: () => void = () => {}): Command {
  const { handlers, output } = options;
  const program = new Command();
  if (options.commanderOutput) program.configureOutput(options.commanderOutput);

  program
    .name("mist-ops")
    .version(VERSION)
    .description(
      "Administrative operations against the Mist cloud API\n\n" +
      "Credentials are read from an env file (default ~/.mist_env) or the environment:\n" +
      "  MIST_HOST      API host, e.g. api.mist.com or api.eu.mist.com\n" +
      "  MIST_APITOKEN  API token of an org administrator\n\n" +
      "Quick start:\n" +
      "  $ mist-ops configure --host api.mist.com --token YOUR_TOKEN\n" +
      "  $ mist-ops gateways report --org_id <org_id>\n" +
      "  $ mist-ops gateways backup",
    )
    .addOption(
      new Option("--format <fmt>", "Output format for listings").choices(["table", "json"]).default("table"),
    )
    .exitOverride();

  function sessionOptions(cmd: Command): Command {
    return cmd
      .option("-l, --log_file <path>", "file where to write the logs", DEFAULT_LOG_FILE)
      .option("-e, --env <path>", "env file holding MIST_HOST and MIST_APITOKEN", DEFAULT_ENV_FILE);
  }

  function session(flags: SessionFlags): SessionSettings {
    const format: unknown = program.opts().format;
    return {
      envFile: flags.env,
      logFile: flags.log_file,
      format: typeof format === "string" && isOutputFormat(format) ? format : "table",
    };
  }

  // ── admins ──────────────────────────────────────────────────────────

  const admins = program
    .command("admins")
    .description("Manage org administrators");

  sessionOptions(
    admins
      .command("import <csv_file>")
      .description(
        "Invite administrators listed in a CSV file (email, first name, last name).\n" +
        "The org, the privilege level and the scope (whole org or sites) are asked interactively.",
      ),
  ).action(async (csvFile: string, flags: SessionFlags) => {
    const summary = await handlers.adminImport(csvFile, session(flags));
    if (summary.failed.length) onFailure();
  });

  // ── gateways ────────────────────────────────────────────────────────

  const gateways = program
    .command("gateways")
    .description("Audit and fix SRX gateway backup firmware");

  sessionOptions(
    gateways
      .command("report")
      .description(
        "Report the firmware deployed on every SRX of an org or site, module by module:\n" +
        "version, backup version, pending version, and whether a snapshot or a reboot is needed.\n" +
        "Without --org_id/--site_id the scope is asked interactively.",
      )
      .addOption(new Option("-o, --org_id <id>", "org to report on").conflicts("site_id"))
      .addOption(new Option("-s, --site_id <id>", "site to report on").conflicts("org_id"))
      .option("-f, --out_file <path>", "where to save the report", DEFAULT_REPORT_FILE)
      .addOption(
        new Option("-d, --datetime", "append the current date and time (ISO format) to the report name").conflicts(
          "timestamp",
        ),
      )
      .addOption(
        new Option("-t, --timestamp", "append the current timestamp to the report name").conflicts("datetime"),
      )
      .addHelpText(
        "after",
        "\nExamples:\n" +
        "  $ mist-ops gateways report\n" +
        "  $ mist-ops gateways report --site_id=203d3d02-xxxx-xxxx-xxxx-76896a3330f4 -d",
      ),
  ).action(async (flags: ReportFlags) => {
    await handlers.gatewayReport(
      {
        scope: flags.org_id ? "org" : flags.site_id ? "site" : undefined,
        scopeId: flags.org_id ?? flags.site_id,
        outFile: flags.out_file,
        appendDatetime: flags.datetime,
        appendTimestamp: flags.timestamp,
      },
      session(flags),
    );
  });

  sessionOptions(
    gateways
      .command("backup")
      .description(
        "Trigger a firmware snapshot on the SRX listed in a report from 'gateways report'\n" +
        "whose backup firmware differs from the running one.",
      )
      .option("-s, --site_id <id>", "only process the devices of this site")
      .option("-f, --in_file <path>", "report generated by 'gateways report'", DEFAULT_REPORT_FILE)
      .option("--auto-approve", "do not ask for confirmation before triggering the snapshots")
      .addHelpText(
        "after",
        "\nExamples:\n" +
        "  $ mist-ops gateways backup\n" +
        "  $ mist-ops gateways backup --site_id=203d3d02-xxxx-xxxx-xxxx-76896a3330f4 --auto-approve",
      ),
  ).action(async (flags: BackupFlags) => {
    await handlers.gatewayBackup(
      { inFile: flags.in_file, siteId: flags.site_id, autoApprove: flags.autoApprove },
      session(flags),
    );
  });

  // ── configure ───────────────────────────────────────────────────────

  program
    .command("configure")
    .description("Save the API host and token to the env file")
    .option("--host <host>", "Mist API host (api.mist.com, api.eu.mist.com, ...)")
    .option("--token <token>", "API token")
    .option("-e, --env <path>", "env file to write", DEFAULT_ENV_FILE)
    .action((opts: { host?: string; token?: string; env: string }) => {
      const values: Record<string, string> = {};
      if (opts.host) values.MIST_HOST = opts.host;
      if (opts.token) values.MIST_APITOKEN = opts.token;
      if (Object.keys(values).length === 0) {
        throw new ConfigError("Provide at least one of --host, --token");
      }
      const file = handlers.configure(opts.env, values);
      output.info(`Saved ${Object.keys(values).join(", ")} to ${file}`);
    });

  // ── mcp ─────────────────────────────────────────────────────────────

  program
    .command("mcp")
    .description("Start an MCP server (stdio) exposing the gateway and admin operations as tools")
    .option("-e, --env <path>", "env file holding MIST_HOST and MIST_APITOKEN", DEFAULT_ENV_FILE)
    .action(async (opts: { env: string }) => {
      await handlers.mcp(opts.env);
    });

  return program;
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/** Parse `argv` (node and script first), run the command and return the exit code */
export async function runCli(argv: readonly string[], options: CliOptions): Promise<number> {
  let code = EXIT_OK;
  const program = buildProgram(options, () => {
    code = EXIT_FAILURE;
  });

  try {
    await program.parseAsync([...argv]);
    return code;
  } catch (err: unknown) {
    // help, version and usage errors: commander already printed what it had to
    if (err instanceof CommanderError) return EXIT_OK;

    if (err instanceof UserAbortError) {
      options.output.info(err.message);
    } else if (err instanceof DependencyError || err instanceof ConfigError) {
      options.output.critical(err.message);
    } else {
      options.output.error(errorMessage(err));
    }
    return exitCodeFor(err);
  }
}
