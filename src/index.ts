#!/usr/bin/env node

import { runAdminImport } from "./admins.js";
import { runCli, type CliHandlers, type SessionSettings } from "./cli.js";
import { resolveConfig, saveEnvFile } from "./config.js";
import { EXIT_FAILURE, EXIT_OK } from "./errors.js";
import { runFirmwareBackup } from "./firmware-backup.js";
import { runFirmwareReport } from "./firmware-report.js";
import { createLogger } from "./logger.js";
import { createConsoleOutput } from "./output.js";
import { ProgressBar } from "./progress.js";
import { createReadlinePrompter } from "./prompt.js";
import { checkRuntime, openSession, type RunContext } from "./session.js";

const output = createConsoleOutput();

/** Build the run context and hand it to `fn` */
async function withContext<T>(settings: SessionSettings, fn: (ctx: RunContext) => Promise<T>): Promise<T> {
  const config = resolveConfig({ env: settings.envFile, logFile: settings.logFile });
  const logger = createLogger({ file: config.logFile });
  checkRuntime(process.versions.node, logger);
  const session = await openSession(config, logger);
  const prompter = createReadlinePrompter();
  try {
    return await fn({
      ...session,
      logger,
      output,
      prompter,
      progress: new ProgressBar(output, logger),
      format: settings.format,
    });
  } finally {
    prompter.close();
  }
}

const handlers: CliHandlers = {
  adminImport: (csvFile, settings) => withContext(settings, (ctx) => runAdminImport(ctx, csvFile)),
  gatewayReport: (options, settings) => withContext(settings, (ctx) => runFirmwareReport(ctx, options)),
  gatewayBackup: (options, settings) => withContext(settings, (ctx) => runFirmwareBackup(ctx, options)),
  configure: (envFile, values) => saveEnvFile(envFile, values),
  mcp: async (envFile) => {
    const { startMcpServer } = await import("./mcp.js");
    await startMcpServer({ config: resolveConfig({ env: envFile }) });
  },
};

runCli(process.argv, { handlers, output }).then(
  (code) => {
    if (code !== EXIT_OK) process.exit(code);
  },
  (err: unknown) => {
    output.error(String(err));
    process.exit(EXIT_FAILURE);
  },
);
