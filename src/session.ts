import { MistClient } from "./client.js";
import { requireConfig, type Config } from "./config.js";
import { endpoint } from "./endpoints.js";
import { ConfigError, DependencyError, MistApiError } from "./errors.js";
import { executeEndpoint } from "./execute.js";
import type { Logger } from "./logger.js";
import type { Output, OutputFormat } from "./output.js";
import type { ProgressBar } from "./progress.js";
import type { Prompter } from "./prompt.js";
import { parsePayload, SelfSchema, type Self } from "./schema.js";

export const MIN_NODE_MAJOR = 20;

/** Everything an operation needs, built once per command invocation */
export interface RunContext {
  client: MistClient;
  self: Self;
  logger: Logger;
  output: Output;
  prompter: Prompter;
  progress: ProgressBar;
  format: OutputFormat;
}

export function checkRuntime(
  nodeVersion: string = process.versions.node,
  logger?: Logger,
): void {
  const major = Number(nodeVersion.split(".")[0]);
  if (!Number.isInteger(major) || major < MIN_NODE_MAJOR) {
    logger?.fatal(`Node.js ${MIN_NODE_MAJOR} or newer is required, you are using ${nodeVersion}`);
    throw new DependencyError(
      `Node.js ${MIN_NODE_MAJOR} or newer is required, you are currently using version ${nodeVersion}. ` +
      "Please upgrade Node.js.",
    );
  }
  logger?.info(`Node.js ${MIN_NODE_MAJOR} or newer is required, you are using ${nodeVersion}`);
}

export async function getSelf(client: MistClient): Promise<Self> {
  const resp = await executeEndpoint(endpoint("getSelf"), { args: {} }, client);
  return parsePayload(SelfSchema, resp.data, "/self");
}

export interface Session {
  client: MistClient;
  self: Self;
}

/** Build the API client and validate the token against /self */
export async function openSession(
  config: Config,
  logger: Logger,
  fetchImpl?: typeof fetch,
): Promise<Session> {
  requireConfig(config);
  const client = new MistClient(config.host, config.apiToken, { fetch: fetchImpl });
  logger.debug({ host: config.host }, "opening API session");
  try {
    const self = await getSelf(client);
    logger.info({ email: self.email, privileges: self.privileges.length }, "authenticated");
    return { client, self };
  } catch (err: unknown) {
    if (err instanceof MistApiError && err.status === 401) {
      throw new ConfigError(`API token rejected by ${config.host} (HTTP 401)`);
    }
    throw err;
  }
}
