import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import * as dotenv from "dotenv";
import { ConfigError } from "./errors.js";

export const DEFAULT_ENV_FILE = "~/.mist_env";
export const DEFAULT_LOG_FILE = "./script.log";
export const DEFAULT_REPORT_FILE = "./report_gateway_firmware.csv";

export interface Config {
  host?: string;
  apiToken?: string;
  /** Env file the values were read from (already ~-expanded) */
  envFile: string;
  logFile: string;
  readOnly: boolean;
}

export interface ConfigOptions {
  env?: string;
  logFile?: string;
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

export function loadEnvFile(path: string): Record<string, string> {
  const file = expandHome(path);
  if (!existsSync(file)) return {};
  return dotenv.parse(readFileSync(file, "utf-8"));
}

/** Merge values into the env file, keeping keys it already has */
export function saveEnvFile(path: string, values: Record<string, string>): string {
  const file = expandHome(path);
  const merged = { ...loadEnvFile(file), ...values };
  const lines = Object.entries(merged).map(([k, v]) => `${k}=${v}`);
  writeFileSync(file, lines.join("\n") + "\n", { mode: 0o600 });
  return file;
}

export function resolveConfig(
  opts: ConfigOptions,
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const envFile = expandHome(opts.env || DEFAULT_ENV_FILE);
  const file = loadEnvFile(envFile);
  return {
    host: env.MIST_HOST || file.MIST_HOST,
    apiToken: env.MIST_APITOKEN || file.MIST_APITOKEN,
    envFile,
    logFile: opts.logFile || DEFAULT_LOG_FILE,
    readOnly: (env.MIST_READ_ONLY || file.MIST_READ_ONLY) === "1",
  };
}

export function requireConfig(config: Config): asserts config is Config & { host: string; apiToken: string } {
  if (!config.host) {
    throw new ConfigError(
      `Missing Mist API host. Set MIST_HOST in ${config.envFile} or the environment, or run: mist-ops configure`,
    );
  }
  if (!config.apiToken) {
    throw new ConfigError(
      `Missing API token. Set MIST_APITOKEN in ${config.envFile} or the environment, or run: mist-ops configure`,
    );
  }
}
