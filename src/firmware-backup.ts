import { readFile } from "node:fs/promises";
import { parseCsvTable } from "./csv.js";
import { endpoint } from "./endpoints.js";
import { CsvReadError, errorMessage } from "./errors.js";
import { executeEndpoint } from "./execute.js";
import { center, formatOutput, pickFields } from "./output.js";
import { promptConfirm } from "./prompt.js";
import type { RunContext } from "./session.js";

/** A report row as read back from the CSV file — every cell is a string */
export type ReportRecord = Record<string, string>;

export interface SnapshotFailure {
  candidate: ReportRecord;
  reason: string;
}

export interface SnapshotSummary {
  succeeded: ReportRecord[];
  failed: SnapshotFailure[];
}

export type BackupOutcome =
  | { status: "compliant" }
  | { status: "declined"; candidates: ReportRecord[] }
  | ({ status: "done"; candidates: ReportRecord[] } & SnapshotSummary);

export interface BackupOptions {
  inFile: string;
  siteId?: string;
  autoApprove?: boolean;
}

/** Columns shown when asking for approval */
const CANDIDATE_FIELDS = [
  "cluster_name",
  "cluster_device_id",
  "cluster_site_id",
  "module_serial",
  "module_mac",
  "module_model",
  "module_version",
  "module_backup_version",
];

/** Columns a report needs before candidates can be selected from it */
export const REQUIRED_REPORT_COLUMNS = [
  "cluster_device_id",
  "cluster_site_id",
  "module_model",
  "module_need_snapshot",
] as const;

// ---------------------------------------------------------------------------
// Candidate selection
// ---------------------------------------------------------------------------

/**
 * SRX modules flagged as needing a snapshot, optionally restricted to one
 * site, one entry per device (first occurrence wins).
 */
export function selectCandidates(records: readonly ReportRecord[], siteId?: string): ReportRecord[] {
  const selected: ReportRecord[] = [];
  const deviceIds = new Set<string | undefined>();
  for (const record of records) {
    if (!(record.module_model ?? "").includes("SRX")) continue;
    if (siteId && record.cluster_site_id !== siteId) continue;
    if (record.module_need_snapshot !== "True") continue;
    if (deviceIds.has(record.cluster_device_id)) continue;
    selected.push(record);
    deviceIds.add(record.cluster_device_id);
  }
  return selected;
}

export async function readCandidates(
  ctx: Pick<RunContext, "progress" | "logger">,
  file: string,
  siteId?: string,
): Promise<ReportRecord[]> {
  const message = "Reading CSV Report";
  ctx.progress.logMessage(message, false);
  let records: ReportRecord[];
  try {
    const table = parseCsvTable(await readFile(file, "utf-8"));
    const missing = REQUIRED_REPORT_COLUMNS.filter((column) => !table.header.includes(column));
    if (missing.length) throw new Error(`missing column(s) ${missing.join(", ")}`);
    records = table.records;
  } catch (err: unknown) {
    ctx.progress.logFailure(message, { displayBar: false, err });
    throw new CsvReadError(`Unable to read the CSV report ${file}: ${errorMessage(err)}`, file, { cause: err });
  }
  ctx.progress.logSuccess(message, { displayBar: false });
  const candidates = selectCandidates(records, siteId);
  ctx.logger.info({ file, rows: records.length, candidates: candidates.length, siteId }, "report read");
  return candidates;
}

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

async function snapshot(
  ctx: Pick<RunContext, "client" | "logger">,
  candidate: ReportRecord,
): Promise<string | null> {
  const siteId = candidate.cluster_site_id;
  const deviceId = candidate.cluster_device_id;
  const mac = candidate.module_mac ?? "";
  if (!siteId) return `Missing site_id for device ${mac}`;
  if (!deviceId) return `Missing device_id for device ${mac}`;

  const resp = await executeEndpoint(endpoint("createSiteDeviceSnapshot"), { args: { siteId, deviceId } }, ctx.client);
  if (resp.status !== 200) return `Unexpected HTTP ${resp.status} for device ${deviceId}`;
  return null;
}

/** One snapshot call per candidate, in order; a failing device never stops the batch */
export async function triggerSnapshots(
  ctx: Pick<RunContext, "client" | "logger" | "progress" | "output">,
  candidates: readonly ReportRecord[],
): Promise<SnapshotSummary> {
  const summary: SnapshotSummary = { succeeded: [], failed: [] };
  ctx.progress.setStepsTotal(candidates.length);
  ctx.progress.logTitle("Triggering Snapshots");

  for (const candidate of candidates) {
    const message = `Processing device ${candidate.cluster_device_id ?? ""}`;
    ctx.progress.logMessage(message);
    let reason: string | null;
    let err: unknown;
    try {
      reason = await snapshot(ctx, candidate);
    } catch (e: unknown) {
      err = e;
      reason = errorMessage(e);
    }

    if (reason === null) {
      ctx.progress.logSuccess(message, { inc: true });
      summary.succeeded.push(candidate);
    } else {
      ctx.progress.logFailure(message, { inc: true, err });
      if (err === undefined) ctx.output.error(reason);
      summary.failed.push({ candidate, reason });
    }
  }

  ctx.logger.info(
    { succeeded: summary.succeeded.length, failed: summary.failed.length },
    "snapshot batch finished",
  );
  return summary;
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export async function requestApproval(
  ctx: Pick<RunContext, "prompter" | "output" | "format">,
  candidates: readonly ReportRecord[],
): Promise<boolean> {
  ctx.output.log(center(""));
  ctx.output.log("List of gateways to process:");
  ctx.output.log();
  ctx.output.log(formatOutput(pickFields(candidates, CANDIDATE_FIELDS), ctx.format));
  const approved = await promptConfirm(ctx.prompter, "Do you want to continue (y/N)? ");
  if (approved) ctx.output.log(center(""));
  return approved;
}

export async function runFirmwareBackup(
  ctx: Omit<RunContext, "self">,
  options: BackupOptions,
): Promise<BackupOutcome> {
  const candidates = await readCandidates(ctx, options.inFile, options.siteId);
  if (!candidates.length) {
    ctx.output.log("All the gateways are compliant... Exiting...");
    return { status: "compliant" };
  }

  if (options.autoApprove) {
    ctx.output.info("auto-approve parameter has been set to True. Starting the process");
  } else if (!(await requestApproval(ctx, candidates))) {
    ctx.output.info("process stopped by the user. Exiting...");
    ctx.logger.info("snapshot batch declined by the user");
    return { status: "declined", candidates };
  }

  const summary = await triggerSnapshots(ctx, candidates);
  ctx.output.log();
  ctx.output.log(`Snapshots triggered: ${summary.succeeded.length} succeeded, ${summary.failed.length} failed`);
  return { status: "done", candidates, ...summary };
}
