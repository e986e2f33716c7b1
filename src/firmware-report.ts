import { writeFile } from "node:fs/promises";
import { z } from "zod";
import { stringifyCsv } from "./csv.js";
import { endpoint } from "./endpoints.js";
import { iteratePages } from "./execute.js";
import { center, formatOutput } from "./output.js";
import { DeviceStatSchema, parsePayload, type DeviceStat, type ModuleStat } from "./schema.js";
import { showMenu } from "./prompt.js";
import { selectOrg, selectSite } from "./select.js";
import type { RunContext } from "./session.js";

export type Scope = "org" | "site";

/** One row per physical module — a clustered gateway contributes two */
export type GatewayModuleRow = {
  cluster_name: string | null;
  cluster_version: string | null;
  cluster_device_id: string | null;
  cluster_site_id: string | null;
  module_serial: string | null;
  module_mac: string | null;
  module_model: string | null;
  module_version: string | null;
  module_backup_version: string | null;
  module_need_snapshot: boolean;
  module_pending_version: string | null;
  module_need_reboot: boolean;
};

export interface ReportOptions {
  scope?: Scope;
  scopeId?: string;
  outFile: string;
  appendDatetime?: boolean;
  appendTimestamp?: boolean;
  now?: () => Date;
}

export interface ReportResult {
  scope: Scope;
  scopeId: string;
  rows: GatewayModuleRow[];
  /** Written file, undefined when there was nothing to write */
  file?: string;
}

const GATEWAYS_PAGE_SIZE = 1000;

// ---------------------------------------------------------------------------
// Row extraction
// ---------------------------------------------------------------------------

/** Firmware running differs from the one saved in the backup partition */
export function needsSnapshot(module: ModuleStat): boolean {
  return (module.version ?? null) !== (module.backup_version ?? null);
}

/** A firmware is staged and waits for a reboot */
export function needsReboot(module: ModuleStat): boolean {
  return typeof module.pending_version === "string" && module.pending_version !== "";
}

export function moduleRow(cluster: DeviceStat, module: ModuleStat): GatewayModuleRow {
  return {
    cluster_name: cluster.name ?? null,
    cluster_version: cluster.version ?? null,
    cluster_device_id: cluster.id ?? null,
    cluster_site_id: cluster.site_id ?? null,
    module_serial: module.serial ?? null,
    module_mac: module.mac ?? null,
    module_model: module.model ?? null,
    module_version: module.version ?? null,
    module_backup_version: module.backup_version ?? null,
    module_need_snapshot: needsSnapshot(module),
    module_pending_version: module.pending_version ?? null,
    module_need_reboot: needsReboot(module),
  };
}

export function gatewayRows(cluster: DeviceStat): GatewayModuleRow[] {
  const rows = [moduleRow(cluster, cluster.module_stat?.[0] ?? {})];
  const second = cluster.module2_stat?.[0];
  if (second) rows.push(moduleRow(cluster, second));
  return rows;
}

// ---------------------------------------------------------------------------
// Gateway retrieval
// ---------------------------------------------------------------------------

/** Device stats of every gateway in scope, one page at a time */
export async function* gatewayPages(
  ctx: Pick<RunContext, "client">,
  scope: Scope,
  scopeId: string,
): AsyncGenerator<{ gateways: DeviceStat[]; total?: number }, void, undefined> {
  const def = scope === "org" ? endpoint("listOrgDevicesStats") : endpoint("listSiteDevicesStats");
  const args = scope === "org" ? { orgId: scopeId } : { siteId: scopeId };
  const pages = iteratePages(def, { args, extraQuery: { type: "gateway" } }, ctx.client, GATEWAYS_PAGE_SIZE);
  for await (const page of pages) {
    const gateways = parsePayload(z.array(DeviceStatSchema), page.items, "device stats");
    yield { gateways, total: page.total };
  }
}

export async function collectGatewayRows(
  ctx: Pick<RunContext, "client" | "progress" | "output">,
  scope: Scope,
  scopeId: string,
): Promise<GatewayModuleRow[]> {
  const rows: GatewayModuleRow[] = [];
  let processed = 0;
  let total = 0;
  ctx.output.log(center(" Retrieving Gateways "));
  for await (const page of gatewayPages(ctx, scope, scopeId)) {
    total = Math.max(page.total ?? 0, processed + page.gateways.length);
    if (processed === 0) ctx.output.log(center(" Processing gateways "));
    for (const gateway of page.gateways) {
      rows.push(...gatewayRows(gateway));
      processed += 1;
      ctx.progress.tick(processed, total, 55);
    }
  }
  ctx.progress.endTicks(processed, 55);
  return rows;
}

// ---------------------------------------------------------------------------
// CSV report
// ---------------------------------------------------------------------------

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as YYYY-MM-DDTHH.MM.SS, with no ":" */
export function fileDatetime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}` +
    `T${pad2(date.getHours())}.${pad2(date.getMinutes())}.${pad2(date.getSeconds())}`
  );
}

export function reportFileName(
  base: string,
  options: { appendDatetime?: boolean; appendTimestamp?: boolean },
  now: Date,
): string {
  let suffix: string | undefined;
  if (options.appendDatetime) suffix = fileDatetime(now);
  else if (options.appendTimestamp) suffix = String(Math.round(now.getTime() / 1000));
  if (suffix === undefined) return base;
  const stem = base.endsWith(".csv") ? base.slice(0, -".csv".length) : base;
  return `${stem}_${suffix}.csv`;
}

/** Union of the keys of all rows, in first-seen order */
export function reportHeaders(rows: readonly object[]): string[] {
  const headers: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!headers.includes(key)) headers.push(key);
    }
  }
  return headers;
}

export function csvValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function reportComment(scope: Scope, scopeId: string): string {
  return `#Gateways Firmware Backup for ${scope} ${scopeId}`;
}

export function renderReport(rows: readonly GatewayModuleRow[], scope: Scope, scopeId: string): string {
  const headers = reportHeaders(rows);
  const lines: string[][] = [[reportComment(scope, scopeId)], headers];
  for (const row of rows) {
    const entries: Record<string, unknown> = { ...row };
    lines.push(headers.map((h) => csvValue(entries[h])));
  }
  return stringifyCsv(lines);
}

export async function saveReport(
  ctx: Pick<RunContext, "progress" | "output" | "logger">,
  rows: readonly GatewayModuleRow[],
  scope: Scope,
  scopeId: string,
  file: string,
): Promise<void> {
  ctx.output.log(center(" Saving Data "));
  ctx.output.log();
  ctx.output.log("Generating CSV Headers ".padEnd(80, "."));
  rows.forEach((_, i) => ctx.progress.tick(i + 1, rows.length, 50));
  ctx.progress.endTicks(rows.length, 50);
  ctx.output.log();
  ctx.output.log("Saving to file ".padEnd(80, "."));
  await writeFile(file, renderReport(rows, scope, scopeId), "utf-8");
  ctx.progress.endTicks(rows.length, 50);
  ctx.logger.info({ file, rows: rows.length }, "report saved");
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export async function resolveScope(
  ctx: Pick<RunContext, "client" | "self" | "prompter" | "output">,
  scope?: Scope,
  scopeId?: string,
): Promise<{ scope: Scope; scopeId: string }> {
  if (scope && scopeId) return { scope, scopeId };
  const picked = await showMenu<Scope>(ctx.prompter, ctx.output, "", ["org", "site"]);
  const id = picked === "org" ? await selectOrg(ctx) : await selectSite(ctx);
  return { scope: picked, scopeId: id };
}

export async function runFirmwareReport(ctx: RunContext, options: ReportOptions): Promise<ReportResult> {
  const { scope, scopeId } = await resolveScope(ctx, options.scope, options.scopeId);
  ctx.logger.info({ scope, scopeId }, "retrieving gateways");

  const rows = await collectGatewayRows(ctx, scope, scopeId);
  if (!rows.length) {
    ctx.output.info(`No gateway found for ${scope} ${scopeId}`);
    return { scope, scopeId, rows };
  }

  ctx.output.log(center(" Process Done "));
  const file = reportFileName(options.outFile, options, (options.now ?? (() => new Date()))());
  await saveReport(ctx, rows, scope, scopeId, file);
  ctx.output.log(formatOutput(rows, ctx.format));
  ctx.output.log();
  ctx.output.info(`Report saved to ${file}`);
  return { scope, scopeId, rows, file };
}
