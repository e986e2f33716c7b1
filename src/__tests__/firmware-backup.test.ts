import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CsvReadError } from "../errors.js";
import { readCandidates, runFirmwareBackup, selectCandidates, triggerSnapshots } from "../firmware-backup.js";
import { renderReport, type GatewayModuleRow } from "../firmware-report.js";
import { jsonResponse, testContext } from "./helpers.js";

function row(deviceId: string, overrides: Partial<GatewayModuleRow> = {}): GatewayModuleRow {
  return {
    cluster_name: `gw-${deviceId}`,
    cluster_version: "21.4R3",
    cluster_device_id: deviceId,
    cluster_site_id: "site-a",
    module_serial: `SN-${deviceId}`,
    module_mac: `mac-${deviceId}`,
    module_model: "SRX345",
    module_version: "21.4R3",
    module_backup_version: "20.4R3",
    module_need_snapshot: true,
    module_pending_version: null,
    module_need_reboot: false,
    ...overrides,
  };
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "mist-ops-backup-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function reportFile(rows: GatewayModuleRow[]): string {
  const file = join(dir, "report.csv");
  writeFileSync(file, renderReport(rows, "org", "org-1"));
  return file;
}

const ok = () => jsonResponse({}, { status: 200 });

describe("selectCandidates", () => {
  const records = [
    { module_model: "SRX345", cluster_device_id: "d1", cluster_site_id: "s1", module_need_snapshot: "True" },
    { module_model: "SRX345", cluster_device_id: "d1", cluster_site_id: "s1", module_need_snapshot: "True" },
    { module_model: "EX4100", cluster_device_id: "d2", cluster_site_id: "s1", module_need_snapshot: "True" },
    { module_model: "SRX300", cluster_device_id: "d3", cluster_site_id: "s1", module_need_snapshot: "False" },
    { module_model: "SRX300", cluster_device_id: "d4", cluster_site_id: "s2", module_need_snapshot: "True" },
    { module_model: "SRX300", cluster_device_id: "d5", cluster_site_id: "s1", module_need_snapshot: "true" },
  ];

  test("keeps SRX modules that need a snapshot, one per device", () => {
    expect(selectCandidates(records).map((r) => r.cluster_device_id)).toEqual(["d1", "d4"]);
  });

  test("restricts to a site", () => {
    expect(selectCandidates(records, "s2").map((r) => r.cluster_device_id)).toEqual(["d4"]);
  });

  test("returns the first module of each device", () => {
    const [first] = selectCandidates(records);
    expect(first).toBe(records[0]);
  });
});

describe("readCandidates", () => {
  test("reads back a report written by the report command", async () => {
    const file = reportFile([
      row("d1"),
      row("d1", { module_serial: "SN-d1-b" }),
      row("d2", { module_need_snapshot: false }),
      row("d3", { module_model: "SSR120" }),
    ]);
    const { ctx, logs } = testContext();
    const candidates = await readCandidates(ctx, file);
    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({ cluster_device_id: "d1", module_serial: "SN-d1", module_pending_version: "" });
    expect(logs.entries.map((e) => e.msg)).toContain("Reading CSV Report: Success");
  });

  test("a missing file is a CsvReadError", async () => {
    const file = join(dir, "missing.csv");
    const { ctx, logs } = testContext();
    const err = await readCandidates(ctx, file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CsvReadError);
    expect(err).toHaveProperty("path", file);
    expect(err).toHaveProperty("message", expect.stringMatching(/^Unable to read the CSV report .*missing\.csv: ENOENT/));
    expect(logs.entries.map((e) => e.msg)).toContain("Reading CSV Report: Failure");
  });

  test("a file without the report columns is a CsvReadError", async () => {
    const file = join(dir, "admins.csv");
    writeFileSync(file, "email,first,last\njane@example.com,Jane,Doe\n");
    const { ctx } = testContext();
    const err = await readCandidates(ctx, file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CsvReadError);
    expect(err).toHaveProperty(
      "message",
      `Unable to read the CSV report ${file}: missing column(s) cluster_device_id, cluster_site_id, module_model, module_need_snapshot`,
    );
  });

  test("an empty file is a CsvReadError", async () => {
    const file = join(dir, "empty.csv");
    writeFileSync(file, "");
    const { ctx } = testContext();
    await expect(readCandidates(ctx, file)).rejects.toBeInstanceOf(CsvReadError);
  });
});

describe("triggerSnapshots", () => {
  test("a failing device does not stop the batch", async () => {
    const { ctx, api, out } = testContext({
      routes: {
        "POST /api/v1/sites/site-a/devices/d1/snapshot": ok,
        // d2 has no route: the fake API answers 404
        "POST /api/v1/sites/site-a/devices/d3/snapshot": ok,
        "POST /api/v1/sites/site-a/devices/d4/snapshot": () => jsonResponse({ detail: "busy" }, { status: 500 }),
        "POST /api/v1/sites/site-a/devices/d5/snapshot": ok,
      },
    });
    const candidates = selectCandidates(
      ["d1", "d2", "d3", "d4", "d5"].map((id) => ({
        cluster_device_id: id,
        cluster_site_id: "site-a",
        module_model: "SRX345",
        module_need_snapshot: "True",
      })),
    );

    const summary = await triggerSnapshots(ctx, candidates);

    expect(summary.succeeded.map((c) => c.cluster_device_id)).toEqual(["d1", "d3", "d5"]);
    expect(summary.failed.map((f) => [f.candidate.cluster_device_id, f.reason])).toEqual([
      ["d2", "HTTP 404"],
      ["d4", "HTTP 500"],
    ]);
    expect(api.calls).toHaveLength(5);
    expect(ctx.progress.completed).toBe(5);
    expect(out.of("error")).toEqual([]);
  });

  test("any status other than 200 is a failure", async () => {
    const { ctx, out, logs } = testContext({
      routes: { "POST /api/v1/sites/site-a/devices/d1/snapshot": () => jsonResponse({}, { status: 202 }) },
    });
    const summary = await triggerSnapshots(ctx, [{ cluster_device_id: "d1", cluster_site_id: "site-a" }]);
    expect(summary.failed.map((f) => f.reason)).toEqual(["Unexpected HTTP 202 for device d1"]);
    expect(out.of("error")).toEqual(["Unexpected HTTP 202 for device d1"]);
    expect(logs.entries.map((e) => e.msg)).toContain("Processing device d1: Failure");
  });

  test("a row without site or device id fails without calling the API", async () => {
    const { ctx, api, out } = testContext();
    const summary = await triggerSnapshots(ctx, [
      { cluster_device_id: "d1", cluster_site_id: "", module_mac: "aa" },
      { cluster_device_id: "", cluster_site_id: "site-a", module_mac: "bb" },
    ]);
    expect(summary.succeeded).toEqual([]);
    expect(out.of("error")).toEqual(["Missing site_id for device aa", "Missing device_id for device bb"]);
    expect(api.calls).toHaveLength(0);
  });
});

describe("runFirmwareBackup", () => {
  test("nothing to do when every gateway is compliant", async () => {
    const file = reportFile([row("d1", { module_need_snapshot: false })]);
    const { ctx, out, prompts, api } = testContext();
    expect(await runFirmwareBackup(ctx, { inFile: file })).toEqual({ status: "compliant" });
    expect(out.of("log")).toContain("All the gateways are compliant... Exiting...");
    expect(prompts.asked).toEqual([]);
    expect(api.calls).toHaveLength(0);
  });

  test("a file that is not a report fails instead of reporting compliance", async () => {
    const file = join(dir, "admins.csv");
    writeFileSync(file, "email,first,last\njane@example.com,Jane,Doe\n");
    const { ctx, out, api } = testContext();
    await expect(runFirmwareBackup(ctx, { inFile: file })).rejects.toBeInstanceOf(CsvReadError);
    expect(out.of("log")).not.toContain("All the gateways are compliant... Exiting...");
    expect(api.calls).toHaveLength(0);
  });

  test("asks for approval and stops when declined", async () => {
    const file = reportFile([row("d1")]);
    const { ctx, out, prompts, api } = testContext({ answers: ["n"] });
    const outcome = await runFirmwareBackup(ctx, { inFile: file });
    expect(outcome.status).toBe("declined");
    expect(prompts.asked).toEqual(["Do you want to continue (y/N)? "]);
    expect(out.of("info")).toEqual(["process stopped by the user. Exiting..."]);
    expect(api.calls).toHaveLength(0);
  });

  test("snapshots the approved devices of the selected site", async () => {
    const file = reportFile([row("d1"), row("d2", { cluster_site_id: "site-b" })]);
    const { ctx, out, api } = testContext({
      answers: ["y"],
      routes: { "POST /api/v1/sites/site-a/devices/d1/snapshot": ok },
    });
    const outcome = await runFirmwareBackup(ctx, { inFile: file, siteId: "site-a" });
    expect(outcome.status).toBe("done");
    expect(api.calls.map((c) => c.url.pathname)).toEqual(["/api/v1/sites/site-a/devices/d1/snapshot"]);
    expect(out.of("log")).toContain("List of gateways to process:");
    expect(out.of("log")).toContain("Snapshots triggered: 1 succeeded, 0 failed");
  });

  test("auto-approve skips the question", async () => {
    const file = reportFile([row("d1"), row("d2")]);
    const { ctx, out, prompts } = testContext({
      routes: {
        "POST /api/v1/sites/site-a/devices/d1/snapshot": ok,
        "POST /api/v1/sites/site-a/devices/d2/snapshot": () => jsonResponse({ detail: "busy" }, { status: 500 }),
      },
    });
    const outcome = await runFirmwareBackup(ctx, { inFile: file, autoApprove: true });
    expect(prompts.asked).toEqual([]);
    expect(out.of("info")).toEqual(["auto-approve parameter has been set to True. Starting the process"]);
    expect(outcome).toMatchObject({ status: "done" });
    if (outcome.status !== "done") return;
    expect(outcome.succeeded).toHaveLength(1);
    expect(outcome.failed.map((f) => f.reason)).toEqual(["HTTP 500"]);
    expect(out.of("log")).toContain("Snapshots triggered: 1 succeeded, 1 failed");
  });
});
