import { readFile } from "node:fs/promises";
import { z } from "zod";
import { parseCsvRows, type CsvRow } from "./csv.js";
import { endpoint } from "./endpoints.js";
import { CsvReadError, errorMessage } from "./errors.js";
import { executeEndpoint } from "./execute.js";
import { formatOutput } from "./output.js";
import { promptChoice } from "./prompt.js";
import { AdminSchema, parsePayload, type Admin } from "./schema.js";
import { selectOrg, selectSites } from "./select.js";
import type { RunContext } from "./session.js";

export const AdminRoleSchema = z.enum(["admin", "write", "read", "helpdesk"]);
export type AdminRole = z.infer<typeof AdminRoleSchema>;

/** Answer letters accepted by the role prompt */
export const ROLE_SHORTCUTS = {
  s: "admin",
  n: "write",
  o: "read",
  h: "helpdesk",
} as const satisfies Record<string, AdminRole>;

export type InvitePrivilege =
  | { scope: "org"; org_id: string; role: AdminRole }
  | { scope: "site"; org_id: string; site_id: string; role: AdminRole };

export interface InviteRecord {
  email: string;
  firstName: string;
  lastName: string;
  /** 1-based line in the CSV file */
  line: number;
}

export interface InviteFailure {
  invite: InviteRecord;
  reason: string;
}

export interface InviteSummary {
  invited: InviteRecord[];
  failed: InviteFailure[];
}

// ---------------------------------------------------------------------------
// Privileges
// ---------------------------------------------------------------------------

export function buildPrivileges(orgId: string, role: AdminRole, siteIds?: readonly string[]): InvitePrivilege[] {
  if (!siteIds || !siteIds.length) return [{ scope: "org", org_id: orgId, role }];
  return siteIds.map((siteId) => ({ scope: "site", org_id: orgId, site_id: siteId, role }));
}

/** Role, then whole org or an explicit list of sites */
export async function promptPrivileges(
  ctx: Pick<RunContext, "client" | "prompter" | "output">,
  orgId: string,
): Promise<InvitePrivilege[]> {
  const letter = await promptChoice(
    ctx.prompter,
    'Which level of privilege at the org level ("s" for Super Admin, "n" for Network Admin, "o" for observer, "h" for helpdesk) ',
    ["s", "n", "o", "h"] as const,
  );
  const role = ROLE_SHORTCUTS[letter];

  const specific = await promptChoice(
    ctx.prompter,
    "Do you want to select specific sites (y/N)? ",
    ["y", "Y", "n", "N"] as const,
    "n",
  );
  if (specific.toLowerCase() === "y") {
    return buildPrivileges(orgId, role, await selectSites(ctx, orgId));
  }
  return buildPrivileges(orgId, role);
}

// ---------------------------------------------------------------------------
// CSV
// ---------------------------------------------------------------------------

/**
 * email, first name, last name per row. The whole file is validated before
 * anything is sent: a short row fails the import.
 */
export function parseInviteCsv(text: string): InviteRecord[] {
  let rows: CsvRow[];
  try {
    rows = parseCsvRows(text);
  } catch (err: unknown) {
    throw new CsvReadError(errorMessage(err));
  }
  const invites: InviteRecord[] = [];
  for (const row of rows) {
    const cells = row.cells.map((c) => c.trim());
    if (cells.every((c) => c === "")) continue;
    if (!invites.length && cells[0]?.toLowerCase() === "email") continue;
    const [email, firstName, lastName] = cells;
    if (email === undefined || firstName === undefined || lastName === undefined) {
      throw new CsvReadError(
        `Line ${row.line}: expected 3 columns (email, first name, last name), got ${cells.length}`,
      );
    }
    invites.push({ email, firstName, lastName, line: row.line });
  }
  return invites;
}

export async function readInviteCsv(file: string): Promise<InviteRecord[]> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err: unknown) {
    throw new CsvReadError(`Unable to open ${file}: ${errorMessage(err)}`, file, { cause: err });
  }
  return parseInviteCsv(text);
}

// ---------------------------------------------------------------------------
// API calls
// ---------------------------------------------------------------------------

export async function inviteAdmin(
  ctx: Pick<RunContext, "client">,
  orgId: string,
  invite: Pick<InviteRecord, "email" | "firstName" | "lastName">,
  privileges: readonly InvitePrivilege[],
): Promise<void> {
  await executeEndpoint(
    endpoint("inviteOrgAdmin"),
    {
      args: { orgId },
      body: {
        email: invite.email,
        first_name: invite.firstName,
        last_name: invite.lastName,
        privileges,
      },
    },
    ctx.client,
  );
}

/** Same privileges for every row; failures are collected per row and the loop goes on */
export async function inviteAdmins(
  ctx: Pick<RunContext, "client" | "logger" | "output">,
  orgId: string,
  invites: readonly InviteRecord[],
  privileges: readonly InvitePrivilege[],
): Promise<InviteSummary> {
  const summary: InviteSummary = { invited: [], failed: [] };
  for (const invite of invites) {
    ctx.output.log([invite.email, invite.firstName, invite.lastName].join(", "));
    try {
      await inviteAdmin(ctx, orgId, invite, privileges);
      ctx.logger.info({ email: invite.email, orgId }, "admin invited");
      summary.invited.push(invite);
    } catch (err: unknown) {
      ctx.logger.error({ err, email: invite.email, line: invite.line }, "admin invite failed");
      summary.failed.push({ invite, reason: errorMessage(err) });
    }
  }
  return summary;
}

export async function listAdmins(ctx: Pick<RunContext, "client">, orgId: string): Promise<Admin[]> {
  const resp = await executeEndpoint(endpoint("listOrgAdmins"), { args: { orgId } }, ctx.client);
  return parsePayload(z.array(AdminSchema), resp.data, "admins");
}

/** Flatten admins for display: one line each, roles summarised */
export function adminRows(admins: readonly Admin[]): Record<string, string>[] {
  return admins.map((a) => ({
    email: a.email ?? "",
    first_name: a.first_name ?? "",
    last_name: a.last_name ?? "",
    privileges: a.privileges
      .map((p) => (p.scope === "site" ? `${p.role}@site:${p.name ?? p.site_id ?? ""}` : `${p.role}@${p.scope}`))
      .join(" "),
  }));
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export async function runAdminImport(ctx: RunContext, csvFile: string): Promise<InviteSummary> {
  const orgId = await selectOrg(ctx);
  const privileges = await promptPrivileges(ctx, orgId);
  ctx.logger.info({ orgId, privileges }, "privileges selected");

  ctx.output.log(`Opening CSV file ${csvFile}`);
  const invites = await readInviteCsv(csvFile);
  const summary = await inviteAdmins(ctx, orgId, invites, privileges);

  ctx.output.log();
  ctx.output.log(`${summary.invited.length} invite(s) sent, ${summary.failed.length} failed`);
  for (const f of summary.failed) {
    ctx.output.error(`line ${f.invite.line} (${f.invite.email}): ${f.reason}`);
  }

  const admins = await listAdmins(ctx, orgId);
  ctx.output.log();
  ctx.output.log(formatOutput(adminRows(admins), ctx.format));
  return summary;
}
