import { z } from "zod";
import { endpoint } from "./endpoints.js";
import { executeAllPages } from "./execute.js";
import { showMenu, showMultiMenu } from "./prompt.js";
import { parsePayload, SiteSchema, type Site } from "./schema.js";
import type { RunContext } from "./session.js";

export interface OrgRef {
  id: string;
  name: string;
}

/** Orgs the authenticated account holds an org-level privilege on, in privilege order */
export function orgsFromPrivileges(self: RunContext["self"]): OrgRef[] {
  const seen = new Map<string, OrgRef>();
  for (const p of self.privileges) {
    if (p.scope !== "org" || !p.org_id || seen.has(p.org_id)) continue;
    seen.set(p.org_id, { id: p.org_id, name: p.name ?? p.org_id });
  }
  return [...seen.values()];
}

export async function selectOrg(ctx: Pick<RunContext, "self" | "prompter" | "output">): Promise<string> {
  const orgs = orgsFromPrivileges(ctx.self);
  if (!orgs.length) throw new Error("The API token has no org-level privilege");
  const org = await showMenu(ctx.prompter, ctx.output, "Available organizations:", orgs, (o) => `${o.name} (${o.id})`);
  return org.id;
}

export async function listSites(ctx: Pick<RunContext, "client">, orgId: string): Promise<Site[]> {
  const items = await executeAllPages(endpoint("listOrgSites"), { args: { orgId } }, ctx.client);
  return parsePayload(z.array(SiteSchema), items, "sites");
}

const siteLabel = (s: Site) => `${s.name ?? s.id} (${s.id})`;

export async function selectSites(
  ctx: Pick<RunContext, "client" | "prompter" | "output">,
  orgId: string,
): Promise<string[]> {
  const sites = await listSites(ctx, orgId);
  const picked = await showMultiMenu(ctx.prompter, ctx.output, "Available sites:", sites, siteLabel);
  return picked.map((s) => s.id);
}

/** Org menu, then a single site of that org */
export async function selectSite(
  ctx: Pick<RunContext, "client" | "self" | "prompter" | "output">,
): Promise<string> {
  const orgId = await selectOrg(ctx);
  const sites = await listSites(ctx, orgId);
  const site = await showMenu(ctx.prompter, ctx.output, "Available sites:", sites, siteLabel);
  return site.id;
}
