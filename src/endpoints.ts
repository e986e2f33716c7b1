// ---------------------------------------------------------------------------
// Endpoint registry — the Mist API operations the CLI calls
// ---------------------------------------------------------------------------

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface EndpointDef {
  /** Endpoint group (null = top-level) */
  group: string | null;
  /** Action name (e.g. "list", "snapshot") */
  action: string;
  /** Mist API operationId */
  operationId: string;
  method: HttpMethod;
  /** URL path template, placeholders in {camelCase} */
  path: string;
  summary: string;
  /** Path parameters, in template order */
  args: readonly { name: string; desc: string }[];
  /** Whether it supports limit/page query params */
  paginatable: boolean;
  /** Whether it accepts a JSON request body */
  hasBody: boolean;
  /** Extra query params beyond standard pagination */
  extraQuery: readonly { name: string; required: boolean; desc: string }[];
}

export const ENDPOINTS = [
  // ── Self ────────────────────────────────────────────────────────────
  {
    group: null, action: "self", operationId: "getSelf",
    method: "GET", path: "/api/v1/self",
    summary: "Get the authenticated account and its privileges",
    args: [], paginatable: false, hasBody: false, extraQuery: [],
  },

  // ── Sites ───────────────────────────────────────────────────────────
  {
    group: "sites", action: "list", operationId: "listOrgSites",
    method: "GET", path: "/api/v1/orgs/{orgId}/sites",
    summary: "List the sites of an org",
    args: [{ name: "orgId", desc: "Org ID" }],
    paginatable: true, hasBody: false, extraQuery: [],
  },

  // ── Device stats ────────────────────────────────────────────────────
  {
    group: "stats", action: "org-devices", operationId: "listOrgDevicesStats",
    method: "GET", path: "/api/v1/orgs/{orgId}/stats/devices",
    summary: "List device statistics for every site of an org",
    args: [{ name: "orgId", desc: "Org ID" }],
    paginatable: true, hasBody: false,
    extraQuery: [{ name: "type", required: false, desc: "Device type: ap, switch, gateway, all" }],
  },
  {
    group: "stats", action: "site-devices", operationId: "listSiteDevicesStats",
    method: "GET", path: "/api/v1/sites/{siteId}/stats/devices",
    summary: "List device statistics for a site",
    args: [{ name: "siteId", desc: "Site ID" }],
    paginatable: true, hasBody: false,
    extraQuery: [{ name: "type", required: false, desc: "Device type: ap, switch, gateway, all" }],
  },

  // ── Devices ─────────────────────────────────────────────────────────
  {
    group: "devices", action: "snapshot", operationId: "createSiteDeviceSnapshot",
    method: "POST", path: "/api/v1/sites/{siteId}/devices/{deviceId}/snapshot",
    summary: "Snapshot the running firmware of a gateway into its backup partition",
    args: [{ name: "siteId", desc: "Site ID" }, { name: "deviceId", desc: "Device ID" }],
    paginatable: false, hasBody: false, extraQuery: [],
  },

  // ── Admins ──────────────────────────────────────────────────────────
  {
    group: "admins", action: "list", operationId: "listOrgAdmins",
    method: "GET", path: "/api/v1/orgs/{orgId}/admins",
    summary: "List the administrators of an org",
    args: [{ name: "orgId", desc: "Org ID" }],
    paginatable: false, hasBody: false, extraQuery: [],
  },
  {
    group: "admins", action: "invite", operationId: "inviteOrgAdmin",
    method: "POST", path: "/api/v1/orgs/{orgId}/invites",
    summary: "Invite an administrator to an org",
    args: [{ name: "orgId", desc: "Org ID" }],
    paginatable: false, hasBody: true, extraQuery: [],
  },
] as const satisfies readonly EndpointDef[];

export type OperationId = (typeof ENDPOINTS)[number]["operationId"];

export function endpoint(operationId: OperationId): EndpointDef {
  const def = ENDPOINTS.find((e) => e.operationId === operationId);
  if (!def) throw new Error(`Unknown operation: ${operationId}`);
  return def;
}

