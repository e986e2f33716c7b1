import type { EndpointDef } from "./endpoints.js";
import type { ApiResponse, MistClient } from "./client.js";

export interface ExecuteParams {
  /** Path arguments keyed by name (e.g. { siteId: "abc" }) */
  args: Record<string, string | undefined>;
  /** Page size */
  limit?: number;
  /** 1-based page number */
  page?: number;
  /** Extra query params (keyed by param name) */
  extraQuery?: Record<string, string>;
  /** Request body (already built) */
  body?: unknown;
}

export interface ResolvedRequest {
  method: string;
  path: string;
  query: Record<string, string>;
  body: unknown | undefined;
}

export interface Page {
  items: unknown[];
  /** 1-based page number */
  page: number;
  /** Total item count across all pages, when the API reports it */
  total?: number;
}

/** Resolve path template and build query params without executing the request */
export function resolveRequest(def: EndpointDef, params: ExecuteParams): ResolvedRequest {
  let resolvedPath = def.path;

  for (const arg of def.args) {
    const val = params.args[arg.name];
    if (!val) {
      throw new Error(`Missing path argument "${arg.name}" for ${def.operationId}`);
    }
    resolvedPath = resolvedPath.replace(`{${arg.name}}`, encodeURIComponent(val));
  }

  const query: Record<string, string> = {};
  if (def.paginatable) {
    if (params.limit !== undefined) query.limit = String(params.limit);
    if (params.page !== undefined) query.page = String(params.page);
  }
  for (const qp of def.extraQuery) {
    const val = params.extraQuery?.[qp.name];
    if (val !== undefined) query[qp.name] = val;
  }

  return {
    method: def.method,
    path: resolvedPath,
    query,
    body: def.hasBody ? params.body : undefined,
  };
}

/** Execute a single endpoint and return the raw API response */
export async function executeEndpoint(
  def: EndpointDef,
  params: ExecuteParams,
  client: MistClient,
): Promise<ApiResponse> {
  const req = resolveRequest(def, params);
  return client.request({
    method: req.method,
    path: req.path,
    query: req.query,
    body: req.body,
  });
}

function headerNumber(headers: Headers, name: string): number | undefined {
  const raw = headers.get(name);
  if (raw === null || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Page number to request next, or null on the last page.
 * Driven by the X-Page-Total / X-Page-Limit / X-Page-Page response headers.
 */
export function nextPage(headers: Headers): number | null {
  const total = headerNumber(headers, "X-Page-Total");
  const limit = headerNumber(headers, "X-Page-Limit");
  const page = headerNumber(headers, "X-Page-Page");
  if (total === undefined || limit === undefined || page === undefined) return null;
  return limit * page < total ? page + 1 : null;
}

/**
 * Lazily walk every page of a paginatable endpoint. Each call starts over
 * from page 1, so the returned iterable can be consumed more than once.
 */
export async function* iteratePages(
  def: EndpointDef,
  params: ExecuteParams,
  client: MistClient,
  pageSize = 100,
): AsyncGenerator<Page, void, undefined> {
  let page = 1;

  while (true) {
    const resp = await executeEndpoint(def, { ...params, limit: params.limit ?? pageSize, page }, client);
    const items = Array.isArray(resp.data) ? resp.data : [];
    yield { items, page, total: headerNumber(resp.headers, "X-Page-Total") };

    const next = def.paginatable && items.length > 0 ? nextPage(resp.headers) : null;
    if (next === null) return;
    page = next;
  }
}

/** Auto-paginate: fetch all pages and concatenate their items */
export async function executeAllPages(
  def: EndpointDef,
  params: ExecuteParams,
  client: MistClient,
  pageSize = 100,
): Promise<unknown[]> {
  const all: unknown[] = [];
  for await (const page of iteratePages(def, params, client, pageSize)) {
    all.push(...page.items);
  }
  return all;
}
