import { MistClient } from "../client.js";
import { createLogger, type Logger } from "../logger.js";
import type { Output } from "../output.js";
import { ProgressBar } from "../progress.js";
import type { Prompter } from "../prompt.js";
import type { Self } from "../schema.js";
import type { RunContext } from "../session.js";

// ---------------------------------------------------------------------------
// Fake Mist API — routes keyed by "METHOD /path"
// ---------------------------------------------------------------------------

export interface RecordedCall {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

export type RouteHandler = (call: RecordedCall) => Response | Promise<Response>;

export function jsonResponse(
  data: unknown,
  init: { status?: number; headers?: Record<string, string> } = {},
): Response {
  return new Response(JSON.stringify(data), {
    status: init.status ?? 200,
    headers: { "Content-Type": "application/json", ...init.headers },
  });
}

/** Headers the Mist API sends on paginated listings */
export function pageHeaders(total: number, limit: number, page: number): Record<string, string> {
  return { "X-Page-Total": String(total), "X-Page-Limit": String(limit), "X-Page-Page": String(page) };
}

export function fakeFetch(routes: Record<string, RouteHandler>) {
  const calls: RecordedCall[] = [];
  const impl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const method = init?.method ?? "GET";
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    const call: RecordedCall = { method, url, headers: new Headers(init?.headers), body };
    calls.push(call);
    const handler = routes[`${method} ${url.pathname}`];
    if (!handler) return jsonResponse({ detail: `no route for ${method} ${url.pathname}` }, { status: 404 });
    return handler(call);
  };
  return { fetch: impl, calls };
}

export const TEST_HOST = "api.mist.test";

export function testClient(fetchImpl: typeof fetch): MistClient {
  return new MistClient(TEST_HOST, "test-token", { fetch: fetchImpl });
}

// ---------------------------------------------------------------------------
// Console, prompts, logs
// ---------------------------------------------------------------------------

export type OutputKind = keyof Output;

export function memoryOutput() {
  const entries: { kind: OutputKind; text: string }[] = [];
  const record = (kind: OutputKind) => (text = "") => {
    entries.push({ kind, text });
  };
  const output: Output = {
    write: record("write"),
    log: record("log"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    critical: record("critical"),
  };
  const of = (kind: OutputKind) => entries.filter((e) => e.kind === kind).map((e) => e.text);
  return { output, entries, of };
}

/** Answers questions in order; running out of answers is a test bug */
export function scriptedPrompter(answers: readonly string[]) {
  const queue = [...answers];
  const asked: string[] = [];
  let closed = false;
  const prompter: Prompter = {
    question: async (query) => {
      asked.push(query);
      const answer = queue.shift();
      if (answer === undefined) throw new Error(`Unexpected question: ${query}`);
      return answer;
    },
    close: () => {
      closed = true;
    },
  };
  return { prompter, asked, remaining: queue, isClosed: () => closed };
}

export interface LogEntry {
  level: number;
  msg?: string;
  [key: string]: unknown;
}

export function memoryLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    destination: {
      write: (line: string) => {
        const parsed: LogEntry = JSON.parse(line);
        entries.push(parsed);
      },
    },
  });
  return { logger, entries };
}

// ---------------------------------------------------------------------------
// Run context
// ---------------------------------------------------------------------------

export const TEST_SELF: Self = {
  email: "ops@example.com",
  privileges: [
    { scope: "org", role: "admin", name: "Acme", org_id: "org-1" },
    { scope: "site", role: "admin", name: "Lab", org_id: "org-1", site_id: "site-lab" },
    { scope: "org", role: "read", name: "Globex", org_id: "org-2" },
  ],
};

export function testContext(options: {
  routes?: Record<string, RouteHandler>;
  answers?: readonly string[];
  self?: Self;
  format?: RunContext["format"];
} = {}) {
  const api = fakeFetch(options.routes ?? {});
  const out = memoryOutput();
  const prompts = scriptedPrompter(options.answers ?? []);
  const logs = memoryLogger();
  const ctx: RunContext = {
    client: testClient(api.fetch),
    self: options.self ?? TEST_SELF,
    logger: logs.logger,
    output: out.output,
    prompter: prompts.prompter,
    progress: new ProgressBar(out.output, logs.logger),
    format: options.format ?? "json",
  };
  return { ctx, api, out, prompts, logs };
}
