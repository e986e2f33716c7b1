import { MistApiError } from "./errors.js";

export interface RequestOptions {
  method: string;
  path: string;
  query?: Record<string, string | undefined>;
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body ({} when the body is empty) */
  data: unknown;
}

export interface MistClientOptions {
  /** Replaces the global fetch (tests, proxies) */
  fetch?: typeof fetch;
}

export class MistClient {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private host: string,
    private apiToken: string,
    options: MistClientOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  buildUrl(options: Pick<RequestOptions, "path" | "query">): URL {
    const host = this.host.replace(/\/+$/, "");
    const base = /^https?:\/\//.test(host) ? host : `https://${host}`;
    const url = new URL(`${base}${options.path}`);
    if (options.query) {
      for (const [k, v] of Object.entries(options.query)) {
        if (v !== undefined && v !== "") url.searchParams.set(k, v);
      }
    }
    return url;
  }

  async request(options: RequestOptions): Promise<ApiResponse> {
    const url = this.buildUrl(options);
    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Token ${this.apiToken}`,
    };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const resp = await this.fetchImpl(url, {
      method: options.method,
      headers,
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
    });

    if (!resp.ok) {
      const text = await resp.text();
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        parsed = { statusCode: resp.status, message: text };
      }
      throw new MistApiError(`HTTP ${resp.status}`, resp.status, parsed);
    }

    const text = await resp.text();
    if (!text) return { status: resp.status, headers: resp.headers, data: {} };
    try {
      return { status: resp.status, headers: resp.headers, data: JSON.parse(text) };
    } catch {
      throw new MistApiError(
        `Expected JSON from ${url.pathname} but got non-JSON response (status ${resp.status}). ` +
        `Check MIST_HOST points at the API host (api.mist.com, api.eu.mist.com, ...). ` +
        `Snippet: ${text.slice(0, 200)}`,
        resp.status,
        { statusCode: resp.status, body: text.slice(0, 500) },
      );
    }
  }
}
