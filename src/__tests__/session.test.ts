import { describe, expect, test } from "vitest";
import {
  ConfigError,
  CsvReadError,
  DependencyError,
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_SETUP,
  MistApiError,
  UserAbortError,
  exitCodeFor,
} from "../errors.js";
import { checkRuntime, getSelf, openSession } from "../session.js";
import { fakeFetch, jsonResponse, memoryLogger, testClient, TEST_HOST } from "./helpers.js";

const config = { host: TEST_HOST, apiToken: "test-token", envFile: "/tmp/env", logFile: "./script.log", readOnly: false };

describe("checkRuntime", () => {
  test("accepts Node.js 20 and newer", () => {
    const { logger, entries } = memoryLogger();
    expect(() => checkRuntime("20.11.1", logger)).not.toThrow();
    expect(() => checkRuntime("22.3.0")).not.toThrow();
    expect(entries[0]?.msg).toBe("Node.js 20 or newer is required, you are using 20.11.1");
  });

  test("rejects an older runtime with a DependencyError", () => {
    expect(() => checkRuntime("18.19.0")).toThrow(DependencyError);
    expect(() => checkRuntime("18.19.0")).toThrow(
      "Node.js 20 or newer is required, you are currently using version 18.19.0. Please upgrade Node.js.",
    );
  });
});

describe("getSelf", () => {
  test("defaults privileges to an empty list", async () => {
    const api = fakeFetch({ "GET /api/v1/self": () => jsonResponse({ email: "ops@example.com" }) });
    const self = await getSelf(testClient(api.fetch));
    expect(self.email).toBe("ops@example.com");
    expect(self.privileges).toEqual([]);
  });

  test("rejects a malformed payload", async () => {
    const api = fakeFetch({ "GET /api/v1/self": () => jsonResponse({ privileges: [{ scope: "org" }] }) });
    await expect(getSelf(testClient(api.fetch))).rejects.toThrow(/^Unexpected \/self payload at privileges\.0\.role/);
  });
});

describe("openSession", () => {
  test("validates the token against /self", async () => {
    const api = fakeFetch({
      "GET /api/v1/self": () => jsonResponse({ email: "ops@example.com", privileges: [] }),
    });
    const { logger } = memoryLogger();
    const session = await openSession(config, logger, api.fetch);
    expect(session.self.email).toBe("ops@example.com");
    expect(api.calls[0]?.url.toString()).toBe("https://api.mist.test/api/v1/self");
  });

  test("a rejected token is a configuration error", async () => {
    const api = fakeFetch({ "GET /api/v1/self": () => jsonResponse({ detail: "Unauthorized" }, { status: 401 }) });
    const err = await openSession(config, memoryLogger().logger, api.fetch).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toHaveProperty("message", "API token rejected by api.mist.test (HTTP 401)");
  });

  test("other API errors pass through", async () => {
    const api = fakeFetch({ "GET /api/v1/self": () => jsonResponse({}, { status: 503 }) });
    await expect(openSession(config, memoryLogger().logger, api.fetch)).rejects.toBeInstanceOf(MistApiError);
  });

  test("a missing host fails before any request", async () => {
    const api = fakeFetch({});
    await expect(openSession({ ...config, host: undefined }, memoryLogger().logger, api.fetch)).rejects.toBeInstanceOf(
      ConfigError,
    );
    expect(api.calls).toHaveLength(0);
  });
});

describe("exitCodeFor", () => {
  test("maps each error kind to its exit code", () => {
    expect(exitCodeFor(new UserAbortError())).toBe(EXIT_OK);
    expect(exitCodeFor(new DependencyError("old"))).toBe(EXIT_SETUP);
    expect(exitCodeFor(new ConfigError("no token"))).toBe(EXIT_SETUP);
    expect(exitCodeFor(new CsvReadError("bad csv"))).toBe(EXIT_FAILURE);
    expect(exitCodeFor(new MistApiError("HTTP 500", 500, {}))).toBe(EXIT_FAILURE);
    expect(exitCodeFor("boom")).toBe(EXIT_FAILURE);
  });
});
