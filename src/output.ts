import chalk from "chalk";

// ---------------------------------------------------------------------------
// Console sink
// ---------------------------------------------------------------------------

export interface Output {
  /** Raw text, no newline added (progress bars) */
  write(text: string): void;
  log(line?: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  critical(message: string): void;
}

export function createConsoleOutput(
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr,
): Output {
  return {
    write: (text) => {
      stdout.write(text);
    },
    log: (line = "") => {
      stdout.write(`${line}\n`);
    },
    info: (message) => {
      stderr.write(`${chalk.blue("Info")}: ${message}\n`);
    },
    warn: (message) => {
      stderr.write(`${chalk.yellow("Warning")}: ${message}\n`);
    },
    error: (message) => {
      stderr.write(`${chalk.red("Error")}: ${message}\n`);
    },
    critical: (message) => {
      stderr.write(`${chalk.bgRed.white("Critical")}: ${message}\n`);
    },
  };
}

/** Swallows everything — used where stdout belongs to a protocol (MCP) */
export const silentOutput: Output = {
  write: () => {},
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  critical: () => {},
};

/** " text " centred in `width` columns, padded with `fill` */
export function center(text: string, width = 80, fill = "-"): string {
  if (text.length >= width) return text;
  const left = Math.floor((width - text.length) / 2);
  return fill.repeat(left) + text + fill.repeat(width - text.length - left);
}

// ---------------------------------------------------------------------------
// Listings
// ---------------------------------------------------------------------------

export type OutputFormat = "table" | "json";

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "table" || value === "json";
}

/** Pick specific fields from an object or each element of an array */
export function pickFields(data: unknown, fields: string[]): unknown {
  if (!fields.length) return data;

  const pick = (obj: unknown): unknown => {
    if (!isRecord(obj)) return obj;
    const result: Record<string, unknown> = {};
    for (const f of fields) {
      if (f in obj) result[f] = obj[f];
    }
    return result;
  };

  if (Array.isArray(data)) return data.map(pick);
  return pick(data);
}

export function formatOutput(data: unknown, format: OutputFormat): string {
  switch (format) {
    case "table":
      return formatTable(data);
    case "json":
      return JSON.stringify(data, null, 2);
  }
}

export function formatTable(data: unknown): string {
  let items: Record<string, unknown>[];

  if (Array.isArray(data)) {
    items = data.filter(isRecord);
  } else if (isRecord(data)) {
    items = [data];
  } else {
    return String(data);
  }

  if (!items.length) return "(no results)";

  const keys = [...new Set(items.flatMap((item) => Object.keys(item)))];

  const fmt = (v: unknown): string => {
    if (v === null || v === undefined) return "";
    if (typeof v === "object") return JSON.stringify(v);
    return String(v);
  };

  const widths = keys.map((k) => {
    const vals = items.map((item) => fmt(item[k]));
    return Math.min(60, Math.max(k.length, ...vals.map((v) => v.length)));
  });

  const header = keys.map((k, i) => k.padEnd(widths[i])).join("  ").trimEnd();
  const sep = widths.map((w) => "─".repeat(w)).join("──");
  const rows = items.map((item) =>
    keys
      .map((k, i) => {
        const s = fmt(item[k]);
        return s.length > widths[i] ? s.slice(0, widths[i] - 1) + "…" : s.padEnd(widths[i]);
      })
      .join("  ")
      .trimEnd(),
  );

  return [header, sep, ...rows].join("\n");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
