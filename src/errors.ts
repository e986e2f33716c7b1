// ---------------------------------------------------------------------------
// Error taxonomy — each class maps to a process exit code in cli.ts
// ---------------------------------------------------------------------------

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_SETUP = 2;

/** The runtime is older than the minimum the CLI supports */
export class DependencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DependencyError";
  }
}

/** API host/token missing or rejected */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CsvReadError extends Error {
  constructor(
    message: string,
    readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CsvReadError";
  }
}

/** Non-2xx response from the Mist API */
export class MistApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly response: unknown,
  ) {
    super(message);
    this.name = "MistApiError";
  }
}

/** The user quit a menu or declined a confirmation */
export class UserAbortError extends Error {
  constructor(message = "process stopped by the user. Exiting...") {
    super(message);
    this.name = "UserAbortError";
  }
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof UserAbortError) return EXIT_OK;
  if (err instanceof DependencyError || err instanceof ConfigError) return EXIT_SETUP;
  return EXIT_FAILURE;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
