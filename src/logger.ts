import pino, { type DestinationStream, type Level, type Logger } from "pino";

export type { Logger };

export interface CreateLoggerOptions {
  /** Log file, truncated when the logger is created; fd 2 (stderr) when omitted */
  file?: string;
  level?: Level;
  /** Replaces the file destination (tests) */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const destination =
    options.destination ??
    (options.file
      ? pino.destination({ dest: options.file, append: false, mkdir: true, sync: true })
      : pino.destination({ dest: 2, sync: true }));

  return pino(
    {
      level: options.level ?? "debug",
      base: { service: "mist-ops" },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
      redact: { paths: ["headers.Authorization", "apiToken"], censor: "[Redacted]" },
    },
    destination,
  );
}
