import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger };

export const REDACTED_PATHS = [
  "key",
  "token",
  "config.key",
  "config.token",
  "headers.authorization",
  "headers.Authorization",
] as const;

export type LoggerOptions = {
  readonly level?: string;
  /** Defaults to stderr; stdout carries protocol output. */
  readonly destination?: DestinationStream;
};

export const createLogger = (options: LoggerOptions = {}): Logger =>
  pino(
    {
      name: "tf-mimirtool",
      level: options.level ?? process.env["MIMIR_LOG_LEVEL"] ?? "info",
      redact: { paths: [...REDACTED_PATHS], censor: "[REDACTED]" },
    },
    options.destination ?? pino.destination(2),
  );

export const silentLogger = (): Logger => pino({ level: "silent" });
