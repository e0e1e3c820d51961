import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export type LoggerConfig = {
  level?: string;
  format?: "json" | "pretty";
  /** File descriptor to write to; the CLI logs to stderr so stdout stays clean. */
  destination?: 1 | 2;
  base?: Record<string, unknown>;
};

export function createLogger(config: LoggerConfig = {}): Logger {
  const destination = config.destination ?? 1;
  const format = config.format ?? (process.env.LOG_FORMAT === "pretty" ? "pretty" : "json");
  const options: LoggerOptions = {
    level: config.level ?? process.env.LOG_LEVEL ?? "info",
    base: { service: "tubechat", ...config.base },
  };

  if (format === "pretty") {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname,service",
        destination,
      },
    };
    return pino(options);
  }

  return pino(options, pino.destination(destination));
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
