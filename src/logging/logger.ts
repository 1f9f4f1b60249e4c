import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
      };

  const options: pino.LoggerOptions = {
    name: "netcomply",
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino({ name: options.name, level }, pino.destination(config.file));
  }

  // Reports go to stdout, so JSON logs stay on stderr.
  return transport ? pino(options) : pino(options, pino.destination(2));
}

/** Logger that discards everything, for embedding the engine without output. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
