import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export interface CreateLoggerOptions {
  level?: LoggerOptions["level"];
  name?: string;
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const config: LoggerOptions = {
    name: options.name ?? "sim-twin",
    level: options.level ?? "info"
  };
  return options.destination ? pino(config, options.destination) : pino(config);
}
