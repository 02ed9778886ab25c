import type { AppConfig } from "../config/schema";

export type LogLevel = AppConfig["logLevel"];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

const order: LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export function createLogger(config: Pick<AppConfig, "logLevel">): Logger {
  const level = config.logLevel;
  const enabled = (target: LogLevel) =>
    order.indexOf(level) >= order.indexOf(target) && level !== "silent";

  return {
    debug: (m) => enabled("debug") && console.error(m),
    info: (m) => enabled("info") && console.error(m),
    warn: (m) => enabled("warn") && console.error(m),
    error: (m) => enabled("error") && console.error(m),
  };
}

export const silentLogger: Logger = createLogger({ logLevel: "silent" });
