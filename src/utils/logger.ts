import winston from "winston";
import { ConfigManager, type KeystorePackConfig } from "../config";

export type { LogLevel } from "../config";

type LogMeta = Record<string, unknown>;

let logger: winston.Logger | null = null;
let builtFrom: Readonly<KeystorePackConfig> | null = null;

function createLogger(cfg: Readonly<KeystorePackConfig>): winston.Logger {
  return winston.createLogger({
    level: cfg.logLevel,
    silent: cfg.silent,
    format: winston.format.combine(
      winston.format.timestamp({
        format: "YYYY-MM-DD HH:mm:ss",
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
        const prefix = `[${timestamp}] [keystore-pack] [${level.toUpperCase()}]`;
        const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        if (stack) {
          return `${prefix} ${message}${extra}\n${stack}`;
        }
        return `${prefix} ${message}${extra}`;
      })
    ),
    transports: [new winston.transports.Console()],
    exitOnError: false,
  });
}

function getLogger(): winston.Logger {
  const cfg = ConfigManager.cfg;
  if (!logger || builtFrom !== cfg) {
    logger = createLogger(cfg);
    builtFrom = cfg;
  }
  return logger;
}

export const log = {
  error: (message: string, meta?: LogMeta) => getLogger().error(message, meta),
  warn: (message: string, meta?: LogMeta) => getLogger().warn(message, meta),
  info: (message: string, meta?: LogMeta) => getLogger().info(message, meta),
  verbose: (message: string, meta?: LogMeta) =>
    getLogger().verbose(message, meta),
  debug: (message: string, meta?: LogMeta) => getLogger().debug(message, meta),
  silly: (message: string, meta?: LogMeta) => getLogger().silly(message, meta),
};
