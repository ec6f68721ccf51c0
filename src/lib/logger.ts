import winston from "winston";
import { getConfig, type LogFormat, type LogLevel } from "./config";

export type LogMeta = Record<string, unknown>;

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  silent?: boolean;
};

const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const prettyFormat = winston.format.combine(
  winston.format.timestamp({
    format: "YYYY-MM-DD HH:mm:ss",
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

export const createLogger = (options: LoggerOptions = {}) => {
  const {
    level = getConfig().logging.level,
    format = getConfig().logging.format,
    silent = getConfig().nodeEnv === "test",
  } = options;
  return winston.createLogger({
    level,
    defaultMeta: { service: "puzzle15-engine" },
    transports: [
      new winston.transports.Console({
        format: format === "json" ? jsonFormat : prettyFormat,
        silent,
      }),
    ],
  });
};

let shared: winston.Logger | null = null;

/** Package logger, built from the environment the first time it is needed. */
export const getLogger = () => {
  if (!shared) shared = createLogger();
  return shared;
};
