import winston from "winston";
import { config } from "./index.js";

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "HH:mm:ss" }),
  winston.format.printf(({ level, message, timestamp, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} ${level} ${String(message)}${rest}`;
  }),
);

const prodFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

export const logger = winston.createLogger({
  level: config.logLevel,
  format: config.nodeEnv === "production" ? prodFormat : devFormat,
  defaultMeta: { service: "bot-knowledge-console" },
  transports: [new winston.transports.Console()],
  silent: config.nodeEnv === "test",
});
