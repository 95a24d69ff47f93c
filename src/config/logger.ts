import winston from "winston";
import { config } from "./index.js";

/**
 * Process-wide structured logger. Call as `logger.info(message, meta)`.
 *
 * The Console transport writes synchronously, so a log line emitted right
 * before process.exit() is not lost.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  defaultMeta: { service: "callquote-core" },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [new winston.transports.Console()],
});
