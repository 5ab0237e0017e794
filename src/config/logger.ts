import pino from "pino";
import { logLevelSchema } from "./index.js";

// Only LOG_LEVEL is read here: the rest of the environment is validated by
// loadConfig(), which reports errors through this logger.
const level = logLevelSchema.catch("info").parse(process.env.LOG_LEVEL || undefined);

// stdout carries the JSON result array, so logs go to stderr.
export const logger = pino(
  { level, base: { app: "mail-risk-classifier" } },
  pino.destination(2)
);
