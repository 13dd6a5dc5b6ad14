import pino, { type Logger } from "pino";
import { defaultLogLevel } from "./config";

export type { Logger };

// server.ts raises or lowers this to the configured LOG_LEVEL once config is loaded
export const log: Logger = pino({
  level: defaultLogLevel(process.env.NODE_ENV),
  base: undefined, // no pid/hostname
  timestamp: pino.stdTimeFunctions.isoTime,
});
