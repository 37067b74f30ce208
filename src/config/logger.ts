import pino from "pino";
import env from "./env";

const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "link-preview" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;

export default logger;
