import pino from "pino";

const level = (process.env.LOG_LEVEL ?? "info").toLowerCase();

export const logger = pino({
  level: pino.levels.values[level] === undefined ? "info" : level,
  base: { app: "media-autoposter" },
  timestamp: pino.stdTimeFunctions.isoTime,
});
