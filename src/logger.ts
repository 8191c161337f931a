import pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  if (
    envLevel === "fatal" ||
    envLevel === "error" ||
    envLevel === "warn" ||
    envLevel === "info" ||
    envLevel === "debug" ||
    envLevel === "trace"
  ) {
    return envLevel;
  }
  return "info";
}

export const logger = pino({
  name: "web-research-search",
  level: getLogLevel(),
});

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
