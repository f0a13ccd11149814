import pino from "pino";

const logger: pino.Logger = pino({ level: process.env.LOG_LEVEL ?? "info" });

// Component loggers are created at import time, before config is loaded.
const children = new Set<pino.Logger>();

export function initLogger(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

export function getLogger(name?: string): pino.Logger {
  if (!name) return logger;
  const child = logger.child({ component: name });
  children.add(child);
  return child;
}

export default logger;
