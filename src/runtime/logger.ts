import { destination, pino, type Logger } from "pino";

export type { Logger };

const LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function levelFromEnv(): string {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return level && LEVELS.has(level) ? level : "info";
}

// stdout belongs to the tool protocol; logs go to stderr.
const root: Logger = pino({ name: "pocketdock", level: levelFromEnv(), base: { pid: process.pid } }, destination(2));

export function setLogLevel(level: string): void {
  root.level = level;
}

export function createLogger(module: string, bindings: Record<string, unknown> = {}): Logger {
  return root.child({ module, ...bindings });
}
