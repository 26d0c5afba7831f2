export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(tag: string, msg: string, ...args: unknown[]): void;
  info(tag: string, msg: string, ...args: unknown[]): void;
  warn(tag: string, msg: string, ...args: unknown[]): void;
  error(tag: string, msg: string, ...args: unknown[]): void;
}

function formatLine(level: LogLevel, tag: string, message: string, args: unknown[]): string {
  const ts = new Date().toISOString();
  const lvl = level.toUpperCase().padEnd(5);
  const extra = args.length > 0
    ? " " + args.map((a) => (a instanceof Error ? (a.stack ?? a.message) : String(a))).join(" ")
    : "";
  return `${ts} ${lvl} [${tag}] ${message}${extra}`;
}

const consoleLogger: Logger = {
  debug(tag, msg, ...args) {
    console.log(formatLine("debug", tag, msg, args));
  },
  info(tag, msg, ...args) {
    console.log(formatLine("info", tag, msg, args));
  },
  warn(tag, msg, ...args) {
    console.warn(formatLine("warn", tag, msg, args));
  },
  error(tag, msg, ...args) {
    console.error(formatLine("error", tag, msg, args));
  },
};

let sink: Logger = consoleLogger;
let minLevel: number = RANK.info;

function write(level: LogLevel, tag: string, message: string, args: unknown[]): void {
  if (RANK[level] < minLevel) return;
  sink[level](tag, message, ...args);
}

export const log = {
  setLevel(level: LogLevel) {
    minLevel = RANK[level];
  },

  debug(tag: string, msg: string, ...args: unknown[]) { write("debug", tag, msg, args); },
  info(tag: string, msg: string, ...args: unknown[]) { write("info", tag, msg, args); },
  warn(tag: string, msg: string, ...args: unknown[]) { write("warn", tag, msg, args); },
  error(tag: string, msg: string, ...args: unknown[]) { write("error", tag, msg, args); },
};

/** Replace the output sink. Level filtering still applies. */
export function setLogger(logger: Logger): void {
  sink = logger;
}

export function resetLogger(): void {
  sink = consoleLogger;
  minLevel = RANK.info;
}
