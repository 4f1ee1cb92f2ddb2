/**
 * Color-coded development logger.
 *
 * Every line carries a magenta [DEBUG] prefix so it stands out in the
 * terminal. `AGENT_LOG_LEVEL` (info | warn | error | silent) drops lines
 * below the given level; the default prints everything.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const GREY = "\x1b[90m";

const PREFIX = `${MAGENTA}[DEBUG]${RESET}`;

type LogLevel = "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

function threshold(): number {
  const raw = process.env["AGENT_LOG_LEVEL"]?.trim().toLowerCase();
  if (raw === "info" || raw === "warn" || raw === "error" || raw === "silent") {
    return LEVEL_RANK[raw];
  }
  return LEVEL_RANK.info;
}

function emit(level: LogLevel, label: string, scope: string | undefined, args: unknown[]): void {
  if (LEVEL_RANK[level] < threshold()) return;
  if (scope) {
    console.log(PREFIX, label, `${GREY}${scope}${RESET}`, ...args);
    return;
  }
  console.log(PREFIX, label, ...args);
}

export function devLog(...args: unknown[]): void {
  emit("info", `${CYAN}INFO${RESET}`, undefined, args);
}

export function devWarn(...args: unknown[]): void {
  emit("warn", `${YELLOW}WARN${RESET}`, undefined, args);
}

export function devError(...args: unknown[]): void {
  emit("error", `${RED}ERROR${RESET}`, undefined, args);
}

export interface ScopedLogger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function scopedLogger(scope: string): ScopedLogger {
  return {
    log: (...args) => emit("info", `${CYAN}INFO${RESET}`, scope, args),
    warn: (...args) => emit("warn", `${YELLOW}WARN${RESET}`, scope, args),
    error: (...args) => emit("error", `${RED}ERROR${RESET}`, scope, args),
  };
}
