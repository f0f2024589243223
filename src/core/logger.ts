export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];
export const LOG_LEVEL_ENV = "VECSYNC_LOG_LEVEL";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const PREFIX = "[vecsync]";

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

export function readLogLevelEnv(): LogLevel | undefined {
  const raw = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : undefined;
}

let currentLevel: LogLevel = readLogLevelEnv() ?? "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

// stdout is reserved for command output, so every level goes to stderr.
function emit(level: Exclude<LogLevel, "silent">, message: string, detail?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const suffix = detail && Object.keys(detail).length > 0 ? ` ${JSON.stringify(detail)}` : "";
  const tag = level === "info" ? "" : ` ${level}:`;
  console.error(`${PREFIX}${tag} ${message}${suffix}`);
}

export const logger = {
  debug: (message: string, detail?: Record<string, unknown>) => emit("debug", message, detail),
  info: (message: string, detail?: Record<string, unknown>) => emit("info", message, detail),
  warn: (message: string, detail?: Record<string, unknown>) => emit("warn", message, detail),
  error: (message: string, detail?: Record<string, unknown>) => emit("error", message, detail)
};
