//gamecore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function isLogLevel(v: string): v is LogLevel {
  return ORDER.some((level) => level === v);
}

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.trim().toLowerCase();
  return isLogLevel(v) ? v : null;
}

// Per-scope defaults (LOG_SCOPE_<SCOPE> overrides these)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  SERVER: "info",
  DISPATCH: "info",
  REGISTRY: "info",
  HEARTBEAT: "info",
  CODEC: "warn",
  CLIENT: "info",
  SYNC: "info",
  TRANSPORT: "warn",
};

function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // A global LOG_LEVEL wins over the table so tests can quiet everything.
  const global = parseLevel(process.env.LOG_LEVEL);
  if (global) return global;

  return PER_SCOPE_DEFAULTS[key] ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  if (level === "silent") return false;
  return ORDER.indexOf(level) >= ORDER.indexOf(getScopeLevel(scope));
}
