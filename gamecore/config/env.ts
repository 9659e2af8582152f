// gamecore/config/env.ts
//
// Small readers for process.env. `.env` in the working directory is loaded
// once, on first import; real environment variables win over it.

import dotenv from "dotenv";

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function envStr(name: string, fallback: string): string {
  const raw = process.env[name];
  return raw && raw.trim().length ? raw.trim() : fallback;
}

/** Integer env var; a set-but-unparsable value is a ConfigError, not a silent fallback. */
export function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return Math.trunc(n);
}

export function requirePort(name: string, port: number): number {
  if (port < 0 || port > 65535) {
    throw new ConfigError(`${name} must be a port number (0-65535), got ${port}`);
  }
  return port;
}

export function requireAtLeast(name: string, value: number, min: number): number {
  if (value < min) {
    throw new ConfigError(`${name} must be at least ${min}, got ${value}`);
  }
  return value;
}

export function requirePositive(name: string, value: number): number {
  if (value <= 0) {
    throw new ConfigError(`${name} must be greater than 0, got ${value}`);
  }
  return value;
}
