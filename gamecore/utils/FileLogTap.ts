// gamecore/utils/FileLogTap.ts
//
// Mirrors console output into a file (ANSI codes stripped) while still
// printing to the terminal. Enabled by the entry points when PD_FILELOG
// names a path.

import fs from "fs";
import util from "util";

type ConsoleMethod = (...args: unknown[]) => void;

// Matches ANSI color codes like \u001b[32m, \u001b[0m, etc.
const ANSI_REGEX = /\u001b\[[0-9;]*m/g;

export function stripAnsi(input: string): string {
  return input.replace(ANSI_REGEX, "");
}

function serializeArg(arg: unknown): string {
  if (typeof arg === "string") {
    return stripAnsi(arg);
  }
  if (arg instanceof Error) {
    return stripAnsi(arg.stack ?? arg.message);
  }
  try {
    return stripAnsi(JSON.stringify(arg) ?? String(arg));
  } catch {
    // circular structures and BigInt land here
    return stripAnsi(util.inspect(arg));
  }
}

export function formatLine(level: string, args: unknown[], at: Date = new Date()): string {
  return `[${at.toISOString()}] [${level}] ${args.map(serializeArg).join(" ")}\n`;
}

/**
 * Install the tap. Returns a function that restores the original console
 * methods and closes the file.
 */
export function installFileLogTap(filePath: string): () => void {
  const stream = fs.createWriteStream(filePath, { flags: "a" });

  const original = {
    log: console.log,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  let reportedFailure = false;
  stream.on("error", (err) => {
    // Report once on the real stderr; the terminal output keeps working.
    if (reportedFailure) return;
    reportedFailure = true;
    original.error(`[FileLogTap] writing ${filePath} failed: ${err.message}`);
  });

  const wrap = (level: string, method: ConsoleMethod): ConsoleMethod => {
    return (...args: unknown[]): void => {
      if (!stream.destroyed) stream.write(formatLine(level, args));
      method.apply(console, args);
    };
  };

  console.log = wrap("log", original.log);
  console.info = wrap("info", original.info);
  console.warn = wrap("warn", original.warn);
  console.error = wrap("error", original.error);

  return () => {
    console.log = original.log;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    stream.end();
  };
}
