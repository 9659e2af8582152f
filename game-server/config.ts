// game-server/config.ts

import {
  envInt,
  envStr,
  requireAtLeast,
  requirePort,
} from "../gamecore/config/env";
import { MIN_HEARTBEAT_MS } from "../gamecore/core/Heartbeat";
import type { DatagramServerConfig } from "../gamecore/net/DatagramServer";

export interface ServerConfig extends DatagramServerConfig {
  fileLog: string | null;
}

// Defaults (human readable)
const DEFAULT_PORT = 7878;
const DEFAULT_IDLE_WAKE_MS = 1_000;            // 1 second
const DEFAULT_COMPLETED_TTL_MS = 60_000;       // 1 minute
const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60_000;   // 30 minutes

export function loadServerConfig(): ServerConfig {
  const fileLog = envStr("PD_FILELOG", "");

  return {
    host: envStr("PD_HOST", "0.0.0.0"),
    port: requirePort("PD_PORT", envInt("PD_PORT", DEFAULT_PORT)),

    // How often the loop wakes with no traffic to sweep sessions
    idleWakeMs: requireAtLeast(
      "PD_IDLE_WAKE_MS",
      envInt("PD_IDLE_WAKE_MS", DEFAULT_IDLE_WAKE_MS),
      MIN_HEARTBEAT_MS
    ),

    // How long an ended game stays queryable before it is freed
    completedTtlMs: requireAtLeast(
      "PD_COMPLETED_TTL_MS",
      envInt("PD_COMPLETED_TTL_MS", DEFAULT_COMPLETED_TTL_MS),
      0
    ),

    // Games nobody has touched for this long are freed; 0 keeps them forever
    idleTimeoutMs: requireAtLeast(
      "PD_IDLE_TIMEOUT_MS",
      envInt("PD_IDLE_TIMEOUT_MS", DEFAULT_IDLE_TIMEOUT_MS),
      0
    ),

    fileLog: fileLog.length ? fileLog : null,
  };
}
