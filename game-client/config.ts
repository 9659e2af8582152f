// game-client/config.ts

import {
  ConfigError,
  envInt,
  envStr,
  requirePort,
  requirePositive,
} from "../gamecore/config/env";
import { validateCadence, type SyncLoopConfig } from "../gamecore/client/SyncLoop";

export interface ClientConfig extends SyncLoopConfig {
  serverHost: string;
  serverPort: number;
  /** Upper bound on every request round trip. */
  replyTimeoutMs: number;
  playerName: string;
  fileLog: string | null;
}

// Defaults (human readable)
const DEFAULT_RENDER_TICK_MS = 33;   // ~30 FPS
const DEFAULT_NET_TICK_MS = 20;      // 50 Hz
const DEFAULT_WAIT_POLL_MS = 500;
const DEFAULT_REPLY_TIMEOUT_MS = 250;

export function loadClientConfig(): ClientConfig {
  const fileLog = envStr("PD_FILELOG", "");

  const cfg: ClientConfig = {
    serverHost: envStr("PD_SERVER_HOST", "127.0.0.1"),
    serverPort: requirePort("PD_SERVER_PORT", envInt("PD_SERVER_PORT", 7878)),

    renderTickMs: envInt("PD_RENDER_TICK_MS", DEFAULT_RENDER_TICK_MS),
    netTickMs: envInt("PD_NET_TICK_MS", DEFAULT_NET_TICK_MS),
    waitPollMs: envInt("PD_WAIT_POLL_MS", DEFAULT_WAIT_POLL_MS),

    replyTimeoutMs: requirePositive(
      "PD_REPLY_TIMEOUT_MS",
      envInt("PD_REPLY_TIMEOUT_MS", DEFAULT_REPLY_TIMEOUT_MS)
    ),

    playerName: envStr("PD_PLAYER_NAME", "Fred"),
    fileLog: fileLog.length ? fileLog : null,
  };

  try {
    validateCadence(cfg);
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
  return cfg;
}
