// gamecore/core/Heartbeat.ts

import type { SessionRegistry, SweepPolicy } from "./SessionRegistry";
import { Logger } from "../utils/logger";

export interface HeartbeatConfig extends SweepPolicy {
  intervalMs: number; // how often the server wakes when idle
}

const log = Logger.scope("HEARTBEAT");

export const MIN_HEARTBEAT_MS = 100;

/**
 * Periodic wake-up for the server loop.
 *
 * Runs even with no traffic. Each sweep frees completed sessions past their
 * TTL and sessions nobody has touched for idleTimeoutMs. Gameplay state is
 * never changed here.
 */
export function startHeartbeat(
  registry: SessionRegistry,
  cfg: HeartbeatConfig
): NodeJS.Timeout {
  const intervalMs = Math.max(cfg.intervalMs, MIN_HEARTBEAT_MS);
  if (intervalMs !== cfg.intervalMs) {
    log.warn("Heartbeat interval raised to the minimum", {
      requested: cfg.intervalMs,
      intervalMs,
    });
  }

  log.info("Starting heartbeat", {
    intervalMs,
    completedTtlMs: cfg.completedTtlMs,
    idleTimeoutMs: cfg.idleTimeoutMs,
  });

  let sweepCount = 0;

  const handle = setInterval(() => {
    sweepCount++;

    const removed = registry.sweep(cfg);

    for (const gameId of removed) {
      log.info("Freed game", { gameId });
    }

    // Only log summaries occasionally or when we actually did work
    if (removed.length > 0 || sweepCount % 60 === 0) {
      log.debug("Heartbeat sweep complete", {
        sweep: sweepCount,
        activeGames: registry.count(),
        freed: removed.length,
      });
    }
  }, intervalMs);

  handle.unref();

  return handle;
}
