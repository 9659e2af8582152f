// gamecore/client/SyncLoop.ts

import { GameClient } from "./GameClient";
import { stepPlayer, startJump, touchingPotion } from "../core/PlayerPhysics";
import type { GameState } from "../shared/NetworkedGame";
import {
  clonePlayer,
  copyDirection,
  createPlayer,
  type Direction,
  type Player,
} from "../shared/Player";
import type { Potion } from "../shared/Potion";
import { copyRect } from "../shared/Rect";
import { Logger } from "../utils/logger";

export type SyncPhase = "waiting" | "running" | "stopped";

export interface SyncLoopConfig {
  /** Local physics cadence. */
  renderTickMs: number;
  /** Push/pull cadence; must not be slower than the render tick. */
  netTickMs: number;
  /** getworld polling while waiting for the second player. */
  waitPollMs: number;
}

export interface SyncLoopOptions {
  onStart?: (game: GameState) => void;
}

export interface SyncLoopStats {
  renderTicks: number;
  netTicks: number;
  netFailures: number;
}

export function validateCadence(cfg: SyncLoopConfig): void {
  const periods: Array<[string, number]> = [
    ["renderTickMs", cfg.renderTickMs],
    ["netTickMs", cfg.netTickMs],
    ["waitPollMs", cfg.waitPollMs],
  ];
  for (const [key, value] of periods) {
    if (!(value > 0)) throw new RangeError(`${key} must be > 0, got ${value}`);
  }
  if (cfg.netTickMs > cfg.renderTickMs) {
    throw new RangeError(
      `netTickMs (${cfg.netTickMs}) must be <= renderTickMs (${cfg.renderTickMs})`
    );
  }
}

/**
 * Copy the synced subset of a remote record onto the local opponent.
 * Vitals and animation state stay local.
 */
export function applyOpponent(target: Player, remote: Player): void {
  target.name = remote.name;
  target.body = copyRect(remote.body);
  target.direction = copyDirection(remote.direction);
  target.lastDirection = copyDirection(remote.lastDirection);
  target.jump.jumping = remote.jump.jumping;
}

/**
 * Client-side replication for one player in one game.
 *
 * WaitingForStart: polls getworld every waitPollMs until the session
 * reports started, then hydrates the opponent and switches to Running.
 *
 * Running: two cadences, each measured from its own last firing.
 *  - render tick: local physics only, never touches the network
 *  - net tick: sendposition, optional pickup, getworld, reconcile
 *
 * At most one round trip is in flight. A failed or timed-out round trip
 * leaves the opponent as it was: no update this tick.
 */
export class SyncLoop {
  private readonly log = Logger.scope("SYNC");

  readonly local: Player;
  readonly opponent: Player = createPlayer("");

  private phase: SyncPhase = "waiting";
  private hasOpponent = false;
  private potions: Potion[] = [];
  private pickupPending = false;

  private lastRenderAt: number | null = null;
  private lastNetAt: number | null = null;
  private lastPollAt: number | null = null;

  private inFlight: Promise<void> | null = null;
  private driver: NodeJS.Timeout | null = null;

  private readonly counters: SyncLoopStats = {
    renderTicks: 0,
    netTicks: 0,
    netFailures: 0,
  };

  constructor(
    private readonly client: GameClient,
    readonly gameId: string,
    local: Player,
    private readonly cfg: SyncLoopConfig,
    private readonly opts: SyncLoopOptions = {}
  ) {
    validateCadence(cfg);
    this.local = local;
  }

  getPhase(): SyncPhase {
    return this.phase;
  }

  /** Opponent as last reconciled, or null before the game has started. */
  getOpponent(): Player | null {
    return this.hasOpponent ? this.opponent : null;
  }

  getPotions(): readonly Potion[] {
    return this.potions;
  }

  stats(): SyncLoopStats {
    return { ...this.counters };
  }

  // ---------------------------------------------------------------------------
  // Input layer hooks
  // ---------------------------------------------------------------------------

  setIntent(intent: Partial<Direction>): void {
    Object.assign(this.local.direction, intent);
  }

  jump(): boolean {
    return startJump(this.local);
  }

  // ---------------------------------------------------------------------------
  // Cadences
  // ---------------------------------------------------------------------------

  /** Advance both cadences to wall-clock time `now` (ms). */
  update(now: number): void {
    if (this.phase === "stopped") return;

    if (this.phase === "waiting") {
      if (!this.inFlight && this.due(this.lastPollAt, this.cfg.waitPollMs, now)) {
        this.lastPollAt = now;
        this.launch(() => this.pollForStart());
      }
      return;
    }

    if (this.due(this.lastRenderAt, this.cfg.renderTickMs, now)) {
      this.lastRenderAt = now;
      this.renderTick();
    }

    if (!this.inFlight && this.due(this.lastNetAt, this.cfg.netTickMs, now)) {
      this.lastNetAt = now;
      this.launch(() => this.netTick());
    }
  }

  /** Drive update() from a timer until stop(). */
  start(): void {
    if (this.driver || this.phase === "stopped") return;
    const period = Math.max(1, Math.floor(this.cfg.netTickMs / 4));
    this.driver = setInterval(() => this.update(Date.now()), period);
  }

  /** Stop cadences; resolves once any in-flight round trip has settled. */
  stop(): Promise<void> {
    if (this.driver) {
      clearInterval(this.driver);
      this.driver = null;
    }
    this.phase = "stopped";
    return this.flush();
  }

  /** Resolves when no round trip is in flight. */
  flush(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  private due(last: number | null, periodMs: number, now: number): boolean {
    return last === null || now - last >= periodMs;
  }

  private launch(task: () => Promise<void>): void {
    this.inFlight = task()
      .catch((err: unknown) => {
        this.counters.netFailures++;
        this.log.debug("Round trip failed; keeping last known state", {
          gameId: this.gameId,
          err,
        });
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  private renderTick(): void {
    this.counters.renderTicks++;
    stepPlayer(this.local);

    if (!this.pickupPending && touchingPotion(this.local, this.potions)) {
      this.pickupPending = true;
    }
  }

  // ---------------------------------------------------------------------------
  // Network
  // ---------------------------------------------------------------------------

  private async pollForStart(): Promise<void> {
    const world = await this.client.getWorld(this.gameId);
    if (this.phase !== "waiting") return;

    this.potions = world.potions;
    if (!world.started) return;

    this.reconcile(world);
    this.phase = "running";
    this.log.info("Game started", {
      gameId: this.gameId,
      opponent: this.hasOpponent ? this.opponent.name : null,
    });
    this.opts.onStart?.(world);
  }

  private async netTick(): Promise<void> {
    this.counters.netTicks++;

    // Snapshot so render ticks during the round trip don't bleed into it.
    await this.client.sendPosition(this.gameId, clonePlayer(this.local));

    if (this.pickupPending) {
      this.pickupPending = false;
      await this.client.pickup(this.gameId, this.local.name);
    }

    const world = await this.client.getWorld(this.gameId);
    if (this.phase === "stopped") return;
    this.reconcile(world);
  }

  private reconcile(world: GameState): void {
    this.potions = world.potions;

    const remote = world.players.find((p) => p.name !== this.local.name);
    if (remote) {
      applyOpponent(this.opponent, remote);
      this.hasOpponent = true;
    }

    const own = world.players.find((p) => p.name === this.local.name);
    if (own && own.ate) {
      this.local.ate = own.ate;
    }
  }
}
