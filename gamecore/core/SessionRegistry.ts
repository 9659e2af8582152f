//gamecore/core/SessionRegistry.ts

import { GameConfig } from "../config/GameConfig";
import {
  NetworkedGame,
  GameSummary,
  findPlayer,
  isFull,
  summarize,
} from "../shared/NetworkedGame";
import { createPlayer, type Player } from "../shared/Player";
import { spawnPotion } from "../shared/Potion";
import { rectsOverlap } from "../shared/Rect";
import { Logger } from "../utils/logger";
import { Rng, type RandomSource } from "../utils/Rng";
import { newGameId } from "../utils/uuid";

const log = Logger.scope("REGISTRY");

export type RegistryError =
  | { code: "invalid_game"; gameId: string }
  | { code: "game_full"; gameId: string }
  | { code: "name_taken"; gameId: string; name: string };

export type RegistryResult<T> = { ok: true; value: T } | { ok: false; error: RegistryError };

export interface JoinOutcome {
  game: NetworkedGame;
  player: Player;
}

export interface SweepPolicy {
  /** How long a completed session lingers before it is freed. */
  completedTtlMs: number;
  /** Any session untouched this long is freed. 0 disables. */
  idleTimeoutMs: number;
}

export interface SessionRegistryOptions {
  rng?: RandomSource;
  now?: () => number;
  idFactory?: () => string;
}

function invalidGame<T>(gameId: string): RegistryResult<T> {
  return { ok: false, error: { code: "invalid_game", gameId } };
}

/**
 * Every live match, in creation order.
 *
 * One instance per server process, owned by the datagram loop and handed
 * to the dispatcher. Only the loop mutates it, one packet at a time.
 */
export class SessionRegistry {
  private games = new Map<string, NetworkedGame>();

  private readonly rng: RandomSource;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  constructor(opts: SessionRegistryOptions = {}) {
    this.rng = opts.rng ?? new Rng();
    this.now = opts.now ?? Date.now;
    this.idFactory = opts.idFactory ?? newGameId;
  }

  // ---------------------------------------------------------------------------
  // Creation / lookup
  // ---------------------------------------------------------------------------

  createSession(): NetworkedGame {
    let id = this.idFactory();
    while (this.games.has(id)) {
      id = this.idFactory();
    }

    const game: NetworkedGame = {
      id,
      players: [],
      started: false,
      completed: false,
      potions: [],
      lastSeen: this.now(),
    };
    for (let i = 0; i < GameConfig.POTIONS_PER_GAME; i++) {
      game.potions.push(spawnPotion(this.rng));
    }

    this.games.set(id, game);
    log.info("Game created", { gameId: id });
    return game;
  }

  /** Absence is a normal outcome; callers report it as an invalid game. */
  find(id: string): NetworkedGame | undefined {
    return this.games.get(id);
  }

  /** Lookup on behalf of a command; marks the session as recently used. */
  touch(id: string): NetworkedGame | undefined {
    const game = this.games.get(id);
    if (game) game.lastSeen = this.now();
    return game;
  }

  values(): Iterable<NetworkedGame> {
    return this.games.values();
  }

  count(): number {
    return this.games.size;
  }

  /** `[id, playerCount]` for every session still waiting for players. */
  listOpen(): GameSummary[] {
    const out: GameSummary[] = [];
    for (const game of this.games.values()) {
      if (!game.started) out.push(summarize(game));
    }
    return out;
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  join(id: string, name: string): RegistryResult<JoinOutcome> {
    const game = this.touch(id);
    if (!game) return invalidGame(id);

    if (game.started || isFull(game)) {
      return { ok: false, error: { code: "game_full", gameId: id } };
    }
    if (findPlayer(game, name)) {
      return { ok: false, error: { code: "name_taken", gameId: id, name } };
    }

    const player = createPlayer(name);
    game.players.push(player);

    if (isFull(game)) {
      game.started = true;
      log.info("Game started", { gameId: id, players: game.players.map((p) => p.name) });
    }

    return { ok: true, value: { game, player } };
  }

  /**
   * Overwrite the first player named `name` with the submitted record.
   * An unknown name leaves the session untouched and still succeeds.
   */
  replacePlayer(id: string, name: string, record: Player): RegistryResult<NetworkedGame> {
    const game = this.touch(id);
    if (!game) return invalidGame(id);

    const idx = game.players.findIndex((p) => p.name === name);
    if (idx === -1) {
      log.debug("replacePlayer: no such player", { gameId: id, name });
    } else {
      // The request's name is the key; a different name inside the record
      // must not rename the entry.
      game.players[idx] = { ...record, name };
    }

    return { ok: true, value: game };
  }

  /**
   * Consume the first potion the named player overlaps: record it on the
   * player and respawn it somewhere else. No overlap, no change.
   */
  pickup(id: string, name: string): RegistryResult<NetworkedGame> {
    const game = this.touch(id);
    if (!game) return invalidGame(id);

    const player = findPlayer(game, name);
    if (!player) return { ok: true, value: game };

    const idx = game.potions.findIndex((p) => rectsOverlap(player.body, p.position));
    if (idx !== -1) {
      const potion = game.potions[idx];
      player.ate = potion;
      game.potions[idx] = spawnPotion(this.rng);
      log.debug("Potion picked up", { gameId: id, name, type: potion.type });
    }

    return { ok: true, value: game };
  }

  complete(id: string): RegistryResult<NetworkedGame> {
    const game = this.touch(id);
    if (!game) return invalidGame(id);

    if (!game.completed) {
      game.completed = true;
      log.info("Game completed", { gameId: id });
    }
    return { ok: true, value: game };
  }

  // ---------------------------------------------------------------------------
  // Removal / cleanup
  // ---------------------------------------------------------------------------

  /** Free completed sessions past their TTL and sessions idle too long. */
  sweep(policy: SweepPolicy): string[] {
    const now = this.now();
    const removed: string[] = [];

    for (const game of this.games.values()) {
      const idleMs = now - game.lastSeen;
      const expired = game.completed && idleMs >= policy.completedTtlMs;
      const abandoned = policy.idleTimeoutMs > 0 && idleMs >= policy.idleTimeoutMs;
      if (expired || abandoned) {
        removed.push(game.id);
      }
    }

    for (const id of removed) {
      this.games.delete(id);
    }
    return removed;
  }
}
