//gamecore/shared/NetworkedGame.ts

import { GameConfig } from "../config/GameConfig";
import type { Player } from "./Player";
import type { Potion } from "./Potion";

/** The wire-visible part of a session, as clients receive it. */
export interface GameState {
  id: string;
  players: Player[];
  started: boolean;
  completed: boolean;
  potions: Potion[];
}

/**
 * One match as held by the session registry.
 *
 * Invariants:
 *  - players.length <= MAX_PLAYERS
 *  - started implies players.length === MAX_PLAYERS, and never reverts
 */
export interface NetworkedGame extends GameState {
  // Not on the wire; used by the session sweep.
  lastSeen: number;
}

export function isFull(game: GameState): boolean {
  return game.players.length >= GameConfig.MAX_PLAYERS;
}

export function findPlayer(game: GameState, name: string): Player | undefined {
  return game.players.find((p) => p.name === name);
}

/** `[id, player_count]` pair used by listgames / gameinfo. */
export type GameSummary = [id: string, playerCount: number];

export function summarize(game: GameState): GameSummary {
  return [game.id, game.players.length];
}
