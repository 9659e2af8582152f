//gamecore/shared/messages.ts

import type { GameState, GameSummary } from "./NetworkedGame";
import type { Player } from "./Player";

// -------------------------
// Commands
// -------------------------

export const COMMANDS = [
  "newgame",
  "listgames",
  "joingame",
  "gameinfo",
  "sendposition",
  "getworld",
  "pickup",
  "endgame",
] as const;

export type CommandName = (typeof COMMANDS)[number];

/** One case per command, carrying exactly the fields it needs. */
export type CommandRequest =
  | { command: "newgame" }
  | { command: "listgames" }
  | { command: "joingame"; gameId: string; name: string }
  | { command: "gameinfo"; gameId: string }
  | { command: "sendposition"; gameId: string; name: string; player: Player }
  | { command: "getworld"; gameId: string }
  | { command: "pickup"; gameId: string; name: string }
  | { command: "endgame"; gameId: string };

/**
 * Result of decoding a datagram that was at least a JSON object.
 * Anything below that bar is a DecodeError and never reaches dispatch.
 */
export type DecodedRequest =
  | { kind: "command"; request: CommandRequest }
  | { kind: "invalid"; command: string | null; reason: string };

// -------------------------
// Responses
// -------------------------

export type CommandResponse =
  | { kind: "created"; gameId: string }
  | { kind: "games"; games: GameSummary[] }
  | { kind: "info"; info: string }
  | { kind: "game"; game: GameSummary }
  | { kind: "world"; game: GameState }
  | { kind: "error"; error: string };

/** Client-side view of a reply: success value or the server's error string. */
export type Reply<T> = { ok: true; value: T } | { ok: false; error: string };

// -------------------------
// Error strings
// -------------------------

export const INVALID_COMMAND = "Invalid Command";

export function invalidGame(gameId: string): string {
  return `Invalid Game ${gameId}`;
}

export function gameFull(gameId: string): string {
  return `game ${gameId} is full`;
}

export function nameTaken(gameId: string, name: string): string {
  return `name ${name} is taken in game ${gameId}`;
}
