import { randomUUID } from "crypto";

/** Opaque session identifier handed out by `newgame`. */
export function newGameId(): string {
  return randomUUID();
}
