// gamecore/client/GameClient.ts

import {
  decodeCreatedReply,
  decodeGameInfoReply,
  decodeGamesReply,
  decodeInfoReply,
  decodeWorldReply,
  encodeRequest,
} from "../protocol/CommandCodec";
import type { CommandName, CommandRequest, Reply } from "../shared/messages";
import type { GameState, GameSummary } from "../shared/NetworkedGame";
import type { Player } from "../shared/Player";
import type { Transport } from "./DatagramTransport";

/** The server answered with `{ "error": ... }`. */
export class ProtocolError extends Error {
  constructor(
    readonly command: CommandName,
    readonly serverError: string
  ) {
    super(`${command}: ${serverError}`);
    this.name = "ProtocolError";
  }
}

/**
 * Typed calls over a Transport. Success shapes differ per command, so each
 * method decodes with the matching reply decoder.
 */
export class GameClient {
  constructor(private readonly transport: Transport) {}

  private async call<T>(
    req: CommandRequest,
    decode: (raw: string) => Reply<T>
  ): Promise<T> {
    const raw = await this.transport.request(encodeRequest(req));
    const reply = decode(raw);
    if (!reply.ok) {
      throw new ProtocolError(req.command, reply.error);
    }
    return reply.value;
  }

  newGame(): Promise<string> {
    return this.call({ command: "newgame" }, decodeCreatedReply);
  }

  listGames(): Promise<GameSummary[]> {
    return this.call({ command: "listgames" }, decodeGamesReply);
  }

  joinGame(gameId: string, name: string): Promise<string> {
    return this.call({ command: "joingame", gameId, name }, decodeInfoReply);
  }

  gameInfo(gameId: string): Promise<GameSummary> {
    return this.call({ command: "gameinfo", gameId }, decodeGameInfoReply);
  }

  sendPosition(gameId: string, player: Player): Promise<GameState> {
    return this.call(
      { command: "sendposition", gameId, name: player.name, player },
      decodeWorldReply
    );
  }

  getWorld(gameId: string): Promise<GameState> {
    return this.call({ command: "getworld", gameId }, decodeWorldReply);
  }

  pickup(gameId: string, name: string): Promise<GameState> {
    return this.call({ command: "pickup", gameId, name }, decodeWorldReply);
  }

  endGame(gameId: string): Promise<string> {
    return this.call({ command: "endgame", gameId }, decodeInfoReply);
  }

  /** Send a request and hand back the reply text untouched (admin tool). */
  raw(req: CommandRequest): Promise<string> {
    return this.transport.request(encodeRequest(req));
  }
}
