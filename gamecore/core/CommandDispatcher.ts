//gamecore/core/CommandDispatcher.ts

import type { SessionRegistry, RegistryError } from "./SessionRegistry";
import {
  type CommandRequest,
  type CommandResponse,
  type DecodedRequest,
  INVALID_COMMAND,
  gameFull,
  invalidGame,
  nameTaken,
} from "../shared/messages";
import { summarize } from "../shared/NetworkedGame";
import { Logger } from "../utils/logger";

const log = Logger.scope("DISPATCH");

function errorResponse(error: string): CommandResponse {
  return { kind: "error", error };
}

export function describeRegistryError(err: RegistryError): string {
  switch (err.code) {
    case "invalid_game":
      return invalidGame(err.gameId);
    case "game_full":
      return gameFull(err.gameId);
    case "name_taken":
      return nameTaken(err.gameId, err.name);
  }
}

/**
 * Resolves one decoded request against the registry.
 *
 * Every problem with the request itself becomes an `{ error }` response;
 * nothing here throws for bad input.
 */
export class CommandDispatcher {
  constructor(private readonly registry: SessionRegistry) {}

  dispatch(decoded: DecodedRequest): CommandResponse {
    if (decoded.kind === "invalid") {
      log.debug("Invalid command", {
        command: decoded.command,
        reason: decoded.reason,
      });
      return errorResponse(INVALID_COMMAND);
    }
    return this.handle(decoded.request);
  }

  private handle(req: CommandRequest): CommandResponse {
    const registry = this.registry;

    switch (req.command) {
      case "newgame": {
        const game = registry.createSession();
        return { kind: "created", gameId: game.id };
      }

      case "listgames":
        return { kind: "games", games: registry.listOpen() };

      case "joingame": {
        const res = registry.join(req.gameId, req.name);
        if (!res.ok) return errorResponse(describeRegistryError(res.error));

        const { game } = res.value;
        const state = game.started ? "started" : "not started";
        log.info("Player joined", {
          gameId: game.id,
          name: req.name,
          players: game.players.length,
        });
        return {
          kind: "info",
          info: `joined ${state} game ${game.id} with ${game.players.length} players`,
        };
      }

      case "gameinfo": {
        const game = registry.touch(req.gameId);
        if (!game) return errorResponse(invalidGame(req.gameId));
        return { kind: "game", game: summarize(game) };
      }

      case "sendposition": {
        const res = registry.replacePlayer(req.gameId, req.name, req.player);
        if (!res.ok) return errorResponse(describeRegistryError(res.error));
        return { kind: "world", game: res.value };
      }

      case "getworld": {
        const game = registry.touch(req.gameId);
        if (!game) return errorResponse(invalidGame(req.gameId));
        return { kind: "world", game };
      }

      case "pickup": {
        const res = registry.pickup(req.gameId, req.name);
        if (!res.ok) return errorResponse(describeRegistryError(res.error));
        return { kind: "world", game: res.value };
      }

      case "endgame": {
        const res = registry.complete(req.gameId);
        if (!res.ok) return errorResponse(describeRegistryError(res.error));
        return { kind: "info", info: `completed game ${req.gameId}` };
      }
    }
  }
}
