#!/usr/bin/env node
// game-client/admin.ts
//
// One-shot operator tool: sends a single protocol command and prints the
// literal reply, or the local connectivity error.
//
// Usage:
//   admin newgame
//   admin listgames
//   admin joingame <game_id> <name>
//   admin pickup <game_id> <name>
//   admin gameinfo <game_id>
//   admin getworld <game_id>
//   admin endgame <game_id>
//
// Server address comes from PD_SERVER_HOST / PD_SERVER_PORT.

import { DatagramTransport, TransportError } from "../gamecore/client/DatagramTransport";
import { GameClient } from "../gamecore/client/GameClient";
import { envInt, envStr } from "../gamecore/config/env";
import type { CommandRequest } from "../gamecore/shared/messages";

const ADMIN_TIMEOUT_MS = 2_000;

export const USAGE = [
  "usage: admin <command> [args]",
  "  newgame",
  "  listgames",
  "  joingame <game_id> <name>",
  "  pickup <game_id> <name>",
  "  gameinfo <game_id>",
  "  getworld <game_id>",
  "  endgame <game_id>",
].join("\n");

/** Map argv to a request; null when the arguments don't fit any command. */
export function parseAdminArgs(argv: readonly string[]): CommandRequest | null {
  const [command, ...args] = argv;

  switch (command) {
    case "newgame":
    case "listgames":
      return args.length === 0 ? { command } : null;
    case "joingame":
    case "pickup":
      return args.length === 2 ? { command, gameId: args[0], name: args[1] } : null;
    case "gameinfo":
    case "getworld":
    case "endgame":
      return args.length === 1 ? { command, gameId: args[0] } : null;
    default:
      return null;
  }
}

async function main(): Promise<number> {
  const req = parseAdminArgs(process.argv.slice(2));
  if (!req) {
    console.error(USAGE);
    return 2;
  }

  const transport = new DatagramTransport(
    {
      host: envStr("PD_SERVER_HOST", "127.0.0.1"),
      port: envInt("PD_SERVER_PORT", 7878),
    },
    ADMIN_TIMEOUT_MS
  );
  const client = new GameClient(transport);

  try {
    console.log(await client.raw(req));
    return 0;
  } catch (err) {
    if (err instanceof TransportError) {
      console.error(`connection error (${err.reason}): ${err.message}`);
      return 1;
    }
    throw err;
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
