// game-client/client.ts
//
// Headless player: creates (or joins) a game and runs the sync loop with a
// wandering bot standing in for the keyboard.
//
// Usage:
//   client              create a new game and wait for an opponent
//   client <game_id>    join an existing game

import { DatagramTransport } from "../gamecore/client/DatagramTransport";
import { GameClient } from "../gamecore/client/GameClient";
import { SyncLoop } from "../gamecore/client/SyncLoop";
import { createPlayer, type Direction } from "../gamecore/shared/Player";
import { installFileLogTap } from "../gamecore/utils/FileLogTap";
import { Logger } from "../gamecore/utils/logger";
import { pick, Rng } from "../gamecore/utils/Rng";
import { loadClientConfig } from "./config";

const log = Logger.scope("CLIENT");

const BOT_INTENTS: Partial<Direction>[] = [
  { up: true, down: false, left: false, right: false },
  { up: false, down: true, left: false, right: false },
  { up: false, down: false, left: true, right: false },
  { up: false, down: false, left: false, right: true },
  { up: true, down: false, left: false, right: true },
  { up: false, down: false, left: false, right: false },
];

const BOT_THINK_MS = 750;

async function main(): Promise<void> {
  const cfg = loadClientConfig();
  if (cfg.fileLog) installFileLogTap(cfg.fileLog);

  const client = new GameClient(
    new DatagramTransport({ host: cfg.serverHost, port: cfg.serverPort }, cfg.replyTimeoutMs)
  );

  let gameId = process.argv[2];
  if (!gameId) {
    gameId = await client.newGame();
    log.success("Created game", { gameId });
  }

  const info = await client.joinGame(gameId, cfg.playerName);
  log.info(info);

  const loop = new SyncLoop(client, gameId, createPlayer(cfg.playerName), cfg, {
    onStart: (game) => {
      log.success("Match running", {
        gameId: game.id,
        players: game.players.map((p) => p.name),
      });
    },
  });
  loop.start();

  const rng = new Rng(cfg.playerName);
  const bot = setInterval(() => {
    if (loop.getPhase() !== "running") return;
    loop.setIntent(pick(rng, BOT_INTENTS));
    if (rng.next() < 0.2) loop.jump();
  }, BOT_THINK_MS);

  const shutdown = (signal: string) => {
    clearInterval(bot);
    log.info("Leaving game", { signal, gameId, ...loop.stats() });
    loop
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error("Error while stopping", { err });
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error("Client failed", { err });
  process.exit(1);
});
