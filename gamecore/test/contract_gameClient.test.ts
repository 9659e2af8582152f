// gamecore/test/contract_gameClient.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { parseAdminArgs } from "../../game-client/admin";
import { TransportError } from "../client/DatagramTransport";
import { GameClient, ProtocolError } from "../client/GameClient";
import { createPlayer } from "../shared/Player";
import { LoopbackTransport, makeRegistry } from "./testUtils";

test("[contract] typed calls decode each command's success shape", async () => {
  const client = new GameClient(new LoopbackTransport(makeRegistry()));

  const id = await client.newGame();
  assert.equal(id, "game-1");
  assert.deepEqual(await client.listGames(), [["game-1", 0]]);
  assert.equal(await client.joinGame(id, "Fred"), "joined not started game game-1 with 1 players");
  assert.deepEqual(await client.gameInfo(id), ["game-1", 1]);

  const fred = createPlayer("Fred");
  fred.body.x = 222;
  const world = await client.sendPosition(id, fred);
  assert.equal(world.players[0].body.x, 222);
  assert.equal(world.started, false);

  assert.equal(await client.endGame(id), "completed game game-1");
  assert.equal((await client.getWorld(id)).completed, true);
});

test("[contract] server errors reject with ProtocolError", async () => {
  const client = new GameClient(new LoopbackTransport(makeRegistry()));

  await assert.rejects(client.joinGame("nope", "Fred"), (err: unknown) => {
    assert.ok(err instanceof ProtocolError);
    assert.equal(err.command, "joingame");
    assert.equal(err.serverError, "Invalid Game nope");
    assert.equal(err.message, "joingame: Invalid Game nope");
    return true;
  });
});

test("[contract] transport failures pass through untouched", async () => {
  const transport = new LoopbackTransport(makeRegistry());
  transport.dropAll = true;
  const client = new GameClient(transport);

  await assert.rejects(client.listGames(), (err: unknown) => {
    assert.ok(err instanceof TransportError);
    assert.equal(err.reason, "timeout");
    return true;
  });
});

test("[contract] raw() returns the reply text as the server sent it", async () => {
  const client = new GameClient(new LoopbackTransport(makeRegistry()));

  assert.equal(await client.raw({ command: "gameinfo", gameId: "g9" }), '{"error":"Invalid Game g9"}');
  assert.equal(await client.raw({ command: "newgame" }), '{"game_id":"game-1"}');
});

test("[contract] admin arguments map onto requests", () => {
  assert.deepEqual(parseAdminArgs(["newgame"]), { command: "newgame" });
  assert.deepEqual(parseAdminArgs(["joingame", "g1", "Fred"]), {
    command: "joingame",
    gameId: "g1",
    name: "Fred",
  });
  assert.deepEqual(parseAdminArgs(["endgame", "g1"]), { command: "endgame", gameId: "g1" });
  assert.deepEqual(parseAdminArgs(["pickup", "g1", "Fred"]), {
    command: "pickup",
    gameId: "g1",
    name: "Fred",
  });
  assert.equal(parseAdminArgs(["pickup", "g1"]), null);

  assert.equal(parseAdminArgs([]), null);
  assert.equal(parseAdminArgs(["listgames", "extra"]), null);
  assert.equal(parseAdminArgs(["joingame", "g1"]), null);
  assert.equal(parseAdminArgs(["sendposition", "g1", "Fred"]), null);
});
