// gamecore/test/behavior_syncLoop.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { TransportError } from "../client/DatagramTransport";
import { GameClient } from "../client/GameClient";
import { SyncLoop, validateCadence } from "../client/SyncLoop";
import { encodeResponse } from "../protocol/CommandCodec";
import type { GameState } from "../shared/NetworkedGame";
import { createPlayer } from "../shared/Player";
import { LoopbackTransport, ManualTransport, makeRegistry } from "./testUtils";

const cadence = { renderTickMs: 33, netTickMs: 20, waitPollMs: 500 };

function setup() {
  const registry = makeRegistry();
  const game = registry.createSession();
  registry.join(game.id, "Fred");

  const transport = new LoopbackTransport(registry);
  const starts: GameState[] = [];
  const loop = new SyncLoop(new GameClient(transport), game.id, createPlayer("Fred"), cadence, {
    onStart: (g) => starts.push(g),
  });
  return { registry, transport, loop, gameId: game.id, starts };
}

function moveWilma(registry: ReturnType<typeof makeRegistry>, gameId: string, x: number, y: number) {
  const wilma = createPlayer("Wilma");
  wilma.body = { x, y, w: 34, h: 44 };
  wilma.direction.left = true;
  wilma.lastDirection.left = true;
  wilma.jump = { jumping: true, offset: 12, ascending: true };
  wilma.hp = 55;
  registry.replacePlayer(gameId, "Wilma", wilma);
}

async function startRunning(ctx: ReturnType<typeof setup>): Promise<void> {
  ctx.loop.update(0);
  await ctx.loop.flush();
  ctx.registry.join(ctx.gameId, "Wilma");
  ctx.loop.update(500);
  await ctx.loop.flush();
  assert.equal(ctx.loop.getPhase(), "running");
}

test("[behavior] waits for the second player, then hydrates the opponent", async () => {
  const ctx = setup();
  const { loop, registry, transport, gameId, starts } = ctx;

  loop.update(0);
  await loop.flush();
  assert.equal(loop.getPhase(), "waiting");
  assert.equal(loop.getOpponent(), null);

  // poll interval not reached yet
  loop.update(499);
  assert.equal(transport.sent.length, 1);

  registry.join(gameId, "Wilma");
  moveWilma(registry, gameId, 10, 20);

  loop.update(500);
  await loop.flush();

  assert.equal(loop.getPhase(), "running");
  assert.equal(starts.length, 1);

  const opponent = loop.getOpponent();
  assert.ok(opponent);
  assert.equal(opponent.name, "Wilma");
  assert.deepEqual(opponent.body, { x: 10, y: 20, w: 34, h: 44 });
  assert.equal(opponent.direction.left, true);
  assert.equal(opponent.lastDirection.left, true);
  assert.equal(opponent.jump.jumping, true);
  // vitals and the jump offset stay local
  assert.equal(opponent.hp, 100);
  assert.equal(opponent.jump.offset, 0);

  assert.deepEqual(transport.commands(), ["getworld", "getworld"]);
});

test("[behavior] a net tick pushes the local record, pulls the world and reconciles", async () => {
  const ctx = setup();
  await startRunning(ctx);
  const { loop, registry, transport, gameId } = ctx;

  moveWilma(registry, gameId, 200, 210);
  loop.setIntent({ right: true });
  loop.update(600);
  await loop.flush();

  assert.deepEqual(transport.commands(), ["getworld", "getworld", "sendposition", "getworld"]);
  assert.equal(registry.find(gameId)?.players[0].body.x, 102.5);
  assert.deepEqual(loop.getOpponent()?.body, { x: 200, y: 210, w: 34, h: 44 });
  assert.deepEqual(loop.stats(), { renderTicks: 1, netTicks: 1, netFailures: 0 });
});

test("[behavior] cadences fire on their own periods", async () => {
  const ctx = setup();
  await startRunning(ctx);
  const { loop } = ctx;

  loop.update(1_000); // render + net
  await loop.flush();
  loop.update(1_019); // neither
  loop.update(1_020); // net only
  await loop.flush();
  loop.update(1_033); // render only
  await loop.flush();

  assert.deepEqual(loop.stats(), { renderTicks: 2, netTicks: 2, netFailures: 0 });
});

test("[behavior] a lost reply leaves the opponent at its last known state", async () => {
  const ctx = setup();
  await startRunning(ctx);
  const { loop, registry, transport, gameId } = ctx;

  moveWilma(registry, gameId, 50, 60);
  loop.update(600);
  await loop.flush();
  assert.deepEqual(loop.getOpponent()?.body, { x: 50, y: 60, w: 34, h: 44 });

  moveWilma(registry, gameId, 70, 80);
  transport.dropAll = true;
  loop.update(700);
  await loop.flush();

  assert.equal(loop.getPhase(), "running");
  assert.deepEqual(loop.getOpponent()?.body, { x: 50, y: 60, w: 34, h: 44 });
  assert.equal(loop.stats().netFailures, 1);

  transport.dropAll = false;
  loop.update(800);
  await loop.flush();
  assert.deepEqual(loop.getOpponent()?.body, { x: 70, y: 80, w: 34, h: 44 });
});

test("[behavior] render ticks keep running while a round trip is outstanding", async () => {
  const registry = makeRegistry();
  const game = registry.createSession();
  registry.join(game.id, "Fred");
  registry.join(game.id, "Wilma");
  const worldReply = encodeResponse({ kind: "world", game });

  const transport = new ManualTransport();
  const loop = new SyncLoop(new GameClient(transport), game.id, createPlayer("Fred"), cadence);

  loop.update(0);
  transport.pending[0].resolve(worldReply);
  await loop.flush();
  assert.equal(loop.getPhase(), "running");

  loop.setIntent({ down: true });
  loop.update(10); // render + sendposition goes out
  loop.update(43); // render again; net is due but one is in flight
  loop.update(76);

  assert.equal(transport.pending.length, 2);
  assert.equal(loop.stats().renderTicks, 3);
  assert.equal(loop.local.body.y, 100 + 2.5 + 5 + 7.5);

  transport.pending[1].reject(new TransportError("timeout", "no reply within 250ms"));
  await loop.flush();
  assert.equal(loop.stats().netFailures, 1);

  loop.update(96);
  assert.equal(transport.pending.length, 3);
});

test("[behavior] overlapping a potion sends a pickup and adopts the server's record", async () => {
  const ctx = setup();
  await startRunning(ctx);
  const { loop, transport, registry, gameId } = ctx;

  // the test registry always places its potion at 312,232
  loop.local.body = { x: 300, y: 220, w: 34, h: 44 };
  loop.update(600);
  await loop.flush();

  assert.deepEqual(transport.commands().slice(-3), ["sendposition", "pickup", "getworld"]);
  assert.deepEqual(loop.local.ate, { position: { x: 312, y: 232, w: 16, h: 16 }, type: "Mana" });
  assert.deepEqual(registry.find(gameId)?.players[0].ate, loop.local.ate);
});

test("[behavior] stop() ends both cadences", async () => {
  const ctx = setup();
  await startRunning(ctx);
  const { loop, transport } = ctx;

  await loop.stop();
  const sent = transport.sent.length;
  loop.update(10_000);
  await loop.flush();

  assert.equal(loop.getPhase(), "stopped");
  assert.equal(transport.sent.length, sent);
});

test("[contract] the net cadence may not be slower than the render cadence", () => {
  assert.throws(
    () => validateCadence({ renderTickMs: 20, netTickMs: 33, waitPollMs: 500 }),
    RangeError
  );
  assert.throws(() => validateCadence({ renderTickMs: 33, netTickMs: 0, waitPollMs: 500 }), RangeError);
  assert.doesNotThrow(() => validateCadence(cadence));
});
