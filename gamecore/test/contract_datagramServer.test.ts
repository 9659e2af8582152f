// gamecore/test/contract_datagramServer.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { DatagramServer, type PacketSender } from "../net/DatagramServer";
import { makeRegistry } from "./testUtils";

class RecordingSender implements PacketSender {
  readonly sent: Array<{ msg: string; port: number; address: string }> = [];
  failWith: Error | null = null;

  send(msg: string, port: number, address: string, callback: (err: Error | null) => void): void {
    this.sent.push({ msg, port, address });
    callback(this.failWith);
  }
}

const cfg = {
  host: "127.0.0.1",
  port: 0,
  idleWakeMs: 1_000,
  completedTtlMs: 60_000,
  idleTimeoutMs: 0,
};

const origin = { address: "10.0.0.7", port: 50123 };

test("[contract] every decodable packet is answered at its origin", () => {
  const server = new DatagramServer(makeRegistry(), cfg);
  const out = new RecordingSender();

  const reply = server.handlePacket(Buffer.from('{"command":"newgame"}'), origin, out);

  assert.equal(reply, '{"game_id":"game-1"}');
  assert.deepEqual(out.sent, [{ msg: '{"game_id":"game-1"}', port: 50123, address: "10.0.0.7" }]);
  assert.deepEqual(server.stats(), { received: 1, answered: 1, dropped: 0 });
});

test("[contract] undecodable packets are dropped without a reply and the loop keeps going", () => {
  const server = new DatagramServer(makeRegistry(), cfg);
  const out = new RecordingSender();

  assert.equal(server.handlePacket(Buffer.from("{not json"), origin, out), null);
  assert.equal(server.handlePacket(Buffer.from("[]"), origin, out), null);
  assert.equal(out.sent.length, 0);

  const reply = server.handlePacket(Buffer.from('{"command":"listgames"}'), origin, out);
  assert.equal(reply, '{"games":[]}');
  assert.deepEqual(server.stats(), { received: 3, answered: 1, dropped: 2 });
});

test("[contract] well-formed but unknown commands still get an answer", () => {
  const server = new DatagramServer(makeRegistry(), cfg);
  const out = new RecordingSender();

  server.handlePacket(Buffer.from('{"command":"teleport"}'), origin, out);
  assert.equal(out.sent[0]?.msg, '{"error":"Invalid Command"}');
});

test("[contract] a failed send is logged, not thrown", () => {
  const server = new DatagramServer(makeRegistry(), cfg);
  const out = new RecordingSender();
  out.failWith = new Error("EHOSTUNREACH");

  assert.doesNotThrow(() => server.handlePacket(Buffer.from('{"command":"newgame"}'), origin, out));
  assert.equal(server.stats().answered, 1);
});

test("[contract] packets are applied one after another against the same registry", () => {
  const registry = makeRegistry();
  const server = new DatagramServer(registry, cfg);
  const out = new RecordingSender();
  const packet = (o: object) => Buffer.from(JSON.stringify(o));

  server.handlePacket(packet({ command: "newgame" }), origin, out);
  server.handlePacket(packet({ command: "joingame", game_id: "game-1", name: "Fred" }), origin, out);
  server.handlePacket(
    packet({ command: "joingame", game_id: "game-1", name: "Wilma" }),
    { address: "10.0.0.8", port: 40000 },
    out
  );

  assert.deepEqual(
    out.sent.map((s) => [s.address, s.msg]),
    [
      ["10.0.0.7", '{"game_id":"game-1"}'],
      ["10.0.0.7", '{"info":"joined not started game game-1 with 1 players"}'],
      ["10.0.0.8", '{"info":"joined started game game-1 with 2 players"}'],
    ]
  );
  assert.equal(registry.find("game-1")?.started, true);
});
