// gamecore/test/testUtils.ts

import { CommandDispatcher } from "../core/CommandDispatcher";
import { SessionRegistry } from "../core/SessionRegistry";
import { TransportError, type Transport } from "../client/DatagramTransport";
import { decodeRequest, encodeResponse } from "../protocol/CommandCodec";
import type { RandomSource } from "../utils/Rng";

/**
 * Deterministic RandomSource.
 * - Values should be in [0, 1).
 * - If the sequence runs out, it repeats the last value (or 0.5 if empty).
 */
export function sequenceRandom(seq: number[]): RandomSource {
  let i = 0;
  return {
    next: () => {
      const last = seq.length ? seq[seq.length - 1] : 0.5;
      const v = seq[i] ?? last;
      i++;
      return v;
    },
  };
}

/** Manually advanced clock for registry timestamps. */
export class FakeClock {
  constructor(public nowMs = 1_000) {}

  now = (): number => this.nowMs;

  advance(ms: number): void {
    this.nowMs += ms;
  }
}

/** game-1, game-2, ... */
export function sequentialIds(prefix = "game"): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export function makeRegistry(clock = new FakeClock()): SessionRegistry {
  return new SessionRegistry({
    rng: sequenceRandom([0.5]),
    now: clock.now,
    idFactory: sequentialIds(),
  });
}

/**
 * In-process stand-in for the UDP round trip: encodes, dispatches against
 * a real registry and hands back the encoded reply.
 */
export class LoopbackTransport implements Transport {
  readonly sent: string[] = [];
  private readonly dispatcher: CommandDispatcher;

  /** While true, every request fails the way a lost datagram does. */
  dropAll = false;

  constructor(readonly registry: SessionRegistry) {
    this.dispatcher = new CommandDispatcher(registry);
  }

  async request(payload: string): Promise<string> {
    this.sent.push(payload);
    if (this.dropAll) {
      throw new TransportError("timeout", "no reply within 250ms");
    }
    return encodeResponse(this.dispatcher.dispatch(decodeRequest(payload)));
  }

  commands(): string[] {
    return this.sent.map((s) => {
      const decoded = decodeRequest(s);
      return decoded.kind === "command" ? decoded.request.command : "invalid";
    });
  }
}

/** Transport whose replies are released by hand. */
export class ManualTransport implements Transport {
  readonly pending: Array<{
    payload: string;
    resolve: (reply: string) => void;
    reject: (err: Error) => void;
  }> = [];

  request(payload: string): Promise<string> {
    return new Promise((resolve, reject) => {
      this.pending.push({ payload, resolve, reject });
    });
  }
}

/** Let queued promise callbacks run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
