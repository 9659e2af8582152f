// gamecore/client/DatagramTransport.ts

import dgram from "dgram";

import { Logger } from "../utils/logger";

const log = Logger.scope("TRANSPORT");

export type TransportFailure = "timeout" | "socket";

/** Local connectivity failure. Never produced by a server `{ error }` reply. */
export class TransportError extends Error {
  constructor(
    readonly reason: TransportFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

/** One request datagram out, one reply datagram back. */
export interface Transport {
  request(payload: string): Promise<string>;
}

export interface DatagramTarget {
  host: string;
  port: number;
}

/**
 * Binds a fresh ephemeral socket per call and waits at most `timeoutMs`
 * for the first reply. No retries: a lost packet surfaces as a timeout.
 */
export class DatagramTransport implements Transport {
  constructor(
    private readonly target: DatagramTarget,
    private readonly timeoutMs: number
  ) {}

  request(payload: string): Promise<string> {
    const { host, port } = this.target;

    return new Promise<string>((resolve, reject) => {
      const socket = dgram.createSocket("udp4");
      let settled = false;

      const settle = (result: { reply: string } | { error: TransportError }) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.close();
        if ("reply" in result) {
          resolve(result.reply);
        } else {
          log.debug("Request failed", { host, port, reason: result.error.reason });
          reject(result.error);
        }
      };

      const timer = setTimeout(() => {
        settle({
          error: new TransportError(
            "timeout",
            `no reply from ${host}:${port} within ${this.timeoutMs}ms`
          ),
        });
      }, this.timeoutMs);

      socket.on("error", (err) => {
        settle({ error: new TransportError("socket", err.message, { cause: err }) });
      });

      socket.on("message", (msg, rinfo) => {
        if (rinfo.port !== port) {
          log.debug("Ignoring datagram from unexpected sender", {
            from: `${rinfo.address}:${rinfo.port}`,
          });
          return;
        }
        settle({ reply: msg.toString("utf8") });
      });

      socket.bind(0, () => {
        socket.send(payload, port, host, (err) => {
          if (err) {
            settle({ error: new TransportError("socket", err.message, { cause: err }) });
          }
        });
      });
    });
  }
}
