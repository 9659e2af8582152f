// gamecore/net/DatagramServer.ts

import dgram from "dgram";

import { CommandDispatcher } from "../core/CommandDispatcher";
import { startHeartbeat } from "../core/Heartbeat";
import { SessionRegistry } from "../core/SessionRegistry";
import { DecodeError, decodeRequest, encodeResponse } from "../protocol/CommandCodec";
import { Logger } from "../utils/logger";

export interface DatagramServerConfig {
  host: string;
  port: number;
  /** Wake-up period when no packets arrive (runs the session sweep). */
  idleWakeMs: number;
  completedTtlMs: number;
  idleTimeoutMs: number;
}

export interface PacketOrigin {
  address: string;
  port: number;
}

/** The one thing the loop needs from a socket to answer a packet. */
export interface PacketSender {
  send(
    msg: string,
    port: number,
    address: string,
    callback: (err: Error | null) => void
  ): void;
}

export interface DatagramServerStats {
  received: number;
  answered: number;
  dropped: number;
}

const log = Logger.scope("SERVER");

function preview(msg: Buffer): string {
  return msg.toString("utf8", 0, Math.min(128, msg.length));
}

/**
 * Listening -> Dispatching -> Listening.
 *
 * Each packet is decoded, dispatched and answered inside a single
 * synchronous handler call, so the registry only ever sees one request at
 * a time and needs no locking.
 */
export class DatagramServer {
  private readonly dispatcher: CommandDispatcher;
  private socket: dgram.Socket | null = null;
  private heartbeat: NodeJS.Timeout | null = null;

  private readonly counters: DatagramServerStats = {
    received: 0,
    answered: 0,
    dropped: 0,
  };

  constructor(
    private readonly registry: SessionRegistry,
    private readonly cfg: DatagramServerConfig
  ) {
    this.dispatcher = new CommandDispatcher(registry);
  }

  stats(): DatagramServerStats {
    return { ...this.counters };
  }

  /**
   * Handle one datagram and send the reply to its origin.
   * Returns the encoded reply, or null when the packet was dropped.
   */
  handlePacket(msg: Buffer, origin: PacketOrigin, out: PacketSender): string | null {
    this.counters.received++;

    let reply: string;
    try {
      const decoded = decodeRequest(msg);
      reply = encodeResponse(this.dispatcher.dispatch(decoded));
    } catch (err) {
      this.counters.dropped++;
      if (err instanceof DecodeError) {
        log.warn("Dropping undecodable packet", {
          from: `${origin.address}:${origin.port}`,
          reason: err.message,
          preview: preview(msg),
        });
      } else {
        log.error("Dispatch failed; packet dropped", {
          from: `${origin.address}:${origin.port}`,
          err,
        });
      }
      return null;
    }

    out.send(reply, origin.port, origin.address, (err) => {
      if (err) {
        log.warn("Failed to send reply", {
          to: `${origin.address}:${origin.port}`,
          err,
        });
      }
    });
    this.counters.answered++;

    return reply;
  }

  start(): Promise<PacketOrigin> {
    if (this.socket) {
      return Promise.reject(new Error("DatagramServer already started"));
    }

    const socket = dgram.createSocket("udp4");
    this.socket = socket;

    return new Promise((resolve, reject) => {
      const onBindError = (err: Error) => {
        this.socket = null;
        socket.close();
        reject(err);
      };
      socket.once("error", onBindError);

      socket.bind(this.cfg.port, this.cfg.host, () => {
        socket.off("error", onBindError);
        socket.on("error", (err) => {
          log.error("Socket error", { err });
        });
        socket.on("message", (msg, rinfo) => {
          this.handlePacket(msg, rinfo, socket);
        });

        this.heartbeat = startHeartbeat(this.registry, {
          intervalMs: this.cfg.idleWakeMs,
          completedTtlMs: this.cfg.completedTtlMs,
          idleTimeoutMs: this.cfg.idleTimeoutMs,
        });

        const addr = socket.address();
        log.success("Listening for datagrams", {
          host: addr.address,
          port: addr.port,
        });
        resolve({ address: addr.address, port: addr.port });
      });
    });
  }

  stop(): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }

    const socket = this.socket;
    this.socket = null;
    if (!socket) return Promise.resolve();

    return new Promise((resolve) => {
      socket.close(() => {
        log.info("Server stopped", this.stats());
        resolve();
      });
    });
  }
}
