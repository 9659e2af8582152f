// gamecore/protocol/CommandCodec.ts
//
// JSON wire format for the session protocol.
//
// Requests:  { "command", "game_id"?, "name"?, "meta"? }
//            meta (sendposition only) is itself an encoded Player string.
// Responses: { "game_id" } | { "games" } | { "info" } | { "game" }
//            | <session object> | { "error" }
//
// Wire keys are snake_case; the in-memory model is camelCase. Every
// decoder goes through a zod schema, so nothing unvalidated leaves here.

import { z } from "zod";

import type { GameState, GameSummary } from "../shared/NetworkedGame";
import type { Player } from "../shared/Player";
import { POTION_TYPES, type Potion } from "../shared/Potion";
import {
  type CommandRequest,
  type CommandResponse,
  type DecodedRequest,
  type Reply,
} from "../shared/messages";

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const RectSchema = z.object({
  x: z.number(),
  y: z.number(),
  w: z.number(),
  h: z.number(),
});

const DirectionSchema = z.object({
  up: z.boolean(),
  down: z.boolean(),
  left: z.boolean(),
  right: z.boolean(),
});

const PotionSchema = z.object({
  position: RectSchema,
  type: z.enum(POTION_TYPES),
});

const PlayerWireSchema = z.object({
  name: z.string(),
  body: RectSchema,
  direction: DirectionSchema,
  last_direction: DirectionSchema,
  acceleration: z.number(),
  jump: z.object({
    jumping: z.boolean(),
    offset: z.number(),
    ascending: z.boolean(),
  }),
  hp: z.number().int(),
  mp: z.number().int(),
  str: z.number().int(),
  ate: PotionSchema.nullable(),
});

type PlayerWire = z.infer<typeof PlayerWireSchema>;

const PlayerSchema = PlayerWireSchema.transform(
  (w): Player => ({
    name: w.name,
    body: w.body,
    direction: w.direction,
    lastDirection: w.last_direction,
    acceleration: w.acceleration,
    jump: w.jump,
    hp: w.hp,
    mp: w.mp,
    str: w.str,
    ate: w.ate,
  }),
);

const SessionWireSchema = z.object({
  id: z.string(),
  players: z.array(PlayerSchema),
  started: z.boolean(),
  completed: z.boolean(),
  potions: z.array(PotionSchema),
});

const SummarySchema = z.tuple([z.string(), z.number().int()]);

const RequestSchema = z.discriminatedUnion("command", [
  z.object({ command: z.literal("newgame") }),
  z.object({ command: z.literal("listgames") }),
  z.object({ command: z.literal("joingame"), game_id: z.string(), name: z.string() }),
  z.object({ command: z.literal("gameinfo"), game_id: z.string() }),
  z.object({
    command: z.literal("sendposition"),
    game_id: z.string(),
    name: z.string(),
    meta: z.string(),
  }),
  z.object({ command: z.literal("getworld"), game_id: z.string() }),
  z.object({ command: z.literal("pickup"), game_id: z.string(), name: z.string() }),
  z.object({ command: z.literal("endgame"), game_id: z.string() }),
]);

const ErrorReplySchema = z.object({ error: z.string() });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(raw: string | Uint8Array): unknown {
  const text = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`not valid JSON: ${String(err)}`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

function playerToWire(p: Player): PlayerWire {
  return {
    name: p.name,
    body: p.body,
    direction: p.direction,
    last_direction: p.lastDirection,
    acceleration: p.acceleration,
    jump: p.jump,
    hp: p.hp,
    mp: p.mp,
    str: p.str,
    ate: p.ate,
  };
}

function sessionToWire(game: GameState) {
  return {
    id: game.id,
    players: game.players.map(playerToWire),
    started: game.started,
    completed: game.completed,
    potions: game.potions.map((p: Potion) => ({ position: p.position, type: p.type })),
  };
}

// ---------------------------------------------------------------------------
// Player
// ---------------------------------------------------------------------------

export function encodePlayer(player: Player): string {
  return JSON.stringify(playerToWire(player));
}

export function decodePlayer(raw: string): Player {
  const result = PlayerSchema.safeParse(parseJson(raw));
  if (!result.success) {
    throw new DecodeError(`invalid player record: ${describeIssues(result.error)}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export function encodeRequest(req: CommandRequest): string {
  switch (req.command) {
    case "newgame":
    case "listgames":
      return JSON.stringify({ command: req.command });
    case "joingame":
    case "pickup":
      return JSON.stringify({ command: req.command, game_id: req.gameId, name: req.name });
    case "gameinfo":
    case "getworld":
    case "endgame":
      return JSON.stringify({ command: req.command, game_id: req.gameId });
    case "sendposition":
      return JSON.stringify({
        command: req.command,
        game_id: req.gameId,
        name: req.name,
        meta: encodePlayer(req.player),
      });
  }
}

/**
 * Decode one datagram.
 *
 * Throws DecodeError when the payload is not a JSON object at all; the
 * server drops those without replying. A JSON object that does not match
 * any command comes back as `{ kind: "invalid" }` so it can be answered.
 */
export function decodeRequest(raw: string | Uint8Array): DecodedRequest {
  const value = parseJson(raw);
  if (!isRecord(value)) {
    throw new DecodeError("request is not a JSON object");
  }

  const command = typeof value.command === "string" ? value.command : null;
  const parsed = RequestSchema.safeParse(value);
  if (!parsed.success) {
    return { kind: "invalid", command, reason: describeIssues(parsed.error) };
  }

  const msg = parsed.data;
  switch (msg.command) {
    case "newgame":
    case "listgames":
      return { kind: "command", request: { command: msg.command } };
    case "joingame":
    case "pickup":
      return {
        kind: "command",
        request: { command: msg.command, gameId: msg.game_id, name: msg.name },
      };
    case "gameinfo":
    case "getworld":
    case "endgame":
      return { kind: "command", request: { command: msg.command, gameId: msg.game_id } };
    case "sendposition": {
      let player: Player;
      try {
        player = decodePlayer(msg.meta);
      } catch (err) {
        if (err instanceof DecodeError) {
          return { kind: "invalid", command, reason: `meta: ${err.message}` };
        }
        throw err;
      }
      return {
        kind: "command",
        request: { command: msg.command, gameId: msg.game_id, name: msg.name, player },
      };
    }
  }
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export function encodeResponse(res: CommandResponse): string {
  switch (res.kind) {
    case "created":
      return JSON.stringify({ game_id: res.gameId });
    case "games":
      return JSON.stringify({ games: res.games });
    case "info":
      return JSON.stringify({ info: res.info });
    case "game":
      return JSON.stringify({ game: res.game });
    case "world":
      return JSON.stringify(sessionToWire(res.game));
    case "error":
      return JSON.stringify({ error: res.error });
  }
}

function decodeReply<T>(
  raw: string | Uint8Array,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Reply<T> {
  const value = parseJson(raw);

  const err = ErrorReplySchema.safeParse(value);
  if (err.success) {
    return { ok: false, error: err.data.error };
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new DecodeError(`unexpected reply: ${describeIssues(parsed.error)}`);
  }
  return { ok: true, value: parsed.data };
}

// Success shapes differ per command, so callers pick the decoder matching
// the command they sent.

export function decodeCreatedReply(raw: string | Uint8Array): Reply<string> {
  return decodeReply(raw, z.object({ game_id: z.string() }).transform((r) => r.game_id));
}

export function decodeGamesReply(raw: string | Uint8Array): Reply<GameSummary[]> {
  return decodeReply(raw, z.object({ games: z.array(SummarySchema) }).transform((r) => r.games));
}

export function decodeInfoReply(raw: string | Uint8Array): Reply<string> {
  return decodeReply(raw, z.object({ info: z.string() }).transform((r) => r.info));
}

export function decodeGameInfoReply(raw: string | Uint8Array): Reply<GameSummary> {
  return decodeReply(raw, z.object({ game: SummarySchema }).transform((r) => r.game));
}

export function decodeWorldReply(raw: string | Uint8Array): Reply<GameState> {
  return decodeReply(raw, SessionWireSchema);
}
