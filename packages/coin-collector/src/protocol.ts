/**
 * Wire protocol.
 *
 * Every frame is UTF-8 JSON text of the form `{ type, data }` with snake_case
 * field names. Inside the process messages are a closed tagged union with
 * camelCase fields; this module is the only place the two meet.
 */

import { z } from "zod";
import { DIRECTIONS } from "./types.js";
import type { Direction, GameSnapshot } from "./types.js";

// =============================================================================
// Messages
// =============================================================================

export type ClientMessage =
  | { type: "join"; name: string }
  | { type: "input"; directions: Direction[]; sequence: number }
  | { type: "leave" };

export type ServerMessage =
  | { type: "welcome"; playerId: string; colorIndex: number }
  | { type: "lobby_update"; playerCount: number; required: number; playerNames: string[] }
  | { type: "game_start"; countdown: number }
  | { type: "game_state"; snapshot: GameSnapshot }
  | { type: "coin_collected"; coinId: string; collectorId: string; newScore: number }
  | {
      type: "game_over";
      winnerId: string | null;
      winnerName: string | null;
      finalScores: Record<string, number>;
    };

export type Message = ClientMessage | ServerMessage;
export type MessageType = Message["type"];

export type MessageRoute = "client_to_server" | "server_to_client";

/**
 * Every wire type and the direction it travels. Anything not listed is rejected.
 */
export const MESSAGE_TYPES = {
  join: "client_to_server",
  input: "client_to_server",
  leave: "client_to_server",
  welcome: "server_to_client",
  lobby_update: "server_to_client",
  game_start: "server_to_client",
  game_state: "server_to_client",
  coin_collected: "server_to_client",
  game_over: "server_to_client",
} as const satisfies Record<MessageType, MessageRoute>;

/**
 * Thrown when a frame cannot be decoded. Receivers log and drop it.
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

// =============================================================================
// Wire schemas
// =============================================================================

const PositionSchema = z.object({
  x: z.number(),
  y: z.number(),
});

const WirePlayerSchema = z.object({
  id: z.string(),
  position: PositionSchema,
  score: z.number().int().min(0),
  color_index: z.number().int().min(0),
  name: z.string(),
});

const WireCoinSchema = z.object({
  id: z.string(),
  position: PositionSchema,
});

const WireSnapshotSchema = z.object({
  timestamp: z.number(),
  server_time: z.number(),
  players: z.array(WirePlayerSchema),
  coins: z.array(WireCoinSchema),
  game_time_remaining: z.number().min(0),
  game_started: z.boolean(),
  game_over: z.boolean(),
});

const ClientEnvelopeSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("join"),
    data: z.object({ name: z.string().min(1).max(32) }),
  }),
  z.object({
    type: z.literal("input"),
    data: z.object({
      directions: z.array(z.enum(DIRECTIONS)).max(DIRECTIONS.length),
      sequence: z.number().int().min(0),
    }),
  }),
  z.object({
    type: z.literal("leave"),
    data: z.object({}).default({}),
  }),
]);

const ServerEnvelopeSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("welcome"),
    data: z.object({
      player_id: z.string(),
      color_index: z.number().int().min(0),
    }),
  }),
  z.object({
    type: z.literal("lobby_update"),
    data: z.object({
      player_count: z.number().int().min(0),
      required: z.number().int().min(0),
      player_names: z.array(z.string()),
    }),
  }),
  z.object({
    type: z.literal("game_start"),
    data: z.object({ countdown: z.number().int().min(0) }),
  }),
  z.object({
    type: z.literal("game_state"),
    data: WireSnapshotSchema,
  }),
  z.object({
    type: z.literal("coin_collected"),
    data: z.object({
      coin_id: z.string(),
      collector_id: z.string(),
      new_score: z.number().int().min(0),
    }),
  }),
  z.object({
    type: z.literal("game_over"),
    data: z.object({
      winner_id: z.string().nullable(),
      winner_name: z.string().nullable(),
      final_scores: z.record(z.string(), z.number().int().min(0)),
    }),
  }),
]);

type ClientEnvelope = z.infer<typeof ClientEnvelopeSchema>;
type ServerEnvelope = z.infer<typeof ServerEnvelopeSchema>;
type WireSnapshot = z.infer<typeof WireSnapshotSchema>;

// =============================================================================
// Mapping
// =============================================================================

const snapshotToWire = (snapshot: GameSnapshot): WireSnapshot => ({
  timestamp: snapshot.timestamp,
  server_time: snapshot.serverTime,
  players: snapshot.players.map((p) => ({
    id: p.id,
    position: { x: p.position.x, y: p.position.y },
    score: p.score,
    color_index: p.colorIndex,
    name: p.name,
  })),
  coins: snapshot.coins.map((c) => ({
    id: c.id,
    position: { x: c.position.x, y: c.position.y },
  })),
  game_time_remaining: snapshot.timeRemaining,
  game_started: snapshot.started,
  game_over: snapshot.over,
});

const snapshotFromWire = (wire: WireSnapshot): GameSnapshot => ({
  timestamp: wire.timestamp,
  serverTime: wire.server_time,
  players: wire.players.map((p) => ({
    id: p.id,
    name: p.name,
    position: { x: p.position.x, y: p.position.y },
    score: p.score,
    colorIndex: p.color_index,
  })),
  coins: wire.coins.map((c) => ({
    id: c.id,
    position: { x: c.position.x, y: c.position.y },
  })),
  timeRemaining: wire.game_time_remaining,
  started: wire.game_started,
  over: wire.game_over,
});

function toWire(message: Message): ClientEnvelope | ServerEnvelope {
  switch (message.type) {
    case "join":
      return { type: "join", data: { name: message.name } };
    case "input":
      return {
        type: "input",
        data: { directions: [...message.directions], sequence: message.sequence },
      };
    case "leave":
      return { type: "leave", data: {} };
    case "welcome":
      return {
        type: "welcome",
        data: { player_id: message.playerId, color_index: message.colorIndex },
      };
    case "lobby_update":
      return {
        type: "lobby_update",
        data: {
          player_count: message.playerCount,
          required: message.required,
          player_names: [...message.playerNames],
        },
      };
    case "game_start":
      return { type: "game_start", data: { countdown: message.countdown } };
    case "game_state":
      return { type: "game_state", data: snapshotToWire(message.snapshot) };
    case "coin_collected":
      return {
        type: "coin_collected",
        data: {
          coin_id: message.coinId,
          collector_id: message.collectorId,
          new_score: message.newScore,
        },
      };
    case "game_over":
      return {
        type: "game_over",
        data: {
          winner_id: message.winnerId,
          winner_name: message.winnerName,
          final_scores: { ...message.finalScores },
        },
      };
    default: {
      const unknownMessage: never = message;
      throw new ProtocolError(`Unknown message: ${JSON.stringify(unknownMessage)}`);
    }
  }
}

function clientFromWire(envelope: ClientEnvelope): ClientMessage {
  switch (envelope.type) {
    case "join":
      return { type: "join", name: envelope.data.name };
    case "input":
      return {
        type: "input",
        directions: envelope.data.directions,
        sequence: envelope.data.sequence,
      };
    case "leave":
      return { type: "leave" };
  }
}

function serverFromWire(envelope: ServerEnvelope): ServerMessage {
  switch (envelope.type) {
    case "welcome":
      return {
        type: "welcome",
        playerId: envelope.data.player_id,
        colorIndex: envelope.data.color_index,
      };
    case "lobby_update":
      return {
        type: "lobby_update",
        playerCount: envelope.data.player_count,
        required: envelope.data.required,
        playerNames: envelope.data.player_names,
      };
    case "game_start":
      return { type: "game_start", countdown: envelope.data.countdown };
    case "game_state":
      return { type: "game_state", snapshot: snapshotFromWire(envelope.data) };
    case "coin_collected":
      return {
        type: "coin_collected",
        coinId: envelope.data.coin_id,
        collectorId: envelope.data.collector_id,
        newScore: envelope.data.new_score,
      };
    case "game_over":
      return {
        type: "game_over",
        winnerId: envelope.data.winner_id,
        winnerName: envelope.data.winner_name,
        finalScores: envelope.data.final_scores,
      };
  }
}

// =============================================================================
// Codec
// =============================================================================

/**
 * Serialize a message to a wire frame.
 */
export function encodeMessage(message: Message): string {
  return JSON.stringify(toWire(message));
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ProtocolError(`Frame is not valid JSON: ${text.slice(0, 80)}`);
  }
}

function invalidFrame(route: MessageRoute, error: z.ZodError): ProtocolError {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? issue.path.join(".") : "frame";
  return new ProtocolError(`Invalid ${route} frame at ${where}: ${issue?.message ?? "unknown error"}`);
}

/**
 * Decode a frame sent by a client.
 * @throws ProtocolError on bad JSON, an unknown or server-only type, or a bad payload
 */
export function decodeClientMessage(text: string): ClientMessage {
  const result = ClientEnvelopeSchema.safeParse(parseJson(text));
  if (!result.success) {
    throw invalidFrame("client_to_server", result.error);
  }
  return clientFromWire(result.data);
}

/**
 * Decode a frame sent by the server.
 * @throws ProtocolError on bad JSON, an unknown or client-only type, or a bad payload
 */
export function decodeServerMessage(text: string): ServerMessage {
  const result = ServerEnvelopeSchema.safeParse(parseJson(text));
  if (!result.success) {
    throw invalidFrame("server_to_client", result.error);
  }
  return serverFromWire(result.data);
}

// =============================================================================
// Factories
// =============================================================================

export const joinMessage = (name: string): ClientMessage => ({ type: "join", name });

export const inputMessage = (directions: Iterable<Direction>, sequence: number): ClientMessage => ({
  type: "input",
  directions: Array.from(directions),
  sequence,
});

export const leaveMessage = (): ClientMessage => ({ type: "leave" });

export const welcomeMessage = (playerId: string, colorIndex: number): ServerMessage => ({
  type: "welcome",
  playerId,
  colorIndex,
});

export const lobbyUpdateMessage = (
  playerCount: number,
  required: number,
  playerNames: string[],
): ServerMessage => ({ type: "lobby_update", playerCount, required, playerNames });

export const gameStartMessage = (countdown: number): ServerMessage => ({
  type: "game_start",
  countdown,
});

export const gameStateMessage = (snapshot: GameSnapshot): ServerMessage => ({
  type: "game_state",
  snapshot,
});

export const coinCollectedMessage = (
  coinId: string,
  collectorId: string,
  newScore: number,
): ServerMessage => ({ type: "coin_collected", coinId, collectorId, newScore });

export const gameOverMessage = (
  winnerId: string | null,
  winnerName: string | null,
  finalScores: Record<string, number>,
): ServerMessage => ({ type: "game_over", winnerId, winnerName, finalScores });
