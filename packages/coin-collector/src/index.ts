/**
 * @coinrush/coin-collector - Coin collector game rules
 *
 * The authoritative engine, the movement both endpoints integrate with, the
 * wire protocol, and the client-side prediction of the local player.
 */

// Types
export { DIRECTIONS } from "./types.js";
export type {
  Direction,
  PlayerState,
  CoinState,
  GameSnapshot,
  CoinCollectedEvent,
  GameOverEvent,
  EngineEvent,
} from "./types.js";

// Configuration
export {
  DEFAULT_GAME_CONFIG,
  PLAYER_COLORS,
  spawnPoints,
  playerBounds,
  coinSpawnBounds,
} from "./constants.js";
export type { GameConfig } from "./constants.js";

// Movement
export { computeVelocity, integratePosition, stepPosition } from "./movement.js";

// Engine
export { SimulationEngine } from "./engine.js";
export type { SimulationEngineOptions } from "./engine.js";

// Lobby
export { lobbyStatus, runCountdown } from "./lobby.js";
export type { LobbyStatus, CountdownOptions } from "./lobby.js";

// Prediction
export { LocalPlayerPredictor, CoinPrediction } from "./prediction.js";
export type { ReconcileResult } from "./prediction.js";

// Protocol
export {
  MESSAGE_TYPES,
  ProtocolError,
  encodeMessage,
  decodeClientMessage,
  decodeServerMessage,
  joinMessage,
  inputMessage,
  leaveMessage,
  welcomeMessage,
  lobbyUpdateMessage,
  gameStartMessage,
  gameStateMessage,
  coinCollectedMessage,
  gameOverMessage,
} from "./protocol.js";
export type { ClientMessage, ServerMessage, Message, MessageType, MessageRoute } from "./protocol.js";
