/**
 * Process configuration read from the environment.
 *
 * `SIMULATED_LATENCY_MS` is a one-way delay applied on every delayed leg, and
 * both endpoints apply it to both directions. A client input therefore reaches
 * the server after twice the value and its effect returns after four times it.
 */

import { DEFAULT_SIMULATED_LATENCY_MS } from "@coinrush/netcode";
import { z } from "zod";

const latencySchema = z.coerce.number().finite().min(0).default(DEFAULT_SIMULATED_LATENCY_MS);

const serverEnvSchema = z.object({
  HOST: z.string().min(1).default("localhost"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8765),
  SIMULATED_LATENCY_MS: latencySchema,
});

const clientEnvSchema = z.object({
  SERVER_URL: z.string().url().default("http://localhost:8765"),
  PLAYER_NAME: z.string().min(1).max(32).optional(),
  SIMULATED_LATENCY_MS: latencySchema,
});

export interface ServerConfig {
  host: string;
  port: number;
  latencyMs: number;
}

export interface ClientConfig {
  serverUrl: string;
  playerName: string;
  latencyMs: number;
}

type Env = Record<string, string | undefined>;

const ADJECTIVES = ["Swift", "Lucky", "Brave", "Clever", "Quick", "Mighty", "Sneaky", "Golden"];
const NOUNS = ["Fox", "Eagle", "Tiger", "Wolf", "Bear", "Hawk", "Lion", "Panda"];

const pick = (words: readonly string[], random: () => number): string =>
  words[Math.floor(random() * words.length)] ?? words[0] ?? "";

/**
 * Name such as "LuckyFox" for players that did not choose one.
 */
export function randomPlayerName(random: () => number = Math.random): string {
  return `${pick(ADJECTIVES, random)}${pick(NOUNS, random)}`;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const result = serverEnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`[Config] Invalid server environment: ${formatIssues(result.error)}`);
  }
  return {
    host: result.data.HOST,
    port: result.data.PORT,
    latencyMs: result.data.SIMULATED_LATENCY_MS,
  };
}

export function loadClientConfig(
  env: Env = process.env,
  random: () => number = Math.random,
): ClientConfig {
  const result = clientEnvSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`[Config] Invalid client environment: ${formatIssues(result.error)}`);
  }
  return {
    serverUrl: result.data.SERVER_URL,
    playerName: result.data.PLAYER_NAME ?? randomPlayerName(random),
    latencyMs: result.data.SIMULATED_LATENCY_MS,
  };
}
