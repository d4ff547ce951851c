/**
 * Lobby rules: who is waiting and the pre-match countdown.
 */

import type { PlayerState } from "./types.js";

export interface LobbyStatus {
  playerCount: number;
  /** Players needed before the countdown starts */
  required: number;
  playerNames: string[];
}

export function lobbyStatus(players: readonly PlayerState[], required: number): LobbyStatus {
  return {
    playerCount: players.length,
    required,
    playerNames: players.map((player) => player.name),
  };
}

export interface CountdownOptions {
  /** Whole seconds to count down from */
  seconds: number;
  /** Called with the seconds remaining, from `seconds` down to 1 */
  onStep: (remaining: number) => void;
  /** Checked before every step and once more after the last one */
  shouldContinue: () => boolean;
  /** Wait between steps (default: setTimeout-based) */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Count down one step per second.
 *
 * Abandoned as soon as `shouldContinue` returns false, so a player leaving
 * mid-countdown stops the match from starting.
 *
 * @returns Whether the countdown ran to completion
 */
export async function runCountdown(options: CountdownOptions): Promise<boolean> {
  const sleep = options.sleep ?? defaultSleep;
  for (let remaining = options.seconds; remaining > 0; remaining--) {
    if (!options.shouldContinue()) {
      return false;
    }
    options.onStep(remaining);
    await sleep(1000);
  }
  return options.shouldContinue();
}
