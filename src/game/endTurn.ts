import type { PlayerState } from "./moveTypes.ts";

/**
 * Index of the next non-eliminated seat after `from`, wrapping around.
 * Returns `from` when nobody else is left.
 */
export function nextActiveIndex(players: readonly PlayerState[], from: number): number {
  const n = players.length;
  for (let step = 1; step <= n; step++) {
    const i = (from + step) % n;
    if (!players[i].eliminated) return i;
  }
  return from;
}
