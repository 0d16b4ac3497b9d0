import type { GameState } from "./state.ts";

/** How many times the current position has occurred, the current occurrence included. */
export function occurrencesOfCurrentPosition(state: Pick<GameState, "positionHistory">): number {
  const { positionHistory } = state;
  if (positionHistory.length === 0) return 0;
  const target = positionHistory[positionHistory.length - 1];
  let count = 0;
  for (const hash of positionHistory) {
    if (hash === target) count++;
  }
  return count;
}

/** Returns true once the current position has been reached `limit` times. */
export function isRepetitionDraw(state: Pick<GameState, "positionHistory">, limit: number | null): boolean {
  if (limit === null) return false;
  return occurrencesOfCurrentPosition(state) >= limit;
}

export function isNoProgressDraw(state: Pick<GameState, "noProgressPlies">, limit: number | null): boolean {
  if (limit === null) return false;
  return state.noProgressPlies >= limit;
}
