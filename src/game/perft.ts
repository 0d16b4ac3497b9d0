import { commitMove } from "./applyMove.ts";
import { generateLegalMoves } from "./movegen.ts";
import type { GameState } from "./state.ts";

/**
 * Counts leaf positions `depth` plies ahead. Eliminations and turn skipping
 * follow the full move pipeline; finished games are leaves.
 */
export function perft(state: GameState, depth: number): number {
  if (depth <= 0) return 1;
  if (state.outcome.status === "finished") return 0;

  const moves = generateLegalMoves(state, state.players[state.activeIndex].color);
  if (depth === 1) return moves.length;

  let nodes = 0;
  for (const move of moves) nodes += perft(commitMove(state, move), depth - 1);
  return nodes;
}

