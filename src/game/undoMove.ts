import { Result } from "@badrap/result";
import { NoHistoryError } from "./errors.ts";
import { unmakeMove } from "./makeMove.ts";
import type { GameState } from "./state.ts";

/** Takes back the last ply exactly, including after the game has finished. */
export function undoLastMove(state: GameState): Result<GameState, NoHistoryError> {
  const record = state.history[state.history.length - 1];
  if (!record) return Result.err(new NoHistoryError());

  const board = new Map(state.board);
  unmakeMove(board, record.move, { clearedEnPassant: record.clearedEnPassant });

  return Result.ok({
    ...state,
    board,
    players: record.prev.players,
    activeIndex: record.prev.activeIndex,
    outcome: record.prev.outcome,
    noProgressPlies: record.prev.noProgressPlies,
    history: state.history.slice(0, -1),
    positionHistory: state.positionHistory.slice(0, -1),
  });
}
