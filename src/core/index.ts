// "Core" is a stable, deterministic rules surface (no I/O, no rendering).

import type { Result } from "@badrap/result";
import type { PlayerColor } from "../types.ts";
import type { VariantId } from "../variants/variantTypes.ts";
import type { NodeId } from "../game/coords.ts";
import type { InvalidSnapshotError } from "../game/errors.ts";
import type { Move, Outcome } from "../game/moveTypes.ts";
import { isInCheck } from "../game/check.ts";
import { generateLegalMoves, legalMovesFrom } from "../game/movegen.ts";
import { deserializeSaveData, serializeSaveData } from "../game/saveLoad.ts";
import { activePlayer, createInitialGameState, type GameState } from "../game/state.ts";

export type { GameState } from "../game/state.ts";
export type { Piece, PieceType, PlayerColor, PromotionType } from "../types.ts";
export type { NodeId } from "../game/coords.ts";
export type { Move, MoveRecord, MoveRequest, Outcome, GameResult, PlayerState } from "../game/moveTypes.ts";
export type { VariantId, RulesConfig } from "../variants/variantTypes.ts";

export { applyMove } from "../game/applyMove.ts";
export { undoLastMove } from "../game/undoMove.ts";
export { perft } from "../game/perft.ts";
export { formatMove, nodeIdToAlgebraic, algebraicToNodeId, parseSquare } from "../game/coordFormat.ts";
export { hashGameState } from "../game/hashState.ts";
export { VARIANTS, DEFAULT_VARIANT_ID, isVariantId, getVariantById } from "../variants/variantRegistry.ts";
export {
  EngineError,
  EngineErrorCode,
  IllegalMoveError,
  InvalidPositionError,
  InvalidSnapshotError,
  NoHistoryError,
  GameAlreadyFinishedError,
  type IllegalMoveRule,
} from "../game/errors.ts";

export interface PlayerStatus {
  color: PlayerColor;
  inCheck: boolean;
  eliminated: boolean;
  score: number;
}

export interface GameStatus {
  activePlayer: PlayerColor;
  players: PlayerStatus[];
  outcome: Outcome;
  ply: number;
}

export function newGame(variantId?: VariantId): GameState {
  return createInitialGameState(variantId);
}

/** Legal moves of the active player, optionally from one square. Empty once the game is over. */
export function legalMoves(state: GameState, from?: NodeId): Move[] {
  if (state.outcome.status === "finished") return [];
  const mover = activePlayer(state);
  if (from === undefined) return generateLegalMoves(state, mover);
  if (state.board.get(from)?.owner !== mover) return [];
  return legalMovesFrom(state, from);
}

export function status(state: GameState): GameStatus {
  return {
    activePlayer: activePlayer(state),
    players: state.players.map((p) => ({
      color: p.color,
      inCheck: !p.eliminated && isInCheck(state, p.color),
      eliminated: p.eliminated,
      score: p.score,
    })),
    outcome: state.outcome,
    ply: state.history.length,
  };
}

export function exportSnapshot(state: GameState): string {
  return serializeSaveData(state);
}

export function importSnapshot(text: string): Result<GameState, InvalidSnapshotError> {
  return deserializeSaveData(text);
}
