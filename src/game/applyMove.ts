import { Result } from "@badrap/result";
import type { PromotionType } from "../types.ts";
import { isOnBoardId } from "./coords.ts";
import { formatMove } from "./coordFormat.ts";
import { nextActiveIndex } from "./endTurn.ts";
import {
  GameAlreadyFinishedError,
  IllegalMoveError,
  type EngineError,
} from "./errors.ts";
import { evaluateOutcome, findCheckmatedPlayers } from "./gameOver.ts";
import { hashGameState } from "./hashState.ts";
import { makeMove } from "./makeMove.ts";
import { generatePseudoMoves, legalMovesFrom } from "./movegen.ts";
import type { Move, MoveRecord, MoveRequest, PlayerState } from "./moveTypes.ts";
import { isPromotionType } from "./pieceRules.ts";
import { playerName } from "./players.ts";
import { activePlayer, type GameState } from "./state.ts";

const DEFAULT_PROMOTION: PromotionType = "Q";

/** Finds the legal move a request names, or the first rule it breaks. */
export function resolveMove(state: GameState, request: MoveRequest): Result<Move, IllegalMoveError> {
  const { from, to, promoteTo } = request;

  if (!isOnBoardId(from) || !isOnBoardId(to)) {
    return Result.err(new IllegalMoveError("out_of_bounds", `Move ${from}-${to} leaves the board`));
  }

  const piece = state.board.get(from);
  if (!piece) return Result.err(new IllegalMoveError("no_piece", `No piece on ${from}`));

  const mover = activePlayer(state);
  if (piece.owner !== mover) {
    return Result.err(new IllegalMoveError("wrong_turn", `It is ${playerName(mover)}'s turn, not ${playerName(piece.owner)}'s`));
  }

  const target = state.board.get(to);
  if (target?.owner === mover) {
    return Result.err(new IllegalMoveError("occupied_by_own_piece", `${to} holds one of your own pieces`));
  }
  if (target?.type === "K") {
    return Result.err(new IllegalMoveError("king_capture", `The king on ${to} cannot be captured`));
  }

  if (promoteTo !== undefined && !isPromotionType(promoteTo)) {
    return Result.err(new IllegalMoveError("invalid_promotion", `Cannot promote to ${String(promoteTo)}`));
  }

  const matching = legalMovesFrom(state, from).filter((m) => m.to === to);
  if (matching.length > 0) {
    const promotions = matching.filter((m) => m.special === "promotion");
    if (promotions.length === 0) {
      if (promoteTo !== undefined) {
        return Result.err(new IllegalMoveError("invalid_promotion", `Move ${from}-${to} is not a promotion`));
      }
      return Result.ok(matching[0]);
    }
    const wanted = promoteTo ?? DEFAULT_PROMOTION;
    const chosen = promotions.find((m) => m.promoteTo === wanted);
    if (chosen) return Result.ok(chosen);
    return Result.err(new IllegalMoveError("invalid_promotion", `Cannot promote to ${wanted}`));
  }

  if (generatePseudoMoves(state.board, mover, from).some((m) => m.to === to)) {
    return Result.err(new IllegalMoveError("leaves_king_in_check", `Move ${from}-${to} leaves your king in check`));
  }
  return Result.err(new IllegalMoveError("not_piece_pattern", `The piece on ${from} cannot move to ${to}`));
}

/** Plays a move already known to be legal for the active player. */
export function commitMove(state: GameState, move: Move): GameState {
  const { rules } = state.meta;
  const board = new Map(state.board);
  const { clearedEnPassant } = makeMove(board, move);
  const mover = activePlayer(state);

  let players: PlayerState[] = state.players.map((p) =>
    p.color === mover && move.captured ? { ...p, score: p.score + rules.pieceValues[move.captured.piece.type] } : p
  );

  const noProgressPlies = move.captured || move.piece.type === "P" ? 0 : state.noProgressPlies + 1;

  const eliminated = findCheckmatedPlayers({ board, players });
  if (eliminated.length > 0) {
    players = players.map((p) => {
      if (eliminated.includes(p.color)) return { ...p, eliminated: true };
      if (p.color === mover) return { ...p, score: p.score + rules.checkmateBonus * eliminated.length };
      return p;
    });
  }

  const activeIndex = nextActiveIndex(players, state.activeIndex);

  const record: MoveRecord = {
    move,
    notation: formatMove(move),
    mover,
    clearedEnPassant,
    eliminated,
    prev: {
      players: state.players,
      activeIndex: state.activeIndex,
      outcome: state.outcome,
      noProgressPlies: state.noProgressPlies,
    },
  };

  const next: GameState = {
    ...state,
    board,
    players,
    activeIndex,
    history: [...state.history, record],
    positionHistory: [...state.positionHistory, hashGameState({ board, players, activeIndex })],
    noProgressPlies,
  };

  return { ...next, outcome: evaluateOutcome(next) };
}

/**
 * Validates `request` against the active player's legal moves and plays it.
 * The input state is never modified.
 */
export function applyMove(state: GameState, request: MoveRequest): Result<GameState, EngineError> {
  if (state.outcome.status === "finished") return Result.err(new GameAlreadyFinishedError());
  const resolved = resolveMove(state, request);
  if (resolved.isErr) return Result.err(resolved.error);
  return Result.ok(commitMove(state, resolved.value));
}
