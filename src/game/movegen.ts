import type { PlayerColor } from "../types.ts";
import { findKing, type BoardState } from "./board.ts";
import type { NodeId } from "./coords.ts";
import { isSquareAttacked } from "./attackMap.ts";
import { generateCastlingMoves } from "./castling.ts";
import { makeMove, unmakeMove } from "./makeMove.ts";
import type { Move, PlayerState } from "./moveTypes.ts";
import { generatePseudoMovesForPiece } from "./pieceRules.ts";

/** The slice of a game that move generation reads. `GameState` satisfies it. */
export interface MoveGenView {
  board: BoardState;
  players: readonly PlayerState[];
}

export function livePlayers(view: MoveGenView): PlayerColor[] {
  return view.players.filter((p) => !p.eliminated).map((p) => p.color);
}

/** Non-eliminated players other than `player`: the ones whose pieces attack it. */
export function opponentsOf(view: MoveGenView, player: PlayerColor): PlayerColor[] {
  return livePlayers(view).filter((c) => c !== player);
}

export function isEliminated(view: MoveGenView, player: PlayerColor): boolean {
  return view.players.find((p) => p.color === player)?.eliminated ?? true;
}

/** Pseudo-legal moves plus castling, minus king captures. */
function candidateMoves(board: BoardState, from: NodeId, enemies: readonly PlayerColor[]): Move[] {
  const piece = board.get(from);
  if (!piece) return [];
  const out = generatePseudoMovesForPiece(board, from, piece).filter((m) => m.captured?.piece.type !== "K");
  if (piece.type === "K") out.push(...generateCastlingMoves(board, from, piece, enemies));
  return out;
}

function keepsKingSafe(scratch: BoardState, move: Move, kingSquare: NodeId | null, enemies: readonly PlayerColor[]): boolean {
  const undo = makeMove(scratch, move);
  const king = move.piece.type === "K" ? move.to : kingSquare;
  const safe = king === null || !isSquareAttacked(scratch, king, enemies);
  unmakeMove(scratch, move, undo);
  return safe;
}

function legalMovesForSquares(view: MoveGenView, player: PlayerColor, squares: readonly NodeId[]): Move[] {
  if (isEliminated(view, player)) return [];

  const enemies = opponentsOf(view, player);
  const scratch: BoardState = new Map(view.board);
  const kingSquare = findKing(scratch, player);
  const out: Move[] = [];

  for (const from of squares) {
    if (scratch.get(from)?.owner !== player) continue;
    for (const move of candidateMoves(scratch, from, enemies)) {
      if (keepsKingSafe(scratch, move, kingSquare, enemies)) out.push(move);
    }
  }

  return out;
}

export function generateLegalMoves(view: MoveGenView, player: PlayerColor): Move[] {
  const own: NodeId[] = [];
  for (const [id, piece] of view.board.entries()) {
    if (piece.owner === player) own.push(id);
  }
  return legalMovesForSquares(view, player, own);
}

/** Legal moves of whichever live player owns the piece on `from`. */
export function legalMovesFrom(view: MoveGenView, from: NodeId): Move[] {
  const piece = view.board.get(from);
  if (!piece) return [];
  return legalMovesForSquares(view, piece.owner, [from]);
}

export function hasAnyLegalMove(view: MoveGenView, player: PlayerColor): boolean {
  return generateLegalMoves(view, player).length > 0;
}

/** Pseudo-legal moves of `player`'s pieces, king captures included. Used to explain refusals. */
export function generatePseudoMoves(board: BoardState, player: PlayerColor, from: NodeId): Move[] {
  const piece = board.get(from);
  if (!piece || piece.owner !== player) return [];
  return generatePseudoMovesForPiece(board, from, piece);
}
