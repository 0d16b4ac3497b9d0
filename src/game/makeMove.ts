import type { Piece } from "../types.ts";
import type { BoardState } from "./board.ts";
import { parseNodeId, type NodeId } from "./coords.ts";
import type { Move } from "./moveTypes.ts";

/** Squares whose en passant flag `makeMove` cleared; hand back to `unmakeMove`. */
export interface MoveUndo {
  clearedEnPassant: NodeId[];
}

export function isDoubleStep(move: Move): boolean {
  if (move.piece.type !== "P") return false;
  const a = parseNodeId(move.from);
  const b = parseNodeId(move.to);
  return Math.abs(a.r - b.r) + Math.abs(a.c - b.c) === 2 && (a.r === b.r || a.c === b.c);
}

/** Ply boundary: flags set on the previous ply expire. */
export function clearEnPassantFlags(board: BoardState): NodeId[] {
  const cleared: NodeId[] = [];
  for (const [id, piece] of board.entries()) {
    if (piece.enPassant) cleared.push(id);
  }
  for (const id of cleared) {
    const piece = board.get(id);
    if (piece) board.set(id, { ...piece, enPassant: false });
  }
  return cleared;
}

export function restoreEnPassantFlags(board: BoardState, squares: readonly NodeId[]): void {
  for (const id of squares) {
    const piece = board.get(id);
    if (piece) board.set(id, { ...piece, enPassant: true });
  }
}

function placedPiece(move: Move): Piece {
  return {
    ...move.piece,
    type: move.special === "promotion" && move.promoteTo ? move.promoteTo : move.piece.type,
    hasMoved: true,
    enPassant: isDoubleStep(move),
  };
}

/**
 * Plays `move` on `board` in place. The move must come from the generator for
 * this exact board; nothing is validated here.
 */
export function makeMove(board: BoardState, move: Move): MoveUndo {
  const clearedEnPassant = clearEnPassantFlags(board);

  if (move.captured) board.delete(move.captured.square);
  board.delete(move.from);
  board.set(move.to, placedPiece(move));

  if (move.castle) {
    board.delete(move.castle.from);
    board.set(move.castle.to, { ...move.castle.rook, hasMoved: true });
  }

  return { clearedEnPassant };
}

export function unmakeMove(board: BoardState, move: Move, undo: MoveUndo): void {
  if (move.castle) {
    board.delete(move.castle.to);
    board.set(move.castle.from, move.castle.rook);
  }

  board.delete(move.to);
  board.set(move.from, move.piece);
  if (move.captured) board.set(move.captured.square, move.captured.piece);

  restoreEnPassantFlags(board, undo.clearedEnPassant);
}
