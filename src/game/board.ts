import type { Piece, PlayerColor } from "../types.ts";
import { BOARD_SIZE, isOnBoard, isOnBoardId, makeNodeId, parseNodeId, type NodeId } from "./coords.ts";
import { InvalidPositionError } from "./errors.ts";

/** Occupied squares only. */
export type BoardState = Map<NodeId, Piece>;

export function getAllNodes(): NodeId[] {
  const nodes: NodeId[] = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      if (isOnBoard(r, c)) nodes.push(makeNodeId(r, c));
    }
  }
  return nodes;
}

export const ALL_SQUARES: readonly NodeId[] = getAllNodes();

export function pieceAt(board: BoardState, id: NodeId): Piece | null {
  return board.get(id) ?? null;
}

export function setPiece(board: BoardState, id: NodeId, piece: Piece | null): void {
  if (!isOnBoardId(id)) throw new InvalidPositionError(id);
  if (piece) board.set(id, piece);
  else board.delete(id);
}

/**
 * Squares strictly between two squares on a shared row, column or diagonal,
 * ordered from `a` towards `b`. Empty when the squares are not aligned.
 * The walk is geometric: a diagonal may pass through a cut-away corner.
 */
export function squaresBetween(a: NodeId, b: NodeId): NodeId[] {
  const from = parseNodeId(a);
  const to = parseNodeId(b);
  const dr = to.r - from.r;
  const dc = to.c - from.c;
  if (dr === 0 && dc === 0) return [];
  if (dr !== 0 && dc !== 0 && Math.abs(dr) !== Math.abs(dc)) return [];

  const stepR = Math.sign(dr);
  const stepC = Math.sign(dc);
  const steps = Math.max(Math.abs(dr), Math.abs(dc));
  const out: NodeId[] = [];
  for (let i = 1; i < steps; i++) {
    out.push(makeNodeId(from.r + stepR * i, from.c + stepC * i));
  }
  return out;
}

export function findKing(board: BoardState, color: PlayerColor): NodeId | null {
  for (const [id, piece] of board.entries()) {
    if (piece.owner === color && piece.type === "K") return id;
  }
  return null;
}

/** Describes every broken board invariant; an empty list means the board is sound. */
export function checkBoardInvariants(board: BoardState, livePlayers: Iterable<PlayerColor>): string[] {
  const problems: string[] = [];
  const kings = new Map<PlayerColor, number>();

  for (const [id, piece] of board.entries()) {
    if (!isOnBoardId(id)) problems.push(`piece on off-board square ${id}`);
    if (piece.type === "K") kings.set(piece.owner, (kings.get(piece.owner) ?? 0) + 1);
    if (piece.enPassant && piece.type !== "P") problems.push(`non-pawn at ${id} flagged en passant`);
  }

  for (const color of livePlayers) {
    const n = kings.get(color) ?? 0;
    if (n !== 1) problems.push(`player ${color} has ${n} kings`);
  }

  return problems;
}
