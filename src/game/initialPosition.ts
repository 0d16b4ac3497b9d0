import type { Piece, PieceType, PlayerColor } from "../types.ts";
import type { BoardState } from "./board.ts";
import { BOARD_SIZE, CORNER_SIZE, makeNodeId, type NodeId } from "./coords.ts";
import { PAWN_START_ADVANCE, PLAYER_ORDER, forwardOf } from "./players.ts";

// Index 3 and 4 of the back line (0-based, after the rook/knight/bishop) hold
// the queen and king in an order that depends on the seat.
const BACK_LINE_OUTER: readonly PieceType[] = ["R", "N", "B"];

const KING_FIRST: Record<PlayerColor, boolean> = {
  R: false,
  B: true,
  Y: true,
  G: false,
};

/**
 * Square `advance` lines in front of `color`'s home edge, at `index` along that
 * edge (row or column index on the 14×14 grid).
 */
export function homeSquare(color: PlayerColor, advance: number, index: number): NodeId {
  const { dr, dc } = forwardOf(color);
  if (dr !== 0) {
    const r = dr > 0 ? advance : BOARD_SIZE - 1 - advance;
    return makeNodeId(r, index);
  }
  const c = dc > 0 ? advance : BOARD_SIZE - 1 - advance;
  return makeNodeId(index, c);
}

export function backLineFor(color: PlayerColor): PieceType[] {
  const middle: PieceType[] = KING_FIRST[color] ? ["K", "Q"] : ["Q", "K"];
  return [...BACK_LINE_OUTER, ...middle, ...[...BACK_LINE_OUTER].reverse()];
}

function fresh(type: PieceType, owner: PlayerColor): Piece {
  return { type, owner, hasMoved: false, enPassant: false };
}

export function placePlayerPieces(board: BoardState, color: PlayerColor): void {
  const line = backLineFor(color);
  for (let i = 0; i < line.length; i++) {
    const index = CORNER_SIZE + i;
    board.set(homeSquare(color, 0, index), fresh(line[i], color));
    board.set(homeSquare(color, PAWN_START_ADVANCE, index), fresh("P", color));
  }
}

export function createInitialBoard(): BoardState {
  const board: BoardState = new Map();
  for (const color of PLAYER_ORDER) placePlayerPieces(board, color);
  return board;
}
