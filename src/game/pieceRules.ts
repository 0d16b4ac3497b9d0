import type { Piece, PlayerColor, PromotionType } from "../types.ts";
import type { BoardState } from "./board.ts";
import { isOnBoard, makeNodeId, parseNodeId, type NodeId } from "./coords.ts";
import type { Move } from "./moveTypes.ts";
import {
  PLAYER_ORDER,
  captureDirections,
  forwardOf,
  isPawnStartSquare,
  isPromotionSquare,
  type Direction,
} from "./players.ts";

export const ORTHOGONAL: readonly Direction[] = [
  { dr: -1, dc: 0 },
  { dr: 1, dc: 0 },
  { dr: 0, dc: -1 },
  { dr: 0, dc: 1 },
];

export const DIAGONAL: readonly Direction[] = [
  { dr: -1, dc: -1 },
  { dr: -1, dc: 1 },
  { dr: 1, dc: -1 },
  { dr: 1, dc: 1 },
];

export const ALL_DIRECTIONS: readonly Direction[] = [...ORTHOGONAL, ...DIAGONAL];

export const KNIGHT_JUMPS: readonly Direction[] = [
  { dr: -2, dc: -1 },
  { dr: -2, dc: 1 },
  { dr: -1, dc: -2 },
  { dr: -1, dc: 2 },
  { dr: 1, dc: -2 },
  { dr: 1, dc: 2 },
  { dr: 2, dc: -1 },
  { dr: 2, dc: 1 },
];

export const PROMOTION_CHOICES: readonly PromotionType[] = ["Q", "R", "B", "N"];

export function isPromotionType(raw: unknown): raw is PromotionType {
  return PROMOTION_CHOICES.some((t) => t === raw);
}

function slidingDirections(piece: Piece): readonly Direction[] {
  if (piece.type === "B") return DIAGONAL;
  if (piece.type === "R") return ORTHOGONAL;
  return ALL_DIRECTIONS;
}

function isOwn(board: BoardState, id: NodeId, owner: PlayerColor): boolean {
  return board.get(id)?.owner === owner;
}

function chebyshev(a: { r: number; c: number }, b: { r: number; c: number }): number {
  return Math.max(Math.abs(a.r - b.r), Math.abs(a.c - b.c));
}

function plainMove(board: BoardState, from: NodeId, to: NodeId, piece: Piece): Move {
  const target = board.get(to);
  return {
    from,
    to,
    piece,
    captured: target ? { square: to, piece: target } : null,
    special: "none",
  };
}

function pushPawnMove(out: Move[], board: BoardState, from: NodeId, to: NodeId, piece: Piece, promotes: boolean): void {
  if (!promotes) {
    out.push(plainMove(board, from, to, piece));
    return;
  }
  for (const promoteTo of PROMOTION_CHOICES) {
    out.push({ ...plainMove(board, from, to, piece), special: "promotion", promoteTo });
  }
}

function generatePawnMoves(board: BoardState, from: NodeId, piece: Piece): Move[] {
  const out: Move[] = [];
  const player = piece.owner;
  const { r, c } = parseNodeId(from);
  const fwd = forwardOf(player);

  // Forward 1
  const r1 = r + fwd.dr;
  const c1 = c + fwd.dc;
  if (isOnBoard(r1, c1)) {
    const to1 = makeNodeId(r1, c1);
    if (!board.has(to1)) {
      pushPawnMove(out, board, from, to1, piece, isPromotionSquare(player, r1, c1));

      // Forward 2 from the start line
      const r2 = r1 + fwd.dr;
      const c2 = c1 + fwd.dc;
      if (isPawnStartSquare(player, r, c) && isOnBoard(r2, c2)) {
        const to2 = makeNodeId(r2, c2);
        if (!board.has(to2)) out.push(plainMove(board, from, to2, piece));
      }
    }
  }

  for (const d of captureDirections(player)) {
    const tr = r + d.dr;
    const tc = c + d.dc;
    if (!isOnBoard(tr, tc)) continue;
    const to = makeNodeId(tr, tc);
    const target = board.get(to);

    if (target) {
      if (target.owner !== player) pushPawnMove(out, board, from, to, piece, isPromotionSquare(player, tr, tc));
      continue;
    }

    // En passant: an adjacent enemy pawn that skipped over `to` on the previous ply.
    for (const other of PLAYER_ORDER) {
      if (other === player) continue;
      const ofwd = forwardOf(other);
      const pr = tr + ofwd.dr;
      const pc = tc + ofwd.dc;
      if (!isOnBoard(pr, pc) || chebyshev({ r, c }, { r: pr, c: pc }) !== 1) continue;
      const square = makeNodeId(pr, pc);
      const passed = board.get(square);
      if (!passed || passed.type !== "P" || passed.owner !== other || !passed.enPassant) continue;
      out.push({ from, to, piece, captured: { square, piece: passed }, special: "enPassant" });
    }
  }

  return out;
}

function generateStepMoves(board: BoardState, from: NodeId, piece: Piece, deltas: readonly Direction[]): Move[] {
  const { r, c } = parseNodeId(from);
  const out: Move[] = [];
  for (const { dr, dc } of deltas) {
    const rr = r + dr;
    const cc = c + dc;
    if (!isOnBoard(rr, cc)) continue;
    const to = makeNodeId(rr, cc);
    if (isOwn(board, to, piece.owner)) continue;
    out.push(plainMove(board, from, to, piece));
  }
  return out;
}

function generateSlidingMoves(board: BoardState, from: NodeId, piece: Piece, dirs: readonly Direction[]): Move[] {
  const { r: r0, c: c0 } = parseNodeId(from);
  const out: Move[] = [];

  for (const { dr, dc } of dirs) {
    let r = r0 + dr;
    let c = c0 + dc;
    while (isOnBoard(r, c)) {
      const to = makeNodeId(r, c);
      const target = board.get(to);
      if (!target) {
        out.push(plainMove(board, from, to, piece));
      } else {
        if (target.owner !== piece.owner) out.push(plainMove(board, from, to, piece));
        break;
      }
      r += dr;
      c += dc;
    }
  }

  return out;
}

/**
 * Pseudo-legal moves of one piece: movement pattern and occupancy only. Own-king
 * safety, king captures and castling are left to the move generator.
 */
export function generatePseudoMovesForPiece(board: BoardState, from: NodeId, piece: Piece): Move[] {
  switch (piece.type) {
    case "P":
      return generatePawnMoves(board, from, piece);
    case "N":
      return generateStepMoves(board, from, piece, KNIGHT_JUMPS);
    case "K":
      return generateStepMoves(board, from, piece, ALL_DIRECTIONS);
    case "B":
    case "R":
    case "Q":
      return generateSlidingMoves(board, from, piece, slidingDirections(piece));
    default:
      return [];
  }
}

/** Squares `piece` could capture on. Pawns threaten their forward diagonals only. */
export function attackTargets(board: BoardState, from: NodeId, piece: Piece): NodeId[] {
  const { r, c } = parseNodeId(from);
  const out: NodeId[] = [];

  const addStep = (deltas: readonly Direction[]) => {
    for (const { dr, dc } of deltas) {
      const rr = r + dr;
      const cc = c + dc;
      if (!isOnBoard(rr, cc)) continue;
      const to = makeNodeId(rr, cc);
      if (!isOwn(board, to, piece.owner)) out.push(to);
    }
  };

  switch (piece.type) {
    case "P":
      addStep(captureDirections(piece.owner));
      break;
    case "N":
      addStep(KNIGHT_JUMPS);
      break;
    case "K":
      addStep(ALL_DIRECTIONS);
      break;
    default:
      for (const m of generateSlidingMoves(board, from, piece, slidingDirections(piece))) out.push(m.to);
      break;
  }

  return out;
}
