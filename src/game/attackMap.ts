import type { Piece, PlayerColor } from "../types.ts";
import { squaresBetween, type BoardState } from "./board.ts";
import { isOnBoardId, parseNodeId, type NodeId } from "./coords.ts";
import { attackTargets } from "./pieceRules.ts";
import { captureDirections } from "./players.ts";

/** Union of the capture targets of every piece `attacker` owns. */
export function attackedSquares(board: BoardState, attacker: PlayerColor): Set<NodeId> {
  const out = new Set<NodeId>();
  for (const [from, piece] of board.entries()) {
    if (piece.owner !== attacker) continue;
    for (const to of attackTargets(board, from, piece)) out.add(to);
  }
  return out;
}

function clearLine(board: BoardState, from: NodeId, to: NodeId): boolean {
  return squaresBetween(from, to).every((id) => isOnBoardId(id) && !board.has(id));
}

/** Whether `piece` on `from` hits `target`, ignoring what stands on `target`. */
export function pieceAttacks(board: BoardState, from: NodeId, piece: Piece, target: NodeId): boolean {
  const a = parseNodeId(from);
  const b = parseNodeId(target);
  const dr = b.r - a.r;
  const dc = b.c - a.c;
  const adr = Math.abs(dr);
  const adc = Math.abs(dc);
  if (adr === 0 && adc === 0) return false;

  switch (piece.type) {
    case "P":
      return captureDirections(piece.owner).some((d) => d.dr === dr && d.dc === dc);
    case "N":
      return (adr === 1 && adc === 2) || (adr === 2 && adc === 1);
    case "K":
      return adr <= 1 && adc <= 1;
    case "B":
      return adr === adc && clearLine(board, from, target);
    case "R":
      return (adr === 0 || adc === 0) && clearLine(board, from, target);
    case "Q":
      return (adr === adc || adr === 0 || adc === 0) && clearLine(board, from, target);
    default:
      return false;
  }
}

export function isSquareAttacked(board: BoardState, square: NodeId, attackers: Iterable<PlayerColor>): boolean {
  const by = new Set(attackers);
  if (by.size === 0) return false;
  for (const [from, piece] of board.entries()) {
    if (!by.has(piece.owner)) continue;
    if (pieceAttacks(board, from, piece, square)) return true;
  }
  return false;
}
