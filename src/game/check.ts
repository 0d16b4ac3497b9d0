import type { PlayerColor } from "../types.ts";
import { findKing } from "./board.ts";
import { isSquareAttacked } from "./attackMap.ts";
import { hasAnyLegalMove, opponentsOf, type MoveGenView } from "./movegen.ts";

/** A player without a king counts as in check. */
export function isInCheck(view: MoveGenView, player: PlayerColor): boolean {
  const king = findKing(view.board, player);
  if (!king) return true;
  return isSquareAttacked(view.board, king, opponentsOf(view, player));
}

export function isCheckmated(view: MoveGenView, player: PlayerColor): boolean {
  return isInCheck(view, player) && !hasAnyLegalMove(view, player);
}

export function isStalemated(view: MoveGenView, player: PlayerColor): boolean {
  return !isInCheck(view, player) && !hasAnyLegalMove(view, player);
}
