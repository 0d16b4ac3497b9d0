import type { Piece, PlayerColor } from "../types.ts";
import type { BoardState } from "./board.ts";
import { isOnBoard, makeNodeId, parseNodeId, type NodeId } from "./coords.ts";
import { isSquareAttacked } from "./attackMap.ts";
import type { Move, MoveSpecial } from "./moveTypes.ts";
import { forwardOf, type Direction } from "./players.ts";

const KING_SIDE_ROOK_DISTANCE = 3;
const QUEEN_SIDE_ROOK_DISTANCE = 4;

/** The two directions along `color`'s home edge. */
function alongHomeEdge(color: PlayerColor): Direction[] {
  const { dr } = forwardOf(color);
  if (dr !== 0) {
    return [
      { dr: 0, dc: -1 },
      { dr: 0, dc: 1 },
    ];
  }
  return [
    { dr: -1, dc: 0 },
    { dr: 1, dc: 0 },
  ];
}

function sideForDistance(distance: number): MoveSpecial | null {
  if (distance === KING_SIDE_ROOK_DISTANCE) return "castleKingSide";
  if (distance === QUEEN_SIDE_ROOK_DISTANCE) return "castleQueenSide";
  return null;
}

/**
 * Castling moves for an unmoved king. `enemies` are the players whose attacks
 * forbid castling out of, through or into check.
 */
export function generateCastlingMoves(
  board: BoardState,
  kingSquare: NodeId,
  king: Piece,
  enemies: readonly PlayerColor[]
): Move[] {
  if (king.type !== "K" || king.hasMoved) return [];
  const { r, c } = parseNodeId(kingSquare);
  const out: Move[] = [];

  for (const { dr, dc } of alongHomeEdge(king.owner)) {
    let distance = 1;
    let rr = r + dr;
    let cc = c + dc;
    while (isOnBoard(rr, cc) && !board.has(makeNodeId(rr, cc))) {
      distance++;
      rr += dr;
      cc += dc;
    }
    if (!isOnBoard(rr, cc)) continue;

    const rookSquare = makeNodeId(rr, cc);
    const rook = board.get(rookSquare);
    if (!rook || rook.type !== "R" || rook.owner !== king.owner || rook.hasMoved) continue;

    const special = sideForDistance(distance);
    if (!special) continue;

    const transit = makeNodeId(r + dr, c + dc);
    const to = makeNodeId(r + 2 * dr, c + 2 * dc);
    if ([kingSquare, transit, to].some((sq) => isSquareAttacked(board, sq, enemies))) continue;

    out.push({
      from: kingSquare,
      to,
      piece: king,
      captured: null,
      special,
      castle: { from: rookSquare, to: transit, rook },
    });
  }

  return out;
}
