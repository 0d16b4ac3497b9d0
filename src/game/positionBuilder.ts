import type { Piece, PieceType, PlayerColor } from "../types.ts";
import type { VariantId } from "../variants/variantTypes.ts";
import type { NodeId } from "./coords.ts";
import { hashGameState } from "./hashState.ts";
import { PLAYER_ORDER } from "./players.ts";
import { createInitialGameState, type GameState } from "./state.ts";

export interface PositionOptions {
  active?: PlayerColor;
  eliminated?: readonly PlayerColor[];
  variantId?: VariantId;
}

export function makePiece(owner: PlayerColor, type: PieceType, hasMoved = false): Piece {
  return { type, owner, hasMoved, enPassant: false };
}

/**
 * A fresh game on an arbitrary board: no history, no scores. Used for
 * composed positions (puzzles, analysis, tests).
 */
export function buildPosition(pieces: ReadonlyArray<readonly [NodeId, Piece]>, opts: PositionOptions = {}): GameState {
  const base = createInitialGameState(opts.variantId);
  const eliminated = opts.eliminated ?? [];
  const position: GameState = {
    ...base,
    board: new Map(pieces),
    players: base.players.map((p) => ({ ...p, eliminated: eliminated.includes(p.color) })),
    activeIndex: PLAYER_ORDER.indexOf(opts.active ?? "R"),
  };
  return { ...position, positionHistory: [hashGameState(position)] };
}
