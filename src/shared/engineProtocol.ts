import type { PieceType, PlayerColor, PromotionType } from "../types.ts";
import type { VariantId } from "../variants/variantTypes.ts";
import type { BoardState } from "../game/board.ts";
import type { NodeId } from "../game/coords.ts";
import { formatMove, nodeIdToAlgebraic } from "../game/coordFormat.ts";
import type { EngineErrorCode, IllegalMoveRule } from "../game/errors.ts";
import type { Move, MoveSpecial, Outcome } from "../game/moveTypes.ts";

export type GameId = string;

export type EngineErrorResponse = {
  error: string;
  code?: EngineErrorCode | "NOT_FOUND" | "BAD_REQUEST";
  /** Present when a move was refused. */
  rule?: IllegalMoveRule;
};

export type WirePiece = {
  square: NodeId;
  /** Same square as `a1`-style text, for display. */
  algebraic: string;
  type: PieceType;
  owner: PlayerColor;
  hasMoved: boolean;
  enPassant: boolean;
};

export type WireMove = {
  from: NodeId;
  to: NodeId;
  notation: string;
  special: MoveSpecial;
  promoteTo?: PromotionType;
  captures?: NodeId;
};

export type WirePlayerStatus = {
  color: PlayerColor;
  inCheck: boolean;
  eliminated: boolean;
  score: number;
};

export type WireStatus = {
  activePlayer: PlayerColor;
  players: WirePlayerStatus[];
  outcome: Outcome;
  ply: number;
};

export type GameView = {
  gameId: GameId;
  variantId: VariantId;
  status: WireStatus;
  board: WirePiece[];
};

export type CreateGameRequest = {
  variantId?: VariantId;
};

export type ImportGameRequest = {
  /** Snapshot text as produced by `GET /api/games/:gameId/snapshot`. */
  snapshot: string;
};

export type GameResponse = GameView | EngineErrorResponse;

export type GetMovesResponse = { moves: WireMove[] } | EngineErrorResponse;

export type SubmitMoveRequest = {
  /** Node id (`r12c3`) or algebraic (`d2`). */
  from: string;
  to: string;
  promoteTo?: PromotionType;
};

export type SubmitMoveResponse = (GameView & { notation: string }) | EngineErrorResponse;

export type UndoResponse = GameView | EngineErrorResponse;

export type ListVariantsResponse = {
  variants: Array<{ variantId: VariantId; displayName: string; subtitle: string }>;
};

export function toWireBoard(board: BoardState): WirePiece[] {
  return Array.from(board.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([square, piece]) => ({
      square,
      algebraic: nodeIdToAlgebraic(square),
      type: piece.type,
      owner: piece.owner,
      hasMoved: piece.hasMoved,
      enPassant: piece.enPassant,
    }));
}

export function toWireMove(move: Move): WireMove {
  const out: WireMove = { from: move.from, to: move.to, notation: formatMove(move), special: move.special };
  if (move.promoteTo) out.promoteTo = move.promoteTo;
  if (move.captured) out.captures = move.captured.square;
  return out;
}
