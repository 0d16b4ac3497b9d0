import type { Piece, PlayerColor, PromotionType } from "../types.ts";
import type { NodeId } from "./coords.ts";

export type MoveSpecial = "none" | "enPassant" | "castleKingSide" | "castleQueenSide" | "promotion";

export interface CapturedPiece {
  /** Differs from `to` only for en passant. */
  square: NodeId;
  piece: Piece;
}

export interface CastleRook {
  from: NodeId;
  to: NodeId;
  rook: Piece;
}

export interface Move {
  from: NodeId;
  to: NodeId;
  /** The moving piece as it stood before the move. */
  piece: Piece;
  captured: CapturedPiece | null;
  special: MoveSpecial;
  promoteTo?: PromotionType;
  castle?: CastleRook;
}

/** What a caller submits; any `Move` from the generator is also a valid request. */
export interface MoveRequest {
  from: NodeId;
  to: NodeId;
  promoteTo?: PromotionType;
}

export interface PlayerState {
  color: PlayerColor;
  eliminated: boolean;
  score: number;
}

export type GameResult =
  | { kind: "win"; winner: PlayerColor; reasonCode: "LAST_PLAYER_STANDING"; message: string }
  | {
      kind: "draw";
      reasonCode: "STALEMATE" | "REPETITION" | "NO_PROGRESS";
      message: string;
      stalemated?: PlayerColor;
    };

export type Outcome = { status: "inProgress" } | { status: "finished"; result: GameResult };

/** Everything needed to take a ply back exactly. */
export interface MoveRecord {
  move: Move;
  notation: string;
  mover: PlayerColor;
  /** Pawns whose en passant flag was cleared at the start of this ply. */
  clearedEnPassant: NodeId[];
  /** Players checkmated by this ply. */
  eliminated: PlayerColor[];
  prev: {
    players: PlayerState[];
    activeIndex: number;
    outcome: Outcome;
    noProgressPlies: number;
  };
}
