export type PlayerColor = "R" | "B" | "Y" | "G";
export type PieceType = "P" | "N" | "B" | "R" | "Q" | "K";
export type PromotionType = "Q" | "R" | "B" | "N";

export interface Piece {
  type: PieceType;
  owner: PlayerColor;
  hasMoved: boolean;
  /** Pawn double-stepped on the previous ply and may be taken en passant. */
  enPassant: boolean;
}
