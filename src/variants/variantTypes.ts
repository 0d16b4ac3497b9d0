import type { PieceType } from "../types.ts";

export type VariantId = "ffa_classic" | "ffa_no_draws";

export interface RulesConfig {
  /** Points credited to the capturer. */
  pieceValues: Record<PieceType, number>;
  /** Points credited to the mover for each player its move checkmates. */
  checkmateBonus: number;
  /** Occurrences of the same position that end the game in a draw; null disables. */
  repetitionDrawCount: number | null;
  /** Plies without a capture or pawn move that end the game in a draw; null disables. */
  noProgressDrawPlies: number | null;
}

export interface GameMeta {
  variantId: VariantId;
  rules: RulesConfig;
}

export interface VariantSpec {
  variantId: VariantId;
  displayName: string;
  subtitle: string;
  rules: RulesConfig;
  defaultSaveName: string;
}
