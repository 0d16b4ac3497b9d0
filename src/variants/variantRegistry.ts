import type { RulesConfig, VariantId, VariantSpec } from "./variantTypes.ts";

const CLASSIC_PIECE_VALUES: RulesConfig["pieceValues"] = {
  P: 1,
  N: 3,
  B: 5,
  R: 5,
  Q: 9,
  // Kings are never captured; a mated king is eliminated instead.
  K: 0,
};

export const VARIANTS: readonly VariantSpec[] = [
  {
    variantId: "ffa_classic",
    displayName: "Free-for-all",
    subtitle: "Rules: last king standing • Draws: threefold repetition, 50 rounds without progress",
    rules: {
      pieceValues: CLASSIC_PIECE_VALUES,
      checkmateBonus: 20,
      repetitionDrawCount: 3,
      noProgressDrawPlies: 200,
    },
    defaultSaveName: "ffa_classic-save.json",
  },
  {
    variantId: "ffa_no_draws",
    displayName: "Free-for-all (no draw rules)",
    subtitle: "Rules: last king standing • Draws: stalemate only",
    rules: {
      pieceValues: CLASSIC_PIECE_VALUES,
      checkmateBonus: 20,
      repetitionDrawCount: null,
      noProgressDrawPlies: null,
    },
    defaultSaveName: "ffa_no_draws-save.json",
  },
] as const;

export const DEFAULT_VARIANT_ID: VariantId = "ffa_classic";

export function getVariantById(id: VariantId): VariantSpec {
  const found = VARIANTS.find((v) => v.variantId === id);
  if (!found) throw new Error(`Unknown variantId: ${id}`);
  return found;
}

export function isVariantId(id: unknown): id is VariantId {
  return typeof id === "string" && VARIANTS.some((v) => v.variantId === id);
}
