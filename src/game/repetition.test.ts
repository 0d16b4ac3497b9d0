import { describe, it, expect } from "vitest";
import { applyMove } from "./applyMove.ts";
import { buildPosition, makePiece } from "./positionBuilder.ts";
import { isNoProgressDraw, isRepetitionDraw, occurrencesOfCurrentPosition } from "./repetition.ts";
import type { GameState } from "./state.ts";
import type { VariantId } from "../variants/variantTypes.ts";

const OUT_AND_BACK: Array<[string, string]> = [
  ["r13c7", "r13c8"],
  ["r6c0", "r5c0"],
  ["r0c6", "r0c7"],
  ["r7c13", "r8c13"],
  ["r13c8", "r13c7"],
  ["r5c0", "r6c0"],
  ["r0c7", "r0c6"],
  ["r8c13", "r7c13"],
];

function shuffleKings(variantId: VariantId, plies: number): GameState {
  let s = buildPosition(
    [
      ["r13c7", makePiece("R", "K", true)],
      ["r6c0", makePiece("B", "K", true)],
      ["r0c6", makePiece("Y", "K", true)],
      ["r7c13", makePiece("G", "K", true)],
    ],
    { variantId }
  );
  for (let i = 0; i < plies; i++) {
    const [from, to] = OUT_AND_BACK[i % OUT_AND_BACK.length];
    const r = applyMove(s, { from, to });
    if (r.isErr) throw r.error;
    s = r.value;
  }
  return s;
}

describe("repetition", () => {
  it("counts occurrences of the latest hash", () => {
    expect(occurrencesOfCurrentPosition({ positionHistory: [] })).toBe(0);
    expect(occurrencesOfCurrentPosition({ positionHistory: ["a", "b", "a", "c", "a"] })).toBe(3);
    expect(isRepetitionDraw({ positionHistory: ["a", "b", "a"] }, 3)).toBe(false);
    expect(isRepetitionDraw({ positionHistory: ["a", "b", "a", "b", "a"] }, 3)).toBe(true);
    expect(isRepetitionDraw({ positionHistory: ["a", "a", "a"] }, null)).toBe(false);
  });

  it("no-progress limit", () => {
    expect(isNoProgressDraw({ noProgressPlies: 199 }, 200)).toBe(false);
    expect(isNoProgressDraw({ noProgressPlies: 200 }, 200)).toBe(true);
    expect(isNoProgressDraw({ noProgressPlies: 1000 }, null)).toBe(false);
  });

  it("the third occurrence of a position draws the game", () => {
    expect(shuffleKings("ffa_classic", 15).outcome).toEqual({ status: "inProgress" });
    expect(shuffleKings("ffa_classic", 16).outcome).toEqual({
      status: "finished",
      result: { kind: "draw", reasonCode: "REPETITION", message: "Draw — position repeated" },
    });
  });

  it("variants without draw rules keep playing", () => {
    const s = shuffleKings("ffa_no_draws", 16);
    expect(s.outcome).toEqual({ status: "inProgress" });
    expect(s.noProgressPlies).toBe(16);
  });
});
