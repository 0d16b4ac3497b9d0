import { describe, it, expect } from "vitest";
import { generateLegalMoves, legalMovesFrom } from "./movegen.ts";
import { perft } from "./perft.ts";
import { buildPosition, makePiece } from "./positionBuilder.ts";
import { createInitialGameState } from "./state.ts";
import { isSquareAttacked } from "./attackMap.ts";
import { findKing } from "./board.ts";
import { makeMove, unmakeMove } from "./makeMove.ts";

const ALL_COLORS = ["R", "B", "Y", "G"] as const;

const OTHER_KINGS = [
  ["r6c0", makePiece("B", "K")],
  ["r0c6", makePiece("Y", "K")],
  ["r7c13", makePiece("G", "K")],
] as const;

function pinnedRook(eliminated: Array<"Y"> = []) {
  return buildPosition(
    [
      ["r13c7", makePiece("R", "K")],
      ["r10c7", makePiece("R", "R")],
      ["r5c7", makePiece("Y", "Q")],
      ...OTHER_KINGS,
    ],
    { eliminated }
  );
}

describe("movegen", () => {
  it("perft from the starting position", () => {
    const start = createInitialGameState();
    expect(perft(start, 1)).toBe(20);
    expect(perft(start, 2)).toBe(399);
  });

  it("every opening move of every seat keeps its king safe", () => {
    const start = createInitialGameState();
    for (const color of ALL_COLORS) {
      const moves = generateLegalMoves(start, color);
      expect(moves).toHaveLength(20);
      for (const move of moves) {
        const board = new Map(start.board);
        const undo = makeMove(board, move);
        const king = findKing(board, color);
        expect(king).not.toBeNull();
        if (king) expect(isSquareAttacked(board, king, ALL_COLORS.filter((c) => c !== color))).toBe(false);
        unmakeMove(board, move, undo);
        expect(board).toEqual(start.board);
      }
    }
  });

  it("a pinned rook may only move along the pin", () => {
    const moves = legalMovesFrom(pinnedRook(), "r10c7");
    expect(moves.map((m) => m.to).sort()).toEqual(["r11c7", "r12c7", "r5c7", "r6c7", "r7c7", "r8c7", "r9c7"]);
  });

  it("pieces of an eliminated player no longer pin", () => {
    const moves = legalMovesFrom(pinnedRook(["Y"]), "r10c7");
    expect(moves).toHaveLength(20);
    expect(moves.find((m) => m.to === "r5c7")?.captured?.piece.type).toBe("Q");
  });

  it("eliminated players have no moves", () => {
    expect(generateLegalMoves(pinnedRook(["Y"]), "Y")).toEqual([]);
  });

  it("kings are never captured", () => {
    const s = buildPosition([
      ["r13c7", makePiece("R", "K")],
      ["r6c2", makePiece("R", "Q")],
      ...OTHER_KINGS,
    ]);
    const moves = legalMovesFrom(s, "r6c2");
    expect(moves.some((m) => m.to === "r6c1")).toBe(true);
    expect(moves.some((m) => m.to === "r6c0")).toBe(false);
  });

  describe("castling", () => {
    const redHome = [
      ["r13c7", makePiece("R", "K")],
      ["r13c3", makePiece("R", "R")],
      ["r13c10", makePiece("R", "R")],
    ] as const;

    it("both sides when the line is clear", () => {
      const s = buildPosition([...redHome, ...OTHER_KINGS]);
      const castles = legalMovesFrom(s, "r13c7").filter((m) => m.castle);
      expect(castles.map((m) => [m.special, m.to, m.castle?.from, m.castle?.to])).toEqual([
        ["castleQueenSide", "r13c5", "r13c3", "r13c6"],
        ["castleKingSide", "r13c9", "r13c10", "r13c8"],
      ]);
    });

    it("not through an attacked square", () => {
      const s = buildPosition([...redHome, ...OTHER_KINGS, ["r0c8", makePiece("Y", "R")]]);
      const castles = legalMovesFrom(s, "r13c7").filter((m) => m.castle);
      expect(castles.map((m) => m.special)).toEqual(["castleQueenSide"]);
    });

    it("not with a rook that has moved", () => {
      const s = buildPosition([
        ["r13c7", makePiece("R", "K")],
        ["r13c10", makePiece("R", "R", true)],
        ...OTHER_KINGS,
      ]);
      expect(legalMovesFrom(s, "r13c7").filter((m) => m.castle)).toEqual([]);
    });

    it("along a column for a side seat", () => {
      const s = buildPosition(
        [
          ["r13c7", makePiece("R", "K")],
          ["r6c0", makePiece("B", "K")],
          ["r3c0", makePiece("B", "R")],
          ["r10c0", makePiece("B", "R")],
          ["r0c6", makePiece("Y", "K")],
          ["r7c13", makePiece("G", "K")],
        ],
        { active: "B" }
      );
      const castles = legalMovesFrom(s, "r6c0").filter((m) => m.castle);
      expect(castles.map((m) => [m.special, m.to, m.castle?.to])).toEqual([
        ["castleKingSide", "r4c0", "r5c0"],
        ["castleQueenSide", "r8c0", "r7c0"],
      ]);
    });
  });
});
