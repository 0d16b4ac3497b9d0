import { describe, it, expect } from "vitest";
import { applyMove } from "./applyMove.ts";
import { isSquareAttacked } from "./attackMap.ts";
import { checkBoardInvariants, findKing } from "./board.ts";
import { makeMove } from "./makeMove.ts";
import { generateLegalMoves, livePlayers, opponentsOf } from "./movegen.ts";
import type { Move, MoveRequest } from "./moveTypes.ts";
import { buildPosition, makePiece } from "./positionBuilder.ts";
import { activePlayer, createInitialGameState, type GameState } from "./state.ts";
import { undoLastMove } from "./undoMove.ts";

// Mulberry32
function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function moveKey(m: Move): string {
  return `${m.from}-${m.to}${m.promoteTo ?? ""}`;
}

/** Everything wrong with the legal move list of the player to move. */
function legalMoveProblems(state: GameState, moves: readonly Move[]): string[] {
  const mover = activePlayer(state);
  const enemies = opponentsOf(state, mover);
  const problems: string[] = [];
  const seen = new Set<string>();

  for (const m of moves) {
    const key = moveKey(m);
    if (seen.has(key)) problems.push(`${key} listed twice`);
    seen.add(key);
    if (m.captured?.piece.type === "K") problems.push(`${key} captures a king`);

    const scratch = new Map(state.board);
    makeMove(scratch, m);
    const king = findKing(scratch, mover);
    if (!king || isSquareAttacked(scratch, king, enemies)) problems.push(`${key} leaves ${mover}'s king attacked`);
  }
  return problems;
}

function play(state: GameState, request: MoveRequest): GameState {
  const result = applyMove(state, request);
  if (result.isErr) throw result.error;
  return result.value;
}

function undo(state: GameState): GameState {
  const result = undoLastMove(state);
  if (result.isErr) throw result.error;
  return result.value;
}

describe("undoLastMove", () => {
  it("fails with nothing to undo", () => {
    const result = undoLastMove(createInitialGameState());
    expect(result.isErr && result.error.code).toBe("NO_HISTORY");
  });

  it("restores the position before a double step", () => {
    const start = createInitialGameState();
    expect(undo(play(start, { from: "r12c4", to: "r10c4" }))).toEqual(start);
  });

  it("walks back several plies in order", () => {
    const start = createInitialGameState();
    const a = play(start, { from: "r12c4", to: "r10c4" });
    const b = play(a, { from: "r7c1", to: "r7c3" });
    const c = play(b, { from: "r1c5", to: "r3c5" });
    expect(undo(c)).toEqual(b);
    expect(undo(undo(c))).toEqual(a);
  });

  it("puts back a pawn taken en passant and its flag", () => {
    const s = play(
      buildPosition(
        [
          ["r13c7", makePiece("R", "K")],
          ["r6c0", makePiece("B", "K")],
          ["r6c1", makePiece("B", "P")],
          ["r0c6", makePiece("Y", "K")],
          ["r5c3", makePiece("Y", "P", true)],
          ["r7c13", makePiece("G", "K")],
        ],
        { active: "B" }
      ),
      { from: "r6c1", to: "r6c3" }
    );
    const back = undo(play(s, { from: "r5c3", to: "r6c2" }));
    expect(back).toEqual(s);
    expect(back.board.get("r6c3")?.enPassant).toBe(true);
  });

  it("returns the rook after castling and the pawn after promotion", () => {
    const castle = buildPosition([
      ["r13c7", makePiece("R", "K")],
      ["r13c10", makePiece("R", "R")],
      ["r6c0", makePiece("B", "K")],
      ["r0c6", makePiece("Y", "K")],
      ["r7c13", makePiece("G", "K")],
    ]);
    expect(undo(play(castle, { from: "r13c7", to: "r13c9" }))).toEqual(castle);

    const promo = buildPosition([
      ["r13c7", makePiece("R", "K")],
      ["r1c5", makePiece("R", "P", true)],
      ["r6c0", makePiece("B", "K")],
      ["r3c12", makePiece("Y", "K")],
      ["r7c13", makePiece("G", "K")],
    ]);
    const back = undo(play(promo, { from: "r1c5", to: "r0c5", promoteTo: "N" }));
    expect(back).toEqual(promo);
    expect(back.board.get("r1c5")?.type).toBe("P");
  });

  it("revives an eliminated player and reopens a finished game", () => {
    const s = buildPosition(
      [
        ["r13c7", makePiece("R", "K")],
        ["r10c1", makePiece("R", "R", true)],
        ["r3c5", makePiece("R", "R", true)],
        ["r6c0", makePiece("B", "K", true)],
        ["r0c6", makePiece("Y", "K")],
        ["r7c13", makePiece("G", "K")],
      ],
      { eliminated: ["Y", "G"] }
    );
    const finished = play(s, { from: "r3c5", to: "r3c0" });
    expect(finished.outcome.status).toBe("finished");

    const back = undo(finished);
    expect(back).toEqual(s);
    expect(back.outcome).toEqual({ status: "inProgress" });
    expect(back.players.map((p) => p.score)).toEqual([0, 0, 0, 0]);
  });

  it("every ply of random games is legal, sound and exactly undoable", () => {
    const problems: string[] = [];
    let plies = 0;

    for (const seed of [1, 2, 3, 4]) {
      const random = seededRandom(seed);
      let s = createInitialGameState();

      for (let ply = 0; ply < 150 && s.outcome.status === "inProgress"; ply++) {
        const moves = generateLegalMoves(s, activePlayer(s));
        problems.push(...legalMoveProblems(s, moves).map((p) => `seed ${seed} ply ${ply}: ${p}`));
        if (moves.length === 0) break;

        const move = moves[Math.floor(random() * moves.length)];
        const next = play(s, move);
        plies++;

        const invariants = checkBoardInvariants(next.board, livePlayers(next));
        problems.push(...invariants.map((p) => `seed ${seed} ply ${ply}: ${p}`));
        expect(undo(next)).toEqual(s);

        s = next;
      }
    }

    expect(problems).toEqual([]);
    expect(plies).toBeGreaterThan(0);
  });
});
