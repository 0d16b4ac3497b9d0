import type { GameState } from "./state.ts";

export type PositionView = Pick<GameState, "board" | "players" | "activeIndex">;

/**
 * Create a hash string representing the position for repetition detection.
 * Two positions with the same hash are considered identical.
 */
export function hashGameState(state: PositionView): string {
  // Sort node IDs for consistent ordering
  const nodeIds = Array.from(state.board.keys()).sort();

  const parts: string[] = [];

  for (const nodeId of nodeIds) {
    const piece = state.board.get(nodeId);
    if (!piece) continue;
    // Flags change which moves are available (castling, en passant).
    parts.push(`${nodeId}:${piece.owner}${piece.type}${piece.hasMoved ? "m" : ""}${piece.enPassant ? "e" : ""}`);
  }

  const out = state.players.filter((p) => p.eliminated).map((p) => p.color);
  if (out.length > 0) parts.push(`out:${out.join("")}`);

  // Same position with a different player to move is different
  parts.push(`toMove:${state.players[state.activeIndex]?.color ?? "-"}`);

  return parts.join("|");
}
