import { BOARD_SIZE, isOnBoard, isOnBoardId, makeNodeId, tryParseNodeId, type NodeId } from "./coords.ts";
import type { Move } from "./moveTypes.ts";

const A1_RE = /^(?<file>[a-n])(?<rank>\d{1,2})$/;

/** `r13c7` → `h1`. Files run a–n left to right, ranks 1–14 bottom to top. */
export function nodeIdToAlgebraic(nodeId: NodeId): string {
  const parsed = tryParseNodeId(nodeId);
  if (!parsed || !isOnBoard(parsed.r, parsed.c)) return nodeId;

  const file = String.fromCharCode("a".charCodeAt(0) + parsed.c);
  // Node IDs are addressed top-to-bottom (r0 at the top). Ranks count from the bottom.
  return `${file}${BOARD_SIZE - parsed.r}`;
}

/** Inverse of {@link nodeIdToAlgebraic}; null for text that names no playable square. */
export function algebraicToNodeId(text: string): NodeId | null {
  const match = A1_RE.exec(text.trim().toLowerCase());
  if (!match || !match.groups) return null;

  const c = match.groups.file.charCodeAt(0) - "a".charCodeAt(0);
  const r = BOARD_SIZE - Number(match.groups.rank);
  if (!isOnBoard(r, c)) return null;
  return makeNodeId(r, c);
}

/** Accepts either `r12c3` or `d2`. */
export function parseSquare(text: string): NodeId | null {
  if (isOnBoardId(text)) return text;
  return algebraicToNodeId(text);
}

export function formatMove(move: Move): string {
  if (move.special === "castleKingSide") return "O-O";
  if (move.special === "castleQueenSide") return "O-O-O";

  const sep = move.captured ? "x" : "-";
  const base = `${nodeIdToAlgebraic(move.from)}${sep}${nodeIdToAlgebraic(move.to)}`;
  if (move.special === "promotion" && move.promoteTo) return `${base}=${move.promoteTo}`;
  if (move.special === "enPassant") return `${base} e.p.`;
  return base;
}
