import { InvalidPositionError } from "./errors.ts";

export type NodeId = string;

export const BOARD_SIZE = 14;
/** Width of each cut-away corner of the cross. */
export const CORNER_SIZE = 3;

const NODE_ID_RE = /^r(\d+)c(\d+)$/;

export function parseNodeId(id: string): { r: number; c: number } {
  const m = NODE_ID_RE.exec(id);
  if (!m) throw new InvalidPositionError(id);
  return { r: Number(m[1]), c: Number(m[2]) };
}

export function tryParseNodeId(id: string): { r: number; c: number } | null {
  const m = NODE_ID_RE.exec(id);
  if (!m) return null;
  return { r: Number(m[1]), c: Number(m[2]) };
}

export function makeNodeId(r: number, c: number): NodeId {
  return `r${r}c${c}`;
}

export function inBounds(r: number, c: number): boolean {
  return r >= 0 && r < BOARD_SIZE && c >= 0 && c < BOARD_SIZE;
}

function inCornerBand(n: number): boolean {
  return n < CORNER_SIZE || n >= BOARD_SIZE - CORNER_SIZE;
}

export function isOnBoard(r: number, c: number): boolean {
  return inBounds(r, c) && !(inCornerBand(r) && inCornerBand(c));
}

export function isOnBoardId(id: string): boolean {
  const rc = tryParseNodeId(id);
  return rc !== null && isOnBoard(rc.r, rc.c);
}
