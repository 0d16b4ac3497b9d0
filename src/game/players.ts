import type { PlayerColor } from "../types.ts";
import { BOARD_SIZE } from "./coords.ts";

export type Direction = { dr: number; dc: number };

export interface PlayerOrientation {
  color: PlayerColor;
  name: string;
  /** Pawn advance direction. The home edge lies directly behind it. */
  forward: Direction;
}

/** Fixed cyclic turn order. */
export const PLAYER_ORDER: readonly PlayerColor[] = ["R", "B", "Y", "G"];

const ORIENTATION: Record<PlayerColor, PlayerOrientation> = {
  R: { color: "R", name: "Red", forward: { dr: -1, dc: 0 } },
  B: { color: "B", name: "Blue", forward: { dr: 0, dc: 1 } },
  Y: { color: "Y", name: "Yellow", forward: { dr: 1, dc: 0 } },
  G: { color: "G", name: "Green", forward: { dr: 0, dc: -1 } },
};

/** Distance from the home edge of the line pawns start on. */
export const PAWN_START_ADVANCE = 1;
/** Distance from the home edge of the far edge, where pawns promote. */
export const PROMOTION_ADVANCE = BOARD_SIZE - 1;

export function isPlayerColor(raw: unknown): raw is PlayerColor {
  return raw === "R" || raw === "B" || raw === "Y" || raw === "G";
}

export function playerName(color: PlayerColor): string {
  return ORIENTATION[color].name;
}

export function forwardOf(color: PlayerColor): Direction {
  return ORIENTATION[color].forward;
}

/** How many lines a square lies in front of `color`'s home edge. */
export function advanceOf(color: PlayerColor, r: number, c: number): number {
  const { dr, dc } = ORIENTATION[color].forward;
  if (dr > 0) return r;
  if (dr < 0) return BOARD_SIZE - 1 - r;
  if (dc > 0) return c;
  return BOARD_SIZE - 1 - c;
}

export function isPawnStartSquare(color: PlayerColor, r: number, c: number): boolean {
  return advanceOf(color, r, c) === PAWN_START_ADVANCE;
}

export function isPromotionSquare(color: PlayerColor, r: number, c: number): boolean {
  return advanceOf(color, r, c) === PROMOTION_ADVANCE;
}

/** The two forward diagonals a pawn of `color` captures on. */
export function captureDirections(color: PlayerColor): Direction[] {
  const { dr, dc } = ORIENTATION[color].forward;
  if (dr !== 0) {
    return [
      { dr, dc: -1 },
      { dr, dc: 1 },
    ];
  }
  return [
    { dr: -1, dc },
    { dr: 1, dc },
  ];
}
