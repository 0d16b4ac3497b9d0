import type { PlayerColor } from "../types.ts";
import type { GameMeta, VariantId } from "../variants/variantTypes.ts";
import { DEFAULT_VARIANT_ID, getVariantById } from "../variants/variantRegistry.ts";
import type { BoardState } from "./board.ts";
import { hashGameState } from "./hashState.ts";
import { createInitialBoard } from "./initialPosition.ts";
import type { MoveRecord, Outcome, PlayerState } from "./moveTypes.ts";
import { PLAYER_ORDER } from "./players.ts";

export interface GameState {
  meta: GameMeta;
  board: BoardState;
  /** All four seats in turn order, eliminated ones included. */
  players: PlayerState[];
  activeIndex: number;
  history: MoveRecord[];
  /** Hash of every position reached, the starting one first. */
  positionHistory: string[];
  /** Plies since the last capture or pawn move. */
  noProgressPlies: number;
  outcome: Outcome;
}

export function activePlayer(state: GameState): PlayerColor {
  return state.players[state.activeIndex].color;
}

export function createInitialGameState(variantId: VariantId = DEFAULT_VARIANT_ID): GameState {
  const variant = getVariantById(variantId);

  const base: GameState = {
    meta: { variantId: variant.variantId, rules: variant.rules },
    board: createInitialBoard(),
    players: PLAYER_ORDER.map((color) => ({ color, eliminated: false, score: 0 })),
    activeIndex: 0,
    history: [],
    positionHistory: [],
    noProgressPlies: 0,
    outcome: { status: "inProgress" },
  };

  return { ...base, positionHistory: [hashGameState(base)] };
}
