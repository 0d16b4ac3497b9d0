import type { PlayerColor } from "../types.ts";
import { isCheckmated, isStalemated } from "./check.ts";
import { livePlayers, type MoveGenView } from "./movegen.ts";
import type { Outcome } from "./moveTypes.ts";
import { playerName } from "./players.ts";
import { isNoProgressDraw, isRepetitionDraw } from "./repetition.ts";
import type { GameState } from "./state.ts";

/**
 * Live players who are checkmated on this board. Everyone is judged against
 * the same set of live attackers, so simultaneous mates are all reported.
 */
export function findCheckmatedPlayers(view: MoveGenView): PlayerColor[] {
  return livePlayers(view).filter((color) => isCheckmated(view, color));
}

/**
 * Check if the game is over. Expects eliminations to be applied and the turn
 * already handed to the next live player.
 */
export function evaluateOutcome(state: GameState): Outcome {
  const live = livePlayers(state);
  if (live.length === 1) {
    const winner = live[0];
    return {
      status: "finished",
      result: {
        kind: "win",
        winner,
        reasonCode: "LAST_PLAYER_STANDING",
        message: `${playerName(winner)} wins — last king standing`,
      },
    };
  }

  const toMove = state.players[state.activeIndex].color;
  if (isStalemated(state, toMove)) {
    return {
      status: "finished",
      result: {
        kind: "draw",
        reasonCode: "STALEMATE",
        message: `Draw — ${playerName(toMove)} is stalemated`,
        stalemated: toMove,
      },
    };
  }

  const { rules } = state.meta;
  if (isRepetitionDraw(state, rules.repetitionDrawCount)) {
    return {
      status: "finished",
      result: { kind: "draw", reasonCode: "REPETITION", message: "Draw — position repeated" },
    };
  }

  if (isNoProgressDraw(state, rules.noProgressDrawPlies)) {
    return {
      status: "finished",
      result: { kind: "draw", reasonCode: "NO_PROGRESS", message: "Draw — no capture or pawn move" },
    };
  }

  return { status: "inProgress" };
}
