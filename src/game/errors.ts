export const EngineErrorCode = {
  INVALID_POSITION: "INVALID_POSITION",
  ILLEGAL_MOVE: "ILLEGAL_MOVE",
  NO_HISTORY: "NO_HISTORY",
  GAME_ALREADY_FINISHED: "GAME_ALREADY_FINISHED",
  INVALID_SNAPSHOT: "INVALID_SNAPSHOT",
} as const;

export type EngineErrorCode = (typeof EngineErrorCode)[keyof typeof EngineErrorCode];

/** Why a requested move was refused. */
export type IllegalMoveRule =
  | "out_of_bounds"
  | "no_piece"
  | "wrong_turn"
  | "occupied_by_own_piece"
  | "king_capture"
  | "invalid_promotion"
  | "not_piece_pattern"
  | "leaves_king_in_check";

export class EngineError extends Error {
  public readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}

/** A write outside the cross-shaped board. Callers are expected to filter with `isOnBoard` first. */
export class InvalidPositionError extends EngineError {
  public readonly square: string;

  constructor(square: string) {
    super(EngineErrorCode.INVALID_POSITION, `Square ${square} is not on the board`);
    this.name = "InvalidPositionError";
    this.square = square;
  }
}

export class IllegalMoveError extends EngineError {
  public readonly rule: IllegalMoveRule;

  constructor(rule: IllegalMoveRule, message: string) {
    super(EngineErrorCode.ILLEGAL_MOVE, message);
    this.name = "IllegalMoveError";
    this.rule = rule;
  }
}

export class NoHistoryError extends EngineError {
  constructor() {
    super(EngineErrorCode.NO_HISTORY, "There is no move to undo");
    this.name = "NoHistoryError";
  }
}

export class GameAlreadyFinishedError extends EngineError {
  constructor() {
    super(EngineErrorCode.GAME_ALREADY_FINISHED, "The game is already finished");
    this.name = "GameAlreadyFinishedError";
  }
}

export class InvalidSnapshotError extends EngineError {
  constructor(message: string) {
    super(EngineErrorCode.INVALID_SNAPSHOT, `Invalid snapshot: ${message}`);
    this.name = "InvalidSnapshotError";
  }
}
