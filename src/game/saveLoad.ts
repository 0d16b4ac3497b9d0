import { Result } from "@badrap/result";
import type { Piece, PieceType, PlayerColor } from "../types.ts";
import type { VariantId } from "../variants/variantTypes.ts";
import { getVariantById, isVariantId } from "../variants/variantRegistry.ts";
import { checkBoardInvariants, type BoardState } from "./board.ts";
import { isOnBoardId, type NodeId } from "./coords.ts";
import { InvalidSnapshotError } from "./errors.ts";
import { hashGameState } from "./hashState.ts";
import { unmakeMove } from "./makeMove.ts";
import type {
  CapturedPiece,
  CastleRook,
  GameResult,
  Move,
  MoveRecord,
  MoveSpecial,
  Outcome,
  PlayerState,
} from "./moveTypes.ts";
import { PLAYER_ORDER, isPlayerColor } from "./players.ts";
import { isPromotionType } from "./pieceRules.ts";
import type { GameState } from "./state.ts";

export const SAVE_VERSION = 1;

export interface SerializedGameState {
  saveVersion: typeof SAVE_VERSION;
  variantId: VariantId;
  board: [NodeId, Piece][];
  players: PlayerState[];
  activeIndex: number;
  outcome: Outcome;
  noProgressPlies: number;
  positionHistory: string[];
  history: MoveRecord[];
}

/**
 * Serialize game state to a JSON-compatible object
 */
export function serializeGameState(state: GameState): SerializedGameState {
  return {
    saveVersion: SAVE_VERSION,
    variantId: state.meta.variantId,
    board: Array.from(state.board.entries()),
    players: state.players,
    activeIndex: state.activeIndex,
    outcome: state.outcome,
    noProgressPlies: state.noProgressPlies,
    positionHistory: state.positionHistory,
    history: state.history,
  };
}

export function serializeSaveData(state: GameState): string {
  return JSON.stringify(serializeGameState(state), null, 2);
}

type Json = Record<string, unknown>;

function isRecord(raw: unknown): raw is Json {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

function fail(message: string): never {
  throw new InvalidSnapshotError(message);
}

function expectRecord(raw: unknown, where: string): Json {
  if (!isRecord(raw)) fail(`${where} must be an object`);
  return raw;
}

function expectArray(raw: unknown, where: string): unknown[] {
  if (!Array.isArray(raw)) fail(`${where} must be an array`);
  return raw;
}

function expectInt(raw: unknown, where: string, min = 0): number {
  if (typeof raw !== "number" || !Number.isInteger(raw) || raw < min) fail(`${where} must be an integer >= ${min}`);
  return raw;
}

function expectBool(raw: unknown, where: string): boolean {
  if (typeof raw !== "boolean") fail(`${where} must be a boolean`);
  return raw;
}

function expectString(raw: unknown, where: string): string {
  if (typeof raw !== "string") fail(`${where} must be a string`);
  return raw;
}

function expectSquare(raw: unknown, where: string): NodeId {
  if (typeof raw !== "string" || !isOnBoardId(raw)) fail(`${where} is not a board square`);
  return raw;
}

function expectColor(raw: unknown, where: string): PlayerColor {
  if (!isPlayerColor(raw)) fail(`${where} is not a player color`);
  return raw;
}

function isPieceType(raw: unknown): raw is PieceType {
  return raw === "P" || raw === "N" || raw === "B" || raw === "R" || raw === "Q" || raw === "K";
}

function isMoveSpecial(raw: unknown): raw is MoveSpecial {
  return (
    raw === "none" ||
    raw === "enPassant" ||
    raw === "castleKingSide" ||
    raw === "castleQueenSide" ||
    raw === "promotion"
  );
}

function readPiece(raw: unknown, where: string): Piece {
  const p = expectRecord(raw, where);
  if (!isPieceType(p.type)) fail(`${where}.type is not a piece type`);
  return {
    type: p.type,
    owner: expectColor(p.owner, `${where}.owner`),
    hasMoved: expectBool(p.hasMoved, `${where}.hasMoved`),
    enPassant: expectBool(p.enPassant, `${where}.enPassant`),
  };
}

function readBoard(raw: unknown): BoardState {
  const board: BoardState = new Map();
  expectArray(raw, "board").forEach((entry, i) => {
    const pair = expectArray(entry, `board[${i}]`);
    if (pair.length !== 2) fail(`board[${i}] must be a [square, piece] pair`);
    const square = expectSquare(pair[0], `board[${i}][0]`);
    if (board.has(square)) fail(`board lists ${square} twice`);
    board.set(square, readPiece(pair[1], `board[${i}][1]`));
  });
  return board;
}

function readPlayers(raw: unknown, where: string): PlayerState[] {
  const list = expectArray(raw, where);
  if (list.length !== PLAYER_ORDER.length) fail(`${where} must list ${PLAYER_ORDER.length} players`);
  return list.map((entry, i) => {
    const p = expectRecord(entry, `${where}[${i}]`);
    const color = expectColor(p.color, `${where}[${i}].color`);
    if (color !== PLAYER_ORDER[i]) fail(`${where}[${i}] must be ${PLAYER_ORDER[i]}`);
    const score = p.score;
    if (typeof score !== "number" || !Number.isFinite(score)) fail(`${where}[${i}].score must be a number`);
    return { color, eliminated: expectBool(p.eliminated, `${where}[${i}].eliminated`), score };
  });
}

function readResult(raw: unknown, where: string): GameResult {
  const r = expectRecord(raw, where);
  const message = expectString(r.message, `${where}.message`);
  if (r.kind === "win") {
    if (r.reasonCode !== "LAST_PLAYER_STANDING") fail(`${where}.reasonCode is unknown`);
    return { kind: "win", winner: expectColor(r.winner, `${where}.winner`), reasonCode: r.reasonCode, message };
  }
  if (r.kind === "draw") {
    const reasonCode = r.reasonCode;
    if (reasonCode !== "STALEMATE" && reasonCode !== "REPETITION" && reasonCode !== "NO_PROGRESS") {
      fail(`${where}.reasonCode is unknown`);
    }
    if (r.stalemated === undefined) return { kind: "draw", reasonCode, message };
    return { kind: "draw", reasonCode, message, stalemated: expectColor(r.stalemated, `${where}.stalemated`) };
  }
  return fail(`${where}.kind must be "win" or "draw"`);
}

function readOutcome(raw: unknown, where: string): Outcome {
  const o = expectRecord(raw, where);
  if (o.status === "inProgress") return { status: "inProgress" };
  if (o.status === "finished") return { status: "finished", result: readResult(o.result, `${where}.result`) };
  return fail(`${where}.status must be "inProgress" or "finished"`);
}

function readCaptured(raw: unknown, where: string): CapturedPiece | null {
  if (raw === null) return null;
  const c = expectRecord(raw, where);
  return { square: expectSquare(c.square, `${where}.square`), piece: readPiece(c.piece, `${where}.piece`) };
}

function readCastle(raw: unknown, where: string): CastleRook {
  const c = expectRecord(raw, where);
  return {
    from: expectSquare(c.from, `${where}.from`),
    to: expectSquare(c.to, `${where}.to`),
    rook: readPiece(c.rook, `${where}.rook`),
  };
}

function readMove(raw: unknown, where: string): Move {
  const m = expectRecord(raw, where);
  if (!isMoveSpecial(m.special)) fail(`${where}.special is unknown`);
  const move: Move = {
    from: expectSquare(m.from, `${where}.from`),
    to: expectSquare(m.to, `${where}.to`),
    piece: readPiece(m.piece, `${where}.piece`),
    captured: readCaptured(m.captured, `${where}.captured`),
    special: m.special,
  };
  if (m.promoteTo !== undefined) {
    if (!isPromotionType(m.promoteTo)) fail(`${where}.promoteTo is not a promotion piece`);
    move.promoteTo = m.promoteTo;
  }
  if (m.castle !== undefined) move.castle = readCastle(m.castle, `${where}.castle`);
  return move;
}

function readRecord(raw: unknown, where: string): MoveRecord {
  const r = expectRecord(raw, where);
  const prev = expectRecord(r.prev, `${where}.prev`);
  return {
    move: readMove(r.move, `${where}.move`),
    notation: expectString(r.notation, `${where}.notation`),
    mover: expectColor(r.mover, `${where}.mover`),
    clearedEnPassant: expectArray(r.clearedEnPassant, `${where}.clearedEnPassant`).map((s, i) =>
      expectSquare(s, `${where}.clearedEnPassant[${i}]`)
    ),
    eliminated: expectArray(r.eliminated, `${where}.eliminated`).map((c, i) =>
      expectColor(c, `${where}.eliminated[${i}]`)
    ),
    prev: {
      players: readPlayers(prev.players, `${where}.prev.players`),
      activeIndex: expectInt(prev.activeIndex, `${where}.prev.activeIndex`),
      outcome: readOutcome(prev.outcome, `${where}.prev.outcome`),
      noProgressPlies: expectInt(prev.noProgressPlies, `${where}.prev.noProgressPlies`),
    },
  };
}

function liveColors(players: readonly PlayerState[]): PlayerColor[] {
  return players.filter((p) => !p.eliminated).map((p) => p.color);
}

/**
 * Takes every recorded ply back on a scratch board, newest first. Each ply must
 * match what stands on the board, and each earlier position must be sound.
 */
function checkHistory(board: BoardState, history: readonly MoveRecord[]): void {
  const scratch: BoardState = new Map(board);

  for (let i = history.length - 1; i >= 0; i--) {
    const where = `history[${i}]`;
    const { move, mover, clearedEnPassant, prev } = history[i];
    if (move.piece.owner !== mover) fail(`${where}.move.piece is not ${mover}'s`);
    if (prev.activeIndex >= prev.players.length) fail(`${where}.prev.activeIndex is out of range`);

    const placedType = move.special === "promotion" && move.promoteTo ? move.promoteTo : move.piece.type;
    const placed = scratch.get(move.to);
    if (!placed || placed.owner !== mover || placed.type !== placedType) fail(`${where}.move does not match the board`);
    if (scratch.has(move.from)) fail(`${where}.move.from is occupied`);
    if (move.captured && move.captured.square !== move.to && scratch.has(move.captured.square)) {
      fail(`${where}.move.captured.square is occupied`);
    }
    if (move.castle) {
      const rook = scratch.get(move.castle.to);
      if (rook?.type !== "R" || rook.owner !== mover) fail(`${where}.move.castle does not match the board`);
      if (scratch.has(move.castle.from)) fail(`${where}.move.castle.from is occupied`);
    }

    unmakeMove(scratch, move, { clearedEnPassant });

    const problems = checkBoardInvariants(scratch, liveColors(prev.players));
    if (problems.length > 0) fail(`before ${where}: ${problems.join("; ")}`);
  }
}

function readGameState(raw: unknown): GameState {
  const data = expectRecord(raw, "snapshot");
  if (data.saveVersion !== SAVE_VERSION) fail(`unsupported saveVersion ${String(data.saveVersion)}`);
  if (!isVariantId(data.variantId)) fail(`unknown variantId ${String(data.variantId)}`);
  const variant = getVariantById(data.variantId);

  const board = readBoard(data.board);
  const players = readPlayers(data.players, "players");
  const activeIndex = expectInt(data.activeIndex, "activeIndex");
  if (activeIndex >= players.length) fail("activeIndex is out of range");
  if (players[activeIndex].eliminated) fail("the active player is eliminated");

  const history = expectArray(data.history, "history").map((r, i) => readRecord(r, `history[${i}]`));
  const positionHistory = expectArray(data.positionHistory, "positionHistory").map((h, i) =>
    expectString(h, `positionHistory[${i}]`)
  );
  if (positionHistory.length !== history.length + 1) fail("positionHistory must hold one entry per reached position");

  const problems = checkBoardInvariants(board, liveColors(players));
  if (problems.length > 0) fail(problems.join("; "));

  if (positionHistory[positionHistory.length - 1] !== hashGameState({ board, players, activeIndex })) {
    fail("positionHistory does not end with the current position");
  }
  checkHistory(board, history);

  return {
    meta: { variantId: variant.variantId, rules: variant.rules },
    board,
    players,
    activeIndex,
    history,
    positionHistory,
    noProgressPlies: expectInt(data.noProgressPlies, "noProgressPlies"),
    outcome: readOutcome(data.outcome, "outcome"),
  };
}

/**
 * Parse and validate snapshot text. Every field is checked, as are the board
 * invariants; nothing is trusted from the file.
 */
export function deserializeSaveData(text: string): Result<GameState, InvalidSnapshotError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return Result.err(new InvalidSnapshotError(`not valid JSON (${msg})`));
  }

  try {
    return Result.ok(readGameState(raw));
  } catch (err) {
    if (err instanceof InvalidSnapshotError) return Result.err(err);
    throw err;
  }
}
