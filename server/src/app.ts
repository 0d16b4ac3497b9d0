import express from "express";
import cors from "cors";
import { createServer, type Server } from "node:http";
import { randomBytes } from "node:crypto";

import {
  applyMove,
  exportSnapshot,
  importSnapshot,
  legalMoves,
  newGame,
  parseSquare,
  status,
  undoLastMove,
  type GameState,
} from "../../src/core/index.ts";
import { EngineError, IllegalMoveError } from "../../src/game/errors.ts";
import { isPromotionType } from "../../src/game/pieceRules.ts";
import { getVariantById, isVariantId, VARIANTS } from "../../src/variants/variantRegistry.ts";
import {
  toWireBoard,
  toWireMove,
  type CreateGameRequest,
  type EngineErrorResponse,
  type GameId,
  type GameResponse,
  type GameView,
  type GetMovesResponse,
  type ImportGameRequest,
  type ListVariantsResponse,
  type SubmitMoveRequest,
  type SubmitMoveResponse,
  type UndoResponse,
} from "../../src/shared/engineProtocol.ts";

import { ensureGamesDir, isGameId, resolveGamesDir, tryLoadGame, writeSnapshotAtomic } from "./persistence.ts";

type Game = {
  gameId: GameId;
  state: GameState;
  /** Serialize all game mutations so concurrent requests apply in order. */
  actionChain: Promise<void>;
  persistChain: Promise<void>;
};

type ServerOpts = {
  gamesDir?: string;
};

class GameNotFoundError extends Error {
  constructor(gameId: string) {
    super(`Game ${gameId} not found`);
    this.name = "GameNotFoundError";
  }
}

const newGameId = (): GameId => randomBytes(12).toString("hex");

function bodyOf(req: express.Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && !Array.isArray(body)) return { ...body };
  return {};
}

function readCreateRequest(req: express.Request): CreateGameRequest {
  const { variantId } = bodyOf(req);
  if (variantId === undefined) return {};
  if (!isVariantId(variantId)) throw new Error(`Unknown variantId: ${String(variantId)}`);
  return { variantId };
}

function readImportRequest(req: express.Request): ImportGameRequest {
  const { snapshot } = bodyOf(req);
  if (typeof snapshot !== "string") throw new Error("Missing snapshot");
  return { snapshot };
}

function readMoveRequest(req: express.Request): SubmitMoveRequest {
  const { from, to, promoteTo } = bodyOf(req);
  if (typeof from !== "string" || typeof to !== "string") throw new Error("Missing from/to");
  if (promoteTo === undefined) return { from, to };
  if (!isPromotionType(promoteTo)) throw new IllegalMoveError("invalid_promotion", `Cannot promote to ${String(promoteTo)}`);
  return { from, to, promoteTo };
}

function viewOf(game: Game): GameView {
  return {
    gameId: game.gameId,
    variantId: game.state.meta.variantId,
    status: status(game.state),
    board: toWireBoard(game.state.board),
  };
}

function errorBody(err: unknown, fallback: string): EngineErrorResponse {
  if (err instanceof IllegalMoveError) return { error: err.message, code: err.code, rule: err.rule };
  if (err instanceof EngineError) return { error: err.message, code: err.code };
  if (err instanceof GameNotFoundError) return { error: err.message, code: "NOT_FOUND" };
  return { error: err instanceof Error ? err.message : fallback, code: "BAD_REQUEST" };
}

function sendError(res: express.Response, err: unknown, fallback: string): void {
  const body = errorBody(err, fallback);
  res.status(body.code === "NOT_FOUND" ? 404 : 400).json(body);
}

export function createEngineApp(opts: ServerOpts = {}): {
  app: express.Express;
  games: Map<GameId, Game>;
  gamesDir: string | null;
  shutdown: () => Promise<void>;
} {
  const gamesDir = resolveGamesDir(opts.gamesDir);
  const games = new Map<GameId, Game>();
  const logRequests = process.env.QUADCHESS_LOG === "1";
  let isShuttingDown = false;

  function queuePersist(game: Game): Promise<void> {
    if (!gamesDir || isShuttingDown) return Promise.resolve();
    const dir = gamesDir;
    const state = game.state;
    game.persistChain = game.persistChain
      .then(() => writeSnapshotAtomic(dir, game.gameId, state))
      .catch((err) => {
        // eslint-disable-next-line no-console
        console.error("[quadchess-server] persist error", err);
      });
    return game.persistChain;
  }

  function queueGameAction<T>(game: Game, fn: () => Promise<T>): Promise<T> {
    if (isShuttingDown) return Promise.reject(new Error("Server shutting down"));

    // Chain actions so at most one runs at a time per game.
    const prev = game.actionChain;
    const next = prev.catch(() => undefined).then(fn);
    game.actionChain = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  function register(state: GameState): Game {
    const game: Game = {
      gameId: newGameId(),
      state,
      actionChain: Promise.resolve(),
      persistChain: Promise.resolve(),
    };
    games.set(game.gameId, game);
    return game;
  }

  async function requireGame(gameId: string): Promise<Game> {
    const existing = games.get(gameId);
    if (existing) return existing;
    if (!gamesDir || !isGameId(gameId)) throw new GameNotFoundError(gameId);

    const state = await tryLoadGame(gamesDir, gameId);
    if (!state) throw new GameNotFoundError(gameId);

    // eslint-disable-next-line no-console
    console.log(`[quadchess-server] loaded game ${gameId} from disk (ply=${state.history.length})`);

    // A concurrent request may have loaded it meanwhile.
    const raced = games.get(gameId);
    if (raced) return raced;

    const game: Game = { gameId, state, actionChain: Promise.resolve(), persistChain: Promise.resolve() };
    games.set(gameId, game);
    return game;
  }

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "4mb" }));

  app.use((req, _res, next) => {
    if (logRequests) {
      // eslint-disable-next-line no-console
      console.log(`[quadchess-server] ${req.method} ${req.path}`);
    }
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/variants", (_req, res) => {
    const response: ListVariantsResponse = {
      variants: VARIANTS.map((v) => ({ variantId: v.variantId, displayName: v.displayName, subtitle: v.subtitle })),
    };
    res.json(response);
  });

  app.post("/api/games", async (req, res) => {
    try {
      const { variantId } = readCreateRequest(req);
      const game = register(newGame(variantId));
      await queuePersist(game);
      const response: GameResponse = viewOf(game);
      res.json(response);
    } catch (err) {
      sendError(res, err, "Create failed");
    }
  });

  app.post("/api/games/import", async (req, res) => {
    try {
      const { snapshot } = readImportRequest(req);
      const loaded = importSnapshot(snapshot);
      if (loaded.isErr) throw loaded.error;

      const game = register(loaded.value);
      await queuePersist(game);
      const response: GameResponse = viewOf(game);
      res.json(response);
    } catch (err) {
      sendError(res, err, "Import failed");
    }
  });

  app.get("/api/games/:gameId", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      const response: GameResponse = viewOf(game);
      res.json(response);
    } catch (err) {
      sendError(res, err, "Lookup failed");
    }
  });

  app.get("/api/games/:gameId/moves", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      const rawFrom = req.query.from;
      let from: string | undefined;
      if (typeof rawFrom === "string" && rawFrom.length > 0) {
        const square = parseSquare(rawFrom);
        if (!square) throw new IllegalMoveError("out_of_bounds", `${rawFrom} is not a board square`);
        from = square;
      }
      const response: GetMovesResponse = { moves: legalMoves(game.state, from).map(toWireMove) };
      res.json(response);
    } catch (err) {
      sendError(res, err, "Move listing failed");
    }
  });

  app.post("/api/games/:gameId/move", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      const submitted = readMoveRequest(req);
      const request = {
        from: parseSquare(submitted.from) ?? submitted.from,
        to: parseSquare(submitted.to) ?? submitted.to,
        promoteTo: submitted.promoteTo,
      };

      const response = await queueGameAction(game, async (): Promise<SubmitMoveResponse> => {
        const result = applyMove(game.state, request);
        if (result.isErr) throw result.error;
        game.state = result.value;
        await queuePersist(game);
        const notation = game.state.history[game.state.history.length - 1]?.notation ?? "";
        return { ...viewOf(game), notation };
      });
      res.json(response);
    } catch (err) {
      const body = errorBody(err, "Move failed");
      // eslint-disable-next-line no-console
      console.error("[quadchess-server] move error", body.error);
      res.status(body.code === "NOT_FOUND" ? 404 : 400).json(body);
    }
  });

  app.post("/api/games/:gameId/undo", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      const response = await queueGameAction(game, async (): Promise<UndoResponse> => {
        const result = undoLastMove(game.state);
        if (result.isErr) throw result.error;
        game.state = result.value;
        await queuePersist(game);
        return viewOf(game);
      });
      res.json(response);
    } catch (err) {
      sendError(res, err, "Undo failed");
    }
  });

  app.get("/api/games/:gameId/snapshot", async (req, res) => {
    try {
      const game = await requireGame(req.params.gameId);
      await game.persistChain;
      const { defaultSaveName } = getVariantById(game.state.meta.variantId);
      res.type("application/json");
      res.setHeader("content-disposition", `attachment; filename="${defaultSaveName}"`);
      res.send(exportSnapshot(game.state));
    } catch (err) {
      sendError(res, err, "Snapshot failed");
    }
  });

  async function shutdown(): Promise<void> {
    isShuttingDown = true;
    // Wait for any queued persistence to finish.
    await Promise.all(Array.from(games.values()).map((g) => g.persistChain.catch(() => undefined)));
  }

  return { app, games, gamesDir, shutdown };
}

export async function startEngineServer(args: { port?: number; gamesDir?: string }): Promise<{
  app: express.Express;
  server: Server;
  url: string;
  gamesDir: string | null;
  close: () => Promise<void>;
}> {
  const { app, gamesDir, shutdown } = createEngineApp({ gamesDir: args.gamesDir });
  if (gamesDir) await ensureGamesDir(gamesDir);

  const port = args.port !== undefined && Number.isFinite(args.port) ? args.port : 8789;

  const server = createServer(app);
  server.listen(port);

  await new Promise<void>((resolve) => {
    server.once("listening", () => resolve());
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null ? address.port : port;

  async function close(): Promise<void> {
    await shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  return { app, server, url: `http://localhost:${actualPort}`, gamesDir, close };
}
