import fs from "node:fs/promises";
import path from "node:path";

import type { GameState } from "../../src/game/state.ts";
import { deserializeSaveData, serializeSaveData } from "../../src/game/saveLoad.ts";
import type { GameId } from "../../src/shared/engineProtocol.ts";

const GAME_ID_RE = /^[0-9a-f]{8,64}$/;

export function isGameId(raw: string): raw is GameId {
  return GAME_ID_RE.test(raw);
}

/** Explicit directory first, then `QUADCHESS_DATA_DIR`; null keeps games in memory only. */
export function resolveGamesDir(explicitDir?: string | undefined): string | null {
  if (explicitDir && explicitDir.trim()) return path.resolve(explicitDir);
  const fromEnv = process.env.QUADCHESS_DATA_DIR;
  if (fromEnv && fromEnv.trim()) return path.resolve(fromEnv);
  return null;
}

export async function ensureGamesDir(gamesDir: string): Promise<void> {
  await fs.mkdir(gamesDir, { recursive: true });
}

export function snapshotPath(gamesDir: string, gameId: GameId): string {
  return path.join(gamesDir, `${gameId}.snapshot.json`);
}

export async function writeSnapshotAtomic(gamesDir: string, gameId: GameId, state: GameState): Promise<void> {
  const p = snapshotPath(gamesDir, gameId);
  const tmp = `${p}.tmp`;
  await fs.writeFile(tmp, serializeSaveData(state), "utf8");
  await fs.rename(tmp, p);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Null when no snapshot exists; throws when the file is there but unreadable. */
export async function tryLoadGame(gamesDir: string, gameId: GameId): Promise<GameState | null> {
  let text: string;
  try {
    text = await fs.readFile(snapshotPath(gamesDir, gameId), "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  const loaded = deserializeSaveData(text);
  if (loaded.isErr) throw loaded.error;
  return loaded.value;
}
