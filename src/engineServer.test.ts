// @vitest-environment node
import { describe, it, expect } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { startEngineServer } from "../server/src/app.ts";

type Json = Record<string, unknown>;

async function call(url: string, init?: { method: string; body?: unknown }): Promise<{ status: number; body: Json }> {
  const res = await fetch(url, {
    method: init?.method ?? "GET",
    headers: { "content-type": "application/json" },
    body: init?.body === undefined ? undefined : JSON.stringify(init.body),
  });
  const body: unknown = await res.json();
  if (typeof body !== "object" || body === null || Array.isArray(body)) throw new Error(`Unexpected body from ${url}`);
  return { status: res.status, body: { ...body } };
}

function gameIdOf(body: Json): string {
  const { gameId } = body;
  if (typeof gameId !== "string") throw new Error("response has no gameId");
  return gameId;
}

describe("engine server", () => {
  it("plays, persists, reloads and undoes games over HTTP", async () => {
    const tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "quadchess-server-"));
    const gamesDir = path.join(tmpRoot, "games");

    const s1 = await startEngineServer({ port: 0, gamesDir });
    let gameId = "";
    try {
      const variants = await call(`${s1.url}/api/variants`);
      expect(variants.body).toMatchObject({
        variants: [{ variantId: "ffa_classic" }, { variantId: "ffa_no_draws" }],
      });

      const created = await call(`${s1.url}/api/games`, { method: "POST", body: {} });
      expect(created.status).toBe(200);
      expect(created.body).toMatchObject({ variantId: "ffa_classic", status: { activePlayer: "R", ply: 0 } });
      gameId = gameIdOf(created.body);

      const moves = await call(`${s1.url}/api/games/${gameId}/moves?from=e2`);
      expect(moves.body).toEqual({
        moves: [
          { from: "r12c4", to: "r11c4", notation: "e2-e3", special: "none" },
          { from: "r12c4", to: "r10c4", notation: "e2-e4", special: "none" },
        ],
      });

      const played = await call(`${s1.url}/api/games/${gameId}/move`, {
        method: "POST",
        body: { from: "e2", to: "e4" },
      });
      expect(played.status).toBe(200);
      expect(played.body).toMatchObject({ notation: "e2-e4", status: { activePlayer: "B", ply: 1 } });

      const refused = await call(`${s1.url}/api/games/${gameId}/move`, {
        method: "POST",
        body: { from: "r12c5", to: "r11c5" },
      });
      expect(refused.status).toBe(400);
      expect(refused.body).toEqual({ error: "It is Blue's turn, not Red's", code: "ILLEGAL_MOVE", rule: "wrong_turn" });

      const missing = await call(`${s1.url}/api/games/deadbeefdeadbeef`);
      expect(missing.status).toBe(404);
      expect(missing.body.code).toBe("NOT_FOUND");
    } finally {
      await s1.close();
    }

    const s2 = await startEngineServer({ port: 0, gamesDir });
    try {
      const reloaded = await call(`${s2.url}/api/games/${gameId}`);
      expect(reloaded.status).toBe(200);
      expect(reloaded.body).toMatchObject({ gameId, status: { activePlayer: "B", ply: 1 } });

      const snapshot = await fetch(`${s2.url}/api/games/${gameId}/snapshot`).then((r) => r.text());
      const imported = await call(`${s2.url}/api/games/import`, { method: "POST", body: { snapshot } });
      expect(imported.status).toBe(200);
      const importedId = gameIdOf(imported.body);
      expect(importedId).not.toBe(gameId);

      const undone = await call(`${s2.url}/api/games/${importedId}/undo`, { method: "POST" });
      expect(undone.body).toMatchObject({ status: { activePlayer: "R", ply: 0 } });

      const nothingLeft = await call(`${s2.url}/api/games/${importedId}/undo`, { method: "POST" });
      expect(nothingLeft.status).toBe(400);
      expect(nothingLeft.body.code).toBe("NO_HISTORY");

      // The original game is untouched by undo on its copy.
      const original = await call(`${s2.url}/api/games/${gameId}`);
      expect(original.body).toMatchObject({ status: { ply: 1 } });
    } finally {
      await s2.close();
      await fs.rm(tmpRoot, { recursive: true, force: true });
    }
  });

  it("rejects malformed requests", async () => {
    const s = await startEngineServer({ port: 0 });
    try {
      const badVariant = await call(`${s.url}/api/games`, { method: "POST", body: { variantId: "crazyhouse" } });
      expect(badVariant.status).toBe(400);
      expect(badVariant.body).toEqual({ error: "Unknown variantId: crazyhouse", code: "BAD_REQUEST" });

      const badSnapshot = await call(`${s.url}/api/games/import`, { method: "POST", body: { snapshot: "{}" } });
      expect(badSnapshot.status).toBe(400);
      expect(badSnapshot.body.code).toBe("INVALID_SNAPSHOT");

      const noSnapshot = await call(`${s.url}/api/games/import`, { method: "POST", body: {} });
      expect(noSnapshot.body).toEqual({ error: "Missing snapshot", code: "BAD_REQUEST" });

      const created = await call(`${s.url}/api/games`, { method: "POST", body: { variantId: "ffa_no_draws" } });
      expect(created.body).toMatchObject({ variantId: "ffa_no_draws" });
      const gameId = gameIdOf(created.body);

      const noTarget = await call(`${s.url}/api/games/${gameId}/move`, { method: "POST", body: { from: "e2" } });
      expect(noTarget.body).toEqual({ error: "Missing from/to", code: "BAD_REQUEST" });

      const badPromotion = await call(`${s.url}/api/games/${gameId}/move`, {
        method: "POST",
        body: { from: "e2", to: "e4", promoteTo: "K" },
      });
      expect(badPromotion.status).toBe(400);
      expect(badPromotion.body).toEqual({
        error: "Cannot promote to K",
        code: "ILLEGAL_MOVE",
        rule: "invalid_promotion",
      });
    } finally {
      await s.close();
    }
  });
});
