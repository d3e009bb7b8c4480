import { Router, type Response } from "express";
import { LRUCache } from "lru-cache";
import type { SnapshotStore } from "../../database/snapshots";
import type { RankingEntry, RankingMode } from "../valuation/types";
import { DEFAULT_TOP, findRelic, loadRanking, parseRankingMode, topRelics } from "./service";

const parseLimit = (value: unknown): number => {
  const parsed = Number.parseInt(String(value ?? DEFAULT_TOP), 10);
  return Number.isFinite(parsed) ? Math.max(1, Math.min(500, parsed)) : DEFAULT_TOP;
};

const handleError = (res: Response, error: unknown) =>
  res.status(500).json({ error: String(error) });

/**
 * Read-only access to the persisted rankings.
 */
export const createRankingsRouter = (store: SnapshotStore): Router => {
  const router = Router();

  // rankings only change when a refresh finishes; a short TTL is enough
  const rankingCache = new LRUCache<RankingMode, RankingEntry[]>({
    max: 2,
    ttl: 1000 * 30,
  });

  const getRanking = async (mode: RankingMode) => {
    const cached = rankingCache.get(mode);
    if (cached) return cached;
    const ranking = await loadRanking(store, mode);
    if (ranking) rankingCache.set(mode, ranking);
    return ranking;
  };

  /**
   * GET /api/rankings/:mode?limit=25
   * Top relics by expected value ("value") or by value / Intact price ("profit").
   */
  router.get("/:mode", async (request, response) => {
    try {
      const mode = parseRankingMode(request.params.mode);
      if (!mode) return response.status(400).json({ error: "mode must be value or profit" });
      const ranking = await getRanking(mode);
      if (!ranking) {
        return response.status(404).json({ error: "No rankings yet, run a refresh first" });
      }
      const limit = parseLimit(request.query.limit);
      return response.json({ mode, total: ranking.length, items: topRelics(ranking, limit) });
    } catch (error) {
      return handleError(response, error);
    }
  });

  /**
   * GET /api/rankings/:mode/:name
   * One relic by display name, case-insensitive, e.g. /api/rankings/value/lith%20a1%20intact
   */
  router.get("/:mode/:name", async (request, response) => {
    try {
      const mode = parseRankingMode(request.params.mode);
      if (!mode) return response.status(400).json({ error: "mode must be value or profit" });
      const ranking = await getRanking(mode);
      if (!ranking) {
        return response.status(404).json({ error: "No rankings yet, run a refresh first" });
      }
      const entry = findRelic(ranking, request.params.name);
      if (!entry) return response.status(404).json({ error: "Relic not found" });
      const rank = ranking.indexOf(entry) + 1;
      return response.json({ mode, rank, ...entry });
    } catch (error) {
      return handleError(response, error);
    }
  });

  return router;
};
