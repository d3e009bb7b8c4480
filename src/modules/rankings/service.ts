import { SNAPSHOTS, type SnapshotStore } from "../../database/snapshots";
import { RANKING_MODES, type RankingEntry, type RankingMode } from "../valuation/types";

export const DEFAULT_TOP = 25;

export const parseRankingMode = (value: unknown): RankingMode | undefined => {
  const text = String(value ?? "").trim().toLowerCase();
  return RANKING_MODES.find((mode) => mode === text);
};

/** Case-insensitive exact match on the relic display name. */
export const findRelic = (ranking: RankingEntry[], name: string): RankingEntry | undefined => {
  const wanted = name.trim().toLowerCase();
  if (!wanted) return undefined;
  return ranking.find((entry) => entry.relicName.toLowerCase() === wanted);
};

export const topRelics = (ranking: RankingEntry[], limit = DEFAULT_TOP): RankingEntry[] =>
  ranking.slice(0, Math.max(0, limit));

const isRankingEntry = (value: unknown): value is RankingEntry =>
  typeof value === "object" &&
  value !== null &&
  "relicName" in value &&
  typeof value.relicName === "string" &&
  "metric" in value &&
  typeof value.metric === "number";

/** Persisted ranking of a mode, or null when no refresh has produced one yet. */
export const loadRanking = async (
  store: SnapshotStore,
  mode: RankingMode,
): Promise<RankingEntry[] | null> => {
  const name = mode === "value" ? SNAPSHOTS.valueRanking : SNAPSHOTS.profitRanking;
  const stored = await store.tryLoad<unknown>(name);
  if (!Array.isArray(stored)) return null;
  return stored.filter(isRankingEntry);
};
