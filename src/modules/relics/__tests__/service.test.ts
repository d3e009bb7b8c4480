import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SnapshotStore } from "../../../database/snapshots";
import { FeedUnavailableError } from "../../../lib/errors";
import type { DropTableSource } from "../../drops/repo";
import { ensureCatalog } from "../service";
import type { DropTableDocument } from "../types";

const NOW = 1_700_000_000;
const DAY = 86_400;

const document: DropTableDocument = {
  relics: [
    {
      tier: "Lith",
      relicName: "A1",
      state: "Intact",
      rewards: [
        { itemName: "X", rarity: "Common", chance: 25 },
        { itemName: "Y", rarity: "Uncommon", chance: 11 },
      ],
    },
    {
      tier: "Meso",
      relicName: "B2",
      state: "Intact",
      rewards: [{ itemName: "Z", rarity: "Rare", chance: 2 }],
    },
  ],
};

const countingFeed = (): DropTableSource & { calls: number } => {
  const feed: DropTableSource & { calls: number } = {
    calls: 0,
    async fetchDropTable() {
      feed.calls += 1;
      return document;
    },
  };
  return feed;
};

describe("ensureCatalog", () => {
  let dir: string;
  let clock: number;
  let store: SnapshotStore;
  let feed: DropTableSource & { calls: number };

  const options = () => ({ maxAgeSeconds: DAY, now: () => clock });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "relic-catalog-"));
    clock = NOW;
    store = new SnapshotStore(dir, () => clock);
    feed = countingFeed();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("keeps a catalog until it is older than maxAgeSeconds", async () => {
    await ensureCatalog(store, feed, options());
    await store.save("orders", [{ X: { orders: [] } }]);
    await store.save("statistics", [{ X: { statistics_closed: {} } }]);
    await store.save("value_ranking", [{ relicName: "Lith A1 Intact", metric: 1 }]);
    await store.save("profit_ranking", [{ relicName: "Lith A1 Intact", metric: 1 }]);

    clock = NOW + DAY;
    const kept = await ensureCatalog(store, feed, options());
    expect(kept.refreshed).toBe(false);
    expect(feed.calls).toBe(1);
    expect(await store.tryLoad("orders")).not.toBeNull();

    clock = NOW + DAY + 1;
    const rebuilt = await ensureCatalog(store, feed, options());
    expect(rebuilt.refreshed).toBe(true);
    expect(rebuilt.relics.timestamp).toBe(NOW + DAY + 1);
    expect(feed.calls).toBe(2);
    for (const name of ["orders", "statistics", "value_ranking", "profit_ranking"]) {
      expect(await store.tryLoad(name)).toBeNull();
    }
  });

  it("re-derives a missing item catalog without calling the feed", async () => {
    await ensureCatalog(store, feed, options());
    await store.remove("items");

    const catalog = await ensureCatalog(store, feed, options());

    expect(feed.calls).toBe(1);
    expect(catalog.refreshed).toBe(false);
    expect(Object.keys(catalog.items)).toEqual(["X", "Y", "Z"]);
    expect(catalog.items.Y).toEqual({ itemName: "Y", rarity: "Uncommon", chance: 11, urlName: "y" });
    await expect(store.load("items")).resolves.toEqual(catalog.items);
  });

  it("rebuilds from the feed when relics.json has the wrong shape", async () => {
    await fs.writeFile(path.join(dir, "relics.json"), JSON.stringify({ timestamp: NOW }), "utf8");

    const catalog = await ensureCatalog(store, feed, options());

    expect(feed.calls).toBe(1);
    expect(catalog.refreshed).toBe(true);
    expect(Object.keys(catalog.relics.relics)).toEqual(["Lith A1 Intact", "Meso B2 Intact"]);
    expect(console.warn).toHaveBeenCalledWith("Ignoring malformed snapshot", {
      snapshot: "relics",
      path: path.join(dir, "relics.json"),
    });
  });

  it("rebuilds when a relic entry lacks its rewards", async () => {
    await ensureCatalog(store, feed, options());
    const stored = await store.load<{ timestamp: number; relics: Record<string, object> }>("relics");
    stored.relics["Lith A1 Intact"] = { relicName: "Lith A1 Intact" };
    await store.save("relics", stored);

    const catalog = await ensureCatalog(store, feed, options());

    expect(feed.calls).toBe(2);
    expect(catalog.relics.relics["Lith A1 Intact"].rewards).toHaveLength(2);
  });

  it("re-derives items when items.json is not an item map", async () => {
    await ensureCatalog(store, feed, options());

    for (const broken of ['"oops"', "[1,2]", '{"X":"x"}']) {
      await fs.writeFile(path.join(dir, "items.json"), broken, "utf8");
      const catalog = await ensureCatalog(store, feed, options());
      expect(Object.keys(catalog.items)).toEqual(["X", "Y", "Z"]);
    }
    expect(feed.calls).toBe(1);
  });

  it("fails when the feed is down and the previous catalog is unusable", async () => {
    await fs.writeFile(path.join(dir, "relics.json"), JSON.stringify({ timestamp: NOW }), "utf8");
    const down: DropTableSource = {
      fetchDropTable: async () => {
        throw new FeedUnavailableError("Drop-table feed unavailable (503)");
      },
    };

    await expect(ensureCatalog(store, down, options())).rejects.toBeInstanceOf(
      FeedUnavailableError,
    );
  });
});
