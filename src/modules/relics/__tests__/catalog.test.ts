import { describe, expect, it, vi } from "vitest";

import { FeedUnavailableError } from "../../../lib/errors";
import {
  buildRelicCatalog,
  deriveItemCatalog,
  itemSlug,
  parseDropTable,
  relicDisplayName,
  relicSlug,
} from "../catalog";
import type { RawRelicRecord } from "../types";

const records: RawRelicRecord[] = [
  {
    tier: "Lith",
    relicName: "A1",
    state: "Intact",
    rewards: [
      { itemName: "Forma Blueprint", rarity: "Common", chance: 25.33 },
      { itemName: "Akstiletto Prime Barrel", rarity: "Rare", chance: 2 },
    ],
  },
  {
    tier: "Lith",
    relicName: "A1",
    state: "Radiant",
    rewards: [
      { itemName: "Forma Blueprint", rarity: "Common", chance: 16.67 },
      { itemName: "Akstiletto Prime Barrel", rarity: "Rare", chance: 10 },
    ],
  },
  {
    tier: "Neo Void",
    relicName: "K 2",
    state: "Intact",
    rewards: [{ itemName: "Kavasa Prime Band & Buckle", rarity: "Uncommon", chance: 11 }],
  },
];

describe("relic naming", () => {
  it("derives the display name and a state-free slug", () => {
    expect(relicDisplayName("Lith", "A1", "Intact")).toBe("Lith A1 Intact");
    expect(relicSlug("Lith", "A1")).toBe("lith_a1_relic");
  });

  it("lowercases the slug whatever the input case", () => {
    expect(relicSlug("LITH", "a1")).toBe(relicSlug("Lith", "A1"));
    expect(relicSlug("Neo Void", "K 2")).toBe("neo_void_k_2_relic");
  });

  it("replaces spaces and ampersands in item slugs", () => {
    expect(itemSlug("Kavasa Prime Band & Buckle")).toBe("kavasa_prime_band_and_buckle");
    expect(itemSlug("Forma Blueprint")).toBe("forma_blueprint");
  });
});

describe("buildRelicCatalog", () => {
  it("keys relics by display name and resets value and price", () => {
    const catalog = buildRelicCatalog(records, 1_700_000_000);

    expect(catalog.timestamp).toBe(1_700_000_000);
    expect(Object.keys(catalog.relics)).toEqual([
      "Lith A1 Intact",
      "Lith A1 Radiant",
      "Neo Void K 2 Intact",
    ]);
    expect(catalog.relics["Lith A1 Radiant"]).toEqual({
      relicName: "Lith A1 Radiant",
      tier: "Lith",
      baseName: "A1",
      state: "Radiant",
      urlName: "lith_a1_relic",
      rewards: records[1].rewards,
      value: 0,
      price: null,
    });
  });
});

describe("deriveItemCatalog", () => {
  it("keeps the first occurrence of every item", () => {
    const { relics } = buildRelicCatalog(records, 0);
    const items = deriveItemCatalog(relics);

    expect(Object.keys(items)).toEqual([
      "Forma Blueprint",
      "Akstiletto Prime Barrel",
      "Kavasa Prime Band & Buckle",
    ]);
    expect(items["Akstiletto Prime Barrel"]).toEqual({
      itemName: "Akstiletto Prime Barrel",
      rarity: "Rare",
      chance: 2,
      urlName: "akstiletto_prime_barrel",
    });
  });

  it("is idempotent for the same feed", () => {
    const first = deriveItemCatalog(buildRelicCatalog(records, 0).relics);
    const second = deriveItemCatalog(buildRelicCatalog(records, 0).relics);
    expect(second).toEqual(first);
  });
});

describe("parseDropTable", () => {
  it("skips broken records and coerces reward chances", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const document = parseDropTable({
      relics: [
        { tier: "Meso", relicName: "B3", state: "Intact", rewards: [{ itemName: "X", chance: "5.5" }] },
        { tier: "Meso", relicName: "B4", rewards: [] },
        "garbage",
      ],
    });

    expect(document.relics).toEqual([
      {
        tier: "Meso",
        relicName: "B3",
        state: "Intact",
        rewards: [{ itemName: "X", rarity: "", chance: 5.5 }],
      },
    ]);
    expect(warn).toHaveBeenCalledWith("parseDropTable: skipped malformed relic records", {
      skipped: 2,
    });
    warn.mockRestore();
  });

  it("rejects a document without a relic list", () => {
    expect(() => parseDropTable({ missionRewards: {} })).toThrow(FeedUnavailableError);
    expect(() => parseDropTable(null)).toThrow(FeedUnavailableError);
  });
});
