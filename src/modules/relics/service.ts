import { DERIVED_SNAPSHOTS, SNAPSHOTS, type SnapshotStore } from "../../database/snapshots";
import { describeError } from "../../lib/errors";
import type { DropTableSource } from "../drops/repo";
import {
  buildRelicCatalog,
  deriveItemCatalog,
  isItemCatalog,
  isRelicCatalogSnapshot,
} from "./catalog";
import type { ItemCatalog, RelicCatalogSnapshot } from "./types";

export interface CatalogOptions {
  /** Rebuild from the feed even when the snapshot is fresh. */
  force?: boolean;
  maxAgeSeconds: number;
  /** Seconds since epoch. */
  now?: () => number;
}

export interface Catalog {
  relics: RelicCatalogSnapshot;
  items: ItemCatalog;
  /** True when the relic catalog was rebuilt from the feed in this call. */
  refreshed: boolean;
}

const nowSeconds = () => Date.now() / 1000;

/**
 * Loads the relic and item catalogs, rebuilding them from the feed when stale.
 * A rebuild drops every snapshot derived from the previous catalog.
 */
export const ensureCatalog = async (
  store: SnapshotStore,
  feed: DropTableSource,
  options: CatalogOptions,
): Promise<Catalog> => {
  const now = options.now ?? nowSeconds;
  let relics: RelicCatalogSnapshot | null = null;

  if (!options.force && !(await store.isStale(SNAPSHOTS.relics, options.maxAgeSeconds))) {
    relics = await store.tryLoadChecked(SNAPSHOTS.relics, isRelicCatalogSnapshot);
  }

  let refreshed = false;
  if (relics === null) {
    try {
      const document = await feed.fetchDropTable();
      relics = buildRelicCatalog(document.relics, now());
      refreshed = true;
    } catch (error) {
      // an outdated catalog still beats no catalog
      relics = await store.tryLoadChecked(SNAPSHOTS.relics, isRelicCatalogSnapshot);
      if (relics === null) throw error;
      console.warn("ensureCatalog: feed refresh failed, keeping the previous catalog", {
        timestamp: relics.timestamp,
        error: describeError(error),
      });
    }
  }
  if (refreshed) {
    await store.save(SNAPSHOTS.relics, relics);
    await Promise.all(DERIVED_SNAPSHOTS.map((name) => store.remove(name)));
    console.log(`Relic catalog rebuilt: ${Object.keys(relics.relics).length} relics`);
  }

  let items: ItemCatalog | null = refreshed
    ? null
    : await store.tryLoadChecked(SNAPSHOTS.items, isItemCatalog);
  if (items === null || !Object.keys(items).length) {
    items = deriveItemCatalog(relics.relics);
    await store.save(SNAPSHOTS.items, items);
    console.log(`Item catalog derived: ${Object.keys(items).length} items`);
  }

  return { relics, items, refreshed };
};
