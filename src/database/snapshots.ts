import fs from "node:fs/promises";
import path from "node:path";
import { MalformedSnapshotError, SnapshotNotFoundError, isSnapshotMiss } from "../lib/errors";

export const SNAPSHOTS = {
  relics: "relics",
  items: "items",
  orders: "orders",
  statistics: "statistics",
  valueRanking: "value_ranking",
  profitRanking: "profit_ranking",
} as const;

export type SnapshotName = (typeof SNAPSHOTS)[keyof typeof SNAPSHOTS];

/** Snapshots derived from the relic catalog; dropped whenever the catalog is rebuilt. */
export const DERIVED_SNAPSHOTS: SnapshotName[] = [
  SNAPSHOTS.orders,
  SNAPSHOTS.statistics,
  SNAPSHOTS.valueRanking,
  SNAPSHOTS.profitRanking,
];

const isMissingFile = (error: unknown) =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

const readTimestamp = (value: unknown): number | undefined => {
  if (!value || typeof value !== "object" || !("timestamp" in value)) return undefined;
  const { timestamp } = value;
  return typeof timestamp === "number" && Number.isFinite(timestamp) ? timestamp : undefined;
};

let tmpCounter = 0;

/**
 * Flat JSON snapshots, one file per name inside a data directory.
 */
export class SnapshotStore {
  readonly dir: string;
  private readonly now: () => number;

  constructor(dir: string, now: () => number = () => Date.now() / 1000) {
    this.dir = path.resolve(dir);
    this.now = now;
  }

  pathOf(name: string): string {
    return path.join(this.dir, `${name}.json`);
  }

  /**
   * True when the snapshot is absent, empty or unreadable, or (with maxAgeSeconds)
   * when its embedded timestamp is missing or older than the limit. Never throws.
   */
  async isStale(name: string, maxAgeSeconds?: number): Promise<boolean> {
    try {
      const value = await this.load<unknown>(name);
      if (maxAgeSeconds === undefined) return false;
      const timestamp = readTimestamp(value);
      if (timestamp === undefined) return true;
      return timestamp + maxAgeSeconds < this.now();
    } catch {
      return true;
    }
  }

  async load<T>(name: string): Promise<T> {
    let text: string;
    try {
      text = await fs.readFile(this.pathOf(name), "utf8");
    } catch (error) {
      if (isMissingFile(error)) throw new SnapshotNotFoundError(name);
      throw error;
    }
    if (!text.trim()) throw new SnapshotNotFoundError(name);
    try {
      return JSON.parse(text) as T;
    } catch (error) {
      throw new MalformedSnapshotError(name, error);
    }
  }

  /** load() with "absent" and "malformed" folded into null. */
  async tryLoad<T>(name: string): Promise<T | null> {
    try {
      return await this.load<T>(name);
    } catch (error) {
      if (isSnapshotMiss(error)) return null;
      throw error;
    }
  }

  /** load() that rejects a value of the wrong shape as malformed. */
  async loadChecked<T>(name: string, guard: (value: unknown) => value is T): Promise<T> {
    const value = await this.load<unknown>(name);
    if (!guard(value)) throw new MalformedSnapshotError(name);
    return value;
  }

  /** loadChecked() with "absent" and "malformed" folded into null; malformed ones are logged. */
  async tryLoadChecked<T>(
    name: string,
    guard: (value: unknown) => value is T,
  ): Promise<T | null> {
    try {
      return await this.loadChecked(name, guard);
    } catch (error) {
      if (error instanceof MalformedSnapshotError) {
        console.warn("Ignoring malformed snapshot", { snapshot: name, path: this.pathOf(name) });
        return null;
      }
      if (isSnapshotMiss(error)) return null;
      throw error;
    }
  }

  async save(name: string, value: unknown): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const target = this.pathOf(name);
    tmpCounter += 1;
    const tmp = `${target}.${process.pid}.${tmpCounter}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(value), "utf8");
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true });
      throw error;
    }
  }

  async remove(name: string): Promise<void> {
    await fs.rm(this.pathOf(name), { force: true });
  }
}
