/** Snapshot file is absent or empty. */
export class SnapshotNotFoundError extends Error {
  snapshot: string;
  constructor(snapshot: string) {
    super(`Snapshot "${snapshot}" not found`);
    this.name = "SnapshotNotFoundError";
    this.snapshot = snapshot;
  }
}

/** Snapshot file exists but does not hold valid JSON of the expected shape. */
export class MalformedSnapshotError extends Error {
  snapshot: string;
  constructor(snapshot: string, cause?: unknown) {
    super(`Snapshot "${snapshot}" is malformed`, { cause });
    this.name = "MalformedSnapshotError";
    this.snapshot = snapshot;
  }
}

/** One entity could not be fetched; the run goes on without it. */
export class EntityFetchError extends Error {
  entity: string;
  status?: number;
  constructor(entity: string, message: string, status?: number, cause?: unknown) {
    super(message, { cause });
    this.name = "EntityFetchError";
    this.entity = entity;
    this.status = status;
  }
}

/** The drop-table feed is unreachable or unusable and there is no catalog to fall back on. */
export class FeedUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "FeedUnavailableError";
  }
}

export const isSnapshotMiss = (error: unknown): boolean =>
  error instanceof SnapshotNotFoundError || error instanceof MalformedSnapshotError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
