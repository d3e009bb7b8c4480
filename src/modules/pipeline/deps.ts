import type { AppConfig } from "../../config";
import { SnapshotStore } from "../../database/snapshots";
import { createHttpClient } from "../../lib/http";
import { createDropTableSource } from "../drops/repo";
import { createMarketTransport } from "../market/repo";
import type { PipelineDeps } from "./service";

/** Live dependencies: axios against the real feed and market, snapshots under DATA_DIR. */
export const createPipelineDeps = (config: AppConfig): PipelineDeps => {
  const http = createHttpClient(config.requestTimeoutMs);
  return {
    store: new SnapshotStore(config.dataDir),
    feed: createDropTableSource(http, config.dropsApiUrl),
    transport: createMarketTransport(http, config.marketApiUrl),
    config,
  };
};
