import "dotenv/config";
import express from "express";
import cors from "cors";
import { loadConfig } from "./config";
import { SnapshotStore } from "./database/snapshots";
import { createRankingsRouter } from "./modules/rankings/router";
import { createRefreshRouter } from "./modules/refresh/router";
import { createRefreshQueue } from "./modules/refresh/service";

/**
 * API entry point: read access to the rankings and a trigger for background refreshes.
 * The refresh itself runs in the worker process (src/worker.ts).
 */
const config = loadConfig();
const store = new SnapshotStore(config.dataDir);
const queue = createRefreshQueue(config);

const app = express();
app.use(cors());
app.use(express.json({ limit: "16kb" }));

app.use("/api/rankings", createRankingsRouter(store));
app.use("/api/refresh", createRefreshRouter(queue));

const server = app.listen(config.port, () => console.log(`API running on :${config.port}`));

const shutdown = async () => {
  try {
    server.close();
    await queue.close();
  } finally {
    process.exit(0);
  }
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
