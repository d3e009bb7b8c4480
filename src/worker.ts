import "dotenv/config";
import { loadConfig } from "./config";
import { createPipelineDeps } from "./modules/pipeline/deps";
import { createRefreshQueue, scheduleDailyRefresh } from "./modules/refresh/service";
import { startRefreshWorker } from "./modules/refresh/worker";

const config = loadConfig();
const queue = createRefreshQueue(config);
const { close } = startRefreshWorker(config, createPipelineDeps(config));

scheduleDailyRefresh(queue).catch((error: unknown) => {
  console.error("Failed to schedule the daily relic refresh", error);
});

const shutdown = async () => {
  try {
    await Promise.allSettled([close(), queue.close()]);
  } finally {
    process.exit(0);
  }
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
