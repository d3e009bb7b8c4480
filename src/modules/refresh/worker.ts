import { Worker, type BackoffStrategy } from "bullmq";
import type { AppConfig } from "../../config";
import { FeedUnavailableError } from "../../lib/errors";
import { parseRedisUrl } from "../../queues/connection";
import type { PipelineDeps } from "../pipeline/service";
import {
  processRefreshJob,
  type RefreshJobData,
  type RefreshJobName,
  type RefreshJobResult,
} from "./service";

export const FEED_RETRY_BASE_MS = 60_000;
export const FEED_RETRY_MAX_MS = 30 * 60_000;

/**
 * Only an unreachable drop-table feed is worth another attempt; anything else
 * fails the job at once (-1 tells bullmq not to retry).
 */
export const refreshBackoff: BackoffStrategy = (attemptsMade, _type, err) => {
  if (!(err instanceof FeedUnavailableError)) return -1;
  const delay = FEED_RETRY_BASE_MS * Math.pow(2, Math.max(0, attemptsMade - 1));
  return Math.min(delay, FEED_RETRY_MAX_MS);
};

export const startRefreshWorker = (
  config: Pick<AppConfig, "redisUrl" | "refreshQueue">,
  deps: PipelineDeps,
) => {
  const worker = new Worker<RefreshJobData, RefreshJobResult, RefreshJobName>(
    config.refreshQueue,
    async (job) => processRefreshJob(job, deps),
    {
      connection: parseRedisUrl(config.redisUrl),
      // one refresh at a time: runs share the snapshot directory
      concurrency: 1,
      settings: {
        backoffStrategy: refreshBackoff,
      },
    },
  );

  worker.on("error", (error) => {
    console.error("Relic refresh worker error", error);
  });

  worker.on("completed", (job, result) => {
    console.log(`Relic refresh job ${job.id} completed`, result);
  });

  worker.on("failed", (job, err) => {
    const willRetry =
      err instanceof FeedUnavailableError &&
      job !== undefined &&
      job.attemptsMade < (job.opts.attempts ?? 1);
    if (willRetry) {
      console.warn("Relic refresh failed, drop-table feed unavailable; retrying", {
        jobId: job.id,
        attemptsMade: job.attemptsMade,
        error: err.message,
      });
      return;
    }
    console.error(`Relic refresh job ${job?.id ?? "unknown"} failed:`, err);
  });

  const close = async () => {
    await worker.close();
  };

  return { worker, close };
};
