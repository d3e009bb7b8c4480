import { Queue, type DefaultJobOptions, type Job, type JobState } from "bullmq";
import type { AppConfig } from "../../config";
import { describeError } from "../../lib/errors";
import { parseRedisUrl } from "../../queues/connection";
import { runPipeline, type PipelineDeps, type PipelineStage } from "../pipeline/service";
import type { PriceMode } from "../valuation/types";

export type RefreshJobName = "relic-refresh";

export interface RefreshJobData {
  mode?: PriceMode;
  force?: boolean;
  triggeredBy: "manual" | "schedule";
}

export interface RefreshJobResult {
  mode: PriceMode;
  relics: number;
  fetched: number;
  failed: number;
  topValue: string | null;
  topProfit: string | null;
}

export interface RefreshProgress {
  stage: PipelineStage | "pending";
  done: number;
  total: number;
  failed: number;
}

export interface RefreshJobStatus {
  id: string;
  status: "pending" | "running" | "completed" | "failed";
  startedAt: string;
  finishedAt?: string;
  error?: string;
  progress: RefreshProgress;
  result?: RefreshJobResult;
}

export type RefreshJob = Job<RefreshJobData, RefreshJobResult, RefreshJobName>;

export type RefreshQueue = Queue<RefreshJobData, RefreshJobResult, RefreshJobName>;

/** The part of a bullmq job the processor touches. */
export interface RefreshJobHandle {
  data: RefreshJobData;
  updateProgress(progress: RefreshProgress): Promise<void>;
}

const initialProgress = (): RefreshProgress => ({
  stage: "pending",
  done: 0,
  total: 0,
  failed: 0,
});

/** A refresh whose feed was down is retried with the worker's backoff strategy. */
export const REFRESH_JOB_OPTIONS: DefaultJobOptions = {
  attempts: 4,
  backoff: { type: "custom" },
  removeOnComplete: {
    age: 60 * 60 * 24,
    count: 10,
  },
  removeOnFail: {
    age: 60 * 60 * 24 * 3,
    count: 25,
  },
};

export const createRefreshQueue = (config: Pick<AppConfig, "redisUrl" | "refreshQueue">) =>
  new Queue<RefreshJobData, RefreshJobResult, RefreshJobName>(config.refreshQueue, {
    connection: parseRedisUrl(config.redisUrl),
    defaultJobOptions: REFRESH_JOB_OPTIONS,
  });

export const processRefreshJob = async (
  job: RefreshJobHandle,
  deps: PipelineDeps,
): Promise<RefreshJobResult> => {
  const progress = initialProgress();
  // reports go out in order; a failed one is logged and the run goes on
  let reporting: Promise<void> = Promise.resolve();
  const report = (snapshot: RefreshProgress) => {
    reporting = reporting
      .then(() => job.updateProgress(snapshot))
      .catch((error: unknown) => {
        console.warn("Failed to report relic refresh progress", {
          stage: snapshot.stage,
          error: describeError(error),
        });
      });
  };

  const result = await runPipeline(deps, {
    mode: job.data.mode,
    force: job.data.force,
    onProgress: (stage, fetchProgress) => {
      progress.stage = stage;
      if (fetchProgress) Object.assign(progress, fetchProgress);
      report({ ...progress });
    },
  }).finally(() => reporting);

  return {
    mode: result.mode,
    relics: Object.keys(result.relics).length,
    fetched: result.fetched.total - result.fetched.failed,
    failed: result.fetched.failed,
    topValue: result.rankings.value[0]?.relicName ?? null,
    topProfit: result.rankings.profit[0]?.relicName ?? null,
  };
};

const mapJobState = (state: JobState | "unknown"): RefreshJobStatus["status"] => {
  if (state === "completed") return "completed";
  if (state === "failed") return "failed";
  if (state === "active") return "running";
  return "pending";
};

const normalizeProgress = (value: unknown): RefreshProgress => {
  const base = initialProgress();
  if (!value || typeof value !== "object") return base;

  const progress = value as Partial<RefreshProgress>;
  return {
    stage: typeof progress.stage === "string" ? progress.stage : base.stage,
    done: typeof progress.done === "number" ? progress.done : base.done,
    total: typeof progress.total === "number" ? progress.total : base.total,
    failed: typeof progress.failed === "number" ? progress.failed : base.failed,
  };
};

export const toRefreshJobStatus = async (job: RefreshJob): Promise<RefreshJobStatus> => {
  const state = await job.getState().catch(() => "unknown" as const);
  const startedAt = job.processedOn ?? job.timestamp ?? Date.now();

  return {
    id: String(job.id ?? ""),
    status: mapJobState(state),
    startedAt: new Date(startedAt).toISOString(),
    finishedAt: job.finishedOn ? new Date(job.finishedOn).toISOString() : undefined,
    error: job.failedReason || undefined,
    progress: normalizeProgress(job.progress),
    result: job.returnvalue ?? undefined,
  };
};

const getExistingJob = async (queue: RefreshQueue): Promise<RefreshJob | null> => {
  const [active] = await queue.getJobs(["active"], 0, 0, false);
  if (active) return active;
  const [waiting] = await queue.getJobs(["waiting"], 0, 0, false);
  if (waiting) return waiting;
  // the next daily run is delayed too; only a pending retry counts
  const delayed = await queue.getJobs(["delayed"]);
  return delayed.find((job) => job.attemptsMade > 0) ?? null;
};

/** Enqueues a refresh unless one is already running, waiting or due for a retry. */
export const requestRefresh = async (
  queue: RefreshQueue,
  data: RefreshJobData,
): Promise<RefreshJobStatus> => {
  const existing = await getExistingJob(queue);
  if (existing) return toRefreshJobStatus(existing);

  const job = await queue.add("relic-refresh", data);
  return toRefreshJobStatus(job);
};

export const getRefreshJobStatus = async (
  queue: RefreshQueue,
  id: string,
): Promise<RefreshJobStatus | undefined> => {
  const job = await queue.getJob(id);
  return job ? toRefreshJobStatus(job) : undefined;
};

export const DAILY_MS = 24 * 60 * 60 * 1000;

/** Repeatable daily refresh; bullmq dedupes it by name and interval. */
export const scheduleDailyRefresh = async (queue: RefreshQueue) => {
  await queue.add("relic-refresh", { triggeredBy: "schedule" }, { repeat: { every: DAILY_MS } });
};
