import IORedis from "ioredis";
import { Queue } from "bullmq";
import { logEvent } from "../../lib/logger";
import type { ResultsPublisher } from "../ResultsPublisher";
import type { SessionResults } from "../SessionResults";

export const RESULTS_EXPORT_QUEUE_NAME = "results-export-queue";
export const RESULTS_EXPORT_JOB_NAME = "record-session-results";

export type ResultsExportJobPayload = {
  results: SessionResults;
};

export function buildResultsExportJobId(sessionId: string) {
  const normalized = sessionId.trim();
  if (!normalized) return "results-export-unknown";
  const safe = normalized.replace(/[^a-zA-Z0-9_-]/g, "_");
  return `results-export-${safe}`;
}

export function createRedisConnection(redisUrl: string) {
  return new IORedis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });
}

export class QueuedResultsPublisher implements ResultsPublisher {
  readonly mode = "queue" as const;
  private readonly connection: IORedis;
  private readonly queue: Queue<ResultsExportJobPayload>;

  constructor(redisUrl: string) {
    this.connection = createRedisConnection(redisUrl);
    this.queue = new Queue<ResultsExportJobPayload>(RESULTS_EXPORT_QUEUE_NAME, {
      connection: this.connection,
      defaultJobOptions: {
        attempts: 8,
        backoff: {
          type: "exponential",
          delay: 5_000,
        },
        removeOnComplete: 100,
        removeOnFail: 500,
      },
    });
  }

  async publish(results: SessionResults) {
    const jobId = buildResultsExportJobId(results.sessionId);
    const existing = await this.queue.getJob(jobId);
    if (existing) {
      logEvent("info", "results_export_job_exists", { sessionId: results.sessionId, jobId });
      return;
    }

    await this.queue.add(RESULTS_EXPORT_JOB_NAME, { results }, { jobId });
    logEvent("info", "results_export_job_enqueued", {
      sessionId: results.sessionId,
      pin: results.pin,
      jobId,
    });
  }

  async close() {
    await this.queue.close();
    await this.connection.quit();
  }
}
