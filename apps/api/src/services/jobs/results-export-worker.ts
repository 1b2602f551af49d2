import { Worker } from "bullmq";
import type IORedis from "ioredis";
import { logEvent } from "../../lib/logger";
import type { ResultsRepository } from "../../repositories/ResultsRepository";
import {
  RESULTS_EXPORT_JOB_NAME,
  RESULTS_EXPORT_QUEUE_NAME,
  createRedisConnection,
  type ResultsExportJobPayload,
} from "./results-export-queue";

export type ResultsExportWorker = {
  worker: Worker<ResultsExportJobPayload>;
  close(): Promise<void>;
};

export async function processResultsExportJob(
  repository: ResultsRepository,
  payload: ResultsExportJobPayload,
) {
  const sessionId = payload.results?.sessionId?.trim() ?? "";
  if (!sessionId) {
    throw new Error("INVALID_SESSION_ID");
  }
  return await repository.recordResults(payload.results);
}

export function startResultsExportWorker(redisUrl: string, repository: ResultsRepository): ResultsExportWorker {
  const connection: IORedis = createRedisConnection(redisUrl);

  const worker = new Worker<ResultsExportJobPayload>(
    RESULTS_EXPORT_QUEUE_NAME,
    async (job) => {
      const outcome = await processResultsExportJob(repository, job.data);
      logEvent("info", "results_export_job_completed", {
        sessionId: job.data.results.sessionId,
        jobId: job.id ?? null,
        attemptsMade: job.attemptsMade,
        recorded: outcome.ok,
      });
      return outcome;
    },
    {
      connection,
      concurrency: 2,
    },
  );

  worker.on("failed", (job, error) => {
    logEvent("warn", "results_export_job_failed", {
      sessionId: job?.data.results.sessionId ?? null,
      jobId: job?.id ?? null,
      attemptsMade: job?.attemptsMade ?? 0,
      name: RESULTS_EXPORT_JOB_NAME,
      error: error.message,
    });
  });

  return {
    worker,
    async close() {
      await worker.close();
      await connection.quit();
    },
  };
}
