import { logEvent } from "../lib/logger";
import type { ResultsRepository } from "../repositories/ResultsRepository";
import type { SessionResults } from "./SessionResults";

/** Hands a finished session's results to persistence, once per session. */
export interface ResultsPublisher {
  readonly mode: "queue" | "direct";
  publish(results: SessionResults): Promise<void>;
  close(): Promise<void>;
}

export class DirectResultsPublisher implements ResultsPublisher {
  readonly mode = "direct" as const;

  constructor(private readonly repository: ResultsRepository) {}

  async publish(results: SessionResults) {
    const outcome = await this.repository.recordResults(results);
    if (!outcome.ok) {
      logEvent("info", "session_results_already_recorded", { sessionId: results.sessionId, pin: results.pin });
      return;
    }
    logEvent("info", "session_results_recorded", {
      sessionId: results.sessionId,
      pin: results.pin,
      resultId: outcome.resultId,
      playerCount: results.players.length,
      finishReason: results.finishReason,
    });
  }

  async close() {}
}
