import type { Pool } from "pg";
import { isDatabaseConfigured, pool } from "../db/client";
import type { SessionResults } from "../services/SessionResults";

type StoredResults = {
  id: string;
  recordedAtMs: number;
  results: SessionResults;
};

export type RecordResultsOutcome =
  | { ok: true; resultId: string }
  | { ok: false; error: "RESULTS_ALREADY_RECORDED" };

export function buildResultsInsertPayload(results: SessionResults) {
  return {
    sessionId: results.sessionId,
    pin: results.pin,
    quizId: results.quizId,
    title: results.title,
    hostUserId: results.hostUserId,
    gameMode: results.gameMode,
    finishReason: results.finishReason,
    questions: results.questions,
    createdAt: new Date(results.createdAtMs),
    finishedAt: results.finishedAtMs === null ? null : new Date(results.finishedAtMs),
    players: results.players.map((player) => ({
      displayName: player.name,
      finalRank: player.rank,
      score: player.score,
      answeredCount: player.answeredCount,
      correctCount: player.correctCount,
      meanCorrectLatencyMs: player.meanCorrectLatencyMs,
      answers: player.answers,
    })),
  };
}

export class ResultsRepository {
  private readonly memoryResults: StoredResults[] = [];
  private readonly sessionIdIndex = new Set<string>();
  private readonly database: Pool | null;

  constructor(options: { database?: Pool | null } = {}) {
    this.database = options.database === undefined ? (isDatabaseConfigured() ? pool : null) : options.database;
  }

  get dbEnabled() {
    return this.database !== null;
  }

  async recordResults(results: SessionResults): Promise<RecordResultsOutcome> {
    if (!this.database) {
      if (this.sessionIdIndex.has(results.sessionId)) {
        return { ok: false, error: "RESULTS_ALREADY_RECORDED" };
      }
      const record: StoredResults = {
        id: String(this.memoryResults.length + 1),
        recordedAtMs: Date.now(),
        results: structuredClone(results),
      };
      this.memoryResults.push(record);
      this.sessionIdIndex.add(results.sessionId);
      return { ok: true, resultId: record.id };
    }

    const client = await this.database.connect();
    let inTransaction = false;

    try {
      await client.query("begin");
      inTransaction = true;

      const payload = buildResultsInsertPayload(results);
      const inserted = await client.query<{ id: string }>(
        `
          insert into session_results
            (session_id, pin, quiz_id, title, host_user_id, game_mode, finish_reason, questions, created_at, finished_at)
          values ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, $10)
          on conflict (session_id) do nothing
          returning id
        `,
        [
          payload.sessionId,
          payload.pin,
          payload.quizId,
          payload.title,
          payload.hostUserId,
          payload.gameMode,
          payload.finishReason,
          JSON.stringify(payload.questions),
          payload.createdAt,
          payload.finishedAt,
        ],
      );
      const resultId = inserted.rows[0]?.id;
      if (!resultId) {
        await client.query("rollback");
        inTransaction = false;
        return { ok: false, error: "RESULTS_ALREADY_RECORDED" };
      }

      for (const player of payload.players) {
        await client.query(
          `
            insert into session_result_players
              (result_id, display_name, final_rank, score, answered_count, correct_count, mean_correct_latency_ms, answers)
            values
              ($1, $2, $3, $4, $5, $6, $7, $8::jsonb)
          `,
          [
            resultId,
            player.displayName,
            player.finalRank,
            player.score,
            player.answeredCount,
            player.correctCount,
            player.meanCorrectLatencyMs,
            JSON.stringify(player.answers),
          ],
        );
      }

      await client.query("commit");
      inTransaction = false;
      return { ok: true, resultId: String(resultId) };
    } catch (error) {
      if (inTransaction) {
        await client.query("rollback");
      }
      throw error;
    } finally {
      client.release();
    }
  }

  /** Memory-only lookup used by the in-process fallback and its tests. */
  findRecorded(sessionId: string) {
    const stored = this.memoryResults.find((record) => record.results.sessionId === sessionId);
    return stored ? structuredClone(stored.results) : null;
  }

  recordedCount() {
    return this.memoryResults.length;
  }
}
