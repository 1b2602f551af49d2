import type { FinishReason, GameMode, LeaderboardEntry, QuestionKind } from "@livequiz/shared";
import type { PlayerRecord, QuizQuestion, ScoreEntry, SessionRecord } from "./session-types";

export type PlayerAnswerResult = {
  questionIndex: number;
  correct: boolean;
  points: number;
  latencyMs: number;
};

export type PlayerResult = {
  rank: number;
  name: string;
  score: number;
  answeredCount: number;
  correctCount: number;
  meanCorrectLatencyMs: number | null;
  answers: PlayerAnswerResult[];
};

export type QuestionSummary = {
  index: number;
  prompt: string;
  kind: QuestionKind;
  answeredCount: number;
  correctCount: number;
  voteTally: Record<string, number> | null;
};

export type SessionResults = {
  sessionId: string;
  pin: string;
  quizId: string;
  title: string;
  hostUserId: string;
  gameMode: GameMode;
  createdAtMs: number;
  finishedAtMs: number | null;
  finishReason: FinishReason | null;
  final: boolean;
  players: PlayerResult[];
  questions: QuestionSummary[];
};

function meanCorrectLatency(entries: ScoreEntry[]) {
  const correct = entries.filter((entry) => entry.correct);
  if (correct.length === 0) return null;
  const total = correct.reduce((sum, entry) => sum + entry.latencyMs, 0);
  return Math.round(total / correct.length);
}

function compareLatency(left: number | null, right: number | null) {
  if (left !== null && right !== null) return left - right;
  if (left !== null) return -1;
  if (right !== null) return 1;
  return 0;
}

/** Score desc, correct count desc, mean latency of correct answers asc, then name. */
export function rankPlayers(players: PlayerRecord[], scores: ScoreEntry[]): PlayerResult[] {
  const entriesByName = new Map<string, ScoreEntry[]>();
  for (const entry of scores) {
    const list = entriesByName.get(entry.name) ?? [];
    list.push(entry);
    entriesByName.set(entry.name, list);
  }

  return players
    .map((player) => {
      const entries = entriesByName.get(player.name) ?? [];
      return {
        rank: 0,
        name: player.name,
        score: player.score,
        answeredCount: player.answeredCount,
        correctCount: player.correctCount,
        meanCorrectLatencyMs: meanCorrectLatency(entries),
        answers: entries
          .map((entry) => ({
            questionIndex: entry.questionIndex,
            correct: entry.correct,
            points: entry.points,
            latencyMs: entry.latencyMs,
          }))
          .sort((left, right) => left.questionIndex - right.questionIndex),
      };
    })
    .sort((left, right) => {
      const byScore = right.score - left.score;
      if (byScore !== 0) return byScore;

      const byCorrect = right.correctCount - left.correctCount;
      if (byCorrect !== 0) return byCorrect;

      const byLatency = compareLatency(left.meanCorrectLatencyMs, right.meanCorrectLatencyMs);
      if (byLatency !== 0) return byLatency;

      return left.name < right.name ? -1 : left.name > right.name ? 1 : 0;
    })
    .map((player, index) => ({ ...player, rank: index + 1 }));
}

export function toLeaderboard(ranked: PlayerResult[]): LeaderboardEntry[] {
  return ranked.map((player) => ({
    rank: player.rank,
    name: player.name,
    score: player.score,
    correctCount: player.correctCount,
    answeredCount: player.answeredCount,
  }));
}

export function voteTally(question: QuizQuestion, entries: ScoreEntry[]) {
  if (question.kind !== "vote") return null;
  const tally: Record<string, number> = {};
  for (const choice of question.choices) {
    tally[choice.id] = 0;
  }
  for (const entry of entries) {
    const current = tally[entry.value];
    if (current !== undefined) tally[entry.value] = current + 1;
  }
  return tally;
}

export function buildSessionResults(
  session: SessionRecord,
  players: PlayerRecord[],
  scores: ScoreEntry[],
): SessionResults {
  const questions: QuestionSummary[] = [];
  for (const index of [...session.playedIndices].sort((left, right) => left - right)) {
    const question = session.questions[index];
    if (!question) continue;
    const entries = scores.filter((entry) => entry.questionIndex === index);
    questions.push({
      index,
      prompt: question.prompt,
      kind: question.kind,
      answeredCount: entries.length,
      correctCount: entries.filter((entry) => entry.correct).length,
      voteTally: voteTally(question, entries),
    });
  }

  return {
    sessionId: session.sessionId,
    pin: session.pin,
    quizId: session.quizId,
    title: session.title,
    hostUserId: session.hostUserId,
    gameMode: session.gameMode,
    createdAtMs: session.createdAtMs,
    finishedAtMs: session.finishedAtMs,
    finishReason: session.finishReason,
    final: session.phase === "finished",
    players: rankPlayers(players, scores),
    questions,
  };
}

/** Plain-text standings a host can paste into notes. */
export function formatResultsTable(results: SessionResults) {
  const nameWidth = Math.max(4, ...results.players.map((player) => player.name.length));
  const header = `${"rank".padStart(4)}  ${"name".padEnd(nameWidth)}  ${"points".padStart(6)}  right/answered`;
  const rows = results.players.map(
    (player) =>
      `${String(player.rank).padStart(4)}  ${player.name.padEnd(nameWidth)}  ${String(player.score).padStart(6)}  ${player.correctCount}/${player.answeredCount}`,
  );
  const lines = [`${results.title} (PIN ${results.pin})`, header, ...rows];
  if (rows.length === 0) lines.push("(no players)");
  return lines.join("\n");
}
