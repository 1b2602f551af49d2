import type { EngineErrorCode, FinishReason, GameMode, SessionPhase } from "@livequiz/shared";

export type QuizChoice = {
  id: string;
  text: string;
};

type QuestionBase = {
  id: string;
  prompt: string;
  timeLimitMs: number;
};

export type QuizQuestion =
  | (QuestionBase & { kind: "choice"; choices: QuizChoice[]; correctChoiceIds: string[] })
  | (QuestionBase & { kind: "text"; acceptedAnswers: string[]; caseSensitive: boolean })
  | (QuestionBase & { kind: "vote"; choices: QuizChoice[] });

export type Quiz = {
  id: string;
  title: string;
  questions: QuizQuestion[];
};

export type RoundSubmission = {
  value: string;
  submittedAtMs: number;
};

export type RoundCloseReason = "timer" | "host" | "deadline" | "teardown";

export type QuestionRound = {
  roundId: string;
  index: number;
  startedAtMs: number;
  timeLimitMs: number;
  deadlineMs: number;
  submissions: Record<string, RoundSubmission>;
  closedAtMs: number | null;
  closeReason: RoundCloseReason | null;
};

export type SessionRecord = {
  pin: string;
  sessionId: string;
  quizId: string;
  title: string;
  questions: QuizQuestion[];
  hostUserId: string;
  gameMode: GameMode;
  phase: SessionPhase;
  questionIndex: number;
  round: QuestionRound | null;
  playedIndices: number[];
  kickedNames: string[];
  createdAtMs: number;
  hostSeenAtMs: number;
  finishedAtMs: number | null;
  finishReason: FinishReason | null;
};

export type PlayerRecord = {
  name: string;
  joinedAtMs: number;
  score: number;
  answeredCount: number;
  correctCount: number;
  resumeToken: string;
  connectionId: string | null;
};

export type ScoreEntry = {
  name: string;
  questionIndex: number;
  points: number;
  correct: boolean;
  latencyMs: number;
  value: string;
  submittedAtMs: number;
};

export type EngineFailure = {
  ok: false;
  error: EngineErrorCode;
  message: string;
};

export type EngineResult<T> = { ok: true; value: T } | EngineFailure;

export function succeed<T>(value: T): EngineResult<T> {
  return { ok: true, value };
}

export function fail(error: EngineErrorCode, message: string): EngineFailure {
  return { ok: false, error, message };
}
