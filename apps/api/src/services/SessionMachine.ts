import type { FinishReason, SessionPhase } from "@livequiz/shared";
import type {
  EngineFailure,
  QuestionRound,
  QuizQuestion,
  RoundCloseReason,
  RoundSubmission,
  SessionRecord,
} from "./session-types";
import { fail } from "./session-types";

type OpenQuestionInput = {
  index: number;
  nowMs: number;
  roundId: string;
};

type CloseQuestionInput = {
  nowMs: number;
  reason: RoundCloseReason;
  // Timer closes carry the round they were armed for.
  roundId?: string;
};

type Changed<T> = { ok: true; changed: boolean } & T;

export type OpenQuestionResult = Changed<{ round: QuestionRound; question: QuizQuestion }> | EngineFailure;
export type CloseQuestionResult = Changed<{ round: QuestionRound | null }> | EngineFailure;
export type NextQuestionResult =
  | (Changed<{ outcome: "opened"; round: QuestionRound; question: QuizQuestion }>)
  | (Changed<{ outcome: "finished" }>)
  | EngineFailure;
export type FinishResult = Changed<{ closedRound: QuestionRound | null }> | EngineFailure;
export type AdmitAnswerResult =
  | { ok: true; submission: RoundSubmission; round: QuestionRound; question: QuizQuestion; elapsedMs: number }
  | EngineFailure;

export type AnswerEvaluation =
  | { valid: false; message: string }
  | { valid: true; correct: boolean };

function normalizeText(value: string, caseSensitive: boolean) {
  const collapsed = value.normalize("NFKC").replace(/\s+/g, " ").trim();
  return caseSensitive ? collapsed : collapsed.toLowerCase();
}

export function evaluateAnswer(question: QuizQuestion, value: string): AnswerEvaluation {
  if (question.kind === "text") {
    const given = normalizeText(value, question.caseSensitive);
    if (!given) return { valid: false, message: "answer text is empty" };
    const correct = question.acceptedAnswers.some(
      (accepted) => normalizeText(accepted, question.caseSensitive) === given,
    );
    return { valid: true, correct };
  }

  const choice = question.choices.find((entry) => entry.id === value);
  if (!choice) return { valid: false, message: `unknown choice ${value}` };
  if (question.kind === "vote") return { valid: true, correct: false };
  return { valid: true, correct: question.correctChoiceIds.includes(choice.id) };
}

export function correctAnswersFor(question: QuizQuestion) {
  if (question.kind === "choice") return [...question.correctChoiceIds];
  if (question.kind === "text") return [...question.acceptedAnswers];
  return [];
}

/** Own-property lookup: display names such as "constructor" or "__proto__" are ordinary keys here. */
export function submissionFor(round: QuestionRound, name: string): RoundSubmission | undefined {
  return Object.hasOwn(round.submissions, name) ? round.submissions[name] : undefined;
}

function recordSubmission(round: QuestionRound, name: string, submission: RoundSubmission) {
  Object.defineProperty(round.submissions, name, {
    value: submission,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function cloneRound(round: QuestionRound): QuestionRound {
  return { ...round, submissions: { ...round.submissions } };
}

/**
 * Phase transitions for one session. Works on a private copy of the stored
 * record; callers persist `snapshot()` once a transition reports `changed`.
 */
export class SessionMachine {
  private session: SessionRecord;

  constructor(record: SessionRecord) {
    this.session = {
      ...record,
      round: record.round ? cloneRound(record.round) : null,
      playedIndices: [...record.playedIndices],
      kickedNames: [...record.kickedNames],
    };
  }

  phase(): SessionPhase {
    return this.session.phase;
  }

  questionIndex(): number {
    return this.session.questionIndex;
  }

  questionCount(): number {
    return this.session.questions.length;
  }

  round(): QuestionRound | null {
    return this.session.round;
  }

  currentQuestion(): QuizQuestion | null {
    if (this.session.questionIndex < 0) return null;
    return this.session.questions[this.session.questionIndex] ?? null;
  }

  snapshot(): SessionRecord {
    return {
      ...this.session,
      round: this.session.round ? cloneRound(this.session.round) : null,
      playedIndices: [...this.session.playedIndices],
      kickedNames: [...this.session.kickedNames],
    };
  }

  roundExpired(nowMs: number) {
    const round = this.session.round;
    return this.session.phase === "question_open" && round !== null && nowMs > round.deadlineMs;
  }

  openQuestion(input: OpenQuestionInput): OpenQuestionResult {
    const { index } = input;
    const session = this.session;

    if (session.phase === "finished") {
      return fail("ILLEGAL_TRANSITION", "session is finished");
    }
    const question = session.questions[index];
    if (!Number.isInteger(index) || index < 0 || !question) {
      return fail(
        "ILLEGAL_TRANSITION",
        `question ${index} does not exist (${session.questions.length} questions)`,
      );
    }

    if (session.phase === "question_open") {
      if (session.questionIndex === index && session.round) {
        return { ok: true, changed: false, round: session.round, question };
      }
      return fail("ILLEGAL_TRANSITION", `question ${session.questionIndex} is still open`);
    }

    if (session.playedIndices.includes(index)) {
      return fail("ILLEGAL_TRANSITION", `question ${index} was already played`);
    }

    const timeLimitMs = Math.max(1, question.timeLimitMs);
    const round: QuestionRound = {
      roundId: input.roundId,
      index,
      startedAtMs: input.nowMs,
      timeLimitMs,
      deadlineMs: input.nowMs + timeLimitMs,
      submissions: {},
      closedAtMs: null,
      closeReason: null,
    };

    session.round = round;
    session.questionIndex = index;
    session.playedIndices.push(index);
    session.phase = "question_open";
    return { ok: true, changed: true, round, question };
  }

  nextQuestion(input: Omit<OpenQuestionInput, "index">): NextQuestionResult {
    const session = this.session;
    if (session.phase !== "lobby" && session.phase !== "question_closed") {
      return fail("ILLEGAL_TRANSITION", `cannot advance while ${session.phase}`);
    }

    let nextIndex = session.questionIndex + 1;
    while (nextIndex < session.questions.length && session.playedIndices.includes(nextIndex)) {
      nextIndex += 1;
    }

    if (nextIndex >= session.questions.length) {
      this.markFinished(input.nowMs, "completed");
      return { ok: true, changed: true, outcome: "finished" };
    }

    const opened = this.openQuestion({ ...input, index: nextIndex });
    if (!opened.ok) return opened;
    return { ok: true, changed: opened.changed, outcome: "opened", round: opened.round, question: opened.question };
  }

  closeQuestion(input: CloseQuestionInput): CloseQuestionResult {
    const session = this.session;
    const round = session.round;

    if (input.roundId !== undefined && round?.roundId !== input.roundId) {
      return { ok: true, changed: false, round };
    }

    if (session.phase === "question_closed") {
      return { ok: true, changed: false, round };
    }
    if (session.phase !== "question_open" || !round) {
      if (input.reason === "timer") return { ok: true, changed: false, round };
      return fail("ILLEGAL_TRANSITION", `no question is open (${session.phase})`);
    }

    round.closedAtMs = input.nowMs;
    round.closeReason = input.reason;
    session.phase = "question_closed";
    return { ok: true, changed: true, round };
  }

  admitAnswer(name: string, value: string, nowMs: number): AdmitAnswerResult {
    const session = this.session;
    const round = session.round;
    const question = this.currentQuestion();

    if (session.phase === "question_closed") {
      return fail("ROUND_CLOSED", "the question is closed");
    }
    if (session.phase !== "question_open" || !round || !question) {
      return fail("ILLEGAL_TRANSITION", `no question is open (${session.phase})`);
    }
    if (nowMs < round.startedAtMs || nowMs > round.deadlineMs) {
      return fail("ROUND_CLOSED", "the answer arrived outside the time limit");
    }
    if (submissionFor(round, name)) {
      return fail("DUPLICATE_SUBMISSION", `an answer for question ${round.index} was already recorded`);
    }

    const submission: RoundSubmission = { value, submittedAtMs: nowMs };
    recordSubmission(round, name, submission);
    return { ok: true, submission, round, question, elapsedMs: nowMs - round.startedAtMs };
  }

  endGame(nowMs: number): FinishResult {
    if (this.session.phase !== "question_closed") {
      return fail("ILLEGAL_TRANSITION", `cannot end the game while ${this.session.phase}`);
    }
    this.markFinished(nowMs, "ended_by_host");
    return { ok: true, changed: true, closedRound: null };
  }

  abort(nowMs: number, reason: FinishReason): FinishResult {
    const session = this.session;
    if (session.phase === "finished") {
      return { ok: true, changed: false, closedRound: null };
    }

    let closedRound: QuestionRound | null = null;
    if (session.phase === "question_open" && session.round) {
      session.round.closedAtMs = nowMs;
      session.round.closeReason = "teardown";
      closedRound = session.round;
    }
    this.markFinished(nowMs, reason);
    return { ok: true, changed: true, closedRound };
  }

  kick(name: string) {
    if (this.session.phase === "finished") {
      return fail("ILLEGAL_TRANSITION", "session is finished");
    }
    if (!this.session.kickedNames.includes(name)) {
      this.session.kickedNames.push(name);
    }
    return { ok: true as const, changed: true };
  }

  isKicked(name: string) {
    return this.session.kickedNames.includes(name);
  }

  touchHost(nowMs: number) {
    this.session.hostSeenAtMs = Math.max(this.session.hostSeenAtMs, nowMs);
  }

  private markFinished(nowMs: number, reason: FinishReason) {
    this.session.phase = "finished";
    this.session.finishedAtMs = nowMs;
    this.session.finishReason = reason;
  }
}
