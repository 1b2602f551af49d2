import { describe, expect, it } from "vitest";
import { SessionMachine, correctAnswersFor, evaluateAnswer } from "../src/services/SessionMachine";
import type { SessionRecord } from "../src/services/session-types";
import { sampleQuiz } from "./helpers";

function lobbyRecord(): SessionRecord {
  const quiz = sampleQuiz();
  return {
    pin: "123456",
    sessionId: "session-1",
    quizId: quiz.id,
    title: quiz.title,
    questions: quiz.questions,
    hostUserId: "host-1",
    gameMode: "standard",
    phase: "lobby",
    questionIndex: -1,
    round: null,
    playedIndices: [],
    kickedNames: [],
    createdAtMs: 0,
    hostSeenAtMs: 0,
    finishedAtMs: null,
    finishReason: null,
  };
}

function openMachine(index = 0, nowMs = 1_000) {
  const machine = new SessionMachine(lobbyRecord());
  machine.openQuestion({ index, nowMs, roundId: "round-1" });
  return machine;
}

describe("SessionMachine", () => {
  it("opens a question from the lobby with its deadline", () => {
    const machine = new SessionMachine(lobbyRecord());
    const opened = machine.openQuestion({ index: 0, nowMs: 1_000, roundId: "round-1" });

    expect(opened.ok && opened.changed).toBe(true);
    expect(machine.phase()).toBe("question_open");
    expect(machine.round()).toEqual({
      roundId: "round-1",
      index: 0,
      startedAtMs: 1_000,
      timeLimitMs: 60_000,
      deadlineMs: 61_000,
      submissions: {},
      closedAtMs: null,
      closeReason: null,
    });
    expect(machine.snapshot().playedIndices).toEqual([0]);
  });

  it("reports no change when the open question is started again", () => {
    const machine = openMachine();
    const again = machine.openQuestion({ index: 0, nowMs: 9_000, roundId: "round-2" });

    expect(again.ok && again.changed).toBe(false);
    expect(machine.round()?.roundId).toBe("round-1");
    expect(machine.round()?.startedAtMs).toBe(1_000);
  });

  it("refuses a different question while one is open", () => {
    const machine = openMachine();
    expect(machine.openQuestion({ index: 1, nowMs: 2_000, roundId: "round-2" })).toEqual({
      ok: false,
      error: "ILLEGAL_TRANSITION",
      message: "question 0 is still open",
    });
  });

  it("refuses indices outside the quiz", () => {
    const machine = new SessionMachine(lobbyRecord());
    expect(machine.openQuestion({ index: 3, nowMs: 0, roundId: "round-1" })).toEqual({
      ok: false,
      error: "ILLEGAL_TRANSITION",
      message: "question 3 does not exist (3 questions)",
    });
    expect(machine.openQuestion({ index: -1, nowMs: 0, roundId: "round-1" }).ok).toBe(false);
    expect(machine.phase()).toBe("lobby");
  });

  it("does not replay a question", () => {
    const machine = openMachine();
    machine.closeQuestion({ nowMs: 2_000, reason: "host" });
    expect(machine.openQuestion({ index: 0, nowMs: 3_000, roundId: "round-2" })).toEqual({
      ok: false,
      error: "ILLEGAL_TRANSITION",
      message: "question 0 was already played",
    });
  });

  it("closes once and ignores repeated closes", () => {
    const machine = openMachine();
    const closed = machine.closeQuestion({ nowMs: 5_000, reason: "host" });
    expect(closed.ok && closed.changed).toBe(true);
    expect(machine.round()?.closeReason).toBe("host");
    expect(machine.round()?.closedAtMs).toBe(5_000);

    const again = machine.closeQuestion({ nowMs: 6_000, reason: "host" });
    expect(again.ok && again.changed).toBe(false);
    expect(machine.round()?.closedAtMs).toBe(5_000);
  });

  it("ignores a timer armed for an older round", () => {
    const machine = openMachine();
    const stale = machine.closeQuestion({ nowMs: 61_000, reason: "timer", roundId: "round-0" });
    expect(stale.ok && stale.changed).toBe(false);
    expect(machine.phase()).toBe("question_open");
  });

  it("rejects a host close with nothing open but lets a timer close pass", () => {
    const machine = new SessionMachine(lobbyRecord());
    expect(machine.closeQuestion({ nowMs: 0, reason: "host" })).toEqual({
      ok: false,
      error: "ILLEGAL_TRANSITION",
      message: "no question is open (lobby)",
    });
    const timer = machine.closeQuestion({ nowMs: 0, reason: "timer" });
    expect(timer.ok && timer.changed).toBe(false);
  });

  it("advances through unplayed questions and finishes after the last", () => {
    const machine = new SessionMachine(lobbyRecord());
    machine.openQuestion({ index: 1, nowMs: 0, roundId: "r-1" });
    machine.closeQuestion({ nowMs: 10, reason: "host" });

    const next = machine.nextQuestion({ nowMs: 20, roundId: "r-2" });
    expect(next.ok && next.outcome === "opened" ? next.round.index : null).toBe(2);
    machine.closeQuestion({ nowMs: 30, reason: "host" });

    const last = machine.nextQuestion({ nowMs: 40, roundId: "r-3" });
    expect(last.ok && last.outcome).toBe("finished");
    expect(machine.snapshot().finishReason).toBe("completed");
    expect(machine.snapshot().finishedAtMs).toBe(40);
  });

  it("refuses to advance while a question is open", () => {
    const machine = openMachine();
    expect(machine.nextQuestion({ nowMs: 2_000, roundId: "r-2" })).toEqual({
      ok: false,
      error: "ILLEGAL_TRANSITION",
      message: "cannot advance while question_open",
    });
  });

  describe("admitAnswer", () => {
    it("records the first answer with its elapsed time", () => {
      const machine = openMachine();
      const admitted = machine.admitAnswer("Ada", "a", 4_000);
      expect(admitted.ok && admitted.elapsedMs).toBe(3_000);
      expect(machine.round()?.submissions).toEqual({ Ada: { value: "a", submittedAtMs: 4_000 } });
    });

    it("accepts an answer exactly on the deadline and refuses one after", () => {
      const machine = openMachine();
      expect(machine.admitAnswer("Ada", "a", 61_000).ok).toBe(true);
      expect(machine.admitAnswer("Bea", "a", 61_001)).toEqual({
        ok: false,
        error: "ROUND_CLOSED",
        message: "the answer arrived outside the time limit",
      });
    });

    it("refuses duplicates and answers outside an open question", () => {
      const machine = openMachine();
      machine.admitAnswer("Ada", "a", 2_000);
      expect(machine.admitAnswer("Ada", "b", 3_000)).toEqual({
        ok: false,
        error: "DUPLICATE_SUBMISSION",
        message: "an answer for question 0 was already recorded",
      });
      expect(new SessionMachine(lobbyRecord()).admitAnswer("Ada", "a", 0)).toEqual({
        ok: false,
        error: "ILLEGAL_TRANSITION",
        message: "no question is open (lobby)",
      });
      machine.closeQuestion({ nowMs: 4_000, reason: "host" });
      expect(machine.admitAnswer("Bea", "a", 4_500)).toEqual({
        ok: false,
        error: "ROUND_CLOSED",
        message: "the question is closed",
      });
    });
  });

  it("ends the game only between questions", () => {
    const machine = openMachine();
    expect(machine.endGame(2_000).ok).toBe(false);
    machine.closeQuestion({ nowMs: 3_000, reason: "host" });
    const ended = machine.endGame(4_000);
    expect(ended.ok && ended.changed).toBe(true);
    expect(machine.snapshot().finishReason).toBe("ended_by_host");
  });

  it("aborts an open question as a teardown close and is idempotent", () => {
    const machine = openMachine();
    const aborted = machine.abort(5_000, "aborted");
    expect(aborted.ok && aborted.closedRound?.closeReason).toBe("teardown");
    expect(machine.phase()).toBe("finished");

    const again = machine.abort(6_000, "shutdown");
    expect(again.ok && again.changed).toBe(false);
    expect(machine.snapshot().finishReason).toBe("aborted");
  });

  it("remembers kicked names and refuses kicks once finished", () => {
    const machine = new SessionMachine(lobbyRecord());
    machine.kick("Bea");
    machine.kick("Bea");
    expect(machine.isKicked("Bea")).toBe(true);
    expect(machine.snapshot().kickedNames).toEqual(["Bea"]);

    machine.abort(0, "aborted");
    expect(machine.kick("Cy")).toEqual({ ok: false, error: "ILLEGAL_TRANSITION", message: "session is finished" });
  });

  it("never moves host activity backwards", () => {
    const machine = new SessionMachine(lobbyRecord());
    machine.touchHost(5_000);
    machine.touchHost(3_000);
    expect(machine.snapshot().hostSeenAtMs).toBe(5_000);
  });

  it("hands out copies that do not alias its state", () => {
    const machine = openMachine();
    const snapshot = machine.snapshot();
    snapshot.playedIndices.push(2);
    if (snapshot.round) {
      snapshot.round.submissions.Ghost = { value: "a", submittedAtMs: 0 };
    }
    expect(machine.snapshot().playedIndices).toEqual([0]);
    expect(machine.round()?.submissions).toEqual({});
  });
});

describe("evaluateAnswer", () => {
  const [choice, text, vote] = sampleQuiz().questions;

  it("checks choice ids", () => {
    if (!choice) throw new Error("missing question");
    expect(evaluateAnswer(choice, "a")).toEqual({ valid: true, correct: true });
    expect(evaluateAnswer(choice, "b")).toEqual({ valid: true, correct: false });
    expect(evaluateAnswer(choice, "z")).toEqual({ valid: false, message: "unknown choice z" });
  });

  it("compares free text without case or extra spaces", () => {
    if (!text) throw new Error("missing question");
    expect(evaluateAnswer(text, "  h2O ")).toEqual({ valid: true, correct: true });
    expect(evaluateAnswer(text, "H2O2")).toEqual({ valid: true, correct: false });
    expect(evaluateAnswer(text, "   ")).toEqual({ valid: false, message: "answer text is empty" });
  });

  it("never marks a vote correct", () => {
    if (!vote) throw new Error("missing question");
    expect(evaluateAnswer(vote, "summer")).toEqual({ valid: true, correct: false });
    expect(correctAnswersFor(vote)).toEqual([]);
  });
});
