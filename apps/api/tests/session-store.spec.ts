import { describe, expect, it } from "vitest";
import { MemorySessionStore } from "../src/services/SessionStore";
import type { PlayerRecord, SessionRecord } from "../src/services/session-types";
import { sampleQuiz } from "./helpers";

function sessionRecord(pin: string): SessionRecord {
  const quiz = sampleQuiz();
  return {
    pin,
    sessionId: `session-${pin}`,
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

function player(name: string, joinedAtMs: number): PlayerRecord {
  return {
    name,
    joinedAtMs,
    score: 0,
    answeredCount: 0,
    correctCount: 0,
    resumeToken: `token-${name}`,
    connectionId: `conn-${name}`,
  };
}

function createStore(ttlMs = 1_000) {
  const clock = { now: 0 };
  const store = new MemorySessionStore({ ttlMs, now: () => clock.now });
  return { store, clock };
}

describe("MemorySessionStore", () => {
  it("hands out copies of the stored session", async () => {
    const { store } = createStore();
    await store.create(sessionRecord("111111"));

    const first = await store.get("111111");
    if (!first) throw new Error("session missing");
    first.playedIndices.push(4);
    expect((await store.get("111111"))?.playedIndices).toEqual([]);
  });

  it("applies updates and refreshes the expiry", async () => {
    const { store, clock } = createStore(1_000);
    await store.create(sessionRecord("111111"));

    clock.now = 900;
    const updated = await store.update("111111", (current) => ({ ...current, phase: "question_open" }));
    expect(updated?.phase).toBe("question_open");

    clock.now = 1_500;
    expect((await store.get("111111"))?.phase).toBe("question_open");

    clock.now = 1_900;
    expect(await store.get("111111")).toBeNull();
    expect(await store.update("111111", (current) => current)).toBeNull();
  });

  it("forgets players and scores of an expired session", async () => {
    const { store, clock } = createStore(1_000);
    await store.create(sessionRecord("111111"));
    await store.putPlayer("111111", player("Ada", 0));

    clock.now = 1_000;
    expect(await store.getPlayer("111111", "Ada")).toBeNull();
    expect(await store.listPlayers("111111")).toEqual([]);
    expect(await store.listScores("111111")).toEqual([]);
  });

  it("lists players in join order", async () => {
    const { store } = createStore();
    await store.create(sessionRecord("111111"));
    await store.putPlayer("111111", player("Cy", 30));
    await store.putPlayer("111111", player("Ada", 10));
    await store.putPlayer("111111", player("Bea", 20));

    expect((await store.listPlayers("111111")).map((entry) => entry.name)).toEqual(["Ada", "Bea", "Cy"]);
  });

  it("appends a score and bumps the player's totals together", async () => {
    const { store } = createStore();
    await store.create(sessionRecord("111111"));
    await store.putPlayer("111111", player("Ada", 0));

    const updated = await store.appendScore("111111", {
      name: "Ada",
      questionIndex: 0,
      points: 917,
      correct: true,
      latencyMs: 10_000,
      value: "a",
      submittedAtMs: 10_000,
    });
    expect(updated).toEqual({ ...player("Ada", 0), score: 917, answeredCount: 1, correctCount: 1 });
    expect(await store.listScores("111111")).toHaveLength(1);

    const missing = await store.appendScore("111111", {
      name: "Ghost",
      questionIndex: 0,
      points: 0,
      correct: false,
      latencyMs: 0,
      value: "b",
      submittedAtMs: 0,
    });
    expect(missing).toBeNull();
    expect(await store.listScores("111111")).toHaveLength(1);
  });

  it("removes players", async () => {
    const { store } = createStore();
    await store.create(sessionRecord("111111"));
    await store.putPlayer("111111", player("Ada", 0));

    expect(await store.removePlayer("111111", "Ada")).toBe(true);
    expect(await store.removePlayer("111111", "Ada")).toBe(false);
  });

  it("reserves each PIN once until it is released", async () => {
    const { store } = createStore();
    expect(await store.reservePin("222222")).toBe(true);
    expect(await store.reservePin("222222")).toBe(false);
    expect(await store.activePins()).toEqual(["222222"]);

    await store.releasePin("222222");
    expect(await store.activePins()).toEqual([]);
    expect(await store.reservePin("222222")).toBe(true);
  });
});
