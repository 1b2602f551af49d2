import { describe, expect, it } from "vitest";
import { FakeConnection } from "./helpers";
import { createTestApp, jsonRequest } from "./app-helpers";

describe("realtime route contract", () => {
  it("exposes the session state with the server clock", async () => {
    const { app, runtime } = createTestApp();
    const created = await runtime.engine.createSession({ quizId: "general", hostUserId: "host-1" });
    if (!created.ok) throw new Error(created.message);
    const { pin } = created.value;

    await runtime.engine.joinPlayer(pin, { name: "Ada", resumeToken: null, connection: new FakeConnection("conn-ada") });
    const started = await runtime.engine.startQuestion(pin, 0);
    if (!started.ok) throw new Error(started.message);

    const before = Date.now();
    const response = await app.handle(jsonRequest(`/realtime/session/${pin}`));
    expect(response.status).toBe(200);

    const payload = (await response.json()) as {
      ok: boolean;
      pin: string;
      snapshot: { phase: string; players: Array<{ name: string; connected: boolean }> };
      round: { index: number; deadlineMs: number; answeredCount: number } | null;
      serverNowMs: number;
    };
    expect(payload.ok).toBe(true);
    expect(payload.pin).toBe(pin);
    expect(payload.snapshot.phase).toBe("question_open");
    expect(payload.snapshot.players).toEqual([{ name: "Ada", score: 0, connected: true }]);
    expect(payload.round).toEqual({
      index: 0,
      startedAtMs: started.value.deadlineMs - 60_000,
      deadlineMs: started.value.deadlineMs,
      answeredCount: 0,
    });
    expect(payload.serverNowMs).toBeGreaterThanOrEqual(before);

    await runtime.engine.shutdown();
    await runtime.close();
  });

  it("answers 404 for unknown sessions", async () => {
    const { app, runtime } = createTestApp();
    const response = await app.handle(jsonRequest("/realtime/session/12345"));
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ ok: false, error: "NOT_FOUND" });
    await runtime.close();
  });
});
