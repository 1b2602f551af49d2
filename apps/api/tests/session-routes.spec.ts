import { afterEach, describe, expect, it } from "vitest";
import type { Runtime } from "../src/runtime";
import { createTestApp, jsonRequest } from "./app-helpers";

type CreatedSession = { ok: true; pin: string; sessionId: string; title: string; questionCount: number };

describe("session routes", () => {
  let runtime: Runtime | null = null;

  afterEach(async () => {
    await runtime?.close();
    runtime = null;
  });

  function setup() {
    const created = createTestApp();
    runtime = created.runtime;
    return created;
  }

  async function createSession(app: ReturnType<typeof setup>["app"], body: unknown = { quizId: "general" }) {
    const response = await app.handle(jsonRequest("/sessions", { method: "POST", body, userId: "host-1" }));
    expect(response.status).toBe(201);
    return (await response.json()) as CreatedSession;
  }

  it("requires a signed-in host to create a session", async () => {
    const { app } = setup();
    const response = await app.handle(jsonRequest("/sessions", { method: "POST", body: { quizId: "general" } }));
    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ ok: false, error: "UNAUTHORIZED" });
  });

  it("validates the create payload", async () => {
    const { app } = setup();
    const missing = await app.handle(jsonRequest("/sessions", { method: "POST", body: {}, userId: "host-1" }));
    expect(missing.status).toBe(400);

    const badMode = await app.handle(
      jsonRequest("/sessions", { method: "POST", body: { quizId: "general", gameMode: "teams" }, userId: "host-1" }),
    );
    expect(badMode.status).toBe(400);
    expect(await badMode.json()).toEqual({ ok: false, error: "VALIDATION_ERROR" });

    const unknownQuiz = await app.handle(
      jsonRequest("/sessions", { method: "POST", body: { quizId: "nope" }, userId: "host-1" }),
    );
    expect(unknownQuiz.status).toBe(404);
    expect(await unknownQuiz.json()).toEqual({ ok: false, error: "QUIZ_NOT_FOUND", message: "quiz nope does not exist" });
  });

  it("creates a session and serves its public snapshot", async () => {
    const { app } = setup();
    const created = await createSession(app, { quizId: "general", gameMode: "host_screen" });
    expect(created.pin).toMatch(/^[0-9]{6}$/);
    expect(created.title).toBe("General Knowledge");
    expect(created.questionCount).toBe(3);

    const response = await app.handle(jsonRequest(`/sessions/${created.pin}`));
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      ok: true,
      session: {
        pin: created.pin,
        title: "General Knowledge",
        phase: "lobby",
        questionIndex: -1,
        questionCount: 3,
        gameMode: "host_screen",
        playerCount: 0,
        players: [],
        finishReason: null,
      },
    });
  });

  it("answers 404 for malformed and unknown PINs", async () => {
    const { app } = setup();
    const created = await createSession(app);
    const unknownPin = created.pin === "000000" ? "000001" : "000000";

    expect((await app.handle(jsonRequest("/sessions/abc"))).status).toBe(404);
    expect((await app.handle(jsonRequest(`/sessions/${unknownPin}`))).status).toBe(404);
    expect((await app.handle(jsonRequest(`/sessions/${unknownPin}/results`))).status).toBe(404);
  });

  it("serves standings with a plain-text table", async () => {
    const { app } = setup();
    const created = await createSession(app);

    const response = await app.handle(jsonRequest(`/sessions/${created.pin}/results`));
    expect(response.status).toBe(200);
    const payload = (await response.json()) as { ok: boolean; results: { final: boolean; sessionId: string }; table: string };
    expect(payload.results.final).toBe(false);
    expect(payload.results.sessionId).toBe(created.sessionId);
    expect(payload.table).toBe(
      [`General Knowledge (PIN ${created.pin})`, "rank  name  points  right/answered", "(no players)"].join("\n"),
    );
  });

  it("lets only the owner abort a session", async () => {
    const { app, runtime: current } = setup();
    const created = await createSession(app);

    const anonymous = await app.handle(jsonRequest(`/sessions/${created.pin}`, { method: "DELETE" }));
    expect(anonymous.status).toBe(401);

    const stranger = await app.handle(jsonRequest(`/sessions/${created.pin}`, { method: "DELETE", userId: "host-2" }));
    expect(stranger.status).toBe(403);
    expect(await stranger.json()).toEqual({ ok: false, error: "UNAUTHORIZED" });

    const owner = await app.handle(jsonRequest(`/sessions/${created.pin}`, { method: "DELETE", userId: "host-1" }));
    expect(owner.status).toBe(200);
    expect(await owner.json()).toEqual({ ok: true, changed: true });

    const again = await app.handle(jsonRequest(`/sessions/${created.pin}`, { method: "DELETE", userId: "host-1" }));
    expect(await again.json()).toEqual({ ok: true, changed: false });

    const snapshot = (await (await app.handle(jsonRequest(`/sessions/${created.pin}`))).json()) as {
      session: { phase: string; finishReason: string | null };
    };
    expect(snapshot.session).toMatchObject({ phase: "finished", finishReason: "aborted" });

    await current.engine.shutdown();
    expect(current.repository.findRecorded(created.sessionId)?.finishReason).toBe("aborted");
  });
});
