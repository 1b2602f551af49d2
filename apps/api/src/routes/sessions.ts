import { Elysia } from "elysia";
import { GAME_MODES, isValidPin, type EngineErrorCode, type GameMode } from "@livequiz/shared";
import type { Runtime } from "../runtime";
import { formatResultsTable } from "../services/SessionResults";

function readStringField(body: unknown, key: string): string | null {
  if (typeof body !== "object" || body === null) return null;
  const record = body as Record<string, unknown>;
  const value = record[key];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readGameMode(body: unknown): GameMode | null | undefined {
  const raw = readStringField(body, "gameMode");
  if (raw === null) return undefined;
  return GAME_MODES.find((mode) => mode === raw) ?? null;
}

export function statusForError(error: EngineErrorCode) {
  switch (error) {
    case "VALIDATION_ERROR":
      return 400;
    case "UNAUTHORIZED":
      return 401;
    case "NOT_FOUND":
    case "QUIZ_NOT_FOUND":
      return 404;
    case "ALLOCATION_EXHAUSTED":
      return 503;
    case "INTERNAL_ERROR":
      return 500;
    default:
      return 409;
  }
}

export function sessionRoutes(runtime: Runtime) {
  const { engine } = runtime;

  return new Elysia({ prefix: "/sessions" })
    .post("/", async ({ body, request, set }) => {
      const hostUserId = await runtime.resolveHostUserId(request.headers);
      if (!hostUserId) {
        set.status = 401;
        return { ok: false as const, error: "UNAUTHORIZED" as const };
      }

      const quizId = readStringField(body, "quizId");
      const gameMode = readGameMode(body);
      if (!quizId || gameMode === null) {
        set.status = 400;
        return { ok: false as const, error: "VALIDATION_ERROR" as const };
      }

      const created = await engine.createSession({ quizId, hostUserId, gameMode });
      if (!created.ok) {
        set.status = statusForError(created.error);
        return { ok: false as const, error: created.error, message: created.message };
      }

      set.status = 201;
      return { ok: true as const, ...created.value };
    })
    .get("/:pin", async ({ params, set }) => {
      const snapshot = isValidPin(params.pin) ? await engine.snapshot(params.pin) : null;
      if (!snapshot) {
        set.status = 404;
        return { ok: false as const, error: "NOT_FOUND" as const };
      }
      return { ok: true as const, session: snapshot };
    })
    .get("/:pin/results", async ({ params, set }) => {
      const results = isValidPin(params.pin) ? await engine.results(params.pin) : null;
      if (!results) {
        set.status = 404;
        return { ok: false as const, error: "NOT_FOUND" as const };
      }
      return { ok: true as const, results, table: formatResultsTable(results) };
    })
    .delete("/:pin", async ({ params, request, set }) => {
      const hostUserId = await runtime.resolveHostUserId(request.headers);
      if (!hostUserId) {
        set.status = 401;
        return { ok: false as const, error: "UNAUTHORIZED" as const };
      }

      const ownerId = isValidPin(params.pin) ? await engine.hostUserIdFor(params.pin) : null;
      if (ownerId === null) {
        set.status = 404;
        return { ok: false as const, error: "NOT_FOUND" as const };
      }
      if (ownerId !== hostUserId) {
        set.status = 403;
        return { ok: false as const, error: "UNAUTHORIZED" as const };
      }

      const aborted = await engine.abort(params.pin, "aborted");
      if (!aborted.ok) {
        set.status = statusForError(aborted.error);
        return { ok: false as const, error: aborted.error, message: aborted.message };
      }
      return { ok: true as const, changed: aborted.value.changed };
    });
}
