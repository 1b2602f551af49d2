import { Elysia } from "elysia";
import { isValidPin } from "@livequiz/shared";
import type { Runtime } from "../runtime";

export function realtimeRoutes(runtime: Runtime) {
  return new Elysia({ prefix: "/realtime" }).get("/session/:pin", async ({ params, set }) => {
    const state = isValidPin(params.pin) ? await runtime.engine.realtimeSnapshot(params.pin) : null;
    if (!state) {
      set.status = 404;
      return { ok: false, error: "NOT_FOUND" };
    }

    return {
      ok: true as const,
      pin: params.pin,
      snapshot: state.snapshot,
      round: state.round,
      serverNowMs: state.serverNowMs,
    };
  });
}
