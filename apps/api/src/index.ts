import { randomUUID } from "node:crypto";
import { cors } from "@elysiajs/cors";
import type { node } from "@elysiajs/node";
import { Elysia } from "elysia";
import { logEvent } from "./lib/logger";
import { authRoutes } from "./routes/auth";
import { realtimeRoutes } from "./routes/realtime";
import { sessionRoutes } from "./routes/sessions";
import type { Runtime } from "./runtime";

type CreateAppOptions = {
  adapter?: ReturnType<typeof node>;
};

function resolveStatus(status: unknown) {
  if (typeof status === "number") return status;
  if (typeof status === "string") {
    const parsed = Number.parseInt(status, 10);
    return Number.isFinite(parsed) ? parsed : 200;
  }
  return 200;
}

async function buildHealthDetailsPayload(runtime: Runtime) {
  return {
    ok: true as const,
    service: "livequiz-api",
    now: new Date().toISOString(),
    uptimeSec: Math.round(process.uptime()),
    storeMode: runtime.storeMode,
    resultsMode: runtime.results.mode,
    sessions: await runtime.engine.diagnostics(),
  };
}

export function createApp(runtime: Runtime, options: CreateAppOptions = {}) {
  return new Elysia({ adapter: options.adapter })
    .derive(({ request, set }) => {
      const headerRequestId = request.headers.get("x-request-id")?.trim();
      const requestId = headerRequestId && headerRequestId.length > 0 ? headerRequestId : randomUUID();
      set.headers["x-request-id"] = requestId;

      return {
        requestId,
        requestStartMs: Date.now(),
      };
    })
    .onAfterResponse(({ request, set, requestId, requestStartMs }) => {
      const durationMs = Math.max(0, Date.now() - requestStartMs);
      logEvent("info", "http_request_complete", {
        requestId,
        method: request.method,
        path: new URL(request.url).pathname,
        status: resolveStatus(set.status),
        durationMs,
      });
    })
    .get("/health", () => ({ ok: true as const }))
    .get("/health/details", () => buildHealthDetailsPayload(runtime))
    .use(
      cors({
        origin: true,
        credentials: true,
        methods: ["GET", "POST", "DELETE", "OPTIONS"],
        allowedHeaders: ["content-type", "authorization", "cookie", "x-request-id"],
        exposeHeaders: ["x-request-id"],
      }),
    )
    .use(authRoutes)
    .use(sessionRoutes(runtime))
    .use(realtimeRoutes(runtime))
    .group("/api", (scoped) =>
      scoped
        .get("/health", () => ({ ok: true as const }))
        .get("/health/details", () => buildHealthDetailsPayload(runtime)),
    );
}

export type App = ReturnType<typeof createApp>;
