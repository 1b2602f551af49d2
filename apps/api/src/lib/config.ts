import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { readEnvVar, readIntEnv, readRatioEnv } from "./env";

const __dirname = fileURLToPath(new URL(".", import.meta.url));

export const DEFAULT_ENGINE_CONFIG = {
  httpPort: 3001,
  wsPort: 3002,
  sessionTtlMs: 3 * 60 * 60 * 1_000,
  hostHeartbeatTimeoutMs: 15_000,
  hostIdleTimeoutMs: 120_000,
  finishedGraceMs: 10 * 60 * 1_000,
  sweepIntervalMs: 5_000,
  pinMaxAttempts: 32,
  pinCapacityRatio: 0.9,
  quizCatalogPath: join(__dirname, "../../data/quizzes.json"),
};

export type EngineConfig = typeof DEFAULT_ENGINE_CONFIG;

export function readEngineConfig(): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;
  return {
    httpPort: readIntEnv("PORT", defaults.httpPort, { min: 1 }),
    wsPort: readIntEnv("WS_PORT", defaults.wsPort, { min: 1 }),
    sessionTtlMs: readIntEnv("SESSION_TTL_MS", defaults.sessionTtlMs, { min: 1_000 }),
    hostHeartbeatTimeoutMs: readIntEnv("HOST_HEARTBEAT_TIMEOUT_MS", defaults.hostHeartbeatTimeoutMs, {
      min: 1_000,
    }),
    hostIdleTimeoutMs: readIntEnv("HOST_IDLE_TIMEOUT_MS", defaults.hostIdleTimeoutMs, { min: 1_000 }),
    finishedGraceMs: readIntEnv("SESSION_FINISHED_GRACE_MS", defaults.finishedGraceMs, { min: 0 }),
    sweepIntervalMs: readIntEnv("SESSION_SWEEP_INTERVAL_MS", defaults.sweepIntervalMs, { min: 100 }),
    pinMaxAttempts: readIntEnv("PIN_MAX_ATTEMPTS", defaults.pinMaxAttempts, { min: 1 }),
    pinCapacityRatio: readRatioEnv("PIN_CAPACITY_RATIO", defaults.pinCapacityRatio),
    quizCatalogPath: readEnvVar("QUIZ_CATALOG_PATH")?.trim() || defaults.quizCatalogPath,
  };
}
