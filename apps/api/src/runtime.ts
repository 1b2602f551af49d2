import { readHostUserId, type HostIdentityResolver } from "./auth/client";
import { pool } from "./db/client";
import { readEngineConfig, type EngineConfig } from "./lib/config";
import { readRedisUrl } from "./lib/env";
import { ResultsRepository } from "./repositories/ResultsRepository";
import { ConnectionRegistry } from "./services/ConnectionRegistry";
import { QueuedResultsPublisher } from "./services/jobs/results-export-queue";
import { PinAllocator } from "./services/PinAllocator";
import { FileQuizCatalog, type QuizCatalog } from "./services/QuizCatalog";
import { RedisSessionStore } from "./services/RedisSessionStore";
import { DirectResultsPublisher, type ResultsPublisher } from "./services/ResultsPublisher";
import { SessionEngine } from "./services/SessionEngine";
import { SessionRouter } from "./services/SessionRouter";
import { MemorySessionStore, type SessionStore } from "./services/SessionStore";

export type Runtime = {
  config: EngineConfig;
  redisUrl: string | null;
  store: SessionStore;
  storeMode: "memory" | "redis";
  pins: PinAllocator;
  catalog: QuizCatalog;
  connections: ConnectionRegistry;
  repository: ResultsRepository;
  results: ResultsPublisher;
  engine: SessionEngine;
  router: SessionRouter;
  resolveHostUserId: HostIdentityResolver;
  close(): Promise<void>;
};

export type RuntimeOverrides = {
  redisUrl?: string | null;
  store?: SessionStore;
  catalog?: QuizCatalog;
  repository?: ResultsRepository;
  results?: ResultsPublisher;
  resolveHostUserId?: HostIdentityResolver;
  now?: () => number;
  newId?: () => string;
  random?: (maxExclusive: number) => number;
};

/** Wires every collaborator once; nothing in the app reaches for a module-level instance. */
export function createRuntime(config: EngineConfig = readEngineConfig(), overrides: RuntimeOverrides = {}): Runtime {
  const redisUrl = overrides.redisUrl === undefined ? readRedisUrl() : overrides.redisUrl;
  const now = overrides.now ?? (() => Date.now());

  const store =
    overrides.store ??
    (redisUrl
      ? new RedisSessionStore(redisUrl, { ttlMs: config.sessionTtlMs })
      : new MemorySessionStore({ ttlMs: config.sessionTtlMs, now }));
  const storeMode = store instanceof RedisSessionStore ? "redis" : "memory";

  const pins = new PinAllocator(store, {
    maxAttempts: config.pinMaxAttempts,
    capacityRatio: config.pinCapacityRatio,
    random: overrides.random,
  });
  const catalog = overrides.catalog ?? new FileQuizCatalog(config.quizCatalogPath);
  const connections = new ConnectionRegistry({ heartbeatTimeoutMs: config.hostHeartbeatTimeoutMs, now });
  const repository = overrides.repository ?? new ResultsRepository();
  const results =
    overrides.results ??
    (redisUrl ? new QueuedResultsPublisher(redisUrl) : new DirectResultsPublisher(repository));

  const engine = new SessionEngine({
    store,
    pins,
    catalog,
    connections,
    results,
    config,
    now,
    newId: overrides.newId,
  });
  const router = new SessionRouter(engine, { now });

  return {
    config,
    redisUrl,
    store,
    storeMode,
    pins,
    catalog,
    connections,
    repository,
    results,
    engine,
    router,
    resolveHostUserId: overrides.resolveHostUserId ?? readHostUserId,
    async close() {
      engine.stopSweeper();
      await results.close();
      await store.close();
      if (repository.dbEnabled) {
        await pool.end();
      }
    },
  };
}
