import IORedis from "ioredis";
import { SESSION_PHASES } from "@livequiz/shared";
import { logEvent } from "../lib/logger";
import type { PlayerRecord, ScoreEntry, SessionRecord } from "./session-types";
import type { SessionMutation, SessionStore } from "./SessionStore";

export const ACTIVE_PINS_KEY = "sessions:active";

export function sessionKey(pin: string) {
  return `session:${pin}`;
}

export function playersKey(pin: string) {
  return `session:${pin}:players`;
}

export function scoresKey(pin: string) {
  return `session:${pin}:scores`;
}

const UPDATE_MAX_ATTEMPTS = 5;

// KEYS: session, players, scores. ARGV: expected json, next json, ttl ms.
const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current ~= ARGV[1] then return 0 end
redis.call('SET', KEYS[1], ARGV[2], 'PX', ARGV[3])
redis.call('PEXPIRE', KEYS[2], ARGV[3])
redis.call('PEXPIRE', KEYS[3], ARGV[3])
return 1
`;

// KEYS: players, scores, session. ARGV: name, entry json, ttl ms.
const APPEND_SCORE_SCRIPT = `
local raw = redis.call('HGET', KEYS[1], ARGV[1])
if not raw then return false end
local player = cjson.decode(raw)
local entry = cjson.decode(ARGV[2])
player.score = player.score + entry.points
player.answeredCount = player.answeredCount + 1
if entry.correct then player.correctCount = player.correctCount + 1 end
local encoded = cjson.encode(player)
redis.call('HSET', KEYS[1], ARGV[1], encoded)
redis.call('RPUSH', KEYS[2], ARGV[2])
redis.call('PEXPIRE', KEYS[1], ARGV[3])
redis.call('PEXPIRE', KEYS[2], ARGV[3])
redis.call('PEXPIRE', KEYS[3], ARGV[3])
return encoded
`;

function parseJson(raw: string | null): Record<string, unknown> | null {
  if (raw === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logEvent("warn", "session_store_decode_failed", {
      error: error instanceof Error ? error.message : "UNKNOWN_ERROR",
    });
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return null;
  return parsed as Record<string, unknown>;
}

function isSessionRecord(value: Record<string, unknown>): value is SessionRecord {
  return (
    typeof value.pin === "string" &&
    typeof value.sessionId === "string" &&
    typeof value.questionIndex === "number" &&
    Array.isArray(value.questions) &&
    Array.isArray(value.playedIndices) &&
    Array.isArray(value.kickedNames) &&
    SESSION_PHASES.some((phase) => phase === value.phase)
  );
}

function isPlayerRecord(value: Record<string, unknown>): value is PlayerRecord {
  return (
    typeof value.name === "string" &&
    typeof value.score === "number" &&
    typeof value.answeredCount === "number" &&
    typeof value.correctCount === "number" &&
    typeof value.resumeToken === "string"
  );
}

function isScoreEntry(value: Record<string, unknown>): value is ScoreEntry {
  return (
    typeof value.name === "string" &&
    typeof value.questionIndex === "number" &&
    typeof value.points === "number" &&
    typeof value.correct === "boolean"
  );
}

export function decodeSession(raw: string | null): SessionRecord | null {
  const record = parseJson(raw);
  return record && isSessionRecord(record) ? record : null;
}

export function decodePlayer(raw: string | null): PlayerRecord | null {
  const record = parseJson(raw);
  if (!record || !isPlayerRecord(record)) return null;
  return { ...record, connectionId: typeof record.connectionId === "string" ? record.connectionId : null };
}

export function decodeScore(raw: string | null): ScoreEntry | null {
  const record = parseJson(raw);
  return record && isScoreEntry(record) ? record : null;
}

export class RedisSessionStore implements SessionStore {
  private readonly redis: IORedis;
  private readonly ttlMs: number;

  constructor(redisUrl: string, options: { ttlMs: number }) {
    this.redis = new IORedis(redisUrl, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
    });
    this.ttlMs = options.ttlMs;
  }

  async reservePin(pin: string) {
    const added = await this.redis.sadd(ACTIVE_PINS_KEY, pin);
    return added === 1;
  }

  async releasePin(pin: string) {
    await this.redis.srem(ACTIVE_PINS_KEY, pin);
  }

  async activePins() {
    return await this.redis.smembers(ACTIVE_PINS_KEY);
  }

  async create(session: SessionRecord) {
    const created = await this.redis.set(
      sessionKey(session.pin),
      JSON.stringify(session),
      "PX",
      this.ttlMs,
      "NX",
    );
    if (created !== "OK") throw new Error("SESSION_ALREADY_EXISTS");
  }

  async get(pin: string) {
    return decodeSession(await this.redis.get(sessionKey(pin)));
  }

  async update(pin: string, mutation: SessionMutation) {
    for (let attempt = 1; attempt <= UPDATE_MAX_ATTEMPTS; attempt += 1) {
      const raw = await this.redis.get(sessionKey(pin));
      const current = decodeSession(raw);
      if (raw === null || !current) return null;
      const next = mutation(current);
      const written: unknown = await this.redis.eval(
        COMPARE_AND_SET_SCRIPT,
        3,
        sessionKey(pin),
        playersKey(pin),
        scoresKey(pin),
        raw,
        JSON.stringify(next),
        String(this.ttlMs),
      );
      if (written === 1) return next;
      logEvent("warn", "session_store_update_conflict", { pin, attempt });
    }
    throw new Error("SESSION_UPDATE_CONFLICT");
  }

  async delete(pin: string) {
    await this.redis.del(sessionKey(pin), playersKey(pin), scoresKey(pin));
  }

  async getPlayer(pin: string, name: string) {
    return decodePlayer(await this.redis.hget(playersKey(pin), name));
  }

  async listPlayers(pin: string) {
    const values = await this.redis.hvals(playersKey(pin));
    return values
      .map((raw) => decodePlayer(raw))
      .filter((player): player is PlayerRecord => player !== null)
      .sort((left, right) => left.joinedAtMs - right.joinedAtMs);
  }

  async putPlayer(pin: string, player: PlayerRecord) {
    await this.redis
      .multi()
      .hset(playersKey(pin), player.name, JSON.stringify(player))
      .pexpire(playersKey(pin), this.ttlMs)
      .pexpire(sessionKey(pin), this.ttlMs)
      .exec();
  }

  async removePlayer(pin: string, name: string) {
    const removed = await this.redis.hdel(playersKey(pin), name);
    return removed > 0;
  }

  async appendScore(pin: string, entry: ScoreEntry) {
    const result: unknown = await this.redis.eval(
      APPEND_SCORE_SCRIPT,
      3,
      playersKey(pin),
      scoresKey(pin),
      sessionKey(pin),
      entry.name,
      JSON.stringify(entry),
      String(this.ttlMs),
    );
    return typeof result === "string" ? decodePlayer(result) : null;
  }

  async listScores(pin: string) {
    const values = await this.redis.lrange(scoresKey(pin), 0, -1);
    return values
      .map((raw) => decodeScore(raw))
      .filter((entry): entry is ScoreEntry => entry !== null);
  }

  async close() {
    await this.redis.quit();
  }
}
