import type { PlayerRecord, ScoreEntry, SessionRecord } from "./session-types";

export type SessionMutation = (current: SessionRecord) => SessionRecord;

/**
 * Ephemeral per-session state. Every write refreshes the session's TTL; an
 * expired session reads as missing from every collection.
 */
export interface SessionStore {
  reservePin(pin: string): Promise<boolean>;
  releasePin(pin: string): Promise<void>;
  activePins(): Promise<string[]>;

  create(session: SessionRecord): Promise<void>;
  get(pin: string): Promise<SessionRecord | null>;
  update(pin: string, mutation: SessionMutation): Promise<SessionRecord | null>;
  delete(pin: string): Promise<void>;

  getPlayer(pin: string, name: string): Promise<PlayerRecord | null>;
  listPlayers(pin: string): Promise<PlayerRecord[]>;
  putPlayer(pin: string, player: PlayerRecord): Promise<void>;
  removePlayer(pin: string, name: string): Promise<boolean>;

  /** Appends the entry and bumps the player's totals as one unit; null when the player is gone. */
  appendScore(pin: string, entry: ScoreEntry): Promise<PlayerRecord | null>;
  listScores(pin: string): Promise<ScoreEntry[]>;

  close(): Promise<void>;
}

type StoredSession = {
  session: SessionRecord;
  players: Map<string, PlayerRecord>;
  scores: ScoreEntry[];
  expiresAtMs: number;
};

type MemorySessionStoreOptions = {
  ttlMs: number;
  now?: () => number;
};

function copySession(session: SessionRecord): SessionRecord {
  return structuredClone(session);
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly pins = new Set<string>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: MemorySessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => Date.now());
  }

  private live(pin: string) {
    const stored = this.sessions.get(pin);
    if (!stored) return null;
    if (stored.expiresAtMs <= this.now()) {
      this.sessions.delete(pin);
      return null;
    }
    return stored;
  }

  private touch(stored: StoredSession) {
    stored.expiresAtMs = this.now() + this.ttlMs;
  }

  async reservePin(pin: string) {
    if (this.pins.has(pin)) return false;
    this.pins.add(pin);
    return true;
  }

  async releasePin(pin: string) {
    this.pins.delete(pin);
  }

  async activePins() {
    return [...this.pins];
  }

  async create(session: SessionRecord) {
    this.sessions.set(session.pin, {
      session: copySession(session),
      players: new Map(),
      scores: [],
      expiresAtMs: this.now() + this.ttlMs,
    });
  }

  async get(pin: string) {
    const stored = this.live(pin);
    return stored ? copySession(stored.session) : null;
  }

  async update(pin: string, mutation: SessionMutation) {
    const stored = this.live(pin);
    if (!stored) return null;
    stored.session = copySession(mutation(copySession(stored.session)));
    this.touch(stored);
    return copySession(stored.session);
  }

  async delete(pin: string) {
    this.sessions.delete(pin);
  }

  async getPlayer(pin: string, name: string) {
    const player = this.live(pin)?.players.get(name);
    return player ? { ...player } : null;
  }

  async listPlayers(pin: string) {
    const stored = this.live(pin);
    if (!stored) return [];
    return [...stored.players.values()]
      .map((player) => ({ ...player }))
      .sort((left, right) => left.joinedAtMs - right.joinedAtMs);
  }

  async putPlayer(pin: string, player: PlayerRecord) {
    const stored = this.live(pin);
    if (!stored) return;
    stored.players.set(player.name, { ...player });
    this.touch(stored);
  }

  async removePlayer(pin: string, name: string) {
    const stored = this.live(pin);
    if (!stored) return false;
    const removed = stored.players.delete(name);
    this.touch(stored);
    return removed;
  }

  async appendScore(pin: string, entry: ScoreEntry) {
    const stored = this.live(pin);
    const player = stored?.players.get(entry.name);
    if (!stored || !player) return null;

    stored.scores.push({ ...entry });
    player.score += entry.points;
    player.answeredCount += 1;
    if (entry.correct) player.correctCount += 1;
    this.touch(stored);
    return { ...player };
  }

  async listScores(pin: string) {
    const stored = this.live(pin);
    return stored ? stored.scores.map((entry) => ({ ...entry })) : [];
  }

  async close() {
    this.sessions.clear();
    this.pins.clear();
  }
}
