import { randomUUID } from "node:crypto";
import type { FinishReason, GameMode, ServerMessage } from "@livequiz/shared";
import type { EngineConfig } from "../lib/config";
import { errorMessage, logEvent } from "../lib/logger";
import { CLOSE_CODES, type Connection, type ConnectionRegistry } from "./ConnectionRegistry";
import type { PinAllocator } from "./PinAllocator";
import type { QuizCatalog } from "./QuizCatalog";
import type { ResultsPublisher } from "./ResultsPublisher";
import { score } from "./ScoreCalculator";
import { SessionMachine, correctAnswersFor, evaluateAnswer } from "./SessionMachine";
import { buildSessionResults, rankPlayers, toLeaderboard, voteTally, type SessionResults } from "./SessionResults";
import type { SessionStore } from "./SessionStore";
import { SessionWorker } from "./SessionWorker";
import {
  hostConnectedMessage,
  joinedMessage,
  openRoundView,
  publicSnapshot,
  questionMessage,
} from "./session-views";
import type { EngineResult, PlayerRecord, QuestionRound, QuizQuestion, SessionRecord } from "./session-types";
import { fail, succeed } from "./session-types";

export type SessionEngineConfig = Pick<EngineConfig, "hostIdleTimeoutMs" | "finishedGraceMs" | "sweepIntervalMs">;

type SessionEngineDependencies = {
  store: SessionStore;
  pins: PinAllocator;
  catalog: QuizCatalog;
  connections: ConnectionRegistry;
  results: ResultsPublisher;
  config: SessionEngineConfig;
  now?: () => number;
  newId?: () => string;
};

export type CreateSessionInput = {
  quizId: string;
  hostUserId: string;
  gameMode?: GameMode;
};

export type JoinPlayerInput = {
  name: string;
  resumeToken: string | null;
  connection: Connection;
};

export type SweepOutcome = "kept" | "timed_out" | "purged" | "released" | "skipped";

function missingSession(pin: string) {
  return fail("NOT_FOUND", `session ${pin} not found`);
}

/**
 * Owns every session's lifecycle. Each mutating operation is queued on the
 * session's worker before its first await, so commands from one connection
 * apply in arrival order and a session never runs two tasks at once.
 */
export class SessionEngine {
  private readonly store: SessionStore;
  private readonly pins: PinAllocator;
  private readonly catalog: QuizCatalog;
  private readonly connections: ConnectionRegistry;
  private readonly publisher: ResultsPublisher;
  private readonly config: SessionEngineConfig;
  private readonly now: () => number;
  private readonly newId: () => string;
  private readonly workers = new Map<string, SessionWorker>();
  private readonly pendingPins = new Map<string, number>();
  private readonly pendingPublishes = new Set<Promise<void>>();
  private sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(dependencies: SessionEngineDependencies) {
    this.store = dependencies.store;
    this.pins = dependencies.pins;
    this.catalog = dependencies.catalog;
    this.connections = dependencies.connections;
    this.publisher = dependencies.results;
    this.config = dependencies.config;
    this.now = dependencies.now ?? (() => Date.now());
    this.newId = dependencies.newId ?? (() => randomUUID());
  }

  private workerFor(pin: string) {
    let worker = this.workers.get(pin);
    if (!worker) {
      worker = new SessionWorker(pin);
      this.workers.set(pin, worker);
    }
    return worker;
  }

  private dropWorker(pin: string) {
    const worker = this.workers.get(pin);
    if (!worker) return;
    worker.dispose();
    this.workers.delete(pin);
  }

  private async forgetWorkerIfOrphaned(pin: string, worker: SessionWorker) {
    if (!worker.isIdle() || worker.armedRoundId() !== null) return;
    if (await this.store.get(pin)) return;
    if (this.workers.get(pin) === worker && worker.isIdle()) {
      this.dropWorker(pin);
    }
  }

  private enqueue<T>(
    pin: string,
    operation: string,
    task: () => Promise<EngineResult<T>>,
  ): Promise<EngineResult<T>> {
    const worker = this.workerFor(pin);
    return worker
      .run(task)
      .catch((error: unknown) => {
        logEvent("error", "session_task_failed", { pin, operation, error: errorMessage(error) });
        return fail("INTERNAL_ERROR", "unexpected server error");
      })
      .then(async (result) => {
        if (!result.ok && result.error === "NOT_FOUND") {
          await this.forgetWorkerIfOrphaned(pin, worker);
        }
        return result;
      });
  }

  private async load(pin: string) {
    const record = await this.store.get(pin);
    return record ? new SessionMachine(record) : null;
  }

  private async persist(pin: string, machine: SessionMachine, hostActivityAtMs?: number) {
    if (hostActivityAtMs !== undefined) machine.touchHost(hostActivityAtMs);
    const snapshot = machine.snapshot();
    await this.store.update(pin, () => snapshot);
    return snapshot;
  }

  private broadcast(pin: string, message: ServerMessage) {
    this.connections.sendToHost(pin, message);
    this.connections.broadcastToPlayers(pin, message);
  }

  private announcePhase(pin: string, record: SessionRecord) {
    this.broadcast(pin, { type: "phase_changed", phase: record.phase, questionIndex: record.questionIndex });
  }

  private announceQuestion(pin: string, record: SessionRecord, round: QuestionRound, question: QuizQuestion) {
    this.workerFor(pin).armTimer(round.roundId, round.deadlineMs - this.now(), (roundId) => {
      this.closeFromTimer(pin, roundId);
    });
    this.announcePhase(pin, record);
    this.connections.sendToHost(pin, questionMessage(record, round, question, "host"));
    this.connections.broadcastToPlayers(pin, questionMessage(record, round, question, "player"));
    logEvent("info", "question_opened", {
      pin,
      questionIndex: round.index,
      roundId: round.roundId,
      deadlineMs: round.deadlineMs,
    });
  }

  private closeFromTimer(pin: string, roundId: string) {
    void this.closeRound(pin, "timer", roundId).then((result) => {
      if (!result.ok) {
        logEvent("warn", "question_timer_close_failed", { pin, roundId, error: result.error });
      }
    });
  }

  private async announceResults(pin: string, record: SessionRecord, round: QuestionRound) {
    const question = record.questions[round.index];
    if (!question) return;
    const [players, scores] = await Promise.all([this.store.listPlayers(pin), this.store.listScores(pin)]);
    const roundScores = scores.filter((entry) => entry.questionIndex === round.index);

    const entries = players.map((player) => {
      const entry = roundScores.find((candidate) => candidate.name === player.name);
      return {
        name: player.name,
        answered: entry !== undefined,
        correct: entry?.correct ?? false,
        points: entry?.points ?? 0,
        totalScore: player.score,
        latencyMs: entry?.latencyMs ?? null,
      };
    });

    this.broadcast(pin, {
      type: "results",
      questionIndex: round.index,
      kind: question.kind,
      correctAnswers: correctAnswersFor(question),
      voteTally: voteTally(question, roundScores),
      entries,
      leaderboard: toLeaderboard(rankPlayers(players, scores)),
    });
    logEvent("info", "question_closed", {
      pin,
      questionIndex: round.index,
      reason: round.closeReason,
      answeredCount: roundScores.length,
    });
  }

  private async finish(pin: string, record: SessionRecord, closedRound: QuestionRound | null) {
    this.workerFor(pin).cancelTimer();
    if (closedRound) {
      await this.announceResults(pin, record, closedRound);
    }

    const [players, scores] = await Promise.all([this.store.listPlayers(pin), this.store.listScores(pin)]);
    const results = buildSessionResults(record, players, scores);
    this.announcePhase(pin, record);
    this.broadcast(pin, {
      type: "leaderboard",
      final: true,
      finishReason: record.finishReason,
      entries: toLeaderboard(results.players),
    });
    this.publishResults(results);
    this.connections.closeSession(pin, CLOSE_CODES.sessionFinished, "session finished");
    logEvent("info", "session_finished", {
      pin,
      sessionId: record.sessionId,
      reason: record.finishReason,
      playerCount: players.length,
      playedCount: record.playedIndices.length,
    });
  }

  private publishResults(results: SessionResults) {
    const pending = this.publisher.publish(results).catch((error: unknown) => {
      logEvent("error", "session_results_publish_failed", {
        pin: results.pin,
        sessionId: results.sessionId,
        mode: this.publisher.mode,
        error: errorMessage(error),
      });
    });
    this.pendingPublishes.add(pending);
    void pending.finally(() => {
      this.pendingPublishes.delete(pending);
    });
  }

  private holdPin(pin: string) {
    this.pendingPins.set(pin, (this.pendingPins.get(pin) ?? 0) + 1);
  }

  private dropPin(pin: string) {
    const holds = (this.pendingPins.get(pin) ?? 0) - 1;
    if (holds > 0) this.pendingPins.set(pin, holds);
    else this.pendingPins.delete(pin);
  }

  async createSession(input: CreateSessionInput): Promise<EngineResult<{ pin: string; sessionId: string; title: string; questionCount: number }>> {
    const quiz = await this.catalog.getQuiz(input.quizId);
    if (!quiz) {
      return fail("QUIZ_NOT_FOUND", `quiz ${input.quizId} does not exist`);
    }

    const allocated = await this.pins.allocate({
      hold: (candidate) => this.holdPin(candidate),
      drop: (candidate) => this.dropPin(candidate),
    });
    if (!allocated.ok) return allocated;

    const pin = allocated.value;
    const nowMs = this.now();
    const record: SessionRecord = {
      pin,
      sessionId: this.newId(),
      quizId: quiz.id,
      title: quiz.title,
      questions: structuredClone(quiz.questions),
      hostUserId: input.hostUserId,
      gameMode: input.gameMode ?? "standard",
      phase: "lobby",
      questionIndex: -1,
      round: null,
      playedIndices: [],
      kickedNames: [],
      createdAtMs: nowMs,
      hostSeenAtMs: nowMs,
      finishedAtMs: null,
      finishReason: null,
    };

    try {
      await this.store.create(record);
    } catch (error) {
      await this.pins.release(pin);
      logEvent("error", "session_create_failed", { pin, quizId: quiz.id, error: errorMessage(error) });
      return fail("INTERNAL_ERROR", "could not create the session");
    } finally {
      this.dropPin(pin);
    }

    logEvent("info", "session_created", {
      pin,
      sessionId: record.sessionId,
      quizId: quiz.id,
      hostUserId: input.hostUserId,
      gameMode: record.gameMode,
      questionCount: record.questions.length,
    });
    return succeed({ pin, sessionId: record.sessionId, title: record.title, questionCount: record.questions.length });
  }

  attachHost(pin: string, hostUserId: string, connection: Connection) {
    return this.enqueue<{ takeover: boolean }>(pin, "attach_host", async () => {
      const machine = await this.load(pin);
      if (!machine) return missingSession(pin);
      const current = machine.snapshot();
      if (current.hostUserId !== hostUserId) {
        return fail("UNAUTHORIZED", "only the session's host can connect as host");
      }
      if (current.phase === "finished") {
        return fail("ILLEGAL_TRANSITION", "session is finished");
      }

      const registered = this.connections.registerHost(pin, connection);
      if (!registered.ok) return registered;

      const record = await this.persist(pin, machine, this.now());
      const players = await this.store.listPlayers(pin);
      this.connections.sendToHost(
        pin,
        hostConnectedMessage(record, players, (name) => this.connections.isPlayerConnected(pin, name)),
      );
      const question = machine.currentQuestion();
      const round = machine.round();
      if (record.phase === "question_open" && round && question) {
        this.connections.sendToHost(pin, questionMessage(record, round, question, "host"));
      }
      logEvent("info", "host_connected", {
        pin,
        connectionId: connection.id,
        takeover: registered.value.replaced !== null,
      });
      return succeed({ takeover: registered.value.replaced !== null });
    });
  }

  hostDisconnected(pin: string, connectionId: string) {
    const removed = this.connections.unregister(pin, { role: "host" }, connectionId);
    if (removed) {
      logEvent("info", "host_disconnected", { pin, connectionId });
    }
    return removed;
  }

  hostHeartbeat(pin: string, connectionId: string) {
    this.connections.touch(pin, "host", connectionId);
    return this.enqueue(pin, "host_heartbeat", async () => {
      const machine = await this.load(pin);
      if (!machine) return missingSession(pin);
      const nowMs = this.now();
      await this.persist(pin, machine, nowMs);
      return succeed({ serverNowMs: nowMs });
    });
  }

  startQuestion(pin: string, index: number) {
    return this.enqueue<{ changed: boolean; questionIndex: number; deadlineMs: number }>(pin, "start_question", async () => {
      const machine = await this.load(pin);
      if (!machine) return missingSession(pin);
      const nowMs = this.now();
      const opened = machine.openQuestion({ index, nowMs, roundId: this.newId() });
      if (!opened.ok) return opened;

      const record = await this.persist(pin, machine, nowMs);
      if (opened.changed) {
        this.announceQuestion(pin, record, opened.round, opened.question);
      }
      return succeed({ changed: opened.changed, questionIndex: opened.round.index, deadlineMs: opened.round.deadlineMs });
    });
  }

  nextQuestion(pin: string) {
    return this.enqueue<{ outcome: "opened" | "finished"; questionIndex: number }>(pin, "next_question", async () => {
      const machine = await this.load(pin);
      if (!machine) return missingSession(pin);
      const nowMs = this.now();
      const advanced = machine.nextQuestion({ nowMs, roundId: this.newId() });
      if (!advanced.ok) return advanced;

      const record = await this.persist(pin, machine, nowMs);
      if (advanced.outcome === "finished") {
        await this.finish(pin, record, null);
        return succeed({ outcome: advanced.outcome, questionIndex: record.questionIndex });
      }
      if (advanced.changed) {
        this.announceQuestion(pin, record, advanced.round, advanced.question);
      }
      return succeed({ outcome: advanced.outcome, questionIndex: advanced.round.index });
    });
  }

  closeQuestion(pin: string) {
    return this.closeRound(pin, "host");
  }

  private closeRound(pin: string, reason: "host" | "timer", roundId?: string) {
    return this.enqueue<{ changed: boolean; questionIndex: number }>(
      pin,
      reason === "timer" ? "question_timer" : "close_question",
      async () => {
        const machine = await this.load(pin);
        if (!machine) return missingSession(pin);
        const nowMs = this.now();
        const closed = machine.closeQuestion({ nowMs, reason, roundId });
        if (!closed.ok) return closed;
        if (!closed.changed || !closed.round) {
          return succeed({ changed: false, questionIndex: machine.questionIndex() });
        }

        this.workerFor(pin).cancelTimer();
        const record = await this.persist(pin, machine, reason === "host" ? nowMs : undefined);
        this.announcePhase(pin, record);
        await this.announceResults(pin, record, closed.round);
        return succeed({ changed: true, questionIndex: closed.round.index });
      },
    );
  }

  endGame(pin: string) {
    return this.enqueue(pin, "end_game", async () => {
      const machine = await this.load(pin);
      if (!machine) return missingSession(pin);
      const nowMs = this.now();
      const ended = machine.endGame(nowMs);
      if (!ended.ok) return ended;

      const record = await this.persist(pin, machine, nowMs);
      await this.finish(pin, record, null);
      return succeed({ finishReason: record.finishReason });
    });
  }

  abort(pin: string, reason: FinishReason = "aborted") {
    return this.enqueue(pin, "abort", async () => this.abortNow(pin, reason));
  }

  private async abortNow(pin: string, reason: FinishReason): Promise<EngineResult<{ changed: boolean }>> {
    const machine = await this.load(pin);
    if (!machine) return missingSession(pin);
    const aborted = machine.abort(this.now(), reason);
    if (!aborted.ok) return aborted;
    if (!aborted.changed) return succeed({ changed: false });

    const record = await this.persist(pin, machine);
    await this.finish(pin, record, aborted.closedRound);
    return succeed({ changed: true });
  }

  kickPlayer(pin: string, name: string) {
    return this.enqueue(pin, "kick_player", async () => {
      const machine = await this.load(pin);
      if (!machine) return missingSession(pin);
      const player = await this.store.getPlayer(pin, name);
      if (!player) return fail("NOT_FOUND", `player ${name} is not in this session`);
      const kicked = machine.kick(name);
      if (!kicked.ok) return kicked;

      await this.persist(pin, machine, this.now());
      await this.store.removePlayer(pin, name);
      this.connections.disconnectPlayer(
        pin,
        name,
        { type: "kicked", reason: "removed by the host" },
        CLOSE_CODES.kicked,
      );
      this.connections.sendToHost(pin, {
        type: "player_left",
        name,
        kicked: true,
        playerCount: this.connections.connectedPlayerCount(pin),
      });
      logEvent("info", "player_kicked", { pin, name });
      return succeed({ name });
    });
  }

  joinPlayer(pin: string, input: JoinPlayerInput) {
    const { name, resumeToken, connection } = input;
    return this.enqueue(pin, "join", async () => {
      const machine = await this.load(pin);
      if (!machine) return missingSession(pin);
      if (machine.phase() === "finished") {
        return fail("ILLEGAL_TRANSITION", "session is finished");
      }
      if (machine.isKicked(name)) {
        return fail("UNAUTHORIZED", `${name} was removed from this session by the host`);
      }

      const nowMs = this.now();
      const existing = await this.store.getPlayer(pin, name);
      let player: PlayerRecord;
      let resumed = false;

      if (existing) {
        const tokenMatches = resumeToken !== null && resumeToken === existing.resumeToken;
        const heldElsewhere =
          existing.connectionId !== null &&
          existing.connectionId !== connection.id &&
          this.connections.isPlayerConnected(pin, name);
        if (!tokenMatches && heldElsewhere) {
          return fail("NAME_TAKEN", `${name} is already playing in this session`);
        }
        player = { ...existing, connectionId: connection.id };
        resumed = true;
      } else {
        player = {
          name,
          joinedAtMs: nowMs,
          score: 0,
          answeredCount: 0,
          correctCount: 0,
          resumeToken: this.newId(),
          connectionId: connection.id,
        };
      }

      await this.store.putPlayer(pin, player);
      this.connections.registerPlayer(pin, name, connection);

      const record = machine.snapshot();
      this.connections.sendToPlayer(pin, name, joinedMessage(record, player, resumed));
      const round = machine.round();
      const question = machine.currentQuestion();
      if (record.phase === "question_open" && round && question && !machine.roundExpired(nowMs)) {
        this.connections.sendToPlayer(pin, name, questionMessage(record, round, question, "player"));
      }
      this.connections.sendToHost(pin, {
        type: "player_joined",
        name,
        resumed,
        playerCount: this.connections.connectedPlayerCount(pin),
      });
      logEvent("info", resumed ? "player_resumed" : "player_joined", { pin, name, connectionId: connection.id });
      return succeed({ name, resumed, resumeToken: player.resumeToken });
    });
  }

  /** Drops the socket binding now; the player record keeps its score for a later resume. */
  playerDisconnected(pin: string, name: string, connectionId: string) {
    const removed = this.connections.unregister(pin, { role: "player", name }, connectionId);
    if (!removed) return Promise.resolve<EngineResult<{ changed: boolean }>>(succeed({ changed: false }));

    return this.enqueue<{ changed: boolean }>(pin, "player_disconnected", async () => {
      const player = await this.store.getPlayer(pin, name);
      if (!player || player.connectionId !== connectionId) {
        return succeed({ changed: false });
      }
      await this.store.putPlayer(pin, { ...player, connectionId: null });
      this.connections.sendToHost(pin, {
        type: "player_left",
        name,
        kicked: false,
        playerCount: this.connections.connectedPlayerCount(pin),
      });
      logEvent("info", "player_disconnected", { pin, name, connectionId });
      return succeed({ changed: true });
    });
  }

  /** `receivedAtMs` is the server receive time; admission never trusts the client clock. */
  submitAnswer(pin: string, name: string, value: string, receivedAtMs = this.now()) {
    return this.enqueue(pin, "submit_answer", async () => {
      const machine = await this.load(pin);
      if (!machine) return missingSession(pin);
      const player = await this.store.getPlayer(pin, name);
      if (!player) return fail("NOT_FOUND", `player ${name} has not joined this session`);

      if (machine.roundExpired(receivedAtMs)) {
        const closed = machine.closeQuestion({ nowMs: receivedAtMs, reason: "deadline" });
        if (closed.ok && closed.changed && closed.round) {
          this.workerFor(pin).cancelTimer();
          const record = await this.persist(pin, machine);
          this.announcePhase(pin, record);
          await this.announceResults(pin, record, closed.round);
        }
        logEvent("debug", "answer_rejected", { pin, name, error: "ROUND_CLOSED", receivedAtMs });
        return fail("ROUND_CLOSED", "the answer arrived after the deadline");
      }

      const admitted = machine.admitAnswer(name, value, receivedAtMs);
      if (!admitted.ok) {
        logEvent("debug", "answer_rejected", { pin, name, error: admitted.error, receivedAtMs });
        return admitted;
      }

      const evaluation = evaluateAnswer(admitted.question, value);
      if (!evaluation.valid) {
        return fail("VALIDATION_ERROR", evaluation.message);
      }

      const points = score(evaluation.correct, admitted.elapsedMs, admitted.round.timeLimitMs);
      await this.persist(pin, machine);
      const updated = await this.store.appendScore(pin, {
        name,
        questionIndex: admitted.round.index,
        points,
        correct: evaluation.correct,
        latencyMs: admitted.elapsedMs,
        value,
        submittedAtMs: receivedAtMs,
      });

      this.connections.sendToPlayer(pin, name, { type: "answer_ack", questionIndex: admitted.round.index });
      const players = await this.store.listPlayers(pin);
      this.connections.sendToHost(pin, {
        type: "answer_received",
        name,
        answeredCount: Object.keys(admitted.round.submissions).length,
        playerCount: players.length,
      });
      logEvent("debug", "answer_accepted", {
        pin,
        name,
        questionIndex: admitted.round.index,
        points,
        latencyMs: admitted.elapsedMs,
      });
      return succeed({
        questionIndex: admitted.round.index,
        correct: evaluation.correct,
        points,
        totalScore: updated?.score ?? player.score + points,
      });
    });
  }

  async snapshot(pin: string) {
    const record = await this.store.get(pin);
    if (!record) return null;
    const players = await this.store.listPlayers(pin);
    return publicSnapshot(record, players, (name) => this.connections.isPlayerConnected(pin, name));
  }

  async realtimeSnapshot(pin: string) {
    const record = await this.store.get(pin);
    if (!record) return null;
    const players = await this.store.listPlayers(pin);
    return {
      snapshot: publicSnapshot(record, players, (name) => this.connections.isPlayerConnected(pin, name)),
      round: openRoundView(record),
      serverNowMs: this.now(),
    };
  }

  async results(pin: string) {
    const record = await this.store.get(pin);
    if (!record) return null;
    const [players, scores] = await Promise.all([this.store.listPlayers(pin), this.store.listScores(pin)]);
    return buildSessionResults(record, players, scores);
  }

  async hostUserIdFor(pin: string) {
    const record = await this.store.get(pin);
    return record?.hostUserId ?? null;
  }

  private sweepSession(pin: string, nowMs: number) {
    return this.enqueue<SweepOutcome>(pin, "sweep", async () => {
      const record = await this.store.get(pin);
      if (!record) {
        await this.pins.release(pin);
        this.connections.closeSession(pin, CLOSE_CODES.sessionFinished, "session expired");
        this.dropWorker(pin);
        logEvent("info", "session_expired", { pin });
        return succeed("released");
      }

      if (record.phase !== "finished" && nowMs - record.hostSeenAtMs > this.config.hostIdleTimeoutMs) {
        logEvent("warn", "session_host_timeout", { pin, silentForMs: nowMs - record.hostSeenAtMs });
        const aborted = await this.abortNow(pin, "host_timeout");
        return aborted.ok ? succeed("timed_out") : aborted;
      }

      if (
        record.phase === "finished" &&
        record.finishedAtMs !== null &&
        nowMs - record.finishedAtMs >= this.config.finishedGraceMs
      ) {
        await this.store.delete(pin);
        await this.pins.release(pin);
        this.connections.closeSession(pin, CLOSE_CODES.sessionFinished, "session closed");
        this.dropWorker(pin);
        logEvent("info", "session_purged", { pin, sessionId: record.sessionId });
        return succeed("purged");
      }

      return succeed("kept");
    });
  }

  async sweep(nowMs = this.now()) {
    const counts: Record<SweepOutcome, number> = { kept: 0, timed_out: 0, purged: 0, released: 0, skipped: 0 };
    for (const pin of await this.store.activePins()) {
      if (this.pendingPins.has(pin)) {
        counts.skipped += 1;
        continue;
      }
      const outcome = await this.sweepSession(pin, nowMs);
      if (outcome.ok) counts[outcome.value] += 1;
    }
    return counts;
  }

  startSweeper() {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        logEvent("error", "session_sweep_failed", { error: errorMessage(error) });
      });
    }, this.config.sweepIntervalMs);
    this.sweeper.unref();
  }

  stopSweeper() {
    if (!this.sweeper) return;
    clearInterval(this.sweeper);
    this.sweeper = null;
  }

  /** Finishes every live session with reason "shutdown" and waits for their results to be handed off. */
  async shutdown() {
    this.stopSweeper();
    const pins = await this.store.activePins();
    const outcomes = await Promise.all(pins.map((pin) => this.abort(pin, "shutdown")));
    await Promise.all([...this.pendingPublishes]);
    for (const pin of [...this.workers.keys()]) {
      this.dropWorker(pin);
    }
    const flushed = outcomes.filter((outcome) => outcome.ok && outcome.value.changed).length;
    logEvent("info", "session_engine_stopped", { sessionCount: pins.length, flushed });
    return flushed;
  }

  async diagnostics() {
    const phaseCounts: Record<string, number> = {};
    const pins = await this.store.activePins();
    for (const pin of pins) {
      const record = await this.store.get(pin);
      const phase = record?.phase ?? "expired";
      phaseCounts[phase] = (phaseCounts[phase] ?? 0) + 1;
    }
    return {
      sessionCount: pins.length,
      phaseCounts,
      workerCount: this.workers.size,
      pendingResults: this.pendingPublishes.size,
      connections: this.connections.diagnostics(),
      config: this.config,
    };
  }
}
