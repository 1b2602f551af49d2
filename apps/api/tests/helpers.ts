import type { ServerMessage } from "@livequiz/shared";
import { ConnectionRegistry, type Connection } from "../src/services/ConnectionRegistry";
import { PinAllocator } from "../src/services/PinAllocator";
import { MemoryQuizCatalog } from "../src/services/QuizCatalog";
import type { ResultsPublisher } from "../src/services/ResultsPublisher";
import { SessionEngine } from "../src/services/SessionEngine";
import type { SessionResults } from "../src/services/SessionResults";
import { MemorySessionStore } from "../src/services/SessionStore";
import type { Quiz } from "../src/services/session-types";

export const HOST_ID = "host-1";

export function sampleQuiz(): Quiz {
  return {
    id: "general",
    title: "General Knowledge",
    questions: [
      {
        id: "q-capital",
        kind: "choice",
        prompt: "Capital of Italy?",
        timeLimitMs: 60_000,
        choices: [
          { id: "a", text: "Rome" },
          { id: "b", text: "Milan" },
          { id: "c", text: "Naples" },
        ],
        correctChoiceIds: ["a"],
      },
      {
        id: "q-formula",
        kind: "text",
        prompt: "Chemical formula of water?",
        timeLimitMs: 30_000,
        acceptedAnswers: ["H2O"],
        caseSensitive: false,
      },
      {
        id: "q-season",
        kind: "vote",
        prompt: "Best season?",
        timeLimitMs: 20_000,
        choices: [
          { id: "spring", text: "Spring" },
          { id: "summer", text: "Summer" },
        ],
      },
    ],
  };
}

type ParsedMessage<T extends ServerMessage["type"]> = Extract<ServerMessage, { type: T }>;

/** In-process stand-in for a socket: keeps every frame and the close call. */
export class FakeConnection implements Connection {
  readonly sent: ServerMessage[] = [];
  closed: { code: number; reason: string } | null = null;
  failSends = false;

  constructor(readonly id: string) {}

  send(payload: string) {
    if (this.failSends) throw new Error("SOCKET_NOT_OPEN");
    this.sent.push(JSON.parse(payload) as ServerMessage);
  }

  close(code: number, reason: string) {
    this.closed = { code, reason };
  }

  ofType<T extends ServerMessage["type"]>(type: T): ParsedMessage<T>[] {
    return this.sent.filter((message): message is ParsedMessage<T> => message.type === type);
  }

  last<T extends ServerMessage["type"]>(type: T): ParsedMessage<T> | undefined {
    return this.ofType(type).at(-1);
  }
}

export class RecordingPublisher implements ResultsPublisher {
  readonly mode = "direct" as const;
  readonly published: SessionResults[] = [];

  async publish(results: SessionResults) {
    this.published.push(results);
  }

  async close() {}
}

export function createEngineHarness(
  quizzes: Quiz[] = [sampleQuiz()],
  store: MemorySessionStore = new MemorySessionStore({ ttlMs: 3 * 60 * 60 * 1_000 }),
) {
  let nextPin = 100_000;
  let nextId = 0;
  const pins = new PinAllocator(store, {
    maxAttempts: 4,
    capacityRatio: 0.9,
    random: () => {
      nextPin += 1;
      return nextPin - 1;
    },
  });
  const connections = new ConnectionRegistry({ heartbeatTimeoutMs: 15_000 });
  const publisher = new RecordingPublisher();
  const engine = new SessionEngine({
    store,
    pins,
    catalog: new MemoryQuizCatalog(quizzes),
    connections,
    results: publisher,
    config: { hostIdleTimeoutMs: 120_000, finishedGraceMs: 600_000, sweepIntervalMs: 5_000 },
    newId: () => {
      nextId += 1;
      return `id-${nextId}`;
    },
  });
  return { engine, store, pins, connections, publisher };
}

export type EngineHarness = ReturnType<typeof createEngineHarness>;

/** Creates a session, attaches the host and joins each named player. */
export async function startSession(
  harness: EngineHarness,
  names: string[],
  gameMode: "standard" | "host_screen" = "standard",
) {
  const created = await harness.engine.createSession({ quizId: "general", hostUserId: HOST_ID, gameMode });
  if (!created.ok) throw new Error(created.message);
  const pin = created.value.pin;

  const host = new FakeConnection("conn-host");
  const attached = await harness.engine.attachHost(pin, HOST_ID, host);
  if (!attached.ok) throw new Error(attached.message);

  const players: Record<string, FakeConnection> = {};
  const tokens: Record<string, string> = {};
  for (const name of names) {
    const connection = new FakeConnection(`conn-${name}`);
    const joined = await harness.engine.joinPlayer(pin, { name, resumeToken: null, connection });
    if (!joined.ok) throw new Error(joined.message);
    players[name] = connection;
    tokens[name] = joined.value.resumeToken;
  }

  return { pin, sessionId: created.value.sessionId, host, players, tokens };
}

export function connectionFor(players: Record<string, FakeConnection>, name: string) {
  const connection = players[name];
  if (!connection) throw new Error(`no connection for ${name}`);
  return connection;
}
