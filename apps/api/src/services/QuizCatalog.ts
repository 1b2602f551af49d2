import { existsSync, readFileSync } from "node:fs";
import { logEvent } from "../lib/logger";
import type { Quiz, QuizChoice, QuizQuestion } from "./session-types";

export interface QuizCatalog {
  getQuiz(quizId: string): Promise<Quiz | null>;
}

const DEFAULT_TIME_LIMIT_SECONDS = 20;

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  return value as Record<string, unknown>;
}

function readString(record: Record<string, unknown>, key: string) {
  const value = record[key];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readTimeLimitMs(record: Record<string, unknown>) {
  const raw = record.timeLimitSeconds;
  const seconds =
    typeof raw === "number" && Number.isFinite(raw) && raw > 0 ? raw : DEFAULT_TIME_LIMIT_SECONDS;
  return Math.round(seconds * 1_000);
}

function readChoices(value: unknown): QuizChoice[] {
  if (!Array.isArray(value)) return [];
  const choices: QuizChoice[] = [];
  value.forEach((entry, index) => {
    if (typeof entry === "string" && entry.trim()) {
      choices.push({ id: String(index), text: entry.trim() });
      return;
    }
    const record = asRecord(entry);
    const text = record ? readString(record, "text") : null;
    if (!record || !text) return;
    choices.push({ id: readString(record, "id") ?? String(index), text });
  });
  return choices;
}

function readStringList(value: unknown) {
  if (!Array.isArray(value)) return [];
  return value
    .map((entry) => (typeof entry === "number" ? String(entry) : entry))
    .filter((entry): entry is string => typeof entry === "string" && entry.trim().length > 0)
    .map((entry) => entry.trim());
}

export function parseQuizQuestion(value: unknown, position: number): QuizQuestion | null {
  const record = asRecord(value);
  if (!record) return null;
  const prompt = readString(record, "prompt");
  if (!prompt) return null;

  const base = {
    id: readString(record, "id") ?? `q${position + 1}`,
    prompt,
    timeLimitMs: readTimeLimitMs(record),
  };
  const kind = readString(record, "kind") ?? "choice";

  if (kind === "text") {
    const acceptedAnswers = readStringList(record.acceptedAnswers);
    if (acceptedAnswers.length === 0) return null;
    return { ...base, kind: "text", acceptedAnswers, caseSensitive: record.caseSensitive === true };
  }

  const choices = readChoices(record.choices);
  if (choices.length < 2) return null;

  if (kind === "vote") {
    return { ...base, kind: "vote", choices };
  }

  if (kind !== "choice") return null;
  const choiceIds = new Set(choices.map((choice) => choice.id));
  const correctChoiceIds = readStringList(record.correctChoiceIds).filter((id) => choiceIds.has(id));
  if (correctChoiceIds.length === 0) return null;
  return { ...base, kind: "choice", choices, correctChoiceIds };
}

export function parseQuiz(value: unknown): Quiz | null {
  const record = asRecord(value);
  if (!record) return null;
  const id = readString(record, "id");
  const title = readString(record, "title");
  if (!id || !title || !Array.isArray(record.questions)) return null;

  const questions: QuizQuestion[] = [];
  record.questions.forEach((entry, position) => {
    const question = parseQuizQuestion(entry, position);
    if (question) {
      questions.push(question);
      return;
    }
    logEvent("warn", "quiz_question_skipped", { quizId: id, position });
  });
  if (questions.length === 0) return null;
  return { id, title, questions };
}

export class MemoryQuizCatalog implements QuizCatalog {
  private readonly quizzes = new Map<string, Quiz>();

  constructor(quizzes: Quiz[] = []) {
    for (const quiz of quizzes) {
      this.quizzes.set(quiz.id, quiz);
    }
  }

  add(quiz: Quiz) {
    this.quizzes.set(quiz.id, quiz);
  }

  async getQuiz(quizId: string) {
    return this.quizzes.get(quizId) ?? null;
  }
}

/** Read-only catalog backed by a JSON file of `{ quizzes: [...] }`, loaded once. */
export class FileQuizCatalog implements QuizCatalog {
  private cache: Map<string, Quiz> | null = null;

  constructor(private readonly filePath: string) {}

  private load() {
    if (this.cache) return this.cache;
    const loaded = new Map<string, Quiz>();
    if (!existsSync(this.filePath)) {
      logEvent("warn", "quiz_catalog_missing", { filePath: this.filePath });
      this.cache = loaded;
      return loaded;
    }

    const parsed: unknown = JSON.parse(readFileSync(this.filePath, "utf8"));
    const record = asRecord(parsed);
    const entries = record && Array.isArray(record.quizzes) ? record.quizzes : [];
    for (const entry of entries) {
      const quiz = parseQuiz(entry);
      if (quiz) loaded.set(quiz.id, quiz);
    }
    logEvent("info", "quiz_catalog_loaded", { filePath: this.filePath, quizCount: loaded.size });
    this.cache = loaded;
    return loaded;
  }

  async getQuiz(quizId: string) {
    return this.load().get(quizId) ?? null;
  }
}
