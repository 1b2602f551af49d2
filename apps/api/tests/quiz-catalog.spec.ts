import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { FileQuizCatalog, MemoryQuizCatalog, parseQuiz, parseQuizQuestion } from "../src/services/QuizCatalog";
import { sampleQuiz } from "./helpers";

const CATALOG_PATH = fileURLToPath(new URL("../data/quizzes.json", import.meta.url));

describe("parseQuizQuestion", () => {
  it("fills ids, kind and time limit when they are left out", () => {
    expect(parseQuizQuestion({ prompt: "Pick one", choices: ["Red", "Blue"], correctChoiceIds: [1] }, 3)).toEqual({
      id: "q4",
      prompt: "Pick one",
      timeLimitMs: 20_000,
      kind: "choice",
      choices: [
        { id: "0", text: "Red" },
        { id: "1", text: "Blue" },
      ],
      correctChoiceIds: ["1"],
    });
  });

  it("reads free-text questions", () => {
    expect(
      parseQuizQuestion(
        { id: "t", prompt: "Spell it", kind: "text", acceptedAnswers: [" Colour ", "Color"], timeLimitSeconds: 12.5 },
        0,
      ),
    ).toEqual({
      id: "t",
      prompt: "Spell it",
      timeLimitMs: 12_500,
      kind: "text",
      acceptedAnswers: ["Colour", "Color"],
      caseSensitive: false,
    });
  });

  it("rejects questions that cannot be answered", () => {
    expect(parseQuizQuestion({ prompt: "No answers", kind: "text" }, 0)).toBeNull();
    expect(parseQuizQuestion({ prompt: "One choice", choices: ["Only"], correctChoiceIds: ["0"] }, 0)).toBeNull();
    expect(parseQuizQuestion({ prompt: "Bad key", choices: ["A", "B"], correctChoiceIds: ["7"] }, 0)).toBeNull();
    expect(parseQuizQuestion({ prompt: "Odd kind", kind: "slider", choices: ["A", "B"] }, 0)).toBeNull();
    expect(parseQuizQuestion("not an object", 0)).toBeNull();
  });
});

describe("parseQuiz", () => {
  it("keeps the valid questions and drops the rest", () => {
    const quiz = parseQuiz({
      id: "mixed",
      title: "Mixed",
      questions: [{ prompt: "Broken" }, { prompt: "Fine", kind: "vote", choices: ["Yes", "No"] }],
    });
    expect(quiz?.questions.map((question) => question.kind)).toEqual(["vote"]);
    expect(quiz?.questions[0]?.id).toBe("q2");
  });

  it("refuses a quiz with no usable question", () => {
    expect(parseQuiz({ id: "empty", title: "Empty", questions: [{ prompt: "Broken" }] })).toBeNull();
  });
});

describe("quiz catalogs", () => {
  it("serves the bundled quizzes from disk", async () => {
    const catalog = new FileQuizCatalog(CATALOG_PATH);
    const warmup = await catalog.getQuiz("warmup");

    expect(warmup?.title).toBe("Warm-up Round");
    expect(warmup?.questions.map((question) => question.kind)).toEqual(["choice", "text", "vote"]);
    expect(warmup?.questions[1]?.timeLimitMs).toBe(30_000);
    expect(await catalog.getQuiz("missing")).toBeNull();
  });

  it("is empty when the file does not exist", async () => {
    const catalog = new FileQuizCatalog(fileURLToPath(new URL("../data/absent.json", import.meta.url)));
    expect(await catalog.getQuiz("warmup")).toBeNull();
  });

  it("holds quizzes in memory", async () => {
    const catalog = new MemoryQuizCatalog();
    catalog.add(sampleQuiz());
    expect((await catalog.getQuiz("general"))?.questions).toHaveLength(3);
  });
});
