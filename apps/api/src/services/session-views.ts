import type { ConnectionRole, QuestionChoiceView, ServerMessage } from "@livequiz/shared";
import type { PlayerRecord, QuestionRound, QuizQuestion, SessionRecord } from "./session-types";
import { submissionFor } from "./SessionMachine";

function choiceViews(question: QuizQuestion, audience: ConnectionRole, record: SessionRecord): QuestionChoiceView[] {
  if (question.kind === "text") return [];
  const hideText = audience === "player" && record.gameMode === "host_screen";
  return question.choices.map((choice) => ({ id: choice.id, text: hideText ? null : choice.text }));
}

/** Host screens always get the full question; players in host_screen mode only get choice ids. */
export function questionMessage(
  record: SessionRecord,
  round: QuestionRound,
  question: QuizQuestion,
  audience: ConnectionRole,
): ServerMessage {
  const hidePrompt = audience === "player" && record.gameMode === "host_screen";
  return {
    type: "question",
    index: round.index,
    questionCount: record.questions.length,
    prompt: hidePrompt ? null : question.prompt,
    kind: question.kind,
    choices: choiceViews(question, audience, record),
    timeLimitMs: round.timeLimitMs,
    startedAtMs: round.startedAtMs,
    deadlineMs: round.deadlineMs,
  };
}

export function hostConnectedMessage(
  record: SessionRecord,
  players: PlayerRecord[],
  isConnected: (name: string) => boolean,
): ServerMessage {
  return {
    type: "host_connected",
    pin: record.pin,
    title: record.title,
    phase: record.phase,
    questionIndex: record.questionIndex,
    questionCount: record.questions.length,
    gameMode: record.gameMode,
    players: players.map((player) => ({
      name: player.name,
      score: player.score,
      connected: isConnected(player.name),
    })),
  };
}

export function hasAnsweredCurrent(record: SessionRecord, name: string) {
  const round = record.round;
  if (!round || round.index !== record.questionIndex) return false;
  return submissionFor(round, name) !== undefined;
}

export function joinedMessage(record: SessionRecord, player: PlayerRecord, resumed: boolean): ServerMessage {
  return {
    type: "joined",
    pin: record.pin,
    name: player.name,
    resumeToken: player.resumeToken,
    resumed,
    score: player.score,
    phase: record.phase,
    questionIndex: record.questionIndex,
    questionCount: record.questions.length,
    hasAnsweredCurrent: hasAnsweredCurrent(record, player.name),
  };
}

export type PublicSessionSnapshot = {
  pin: string;
  title: string;
  phase: SessionRecord["phase"];
  questionIndex: number;
  questionCount: number;
  gameMode: SessionRecord["gameMode"];
  playerCount: number;
  players: Array<{ name: string; score: number; connected: boolean }>;
  finishReason: SessionRecord["finishReason"];
};

export function publicSnapshot(
  record: SessionRecord,
  players: PlayerRecord[],
  isConnected: (name: string) => boolean,
): PublicSessionSnapshot {
  return {
    pin: record.pin,
    title: record.title,
    phase: record.phase,
    questionIndex: record.questionIndex,
    questionCount: record.questions.length,
    gameMode: record.gameMode,
    playerCount: players.length,
    players: players.map((player) => ({
      name: player.name,
      score: player.score,
      connected: isConnected(player.name),
    })),
    finishReason: record.finishReason,
  };
}

export function openRoundView(record: SessionRecord) {
  const round = record.round;
  if (record.phase !== "question_open" || !round) return null;
  return {
    index: round.index,
    startedAtMs: round.startedAtMs,
    deadlineMs: round.deadlineMs,
    answeredCount: Object.keys(round.submissions).length,
  };
}
