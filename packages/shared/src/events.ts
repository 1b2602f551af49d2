import type {
  EngineErrorCode,
  FinishReason,
  GameMode,
  QuestionKind,
  SessionPhase,
} from "./types";

export type HostCommand =
  | { type: "start_question"; index: number }
  | { type: "close_question" }
  | { type: "next_question" }
  | { type: "end_game" }
  | { type: "kick_player"; name: string }
  | { type: "abort" }
  | { type: "heartbeat" };

export type PlayerCommand =
  | { type: "join"; name: string; resumeToken: string | null }
  | { type: "submit_answer"; value: string; clientTimestamp: number | null }
  | { type: "heartbeat" };

export type ClientMessage = HostCommand | PlayerCommand;

export type QuestionChoiceView = {
  id: string;
  // null in host_screen mode: players only see which button to press.
  text: string | null;
};

export type LeaderboardEntry = {
  rank: number;
  name: string;
  score: number;
  correctCount: number;
  answeredCount: number;
};

export type RoundResultEntry = {
  name: string;
  answered: boolean;
  correct: boolean;
  points: number;
  totalScore: number;
  latencyMs: number | null;
};

export type ServerMessage =
  | {
      type: "host_connected";
      pin: string;
      title: string;
      phase: SessionPhase;
      questionIndex: number;
      questionCount: number;
      gameMode: GameMode;
      players: Array<{ name: string; score: number; connected: boolean }>;
    }
  | {
      type: "joined";
      pin: string;
      name: string;
      resumeToken: string;
      resumed: boolean;
      score: number;
      phase: SessionPhase;
      questionIndex: number;
      questionCount: number;
      hasAnsweredCurrent: boolean;
    }
  | { type: "player_joined"; name: string; resumed: boolean; playerCount: number }
  | { type: "player_left"; name: string; kicked: boolean; playerCount: number }
  | { type: "phase_changed"; phase: SessionPhase; questionIndex: number }
  | {
      type: "question";
      index: number;
      questionCount: number;
      prompt: string | null;
      kind: QuestionKind;
      choices: QuestionChoiceView[];
      timeLimitMs: number;
      startedAtMs: number;
      deadlineMs: number;
    }
  | { type: "answer_ack"; questionIndex: number }
  | { type: "answer_received"; name: string; answeredCount: number; playerCount: number }
  | {
      type: "results";
      questionIndex: number;
      kind: QuestionKind;
      correctAnswers: string[];
      voteTally: Record<string, number> | null;
      entries: RoundResultEntry[];
      leaderboard: LeaderboardEntry[];
    }
  | {
      type: "leaderboard";
      final: boolean;
      finishReason: FinishReason | null;
      entries: LeaderboardEntry[];
    }
  | { type: "kicked"; reason: string }
  | { type: "heartbeat_ack"; serverNowMs: number }
  | {
      type: "error";
      code: EngineErrorCode;
      message: string;
      requestType: string | null;
    };

export type ServerMessageType = ServerMessage["type"];
