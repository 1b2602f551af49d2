export type SessionPhase = (typeof import("./constants").SESSION_PHASES)[number];
export type QuestionKind = (typeof import("./constants").QUESTION_KINDS)[number];
export type GameMode = (typeof import("./constants").GAME_MODES)[number];
export type FinishReason = (typeof import("./constants").FINISH_REASONS)[number];
export type EngineErrorCode = (typeof import("./constants").ENGINE_ERROR_CODES)[number];
export type Pin = string;
export type PlayerName = string;
export type ConnectionRole = "host" | "player";
