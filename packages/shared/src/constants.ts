export const SESSION_PHASES = [
  "lobby",
  "question_open",
  "question_closed",
  "finished",
] as const;

export const QUESTION_KINDS = ["choice", "text", "vote"] as const;

export const GAME_MODES = ["standard", "host_screen"] as const;

export const FINISH_REASONS = [
  "completed",
  "ended_by_host",
  "aborted",
  "host_timeout",
  "shutdown",
] as const;

export const ENGINE_ERROR_CODES = [
  "VALIDATION_ERROR",
  "ILLEGAL_TRANSITION",
  "ROUND_CLOSED",
  "DUPLICATE_SUBMISSION",
  "HOST_ALREADY_CONNECTED",
  "UNAUTHORIZED",
  "ALLOCATION_EXHAUSTED",
  "NOT_FOUND",
  "NAME_TAKEN",
  "QUIZ_NOT_FOUND",
  "INTERNAL_ERROR",
] as const;

export const MAX_POINTS = 1_000;
export const PIN_LENGTH = 6;
export const MAX_DISPLAY_NAME_LENGTH = 32;
export const MAX_ANSWER_LENGTH = 500;
