import { MAX_POINTS } from "@livequiz/shared";

/** Share of MAX_POINTS a correct answer loses when it lands exactly on the deadline. */
export const SPEED_DECAY = 0.5;

function elapsedFraction(elapsedMs: number, timeLimitMs: number) {
  if (!(timeLimitMs > 0)) return 1;
  const clamped = Math.min(Math.max(elapsedMs, 0), timeLimitMs);
  return clamped / timeLimitMs;
}

/**
 * Points for one answer. Incorrect answers score 0; correct ones decay linearly
 * from MAX_POINTS at elapsed 0 to half of it at the time limit.
 */
export function score(correct: boolean, elapsedMs: number, timeLimitMs: number) {
  if (!correct) return 0;
  const fraction = Number.isFinite(elapsedMs) ? elapsedFraction(elapsedMs, timeLimitMs) : 1;
  const points = Math.round(MAX_POINTS * (1 - SPEED_DECAY * fraction));
  return Math.min(MAX_POINTS, Math.max(0, points));
}
