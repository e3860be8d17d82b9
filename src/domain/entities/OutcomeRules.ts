import type { Outcome } from "../typedefs.js";

export const MOVES = ["rock", "paper", "scissors"] as const;

export type Move = (typeof MOVES)[number];

/** A move slot after recording: a real move or an expired turn */
export type RecordedMove = Move | "timeout";

export const TIMEOUT = "timeout" as const satisfies RecordedMove;

/** Each move beats exactly one other move; the relation forms a single cycle. */
const BEATS: Readonly<Record<Move, Move>> = {
  rock: "scissors",
  scissors: "paper",
  paper: "rock",
};

export function isMove(value: unknown): value is Move {
  return MOVES.some((move) => move === value);
}

export function beats(move: Move, other: Move): boolean {
  return BEATS[move] === other;
}

export function resolveOutcome(moveA: Move, moveB: Move): Outcome {
  if (moveA === moveB) return "tie";
  return beats(moveA, moveB) ? "A" : "B";
}

/**
 * Outcome when at least one slot expired. The slot that did not time out
 * wins outright; a double timeout is a tie.
 */
export function resolveTimeoutOutcome(moveA: RecordedMove, moveB: RecordedMove): Outcome {
  const expiredA = moveA === TIMEOUT;
  const expiredB = moveB === TIMEOUT;
  if (expiredA && expiredB) return "tie";
  if (expiredA) return "B";
  if (expiredB) return "A";
  throw new Error("Timeout outcome requested but neither slot timed out");
}
