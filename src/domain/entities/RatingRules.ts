import type { Outcome } from "../typedefs.js";

export interface RatingUpdate {
  readonly newRatingA: number;
  readonly newRatingB: number;
  readonly deltaA: number;
  readonly deltaB: number;
}

export const expectedScore = (rating: number, opponentRating: number): number =>
  1 / (1 + Math.pow(10, (opponentRating - rating) / 400));

export function roundHalfAwayFromZero(value: number): number {
  // "+ 0" folds -0 into 0
  return Math.sign(value) * Math.round(Math.abs(value)) + 0;
}

const SCORES: Readonly<Record<Outcome, readonly [number, number]>> = {
  A: [1, 0],
  B: [0, 1],
  tie: [0.5, 0.5],
};

/**
 * Logistic expected-score update. Each side's delta is rounded on its own,
 * so the two deltas are not guaranteed to cancel out.
 */
export function updateRatings(
  ratingA: number,
  ratingB: number,
  outcome: Outcome,
  k: number,
): RatingUpdate {
  const [scoreA, scoreB] = SCORES[outcome];
  const deltaA = roundHalfAwayFromZero(k * (scoreA - expectedScore(ratingA, ratingB)));
  const deltaB = roundHalfAwayFromZero(k * (scoreB - expectedScore(ratingB, ratingA)));

  return {
    newRatingA: ratingA + deltaA,
    newRatingB: ratingB + deltaB,
    deltaA,
    deltaB,
  };
}
