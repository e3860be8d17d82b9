export interface GameConfig {
  readonly turnDurationMs: number;
  readonly ratingK: number;
  readonly defaultRating: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    turnDurationMs: overrides.turnDurationMs ?? 30_000,
    ratingK: overrides.ratingK ?? 10,
    defaultRating: overrides.defaultRating ?? 1200,
  };
}
