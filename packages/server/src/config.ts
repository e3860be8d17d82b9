import { createGameConfig, type GameConfig } from "./core.js";

export const DEFAULT_PORT = 8787;

export interface ServerConfig {
  readonly port: number;
  readonly game: GameConfig;
}

type Env = Readonly<Record<string, string | undefined>>;

function positiveInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/** Missing or malformed variables fall back to their defaults. */
export function loadServerConfig(env: Env): ServerConfig {
  const turnDurationMs = positiveInteger(env["TURN_DURATION_MS"]);
  const ratingK = positiveInteger(env["RATING_K"]);

  return {
    port: positiveInteger(env["PORT"]) ?? DEFAULT_PORT,
    game: createGameConfig({
      ...(turnDurationMs !== undefined ? { turnDurationMs } : {}),
      ...(ratingK !== undefined ? { ratingK } : {}),
    }),
  };
}
