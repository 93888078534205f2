import { ConfigError } from "../yahtzee/domain/errors";

const DEFAULT_LOG_FILE = "yahtzee_game.log";
// the seeded roller works on unsigned 32-bit seeds
const MAX_DICE_SEED = 0xffffffff;

export interface Env {
  NODE_ENV: string;
  YAHTZEE_LOG_FILE: string;
  LOG_LEVEL: string;
  // Set => SeededDiceRoller, unset => RandomDiceRoller
  DICE_SEED: number | null;
}

function resolveDiceSeed(raw: string | undefined): number | null {
  if (raw == null || raw.trim() === "") {
    return null;
  }
  const seed = Number(raw.trim());
  if (!Number.isSafeInteger(seed)) {
    throw new ConfigError(`DICE_SEED must be an integer (got "${raw}")`);
  }
  if (seed < 0 || seed > MAX_DICE_SEED) {
    throw new ConfigError(`DICE_SEED must be between 0 and ${MAX_DICE_SEED} (got ${seed})`);
  }
  return seed;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const NODE_ENV = source.NODE_ENV ?? "development";
  return {
    NODE_ENV,
    YAHTZEE_LOG_FILE: source.YAHTZEE_LOG_FILE || DEFAULT_LOG_FILE,
    LOG_LEVEL: source.LOG_LEVEL ?? (NODE_ENV === "test" ? "silent" : "info"),
    DICE_SEED: resolveDiceSeed(source.DICE_SEED),
  };
}
