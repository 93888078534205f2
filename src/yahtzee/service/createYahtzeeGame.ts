import type { Logger } from "pino";
import type { Env } from "../../config/env";
import { getLogger } from "../../config/logger";
import { RandomDiceRoller } from "../adapters/dice/randomDiceRoller";
import { SeededDiceRoller } from "../adapters/dice/seededDiceRoller";
import { ReadlineConsole } from "../adapters/console/readlineConsole";
import type { ConsolePort } from "../ports/consolePort";
import type { DiceRollerPort } from "../ports/diceRollerPort";
import { YahtzeeGame } from "./game.service";

export function createDiceRollerFromEnv(env: Pick<Env, "DICE_SEED">): DiceRollerPort {
  if (env.DICE_SEED != null) {
    return new SeededDiceRoller(env.DICE_SEED);
  }
  return new RandomDiceRoller();
}

export function createYahtzeeGame(
  env: Env,
  options?: {
    console?: ConsolePort;
    roller?: DiceRollerPort;
    logger?: Logger;
  }
): { game: YahtzeeGame; logger: Logger; close: () => void } {
  const logger = options?.logger ?? getLogger(env);
  const io = options?.console ?? new ReadlineConsole();
  const roller = options?.roller ?? createDiceRollerFromEnv(env);

  return {
    game: new YahtzeeGame({ console: io, roller, logger }),
    logger,
    close: () => io.close(),
  };
}
