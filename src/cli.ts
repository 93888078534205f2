#!/usr/bin/env node
import "dotenv/config";
import { loadEnv } from "./config/env";
import { createYahtzeeGame } from "./yahtzee/service/createYahtzeeGame";
import { YahtzeeError } from "./yahtzee/domain/errors";

async function main() {
  const env = loadEnv();
  const { game, logger, close } = createYahtzeeGame(env);
  logger.info({ nodeEnv: env.NODE_ENV, logFile: env.YAHTZEE_LOG_FILE }, "yahtzee starting");

  try {
    await game.play();
  } catch (err) {
    logger.error({ err }, "session aborted");
    throw err;
  } finally {
    close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof YahtzeeError) {
    console.error(`${err.code}: ${err.message}`);
    process.exit(err.exitCode);
  }
  console.error(err);
  process.exit(1);
});
