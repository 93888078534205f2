import type { Logger } from "pino";
import type { ConsolePort } from "../ports/consolePort";
import type { DiceRollerPort } from "../ports/diceRollerPort";
import { GameSession } from "../domain/session";
import { formatHand, rerollPositions, rollHand } from "../domain/dice";
import { classifyRoll, describeClassification } from "../domain/classify";
import { formatStatistics, summarizeResults } from "../domain/statistics";
import {
  parsePlayerCount,
  parseYesNo,
  validateAndProcessInput,
  wantsAnotherRound,
} from "../domain/input";
import type { PlayerId, YesNo } from "../domain/types";

export const PROMPTS = {
  playerCount: "Enter the number of players: ",
  replaceAny: "Do you want to replace any dice? (y/n): ",
  replaceWhich:
    "Type the values of each die you want to replace (1-5), separate with a comma: ",
  playAgain: "Do you want to play another game? (y/n): ",
} as const;

export const MESSAGES = {
  welcome: "Welcome to Yahtzee!",
  badYesNo: "Incorrect input. Please enter 'y' for yes or 'n' for no.",
  badSelection: "Incorrect input. Please enter values between 1 and 5, separated by commas.",
} as const;

const RULE_WIDTH = 80;

export interface YahtzeeGameDeps {
  console: ConsolePort;
  roller: DiceRollerPort;
  logger: Logger;
}

export class YahtzeeGame {
  private io: ConsolePort;
  private roller: DiceRollerPort;
  private log: Logger;

  constructor(deps: YahtzeeGameDeps) {
    this.io = deps.console;
    this.roller = deps.roller;
    this.log = deps.logger;
  }

  async play(): Promise<GameSession> {
    this.io.print(MESSAGES.welcome);
    this.io.print("=".repeat(RULE_WIDTH));

    const playerCount = parsePlayerCount(await this.io.ask(PROMPTS.playerCount));
    const session = GameSession.withPlayers(playerCount);
    this.log.info({ players: playerCount, roller: this.roller.kind }, "session started");

    let round = 0;
    do {
      round += 1;
      for (const player of session.players()) {
        await this.playTurn(session, player, round);
      }
    } while (wantsAnotherRound(await this.io.ask(PROMPTS.playAgain)));

    this.log.info({ rounds: round, turns: session.totalTurns() }, "session finished");

    for (const player of session.players()) {
      this.io.print(`\nStatistics for ${player}:`);
      const lines = formatStatistics(summarizeResults(session.resultsFor(player)));
      for (const line of lines) this.io.print(line);
    }

    return session;
  }

  private async playTurn(session: GameSession, player: PlayerId, round: number): Promise<void> {
    this.io.print(`\n${"-".repeat(RULE_WIDTH)}\n`);
    this.io.print(`${player}'s Turn\n`);

    const hand = rollHand(this.roller);
    this.log.info({ player, round, hand }, "dice rolled");
    this.io.print(`You rolled: ${formatHand(hand)}\n`);

    if ((await this.askYesNo(PROMPTS.replaceAny)) === "y") {
      const positions = await this.askRerollPositions();
      rerollPositions(hand, positions, this.roller);
      this.log.info({ player, round, positions, hand }, "dice rerolled");
      this.io.print(`New roll: ${formatHand(hand)}\n`);
    }

    const classification = classifyRoll(hand);
    session.record(player, classification);
    this.log.info(
      { player, round, hand, kinds: describeClassification(classification) },
      "roll classified"
    );
  }

  private async askYesNo(prompt: string): Promise<YesNo> {
    for (;;) {
      const answer = parseYesNo(await this.io.ask(prompt));
      if (answer) return answer;
      this.io.print(MESSAGES.badYesNo);
    }
  }

  private async askRerollPositions(): Promise<number[]> {
    for (;;) {
      const selection = validateAndProcessInput(await this.io.ask(PROMPTS.replaceWhich));
      if (selection.valid) return selection.positions;
      this.log.debug("invalid reroll selection");
      this.io.print(MESSAGES.badSelection);
    }
  }
}
