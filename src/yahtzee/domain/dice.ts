import type { DiceRollerPort } from "../ports/diceRollerPort";
import { HAND_SIZE, type Hand } from "./types";

export function rollHand(roller: DiceRollerPort): Hand {
  const hand: Hand = [];
  for (let i = 0; i < HAND_SIZE; i += 1) {
    hand.push(roller.rollDie());
  }
  return hand;
}

/**
 * Replaces the die at each zero-based position with a fresh value, in place.
 * A repeated position is simply rolled again.
 */
export function rerollPositions(
  hand: Hand,
  positions: readonly number[],
  roller: DiceRollerPort
): Hand {
  for (const position of positions) {
    hand[position] = roller.rollDie();
  }
  return hand;
}

/** Renders a hand as `[1, 2, 3, 4, 5]`. */
export function formatHand(hand: readonly number[]): string {
  return `[${hand.join(", ")}]`;
}
