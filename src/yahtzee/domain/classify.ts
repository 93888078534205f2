import { ROLL_KINDS, type RollClassification, type RollKind } from "./types";

/**
 * Reports which roll kinds a five-die hand matches.
 *
 * Counts are per die (how many dice share this die's value), so the kind
 * checks look for a 5, 4, 3 or 2 among those counts. Full house only needs a
 * 3 and a 2 to both appear. The low straight only looks at the four lowest
 * distinct values.
 */
export function classifyRoll(hand: readonly number[]): RollClassification {
  const counts = hand.map((die) => hand.filter((other) => other === die).length);
  const distinct = [...new Set(hand)].sort((a, b) => a - b);

  const yahtzee = counts.includes(5);
  const fullHouse = counts.includes(3) && counts.includes(2);
  const lowFour = distinct.slice(0, 4);
  const lowStraight =
    distinct.length >= 4 && Math.max(...lowFour) - Math.min(...lowFour) === 3;
  const highStraight =
    distinct.length === 5 && Math.max(...distinct) - Math.min(...distinct) === 4;
  const fourOfAKind = counts.includes(4);
  const threeOfAKind = counts.includes(3);

  return [yahtzee, fullHouse, lowStraight, highStraight, fourOfAKind, threeOfAKind];
}

export function describeClassification(classification: RollClassification): RollKind[] {
  return ROLL_KINDS.filter((_, i) => classification[i]);
}

export function formatRollKind(kind: RollKind): string {
  return kind
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}
