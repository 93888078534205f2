import { ValidationError } from "./errors";
import type { RerollSelection, YesNo } from "./types";

const MIN_POSITION = 1;
const MAX_POSITION = 5;

/**
 * Parses a reroll selection such as "1, 3,5".
 *
 * Whitespace and commas are dropped and every remaining character must be a
 * single digit between 1 and 5: "10" is rejected because "0" is checked on
 * its own. An empty selection is valid and rerolls nothing.
 */
export function validateAndProcessInput(raw: string): RerollSelection {
  const chars = [...raw.replace(/[\s,]/g, "")];

  const valid = chars.every((c) => {
    if (!/^[0-9]$/.test(c)) return false;
    const n = Number(c);
    return n >= MIN_POSITION && n <= MAX_POSITION;
  });

  if (!valid) {
    return { valid: false, positions: [] };
  }
  return { valid: true, positions: chars.map((c) => Number(c) - 1) };
}

/** Strict answer for the reroll question: anything but y/n is rejected. */
export function parseYesNo(raw: string): YesNo | null {
  const answer = raw.trim().toLowerCase();
  if (answer === "y" || answer === "n") return answer;
  return null;
}

/** Loose answer for the next-round question: only "y" keeps playing. */
export function wantsAnotherRound(raw: string): boolean {
  return raw.trim().toLowerCase() === "y";
}

export function parsePlayerCount(raw: string): number {
  const text = raw.trim();
  if (!/^\d+$/.test(text)) {
    throw new ValidationError(`invalid number of players: "${raw}"`);
  }
  const count = Number(text);
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new ValidationError(`number of players must be at least 1 (got ${text})`);
  }
  return count;
}
