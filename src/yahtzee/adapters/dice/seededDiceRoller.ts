import type { DiceRollerPort } from "../../ports/diceRollerPort";
import { DIE_FACES, type DieValue } from "../../domain/types";

function mulberry32(seed: number) {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Deterministic roller: die n of the stream is drawn from a generator seeded
 * with seed + n, so a given (seed, cursor) always yields the same face.
 */
export class SeededDiceRoller implements DiceRollerPort {
  readonly kind = "seeded";
  private cursor: number;

  constructor(private readonly seed: number, cursor = 0) {
    this.cursor = cursor;
  }

  get rngCursor(): number {
    return this.cursor;
  }

  rollDie(): DieValue {
    const rng = mulberry32((this.seed + this.cursor) >>> 0);
    this.cursor += 1;
    return DIE_FACES[Math.floor(rng() * DIE_FACES.length)];
  }
}
