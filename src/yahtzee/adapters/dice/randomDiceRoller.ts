import type { DiceRollerPort } from "../../ports/diceRollerPort";
import { DIE_FACES, type DieValue } from "../../domain/types";

export class RandomDiceRoller implements DiceRollerPort {
  readonly kind = "random";

  rollDie(): DieValue {
    return DIE_FACES[Math.floor(Math.random() * DIE_FACES.length)];
  }
}
