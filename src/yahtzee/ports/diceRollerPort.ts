import type { DieValue } from "../domain/types";

export interface DiceRollerPort {
  /** Short label written to the session log ("random", "seeded", ...). */
  readonly kind: string;
  rollDie(): DieValue;
}
