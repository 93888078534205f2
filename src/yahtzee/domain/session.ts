import { NotFoundError } from "./errors";
import type { PlayerId, RollClassification } from "./types";

/** In-memory results of one sitting, players kept in creation order. */
export class GameSession {
  private results = new Map<PlayerId, RollClassification[]>();

  static withPlayers(count: number): GameSession {
    const session = new GameSession();
    for (let i = 1; i <= count; i += 1) {
      session.addPlayer(`Player ${i}`);
    }
    return session;
  }

  addPlayer(player: PlayerId): void {
    if (!this.results.has(player)) {
      this.results.set(player, []);
    }
  }

  record(player: PlayerId, classification: RollClassification): void {
    const list = this.results.get(player);
    if (!list) {
      throw new NotFoundError(`player not found: ${player}`);
    }
    list.push(classification);
  }

  resultsFor(player: PlayerId): readonly RollClassification[] {
    const list = this.results.get(player);
    if (!list) {
      throw new NotFoundError(`player not found: ${player}`);
    }
    return [...list];
  }

  players(): PlayerId[] {
    return [...this.results.keys()];
  }

  totalTurns(): number {
    let total = 0;
    for (const list of this.results.values()) total += list.length;
    return total;
  }
}
