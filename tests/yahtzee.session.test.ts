import { describe, it, expect } from "vitest";
import { GameSession } from "../src/yahtzee/domain/session";
import { classifyRoll } from "../src/yahtzee/domain/classify";
import { NotFoundError } from "../src/yahtzee/domain/errors";

describe("GameSession", () => {
  it("creates numbered players in order", () => {
    const session = GameSession.withPlayers(3);
    expect(session.players()).toEqual(["Player 1", "Player 2", "Player 3"]);
    expect(session.totalTurns()).toBe(0);
  });

  it("records classifications per player", () => {
    const session = GameSession.withPlayers(2);
    const full = classifyRoll([4, 4, 4, 1, 1]);
    const straight = classifyRoll([1, 2, 3, 4, 5]);

    session.record("Player 2", full);
    session.record("Player 1", straight);
    session.record("Player 2", straight);

    expect(session.resultsFor("Player 1")).toEqual([straight]);
    expect(session.resultsFor("Player 2")).toEqual([full, straight]);
    expect(session.totalTurns()).toBe(3);
  });

  it("returns a copy of the results", () => {
    const session = GameSession.withPlayers(1);
    session.record("Player 1", classifyRoll([1, 2, 3, 4, 5]));
    const copy = session.resultsFor("Player 1");
    expect(copy).not.toBe(session.resultsFor("Player 1"));
  });

  it("throws NotFoundError for unknown players", () => {
    const session = GameSession.withPlayers(1);
    expect(() => session.record("Player 9", classifyRoll([1, 1, 1, 1, 1]))).toThrow(
      NotFoundError
    );
    expect(() => session.resultsFor("nobody")).toThrow("player not found: nobody");
  });
});
