import { formatRollKind } from "./classify";
import { ROLL_KINDS, type RollClassification, type RollStatistics } from "./types";

export function summarizeResults(results: readonly RollClassification[]): RollStatistics {
  const totalGames = results.length;

  const categories = ROLL_KINDS.map((kind, i) => {
    const count = results.filter((result) => result[i]).length;
    return {
      kind,
      count,
      percentage: totalGames === 0 ? 0 : (count / totalGames) * 100,
    };
  });

  return { totalGames, categories };
}

export function formatStatistics(stats: RollStatistics): string[] {
  if (stats.totalGames === 0) {
    return ["No games played."];
  }

  return [
    `In ${stats.totalGames} games, you rolled:`,
    ...stats.categories.map(
      (c) => `${formatRollKind(c.kind)}: ${c.count} (${c.percentage.toFixed(2)}%)`
    ),
  ];
}
