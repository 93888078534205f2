export const DIE_FACES = [1, 2, 3, 4, 5, 6] as const;

export type DieValue = (typeof DIE_FACES)[number];

export const HAND_SIZE = 5;

/** Exactly HAND_SIZE dice once rolled; rerolls mutate it in place. */
export type Hand = DieValue[];

/** Fixed order of the six roll kinds; also the order of the classification tuple. */
export const ROLL_KINDS = [
  "yahtzee",
  "full_house",
  "low_straight",
  "high_straight",
  "four_of_a_kind",
  "three_of_a_kind",
] as const;

export type RollKind = (typeof ROLL_KINDS)[number];

export type RollClassification = readonly [
  yahtzee: boolean,
  full_house: boolean,
  low_straight: boolean,
  high_straight: boolean,
  four_of_a_kind: boolean,
  three_of_a_kind: boolean,
];

export type PlayerId = string;

export type YesNo = "y" | "n";

export type RerollSelection =
  | { valid: true; positions: number[] }
  | { valid: false; positions: [] };

export interface CategoryStats {
  kind: RollKind;
  count: number;
  percentage: number;
}

export interface RollStatistics {
  totalGames: number;
  categories: CategoryStats[];
}
