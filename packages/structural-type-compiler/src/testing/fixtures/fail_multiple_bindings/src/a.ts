/** @structural */
export interface Scores {
  [player: string]: number;
}
