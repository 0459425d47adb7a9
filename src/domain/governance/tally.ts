import { ProposalTally } from './governanceTypes.js';

export interface WinnerResult {
  choiceIndex: number;
  weight: number;
}

export const emptyTally = (proposalId: number, choiceCount: number): ProposalTally => ({
  proposalId,
  weights: Array.from({ length: choiceCount }, () => 0),
  voters: Array.from({ length: choiceCount }, () => 0),
});

/**
 * First strict maximum wins: ties keep the lower index.
 */
export const selectWinner = (weights: readonly number[]): WinnerResult => {
  let choiceIndex = 0;
  let weight = weights[0] ?? 0;

  for (let i = 1; i < weights.length; i++) {
    if (weights[i] > weight) {
      choiceIndex = i;
      weight = weights[i];
    }
  }

  return { choiceIndex, weight };
};
