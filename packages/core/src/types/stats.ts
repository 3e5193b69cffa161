/**
 * Merge Statistics
 */

export interface MergeStats {
  copied: number;
  overwritten: number;
  mergedJson: number;
  skipped: number;
  errors: number;
}

export type MergeOutcome = keyof MergeStats;

export function createMergeStats(): MergeStats {
  return {
    copied: 0,
    overwritten: 0,
    mergedJson: 0,
    skipped: 0,
    errors: 0,
  };
}
