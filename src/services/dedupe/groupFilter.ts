import { DuplicateGroup } from '../../types';

export interface GroupFilterOptions {
  pairsOnly: boolean;
}

/**
 * In pairs-only mode larger groups are left for manual review.
 */
export const admitGroup = (group: DuplicateGroup, { pairsOnly }: GroupFilterOptions): boolean =>
  !pairsOnly || group.assets.length === 2;
