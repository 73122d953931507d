import { Asset, AssetPatch, RankingDecision, TransferPlan } from '../../types';

const missingFrom = (winnerIds: ReadonlySet<string>, losers: readonly Asset[], pick: (asset: Asset) => ReadonlySet<string>): string[] => {
  const added = new Set<string>();
  for (const loser of losers) {
    for (const id of pick(loser)) {
      if (!winnerIds.has(id)) added.add(id);
    }
  }
  return [...added];
};

const firstWith = <T>(losers: readonly Asset[], pick: (asset: Asset) => T | null): T | null => {
  for (const loser of losers) {
    const value = pick(loser);
    if (value !== null) return value;
  }
  return null;
};

/**
 * What the losers have that the winner lacks. Memberships are unioned;
 * single-valued fields are taken from the first loser carrying one, and only
 * when the winner has none.
 */
export const planTransfer = ({ winner, losers }: RankingDecision): TransferPlan => {
  const patch: AssetPatch = {};

  if (winner.location === null) {
    const location = firstWith(losers, (asset) => asset.location);
    if (location) {
      patch.latitude = location.latitude;
      patch.longitude = location.longitude;
    }
  }
  if (winner.description === null) {
    const description = firstWith(losers, (asset) => asset.description);
    if (description !== null) patch.description = description;
  }
  if (winner.rating === null) {
    const rating = firstWith(losers, (asset) => asset.rating);
    if (rating !== null) patch.rating = rating;
  }

  return {
    winnerId: winner.id,
    albumIds: missingFrom(winner.albumIds, losers, (asset) => asset.albumIds),
    tagIds: missingFrom(winner.tagIds, losers, (asset) => asset.tagIds),
    patch
  };
};

export const patchFields = (patch: AssetPatch): string[] => Object.keys(patch);

/**
 * Patch as it will be written, e.g. latitude=48.8, description="Paris"
 */
export const describePatch = (patch: AssetPatch): string =>
  Object.entries(patch)
    .map(([field, value]) => `${field}=${JSON.stringify(value)}`)
    .join(', ');

export const isEmptyPlan = (plan: TransferPlan): boolean =>
  plan.albumIds.length === 0 && plan.tagIds.length === 0 && patchFields(plan.patch).length === 0;
