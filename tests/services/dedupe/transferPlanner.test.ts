import { describePatch, isEmptyPlan, planTransfer } from '../../../src/services/dedupe/transferPlanner';
import { Asset, RankingDecision } from '../../../src/types';
import { makeAsset, makeGroup } from '../../helpers/fixtures';

const decide = (winner: Asset, ...losers: Asset[]): RankingDecision => ({
  group: makeGroup('g', winner, ...losers),
  winner,
  losers,
  reason: 'file-size'
});

describe('planTransfer', () => {
  it('should add the albums and tags the winner is missing, in first-seen order', () => {
    const winner = makeAsset('w', { albumIds: ['a1'], tagIds: ['t1'] });
    const first = makeAsset('l1', { albumIds: ['a2', 'a1'], tagIds: ['t1', 't3'] });
    const second = makeAsset('l2', { albumIds: ['a3', 'a2'], tagIds: ['t2'] });

    const plan = planTransfer(decide(winner, first, second));

    expect(plan.winnerId).toBe('w');
    expect(plan.albumIds).toEqual(['a2', 'a3']);
    expect(plan.tagIds).toEqual(['t3', 't2']);
  });

  it('should never replace a location the winner already has', () => {
    const winner = makeAsset('w', { location: { latitude: 10, longitude: 20 } });
    const loser = makeAsset('l', { location: { latitude: 48.85, longitude: 2.35 } });

    expect(planTransfer(decide(winner, loser)).patch).toEqual({});
  });

  it('should adopt the first location found among the losers', () => {
    const winner = makeAsset('w');
    const noGps = makeAsset('l1');
    const gps = makeAsset('l2', { location: { latitude: 48.85, longitude: 2.35 } });
    const otherGps = makeAsset('l3', { location: { latitude: 1, longitude: 1 } });

    const plan = planTransfer(decide(winner, noGps, gps, otherGps));

    expect(plan.patch).toEqual({ latitude: 48.85, longitude: 2.35 });
  });

  it('should fill description and rating only where the winner has none', () => {
    const winner = makeAsset('w', { description: 'Kept caption' });
    const loser = makeAsset('l', { description: 'Other caption', rating: 4 });

    expect(planTransfer(decide(winner, loser)).patch).toEqual({ rating: 4 });
  });

  it('should produce an empty plan when the losers add nothing', () => {
    const winner = makeAsset('w', { albumIds: ['a1'], tagIds: ['t1'], rating: 5 });
    const loser = makeAsset('l', { albumIds: ['a1'], tagIds: ['t1'], rating: 2 });

    expect(isEmptyPlan(planTransfer(decide(winner, loser)))).toBe(true);
  });

  it('should not report a plan with only a patch as empty', () => {
    const plan = planTransfer(decide(makeAsset('w'), makeAsset('l', { description: 'Beach' })));

    expect(isEmptyPlan(plan)).toBe(false);
  });
});

describe('describePatch', () => {
  it('should show each field with the value to be written', () => {
    expect(describePatch({ latitude: 48.8, longitude: 2.35, description: 'Paris', rating: 4 })).toBe(
      'latitude=48.8, longitude=2.35, description="Paris", rating=4'
    );
    expect(describePatch({})).toBe('');
  });
});
