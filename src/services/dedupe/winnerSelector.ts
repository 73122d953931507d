import { Asset, DuplicateGroup, RankingDecision, SelectionRule } from '../../types';
import { InvalidGroupError } from '../../utils/errors';
import { scoreMetadata } from './metadataScorer';

export interface SelectorOptions {
  preferredFormat: string;
}

export interface Comparison {
  rule: SelectionRule;
  // < 0 when the first asset should be kept, > 0 for the second, 0 on a full tie
  preference: number;
}

type Comparator = (a: Asset, b: Asset, options: SelectorOptions) => number;

const normalizeFormat = (format: string): string => format.replace(/^\.+/, '').toLowerCase();

export const matchesPreferredFormat = (asset: Asset, preferredFormat: string): boolean => {
  const wanted = normalizeFormat(preferredFormat);
  return wanted !== '' && asset.extension.toLowerCase() === wanted;
};

const byCaptureDate: Comparator = (a, b) => {
  if (a.capturedAt === null && b.capturedAt === null) return 0;
  if (a.capturedAt === null) return 1;
  if (b.capturedAt === null) return -1;
  return Math.sign(a.capturedAt.getTime() - b.capturedAt.getTime());
};

const byPreferredFormat: Comparator = (a, b, { preferredFormat }) => {
  const aMatches = matchesPreferredFormat(a, preferredFormat);
  const bMatches = matchesPreferredFormat(b, preferredFormat);
  if (aMatches === bMatches) return 0;
  return aMatches ? -1 : 1;
};

const byFileSize: Comparator = (a, b) => Math.sign(b.fileSize - a.fileSize);

const byMetadata: Comparator = (a, b) => Math.sign(scoreMetadata(b) - scoreMetadata(a));

const RULES: ReadonlyArray<[SelectionRule, Comparator]> = [
  ['capture-date', byCaptureDate],
  ['preferred-format', byPreferredFormat],
  ['file-size', byFileSize],
  ['metadata', byMetadata]
];

const RULE_ORDER: readonly SelectionRule[] = [...RULES.map(([rule]) => rule), 'original-order'];

/**
 * Walk the rules in order; the first one that tells the two assets apart
 * decides. A full tie is reported as 'original-order' with preference 0.
 */
export const compareAssets = (a: Asset, b: Asset, options: SelectorOptions): Comparison => {
  for (const [rule, compare] of RULES) {
    const preference = compare(a, b, options);
    if (preference !== 0) return { rule, preference };
  }
  return { rule: 'original-order', preference: 0 };
};

/**
 * Pick the asset to keep. A challenger replaces the current best only when
 * it strictly wins, so on a tie the earlier asset in the group stays.
 */
export const selectWinner = (group: DuplicateGroup, options: SelectorOptions): RankingDecision => {
  if (group.assets.length < 2) {
    throw new InvalidGroupError(group.id, group.assets.length);
  }

  const [first, ...rest] = group.assets;
  let winner = first;
  for (const challenger of rest) {
    if (compareAssets(challenger, winner, options).preference < 0) {
      winner = challenger;
    }
  }

  const losers = group.assets.filter((asset) => asset !== winner);

  // Report the last rule that had to be consulted to eliminate someone
  let reason: SelectionRule = 'original-order';
  for (const loser of losers) {
    const { rule } = compareAssets(winner, loser, options);
    if (rule !== 'original-order' && (reason === 'original-order' || RULE_ORDER.indexOf(rule) > RULE_ORDER.indexOf(reason))) {
      reason = rule;
    }
  }

  return { group, winner, losers, reason };
};
