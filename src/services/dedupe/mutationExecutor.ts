import {
  AlbumMembershipLookup,
  Asset,
  AssetMutationService,
  RankingDecision,
  TransferPlan
} from '../../types';
import { Messages, MessageKey } from '../../i18n/messages';
import { DedupeError, DeletionError, describeError, TransferError } from '../../utils/errors';
import { formatCaptureDate, formatIdList, formatMegabytes } from '../../utils/format';
import { logger } from '../../utils/logger';
import { ConfirmPrompt } from '../../utils/prompt';
import { DeletionBatch } from './deletionBatch';
import { scoreMetadata } from './metadataScorer';
import { describePatch, isEmptyPlan, patchFields, planTransfer } from './transferPlanner';

export interface ExecutorOptions {
  dryRun: boolean;
  permanent: boolean;
  confirm: boolean;
  keepWinnerMetadata: boolean;
  transferMetadata: boolean;
  batchSize: number;
  preferredFormat: string;
}

export interface ExecutorDeps {
  service: AssetMutationService;
  albums: AlbumMembershipLookup;
  prompt: ConfirmPrompt;
  messages: Messages;
  thumbnailUrl: (assetId: string) => string;
}

export type GroupState =
  | 'pending'
  | 'skipped'
  | 'confirmed'
  | 'auto-queued'
  | 'logged-only'
  | 'applied'
  | 'failed';

export interface GroupOutcome {
  groupId: string;
  state: GroupState;
  queuedIds: string[];
}

export interface ExecutorSummary {
  processed: number;
  declined: number;
  failed: number;
  deleted: number;
  planned: number;
  notDeleted: number;
  batches: number;
  errors: DedupeError[];
}

interface PreparedGroup {
  winner: Asset;
  losers: readonly Asset[];
  // Memberships the winner loses before the transfer, null when kept
  strip: { albumIds: string[]; tagIds: string[] } | null;
  plan: TransferPlan | null;
}

/**
 * Turns ranking decisions into server mutations, one group at a time.
 * Losers accumulate in a single deletion batch that is sent whenever it
 * fills up and once more from finish().
 */
export class MutationExecutor {
  private readonly batch: DeletionBatch;
  private readonly counts: ExecutorSummary = {
    processed: 0,
    declined: 0,
    failed: 0,
    deleted: 0,
    planned: 0,
    notDeleted: 0,
    batches: 0,
    errors: []
  };

  constructor(
    private readonly options: ExecutorOptions,
    private readonly deps: ExecutorDeps
  ) {
    this.batch = new DeletionBatch(options.batchSize, options.permanent);
  }

  async processGroup(decision: RankingDecision, index: number): Promise<GroupOutcome> {
    const { t } = this.deps.messages;
    const groupId = decision.group.id;
    this.present(decision, index);

    let state: GroupState = 'pending';
    const moveTo = (next: GroupState): GroupState => {
      logger.debug(`Group ${groupId}: ${state} -> ${next}`);
      state = next;
      return next;
    };

    if (this.options.confirm) {
      let accepted: boolean;
      try {
        accepted = await this.deps.prompt.confirm(t('confirmQuestion'));
      } catch (error) {
        logger.warn(`${t('promptFailed', { index })} (${describeError(error)})`);
        accepted = false;
      }
      if (!accepted) {
        logger.info(t('groupDeclined', { index }));
        this.counts.declined++;
        return { groupId, state: moveTo('skipped'), queuedIds: [] };
      }
      moveTo('confirmed');
    } else {
      moveTo('auto-queued');
    }

    const loserIds = decision.losers.map((asset) => asset.id);
    try {
      const prepared = await this.prepare(decision);
      this.describe(prepared);
      if (!this.options.dryRun) {
        await this.apply(prepared);
      }
    } catch (error) {
      const failure = new TransferError(groupId, decision.winner.id, loserIds, { cause: error });
      logger.error(
        t('transferFailed', { index, winner: decision.winner.id, losers: formatIdList(loserIds) }),
        failure
      );
      this.counts.failed++;
      this.counts.errors.push(failure);
      return { groupId, state: moveTo('failed'), queuedIds: [] };
    }

    for (const id of loserIds) {
      await this.enqueue(id);
    }
    this.counts.processed++;

    if (this.options.dryRun) {
      logger.info(t('groupDryRun', { index }));
      return { groupId, state: moveTo('logged-only'), queuedIds: loserIds };
    }
    logger.info(t('groupApplied', { index, count: loserIds.length }));
    return { groupId, state: moveTo('applied'), queuedIds: loserIds };
  }

  /**
   * Send whatever is still queued. Call once, after the last group.
   */
  async finish(): Promise<ExecutorSummary> {
    await this.flush();
    if (this.options.dryRun) {
      logger.info(this.deps.messages.t('dryRunNotice'));
    }
    return this.summary();
  }

  summary(): ExecutorSummary {
    return { ...this.counts, errors: [...this.counts.errors] };
  }

  private present({ group, winner, losers, reason }: RankingDecision, index: number): void {
    const { t } = this.deps.messages;
    const reasonKey: MessageKey = `reason.${reason}`;
    logger.info(
      t('groupHeader', {
        index,
        count: group.assets.length,
        reason: t(reasonKey, { format: this.options.preferredFormat })
      })
    );
    logger.info(t('keptLine', this.assetParams(winner)));
    for (const loser of losers) {
      logger.info(t('deletedLine', this.assetParams(loser)));
    }
  }

  private assetParams(asset: Asset): Record<string, string | number> {
    return {
      date: formatCaptureDate(asset.capturedAt),
      size: formatMegabytes(asset.fileSize),
      exif: scoreMetadata(asset),
      file: asset.fileName,
      url: this.deps.thumbnailUrl(asset.id)
    };
  }

  private async withAlbums(asset: Asset): Promise<Asset> {
    const albumIds = await this.deps.albums.fetchAlbumIds(asset.id);
    return { ...asset, albumIds: new Set(albumIds) };
  }

  private async prepare(decision: RankingDecision): Promise<PreparedGroup> {
    const { keepWinnerMetadata, transferMetadata } = this.options;
    let { winner, losers } = decision;

    if (transferMetadata || !keepWinnerMetadata) {
      winner = await this.withAlbums(winner);
      const loaded: Asset[] = [];
      for (const loser of losers) {
        loaded.push(await this.withAlbums(loser));
      }
      losers = loaded;
    }

    const strip = keepWinnerMetadata ? null : { albumIds: [...winner.albumIds], tagIds: [...winner.tagIds] };
    const base: Asset = strip ? { ...winner, albumIds: new Set<string>(), tagIds: new Set<string>() } : winner;
    const plan = transferMetadata ? planTransfer({ ...decision, winner: base, losers }) : null;

    return { winner, losers, strip, plan };
  }

  private describe({ winner, strip, plan }: PreparedGroup): void {
    const { t } = this.deps.messages;
    if (strip) {
      logger.info(
        t('stripWinner', { id: winner.id, albums: formatIdList(strip.albumIds), tags: formatIdList(strip.tagIds) })
      );
    }
    if (!plan) return;
    if (isEmptyPlan(plan)) {
      logger.info(t('transferNothing', { id: plan.winnerId }));
      return;
    }
    logger.info(
      t('transferPlan', {
        id: plan.winnerId,
        albums: formatIdList(plan.albumIds),
        tags: formatIdList(plan.tagIds),
        fields: describePatch(plan.patch)
      })
    );
  }

  private async apply({ winner, strip, plan }: PreparedGroup): Promise<void> {
    const { service } = this.deps;
    if (strip) {
      for (const albumId of strip.albumIds) {
        await service.removeFromAlbum(albumId, winner.id);
      }
      for (const tagId of strip.tagIds) {
        await service.removeTag(tagId, winner.id);
      }
    }
    if (!plan) return;
    for (const albumId of plan.albumIds) {
      await service.addToAlbum(albumId, plan.winnerId);
    }
    for (const tagId of plan.tagIds) {
      await service.addTag(tagId, plan.winnerId);
    }
    if (patchFields(plan.patch).length > 0) {
      await service.updateAsset(plan.winnerId, plan.patch);
    }
  }

  private async enqueue(id: string): Promise<void> {
    this.batch.add(id);
    if (this.batch.isFull) {
      await this.flush();
    }
  }

  private async flush(): Promise<void> {
    if (this.batch.size === 0) return;
    const { t } = this.deps.messages;
    const ids = this.batch.drain();
    const batchNumber = ++this.counts.batches;
    const mode = t(this.batch.permanent ? 'modePermanent' : 'modeRecycle');

    if (this.options.dryRun) {
      logger.info(t('batchDryRun', { batch: batchNumber, count: ids.length, mode, ids: formatIdList(ids) }));
      this.counts.planned += ids.length;
      return;
    }

    try {
      await this.deps.service.deleteAssets(ids, this.batch.permanent);
      logger.info(t('batchDeleted', { batch: batchNumber, count: ids.length, mode, ids: formatIdList(ids) }));
      this.counts.deleted += ids.length;
    } catch (error) {
      const failure = new DeletionError(ids, { cause: error });
      logger.error(t('batchFailed', { batch: batchNumber, ids: formatIdList(ids) }), failure);
      this.counts.notDeleted += ids.length;
      this.counts.errors.push(failure);
    }
  }
}
