import { AppConfig } from '../../config';
import { DuplicateGroup, DuplicateSource } from '../../types';
import { ConfigurationError, DedupeError, InvalidGroupError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { admitGroup } from './groupFilter';
import { ExecutorDeps, ExecutorSummary, MutationExecutor } from './mutationExecutor';
import { selectWinner } from './winnerSelector';

export type CleanupOptions = Pick<
  AppConfig,
  | 'server'
  | 'dryRun'
  | 'permanent'
  | 'pairsOnly'
  | 'keepWinnerMetadata'
  | 'transferMetadata'
  | 'confirm'
  | 'batchSize'
  | 'preferredFormat'
>;

export interface CleanupDeps extends ExecutorDeps {
  source: DuplicateSource;
}

export interface RunSummary extends ExecutorSummary {
  dryRun: boolean;
  groups: number;
  skipped: number;
}

const logSummary = ({ t }: CleanupDeps['messages'], summary: RunSummary): void => {
  logger.info(
    t('summary', {
      groups: summary.groups,
      processed: summary.processed,
      skipped: summary.skipped,
      declined: summary.declined,
      failed: summary.failed
    })
  );
  logger.info(
    summary.dryRun
      ? t('summaryDryRun', { planned: summary.planned, errors: summary.errors.length })
      : t('summaryDeleted', { deleted: summary.deleted, notDeleted: summary.notDeleted, errors: summary.errors.length })
  );
};

/**
 * One cleanup pass: fetch the server's duplicate groups, keep the best asset
 * of each admitted group and hand the rest to the executor.
 *
 * Only a failure to fetch the groups is thrown (as a ConfigurationError);
 * per-group and per-batch failures are logged and counted.
 */
export async function runCleanup(options: CleanupOptions, deps: CleanupDeps): Promise<RunSummary> {
  const { t } = deps.messages;

  let groups: DuplicateGroup[];
  try {
    groups = await deps.source.fetchDuplicateGroups();
  } catch (error) {
    throw new ConfigurationError(t('fetchFailed', { server: options.server }), { cause: error });
  }

  if (groups.length === 0) {
    logger.info(t('noDuplicates'));
  } else {
    logger.info(t('groupsFound', { count: groups.length }));
  }

  const executor = new MutationExecutor(options, deps);
  const rejected: DedupeError[] = [];
  let skipped = 0;

  const summarize = (): RunSummary => {
    const executed = executor.summary();
    return {
      ...executed,
      errors: [...rejected, ...executed.errors],
      dryRun: options.dryRun,
      groups: groups.length,
      skipped
    };
  };

  try {
    for (const [position, group] of groups.entries()) {
      const index = position + 1;

      if (!admitGroup(group, options)) {
        skipped++;
        logger.info(t('groupSkippedPairsOnly', { index, count: group.assets.length }));
        continue;
      }

      try {
        const decision = selectWinner(group, options);
        await executor.processGroup(decision, index);
      } catch (error) {
        if (!(error instanceof InvalidGroupError)) throw error;
        skipped++;
        rejected.push(error);
        logger.warn(t('groupInvalid', { index, error: error.message }));
      }
    }
  } finally {
    // Losers of groups already transferred are deleted even if the loop broke off
    await executor.finish();
    logSummary(deps.messages, summarize());
  }

  return summarize();
}
