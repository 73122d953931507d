import { Command } from 'commander';
import { loadConfig, AppConfig } from '../config';
import { ImmichClient } from '../api/immichClient';
import { createMessages } from '../i18n/messages';
import { runCleanup, RunSummary } from '../services/dedupe/cleanupRunner';
import { enableFileLog, logger } from '../utils/logger';
import { ConfirmPrompt, ConsolePrompt } from '../utils/prompt';

export interface CleanupCommandOptions {
  server?: string;
  apiKey?: string;
  dryRun?: boolean;
  permanent?: boolean;
  log?: boolean;
  logDir?: string;
  pairsOnly?: boolean;
  keepMetadata?: boolean;
  transferMetadata?: boolean;
  confirm?: boolean;
  timeout?: string;
  batchSize?: string;
  preferredFormat?: string;
  lang?: string;
}

export const buildProgram = (): Command => {
  const program = new Command();
  program
    .name('dupe-sweep')
    .description('Keep the best asset of each Immich duplicate group and delete the others')
    .version('1.0.0')
    .option('--server <url>', 'Immich server URL (IMMICH_SERVER)')
    .option('--api-key <key>', 'API key (IMMICH_API_KEY)')
    .option('--dry-run', 'Only log what would happen (default)')
    .option('--no-dry-run', 'Apply metadata transfers and deletions')
    .option('--permanent', 'Delete permanently instead of moving to the trash')
    .option('--no-permanent', 'Move deleted assets to the trash (default)')
    .option('--log', 'Also write the output to a log file (default)')
    .option('--no-log', 'Console output only')
    .option('--log-dir <dir>', 'Directory for log files (IMMICH_LOG_DIR)')
    .option('--pairs-only', 'Only process groups of exactly two assets')
    .option('--no-pairs-only', 'Process groups of any size (default)')
    .option('--keep-metadata', "Keep the kept asset's own albums and tags (default)")
    .option('--no-keep-metadata', "Remove the kept asset's own albums and tags first")
    .option('--transfer-metadata', 'Copy albums, tags and missing fields from deleted assets (default)')
    .option('--no-transfer-metadata', 'Do not copy metadata from deleted assets')
    .option('--confirm', 'Ask before processing each group')
    .option('--no-confirm', 'Process every group without asking (default)')
    .option('--timeout <seconds>', 'Per-request timeout in seconds (IMMICH_REQUEST_TIMEOUT)')
    .option('--batch-size <count>', 'Assets per delete request (IMMICH_DELETE_BATCH_SIZE)')
    .option('--preferred-format <ext>', 'Extension that wins over larger files (IMMICH_PREFERRED_FORMAT)')
    .option('--lang <code>', 'Message language: en or fr (IMMICH_LANGUAGE)');
  return program;
};

const asFlag = (value: boolean | undefined): string | undefined =>
  value === undefined ? undefined : String(value);

/**
 * Command line options expressed as the environment variables they override.
 * Options that were not given are left out so the environment still applies.
 */
export const toEnvOverrides = (options: CleanupCommandOptions): Record<string, string> => {
  const overrides: Record<string, string | undefined> = {
    IMMICH_SERVER: options.server,
    IMMICH_API_KEY: options.apiKey,
    IMMICH_DRY_RUN: asFlag(options.dryRun),
    IMMICH_DEFINITELY: asFlag(options.permanent),
    IMMICH_ENABLE_LOG: asFlag(options.log),
    IMMICH_LOG_DIR: options.logDir,
    IMMICH_ONLY_PAIRS: asFlag(options.pairsOnly),
    IMMICH_KEEP_METADATA: asFlag(options.keepMetadata),
    IMMICH_TRANSFER_METADATA: asFlag(options.transferMetadata),
    IMMICH_CONFIRM: asFlag(options.confirm),
    IMMICH_REQUEST_TIMEOUT: options.timeout,
    IMMICH_DELETE_BATCH_SIZE: options.batchSize,
    IMMICH_PREFERRED_FORMAT: options.preferredFormat,
    IMMICH_LANGUAGE: options.lang
  };

  const defined: Record<string, string> = {};
  for (const [name, value] of Object.entries(overrides)) {
    if (value !== undefined) defined[name] = value;
  }
  return defined;
};

export interface CliRuntime {
  env?: Readonly<Record<string, string | undefined>>;
  createClient?: (config: AppConfig) => ImmichClient;
  prompt?: ConfirmPrompt;
}

export const runCli = async (argv: readonly string[], runtime: CliRuntime = {}): Promise<RunSummary> => {
  const program = buildProgram().exitOverride();
  program.parse([...argv], { from: 'user' });

  const config = loadConfig({ ...(runtime.env ?? process.env), ...toEnvOverrides(program.opts<CleanupCommandOptions>()) });
  const messages = createMessages(config.language);

  if (config.enableLog) {
    const file = enableFileLog(config.logDir);
    if (file) logger.info(messages.t('logFile', { path: file }));
  }

  const client = runtime.createClient
    ? runtime.createClient(config)
    : new ImmichClient({ server: config.server, apiKey: config.apiKey, timeoutSeconds: config.timeoutSeconds });
  const prompt = runtime.prompt ?? new ConsolePrompt();

  try {
    return await runCleanup(config, {
      source: client,
      albums: client,
      service: client,
      prompt,
      messages,
      thumbnailUrl: (assetId) => client.thumbnailUrl(assetId)
    });
  } finally {
    prompt.close();
    enableFileLog(null);
  }
};
