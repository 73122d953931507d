import { ConfigurationError } from '../utils/errors';
import { isLanguage, Language, LANGUAGES } from '../i18n/messages';

export interface AppConfig {
  server: string;
  apiKey: string;
  dryRun: boolean;
  permanent: boolean;
  enableLog: boolean;
  logDir: string;
  pairsOnly: boolean;
  keepWinnerMetadata: boolean;
  transferMetadata: boolean;
  confirm: boolean;
  timeoutSeconds: number;
  batchSize: number;
  preferredFormat: string;
  language: Language;
}

export const DEFAULTS = {
  dryRun: true,
  permanent: false,
  enableLog: true,
  logDir: 'logs',
  pairsOnly: false,
  keepWinnerMetadata: true,
  transferMetadata: true,
  confirm: false,
  timeoutSeconds: 5,
  batchSize: 500,
  preferredFormat: 'heic',
  language: 'en'
} as const satisfies Omit<AppConfig, 'server' | 'apiKey'>;

type Env = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

const readString = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

export const parseBoolean = (env: Env, name: string, fallback: boolean): boolean => {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const value = raw.toLowerCase();
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;
  throw new ConfigurationError(`${name} must be one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}, got "${raw}"`);
};

// Node timers hold at most 2^31 - 1 ms; anything longer fires after 1 ms
export const MAX_TIMEOUT_SECONDS = Math.floor(2_147_483_647 / 1000);

/**
 * Whole numbers below 1 are raised to 1; values above max are rejected.
 */
export const parseCount = (env: Env, name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number => {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a whole number, got "${raw}"`);
  }
  const value = Number(raw);
  if (value > max) {
    throw new ConfigurationError(`${name} must be at most ${max}, got "${raw}"`);
  }
  return Math.max(1, value);
};

const parseServer = (env: Env): string => {
  const raw = readString(env, 'IMMICH_SERVER');
  if (raw === undefined) {
    throw new ConfigurationError('IMMICH_SERVER is not set (use --server or the IMMICH_SERVER variable)');
  }
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigurationError(`IMMICH_SERVER is not a valid URL: "${raw}"`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`IMMICH_SERVER must use http or https: "${raw}"`);
  }
  return raw.replace(/\/+$/, '');
};

const parseApiKey = (env: Env): string => {
  const apiKey = readString(env, 'IMMICH_API_KEY');
  if (apiKey === undefined) {
    throw new ConfigurationError('IMMICH_API_KEY is not set (use --api-key or the IMMICH_API_KEY variable)');
  }
  return apiKey;
};

const parseLanguage = (env: Env): Language => {
  const raw = readString(env, 'IMMICH_LANGUAGE');
  if (raw === undefined) return DEFAULTS.language;
  const value = raw.toLowerCase();
  if (!isLanguage(value)) {
    throw new ConfigurationError(`IMMICH_LANGUAGE must be one of ${LANGUAGES.join(', ')}, got "${raw}"`);
  }
  return value;
};

const parseFormat = (env: Env): string => {
  const raw = readString(env, 'IMMICH_PREFERRED_FORMAT') ?? DEFAULTS.preferredFormat;
  return raw.replace(/^\.+/, '').toLowerCase();
};

/**
 * Build the run configuration from environment variables. dotenv is expected
 * to have populated the environment already.
 */
export const loadConfig = (env: Env = process.env): AppConfig => ({
  server: parseServer(env),
  apiKey: parseApiKey(env),
  dryRun: parseBoolean(env, 'IMMICH_DRY_RUN', DEFAULTS.dryRun),
  permanent: parseBoolean(env, 'IMMICH_DEFINITELY', DEFAULTS.permanent),
  enableLog: parseBoolean(env, 'IMMICH_ENABLE_LOG', DEFAULTS.enableLog),
  logDir: readString(env, 'IMMICH_LOG_DIR') ?? DEFAULTS.logDir,
  pairsOnly: parseBoolean(env, 'IMMICH_ONLY_PAIRS', DEFAULTS.pairsOnly),
  keepWinnerMetadata: parseBoolean(env, 'IMMICH_KEEP_METADATA', DEFAULTS.keepWinnerMetadata),
  transferMetadata: parseBoolean(env, 'IMMICH_TRANSFER_METADATA', DEFAULTS.transferMetadata),
  confirm: parseBoolean(env, 'IMMICH_CONFIRM', DEFAULTS.confirm),
  timeoutSeconds: parseCount(env, 'IMMICH_REQUEST_TIMEOUT', DEFAULTS.timeoutSeconds, MAX_TIMEOUT_SECONDS),
  batchSize: parseCount(env, 'IMMICH_DELETE_BATCH_SIZE', DEFAULTS.batchSize),
  preferredFormat: parseFormat(env),
  language: parseLanguage(env)
});
