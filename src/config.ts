import * as dotenv from 'dotenv';
import { ProtocolError } from './errors';
import { LogLevel, parseLogLevel } from './scaling/structured-logger';
import type { AntiSpamPolicy } from './anti-spam/types';
import type { MarketPolicy } from './market/types';

export interface NodeConfig {
  /** Directory for the persisted event log; undefined keeps everything in memory */
  dataDir?: string;
  logLevel: LogLevel;
  antiSpam: AntiSpamPolicy;
  market: MarketPolicy;
  /** Threads for mining outbound PoW; 0 mines on the calling thread */
  workerPoolSize: number;
  /** Per-task limit for a pooled mining job */
  workerTimeoutMs: number;
  notifyMaxAttempts: number;
  maxFutureSkewSeconds: number;
}

export const DEFAULT_ANTI_SPAM_POLICY: AntiSpamPolicy = {
  minPowDifficulty: 16,
  minPaymentSats: 1000,
  referenceRequiredKinds: [321, 322, 323],
};

export const DEFAULT_MARKET_POLICY: MarketPolicy = {
  minBuyerCollateralRatio: 0.1,
  maxOverbidRatio: 0.1,
  defaultHtlcTimeoutBlocks: 144,
  blockIntervalSeconds: 600,
};

export const DEFAULT_CONFIG: NodeConfig = {
  dataDir: undefined,
  logLevel: LogLevel.INFO,
  antiSpam: DEFAULT_ANTI_SPAM_POLICY,
  market: DEFAULT_MARKET_POLICY,
  workerPoolSize: 2,
  workerTimeoutMs: 120_000,
  notifyMaxAttempts: 3,
  maxFutureSkewSeconds: 900,
};

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number, opts: { integer?: boolean; min?: number } = {}): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || (opts.integer && !Number.isInteger(value))) {
    throw new ProtocolError('INVALID_CONFIG', `${name} must be a ${opts.integer ? 'whole number' : 'number'}, got "${raw}"`);
  }
  if (opts.min !== undefined && value < opts.min) {
    throw new ProtocolError('INVALID_CONFIG', `${name} must be >= ${opts.min}, got ${value}`);
  }
  return value;
}

/**
 * Build a node configuration from the environment.
 *
 * Reads `.env` (if present) unless an explicit env map is passed, which is
 * what the tests do.
 */
export function loadConfig(env?: Env): NodeConfig {
  let source: Env;
  if (env) {
    source = env;
  } else {
    dotenv.config();
    source = process.env;
  }

  const dataDir = source.BAZAAR_DATA_DIR?.trim();

  return {
    dataDir: dataDir ? dataDir : undefined,
    logLevel: parseLogLevel(source.BAZAAR_LOG_LEVEL) ?? DEFAULT_CONFIG.logLevel,
    antiSpam: {
      minPowDifficulty: readNumber(source, 'BAZAAR_MIN_POW_DIFFICULTY', DEFAULT_ANTI_SPAM_POLICY.minPowDifficulty, { integer: true, min: 0 }),
      minPaymentSats: readNumber(source, 'BAZAAR_MIN_PAYMENT_SATS', DEFAULT_ANTI_SPAM_POLICY.minPaymentSats, { integer: true, min: 0 }),
      referenceRequiredKinds: DEFAULT_ANTI_SPAM_POLICY.referenceRequiredKinds,
    },
    market: {
      minBuyerCollateralRatio: readNumber(source, 'BAZAAR_MIN_BUYER_COLLATERAL_RATIO', DEFAULT_MARKET_POLICY.minBuyerCollateralRatio, { min: 0 }),
      maxOverbidRatio: readNumber(source, 'BAZAAR_MAX_OVERBID_RATIO', DEFAULT_MARKET_POLICY.maxOverbidRatio, { min: 0 }),
      defaultHtlcTimeoutBlocks: readNumber(source, 'BAZAAR_DEFAULT_HTLC_TIMEOUT_BLOCKS', DEFAULT_MARKET_POLICY.defaultHtlcTimeoutBlocks, { integer: true, min: 1 }),
      blockIntervalSeconds: readNumber(source, 'BAZAAR_BLOCK_INTERVAL_SECONDS', DEFAULT_MARKET_POLICY.blockIntervalSeconds, { integer: true, min: 1 }),
    },
    workerPoolSize: readNumber(source, 'BAZAAR_WORKER_POOL_SIZE', DEFAULT_CONFIG.workerPoolSize, { integer: true, min: 0 }),
    workerTimeoutMs: readNumber(source, 'BAZAAR_WORKER_TIMEOUT_MS', DEFAULT_CONFIG.workerTimeoutMs, { integer: true, min: 1 }),
    notifyMaxAttempts: readNumber(source, 'BAZAAR_NOTIFY_MAX_ATTEMPTS', DEFAULT_CONFIG.notifyMaxAttempts, { integer: true, min: 1 }),
    maxFutureSkewSeconds: readNumber(source, 'BAZAAR_MAX_FUTURE_SKEW_SECONDS', DEFAULT_CONFIG.maxFutureSkewSeconds, { integer: true, min: 0 }),
  };
}
