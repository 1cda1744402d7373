/**
 * Shared helpers for the test suites.
 */

import { powTag } from '../anti-spam/pow';
import { AntiSpamPolicy } from '../anti-spam/types';
import { NodeConfig } from '../config';
import { keyPairFromPrivateKey, KeyPair } from '../crypto';
import { finalizeEvent } from '../events/codec';
import { EventTemplate, MarketEvent } from '../events/types';
import { MarketPolicy } from '../market/types';
import { LogLevel, StructuredLogger } from '../scaling/structured-logger';

export const SILENT = new StructuredLogger({ minLevel: LogLevel.SILENT });

export const SELLER: KeyPair = keyPairFromPrivateKey('11'.repeat(32));
export const BUYER: KeyPair = keyPairFromPrivateKey('22'.repeat(32));
export const ARBITER: KeyPair = keyPairFromPrivateKey('33'.repeat(32));
export const OTHER: KeyPair = keyPairFromPrivateKey('44'.repeat(32));

/** Any PoW proof passes at difficulty 0 */
export const OPEN_POLICY: AntiSpamPolicy = {
  minPowDifficulty: 0,
  minPaymentSats: 1000,
  referenceRequiredKinds: [321, 322, 323],
};

export const TEST_MARKET_POLICY: MarketPolicy = {
  minBuyerCollateralRatio: 0.1,
  maxOverbidRatio: 0.1,
  defaultHtlcTimeoutBlocks: 144,
  blockIntervalSeconds: 600,
};

export function testConfig(overrides: Partial<NodeConfig> = {}): Partial<NodeConfig> {
  return {
    logLevel: LogLevel.SILENT,
    antiSpam: OPEN_POLICY,
    market: TEST_MARKET_POLICY,
    notifyMaxAttempts: 2,
    workerPoolSize: 0,
    ...overrides,
  };
}

/**
 * Sign a template with a difficulty-0 PoW tag.
 */
export function signed(keys: KeyPair, template: EventTemplate): MarketEvent {
  return finalizeEvent({ ...template, tags: [...template.tags, powTag(0, 0)] }, keys.privateKey);
}

export const T0 = 1_700_000_000;
