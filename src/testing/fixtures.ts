import type { AuctionSettings } from '../auction/auction-settings.service';
import { RoundEngine } from '../auction/engine';
import type { BidRules, ItemRef, RoundMode } from '../auction/engine';

export const M = 1_000_000;

export function testBidRules(overrides: Partial<BidRules> = {}): BidRules {
  return {
    unitSize: M,
    shorthandMaxUnits: 999,
    minIncrement: M,
    singleStepThreshold: 20 * M,
    singleStep: M,
    maxStraightIncrement: 20 * M,
    maxBidAmount: 10_000 * M,
    firstBidPolicy: 'AT_LEAST_BASE',
    quickBidTiers: [
      { below: 50 * M, increments: [M, 2 * M, 5 * M] },
      { below: 100 * M, increments: [2 * M, 5 * M, 10 * M] },
      { below: Number.MAX_SAFE_INTEGER, increments: [5 * M, 10 * M, 20 * M] },
    ],
    ...overrides,
  };
}

export function testSettings(overrides: Partial<AuctionSettings> = {}): AuctionSettings {
  return {
    mode: 'TIMED',
    roundDurationSec: 60,
    breakDurationSec: 30,
    finalCallGraceSec: 5,
    resumePolicy: 'RESTART',
    bidCooldownMs: 0,
    settlementRetry: { maxAttempts: 3, delayMs: 5000 },
    bidRules: testBidRules(),
    ...overrides,
  };
}

export function testItem(overrides: Partial<ItemRef> = {}): ItemRef {
  return {
    id: 'item-1',
    name: 'Test Item',
    basePrice: 10 * M,
    metadata: {},
    ...overrides,
  };
}

/** An ACTIVE round engine, opened at `now`. */
export function openRound(
  options: {
    item?: ItemRef;
    rules?: BidRules;
    mode?: RoundMode;
    durationSec?: number;
    now?: number;
  } = {},
): RoundEngine {
  const now = options.now ?? 1_000;
  const engine = new RoundEngine({
    id: 'round-1',
    sessionId: 'session-1',
    item: options.item ?? testItem(),
    mode: options.mode ?? 'TIMED',
    durationSec: options.durationSec ?? 60,
    rules: options.rules ?? testBidRules(),
    createdAt: now,
  });
  engine.open(now);
  return engine;
}
