import { z } from 'zod';

/**
 * Zod schemas for settings and admin endpoint validation
 */

const money = z.number().int().nonnegative();
const positiveMoney = z.number().int().positive();

export const quickBidTierSchema = z.object({
  below: positiveMoney,
  increments: z.array(positiveMoney).min(1).max(10),
});

const bidRulesShape = {
  unitSize: positiveMoney,
  shorthandMaxUnits: z.number().int().nonnegative(),
  minIncrement: positiveMoney,
  singleStepThreshold: money,
  singleStep: positiveMoney,
  maxStraightIncrement: positiveMoney,
  maxBidAmount: positiveMoney,
  firstBidPolicy: z.enum(['AT_LEAST_BASE', 'EXACT_BASE']),
  quickBidTiers: z.array(quickBidTierSchema).min(1),
};

export const bidRulesSchema = z
  .object(bidRulesShape)
  .refine((rules) => rules.singleStep >= rules.minIncrement, {
    message: 'singleStep must be at least minIncrement',
    path: ['singleStep'],
  });

const settingsShape = {
  mode: z.enum(['TIMED', 'MANUAL_CALL']),
  roundDurationSec: z.number().int().min(5).max(3600),
  breakDurationSec: z.number().int().min(0).max(3600),
  finalCallGraceSec: z.number().int().min(0).max(120),
  resumePolicy: z.enum(['RESTART', 'PRESERVE_REMAINING']),
  bidCooldownMs: z.number().int().min(0).max(60_000),
  settlementRetry: z.object({
    maxAttempts: z.number().int().min(1).max(20),
    delayMs: z.number().int().min(0).max(600_000),
  }),
};

/** Full settings, as loaded from configuration */
export const auctionSettingsSchema = z.object({
  ...settingsShape,
  bidRules: bidRulesSchema,
});

/** Runtime override: any subset, nested objects merged field by field */
export const settingsPatchSchema = z
  .object({
    mode: settingsShape.mode.optional(),
    roundDurationSec: settingsShape.roundDurationSec.optional(),
    breakDurationSec: settingsShape.breakDurationSec.optional(),
    finalCallGraceSec: settingsShape.finalCallGraceSec.optional(),
    resumePolicy: settingsShape.resumePolicy.optional(),
    bidCooldownMs: settingsShape.bidCooldownMs.optional(),
    settlementRetry: settingsShape.settlementRetry.partial().optional(),
    bidRules: z.object(bidRulesShape).partial().optional(),
  })
  .strict();

export type AuctionSettingsPatch = z.infer<typeof settingsPatchSchema>;

export const itemSchema = z.object({
  id: z.string().min(1).max(128),
  name: z.string().trim().min(1).max(200),
  basePrice: positiveMoney,
  metadata: z.record(z.unknown()).default({}),
});

/** Schema for loading the queue; omit items to pull from the catalogue */
export const loadQueueSchema = z.object({
  items: z.array(itemSchema).max(1000).optional(),
});

export type LoadQueueBody = z.infer<typeof loadQueueSchema>;

/** Schema for a bid submitted over HTTP */
export const placeBidSchema = z.object({
  bidderId: z.string().min(1).max(128),
  amount: z.union([z.number(), z.string().max(32)]),
  source: z.enum(['COMMAND', 'QUICK', 'AUTO']).default('COMMAND'),
  idempotencyKey: z.string().max(128).optional(),
});

export type PlaceBidBody = z.infer<typeof placeBidSchema>;

/** Bid over the socket: the bidder comes from the handshake, not the payload */
export const socketBidSchema = placeBidSchema.omit({ bidderId: true });

export type SocketBidBody = z.infer<typeof socketBidSchema>;
