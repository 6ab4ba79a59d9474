const int = (value: string | undefined, fallback: number): number => {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export default () => ({
  port: int(process.env.PORT, 3000),
  database: {
    url: process.env.DATABASE_URL ?? 'postgresql://localhost:5432/auction',
    poolSize: int(process.env.DATABASE_POOL_SIZE, 10),
  },
  redis: {
    url: process.env.REDIS_URL ?? 'redis://localhost:6379',
  },
  admin: {
    token: process.env.ADMIN_TOKEN,
  },
  bidder: {
    tokenSecret: process.env.BIDDER_TOKEN_SECRET,
  },
  auction: {
    mode: process.env.AUCTION_MODE ?? 'TIMED',
    roundDurationSec: int(process.env.ROUND_DURATION_SEC, 60),
    breakDurationSec: int(process.env.BREAK_DURATION_SEC, 30),
    finalCallGraceSec: int(process.env.FINAL_CALL_GRACE_SEC, 5),
    resumePolicy: process.env.RESUME_POLICY ?? 'RESTART',
    bidCooldownMs: int(process.env.BID_COOLDOWN_MS, 1000),
    settlementRetry: {
      maxAttempts: int(process.env.SETTLEMENT_MAX_ATTEMPTS, 3),
      delayMs: int(process.env.SETTLEMENT_RETRY_DELAY_MS, 5000),
    },
    bidRules: {
      unitSize: int(process.env.BID_UNIT, 1_000_000),
      shorthandMaxUnits: 999,
      minIncrement: int(process.env.MIN_INCREMENT, 1_000_000),
      singleStepThreshold: int(process.env.SINGLE_STEP_THRESHOLD, 20_000_000),
      singleStep: int(process.env.SINGLE_STEP, 1_000_000),
      maxStraightIncrement: int(process.env.MAX_STRAIGHT_INCREMENT, 20_000_000),
      maxBidAmount: int(process.env.MAX_BID_AMOUNT, 10_000_000_000),
      firstBidPolicy: process.env.FIRST_BID_POLICY ?? 'AT_LEAST_BASE',
      quickBidTiers: [
        { below: 50_000_000, increments: [1_000_000, 2_000_000, 5_000_000] },
        { below: 100_000_000, increments: [2_000_000, 5_000_000, 10_000_000] },
        {
          below: Number.MAX_SAFE_INTEGER,
          increments: [5_000_000, 10_000_000, 20_000_000],
        },
      ],
    },
  },
});
