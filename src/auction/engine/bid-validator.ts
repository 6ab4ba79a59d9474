import { normalizeBidAmount } from './bid-amount';
import type {
  BidDecision,
  BidderSnapshot,
  BidRejection,
  BidRejectionCode,
  BidRules,
  RawBidAmount,
  RoundState,
} from './types';

type RoundView = Pick<
  RoundState,
  'status' | 'bids' | 'highBid' | 'item' | 'rules'
>;

function reject(
  reason: BidRejectionCode,
  message: string,
  extra?: { minimumAmount?: number; shortfall?: number },
): BidRejection {
  return { accepted: false, reason, message, ...extra };
}

export function isSingleStepZone(highBid: number, rules: BidRules): boolean {
  return highBid < rules.singleStepThreshold;
}

/**
 * Lowest amount the next bid may carry. Before the first bid this is the base
 * price; inside the single-step zone it is also the only legal amount.
 */
export function minimumNextBid(round: Pick<RoundState, 'bids' | 'highBid' | 'item' | 'rules'>): number {
  if (round.bids.length === 0) return round.item.basePrice;
  const { rules } = round;
  return isSingleStepZone(round.highBid, rules)
    ? round.highBid + rules.singleStep
    : round.highBid + rules.minIncrement;
}

/**
 * Decide whether a proposed bid is legal. Pure: reads the round and bidder
 * snapshots, never mutates them.
 */
export function validateBid(
  raw: RawBidAmount,
  round: RoundView,
  bidder: BidderSnapshot,
): BidDecision {
  const { rules } = round;

  if (round.status !== 'ACTIVE') {
    return reject(
      'ROUND_NOT_OPEN',
      `Round is not open for bids (status: ${round.status})`,
    );
  }
  if (bidder.banned) {
    return reject('BIDDER_BANNED', 'Bidder is banned from bidding');
  }

  const amount = normalizeBidAmount(raw, round, rules, bidder.balance);
  if (amount === null || amount <= 0) {
    return reject('INVALID_AMOUNT', `Invalid bid amount: ${String(raw)}`);
  }
  if (amount > rules.maxBidAmount) {
    return reject(
      'AMOUNT_TOO_HIGH',
      `Bid exceeds the maximum allowed amount (${rules.maxBidAmount})`,
    );
  }

  const minimumAmount = minimumNextBid(round);

  if (round.bids.length === 0) {
    const base = round.item.basePrice;
    if (amount < base) {
      return reject(
        'BELOW_CURRENT_BID',
        `Opening bid must be at least the base price (${base})`,
        { minimumAmount },
      );
    }
    if (rules.firstBidPolicy === 'EXACT_BASE' && amount !== base) {
      return reject(
        'STEP_INCREMENT_REQUIRED',
        `Opening bid must equal the base price (${base})`,
        { minimumAmount },
      );
    }
  } else {
    if (amount <= round.highBid) {
      return reject(
        'BELOW_CURRENT_BID',
        `Bid must be higher than current highest (${round.highBid})`,
        { minimumAmount },
      );
    }
    if (amount < round.highBid + rules.minIncrement) {
      return reject(
        'INCREMENT_TOO_SMALL',
        `Minimum increment is ${rules.minIncrement}`,
        { minimumAmount },
      );
    }
    if (
      isSingleStepZone(round.highBid, rules) &&
      amount !== round.highBid + rules.singleStep
    ) {
      return reject(
        'STEP_INCREMENT_REQUIRED',
        `Below ${rules.singleStepThreshold} bids must rise by exactly ${rules.singleStep}`,
        { minimumAmount },
      );
    }
  }

  if (amount > bidder.balance) {
    const shortfall = amount - bidder.balance;
    return reject(
      'INSUFFICIENT_BALANCE',
      `Insufficient balance: ${shortfall} short`,
      { shortfall },
    );
  }

  return { accepted: true, amount };
}

/**
 * Suggested next amounts for quick-action bids. Inside the single-step zone
 * there is only one legal amount; above it the configured tier applies.
 */
export function quickBidOptions(
  round: Pick<RoundState, 'bids' | 'highBid' | 'item' | 'rules'>,
): number[] {
  const { rules } = round;
  if (round.bids.length === 0) return [round.item.basePrice];
  if (isSingleStepZone(round.highBid, rules)) {
    return [round.highBid + rules.singleStep];
  }
  const tier =
    rules.quickBidTiers.find((t) => round.highBid < t.below) ??
    rules.quickBidTiers[rules.quickBidTiers.length - 1];
  if (!tier) return [round.highBid + rules.minIncrement];
  return tier.increments
    .filter((inc) => inc >= rules.minIncrement)
    .map((inc) => round.highBid + inc)
    .filter((amount) => amount <= rules.maxBidAmount);
}
