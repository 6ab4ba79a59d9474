import type { BidRules, RawBidAmount, RoundState } from './types';

const CURRENCY_PREFIX = /^[$€£₹¥]/;
const PLAIN_NUMBER = /^\d+(\.\d+)?$/;

/**
 * Price that relative bids ("+N") are added to: the high bid, or the base price
 * before the first bid.
 */
export function referencePrice(round: Pick<RoundState, 'bids' | 'highBid' | 'item'>): number {
  return round.bids.length > 0 ? round.highBid : round.item.basePrice;
}

/**
 * Largest amount a bidder may legally offer right now, bounded by balance.
 * Inside the single-step zone this is exactly one step above the high bid.
 */
/**
 * Largest legal bid the bidder can afford. When the balance falls short of the
 * smallest legal bid, that bid is returned so validation reports the shortfall.
 */
export function maxLegalAmount(
  round: Pick<RoundState, 'bids' | 'highBid' | 'item'>,
  rules: BidRules,
  balance: number,
): number {
  let floor: number;
  let cap: number;
  if (round.bids.length === 0) {
    floor = round.item.basePrice;
    cap =
      rules.firstBidPolicy === 'EXACT_BASE'
        ? round.item.basePrice
        : round.item.basePrice + rules.maxStraightIncrement;
  } else if (round.highBid < rules.singleStepThreshold) {
    floor = round.highBid + rules.singleStep;
    cap = floor;
  } else {
    floor = round.highBid + rules.minIncrement;
    cap = round.highBid + rules.maxStraightIncrement;
  }
  if (balance < floor) return floor;
  return Math.min(balance, cap);
}

/**
 * Normalize shorthand bid input into whole currency units.
 *
 * - `15` → 15 units (integers up to `shorthandMaxUnits`)
 * - `25000000` → as written
 * - `25.5` → 25.5 units, rounded to whole currency
 * - `+2` → reference price + 2 units
 * - `max` → {@link maxLegalAmount}
 *
 * Returns null when the input cannot be read as an amount.
 */
export function normalizeBidAmount(
  raw: RawBidAmount,
  round: Pick<RoundState, 'bids' | 'highBid' | 'item'>,
  rules: BidRules,
  balance: number,
): number | null {
  if (typeof raw === 'number' && !Number.isFinite(raw)) return null;

  const text = String(raw)
    .trim()
    .toLowerCase()
    .replace(/[,_\s]/g, '')
    .replace(CURRENCY_PREFIX, '');
  if (!text) return null;

  if (text === 'max') {
    return maxLegalAmount(round, rules, balance);
  }

  if (text.startsWith('+')) {
    const units = parsePlainNumber(text.slice(1));
    if (units === null || units <= 0) return null;
    return referencePrice(round) + Math.round(units * rules.unitSize);
  }

  const value = parsePlainNumber(text);
  if (value === null) return null;
  if (text.includes('.')) {
    return Math.round(value * rules.unitSize);
  }
  return value <= rules.shorthandMaxUnits ? value * rules.unitSize : value;
}

function parsePlainNumber(text: string): number | null {
  if (!PLAIN_NUMBER.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}
