/**
 * Round lifecycle:
 * PENDING → ACTIVE → SETTLING → COMPLETED, ACTIVE ⇄ PAUSED,
 * ACTIVE | PAUSED → CANCELLED.
 *
 * SETTLING means the outcome is fixed but settlement has not been confirmed yet.
 */
export type RoundStatus =
  | 'PENDING'
  | 'ACTIVE'
  | 'PAUSED'
  | 'SETTLING'
  | 'COMPLETED'
  | 'CANCELLED';

/** Statuses that occupy the single live-round slot. */
export const OPEN_ROUND_STATUSES: readonly RoundStatus[] = [
  'ACTIVE',
  'PAUSED',
  'SETTLING',
];

/**
 * TIMED rounds close on countdown expiry; MANUAL_CALL rounds wait for an
 * admin final call.
 */
export type RoundMode = 'TIMED' | 'MANUAL_CALL';

export type BidSource = 'COMMAND' | 'QUICK' | 'AUTO';

export type FinalizeReason = 'TIMER_EXPIRED' | 'FINAL_CALL' | 'SKIPPED';

export type FirstBidPolicy = 'AT_LEAST_BASE' | 'EXACT_BASE';

export type ResumePolicy = 'RESTART' | 'PRESERVE_REMAINING';

/** Item under the hammer. `metadata` is opaque to the core. */
export interface ItemRef {
  id: string;
  name: string;
  basePrice: number;
  metadata: Record<string, unknown>;
}

export interface Bid {
  bidderId: string;
  amount: number;
  placedAt: number;
  source: BidSource;
}

/** Suggested increments for quick-action bids, applied while highBid < below. */
export interface QuickBidTier {
  below: number;
  increments: number[];
}

/** Rules a round is validated against. Snapshot taken when the round opens. */
export interface BidRules {
  /** Currency units per shorthand unit (e.g. 1_000_000 for "millions"). */
  unitSize: number;
  /** Bare integers up to this value are read as shorthand units. */
  shorthandMaxUnits: number;
  minIncrement: number;
  /** Below this high bid only `singleStep` raises are legal. */
  singleStepThreshold: number;
  singleStep: number;
  maxStraightIncrement: number;
  maxBidAmount: number;
  firstBidPolicy: FirstBidPolicy;
  quickBidTiers: QuickBidTier[];
}

export interface SettlementProgress {
  debited: boolean;
  acquisitionRecorded: boolean;
  itemMarked: boolean;
  attempts: number;
  lastError: string | null;
}

export type RoundOutcome =
  | { kind: 'SOLD'; bidderId: string; amount: number; item: ItemRef }
  | { kind: 'UNSOLD'; item: ItemRef };

/**
 * Single source of truth for one round. All engine logic reads/writes this shape.
 */
export interface RoundState {
  id: string;
  sessionId: string;
  item: ItemRef;
  status: RoundStatus;
  mode: RoundMode;
  durationSec: number;
  highBid: number;
  highBidderId: string | null;
  bids: Bid[];
  /** Accepted bids ever, including undone ones. Never decreases. */
  bidSequence: number;
  outcome: RoundOutcome | null;
  finalizeReason: FinalizeReason | null;
  settlement: SettlementProgress | null;
  rules: BidRules;
  pausedRemainingMs: number | null;
  createdAt: number;
  startedAt: number | null;
  endedAt: number | null;
}

export interface CreateRoundInput {
  id: string;
  sessionId: string;
  item: ItemRef;
  mode: RoundMode;
  durationSec: number;
  rules: BidRules;
  createdAt: number;
}

export type BidRejectionCode =
  | 'ROUND_NOT_OPEN'
  | 'BIDDER_BANNED'
  | 'INVALID_AMOUNT'
  | 'AMOUNT_TOO_HIGH'
  | 'BELOW_CURRENT_BID'
  | 'INCREMENT_TOO_SMALL'
  | 'STEP_INCREMENT_REQUIRED'
  | 'INSUFFICIENT_BALANCE'
  | 'BID_COOLDOWN'
  | 'BID_NOT_RECORDED';

export interface BidRejection {
  accepted: false;
  reason: BidRejectionCode;
  message: string;
  minimumAmount?: number;
  shortfall?: number;
}

export type BidDecision = { accepted: true; amount: number } | BidRejection;

export interface BidderSnapshot {
  bidderId: string;
  balance: number;
  banned: boolean;
}

/** Raw bid input: a number, or text such as "15", "25.5", "+2", "max". */
export type RawBidAmount = number | string;

/* ------------------------------------------------------------------ */
/*  Operation results                                                  */
/* ------------------------------------------------------------------ */

export type OpenRoundResult =
  | { opened: true }
  | { opened: false; reason: string };

export type PlaceBidResult =
  | { accepted: true; amount: number; bid: Bid }
  | BidRejection;

export type UndoBidResult =
  | { undone: true; removed: Bid; highBid: number; highBidderId: string | null }
  | { undone: false; reason: 'NOTHING_TO_UNDO' | 'ROUND_NOT_OPEN' };

export type PauseRoundResult =
  | { paused: true }
  | { paused: false; reason: 'ALREADY_PAUSED' | 'ROUND_NOT_OPEN' };

export type ResumeRoundResult =
  | { resumed: true; durationMs: number }
  | { resumed: false; reason: 'NOT_PAUSED' | 'ROUND_NOT_OPEN' };

export type BeginFinalizeResult =
  | { begun: true; outcome: RoundOutcome }
  | { begun: false; reason: 'ALREADY_FINAL' | 'ROUND_NOT_OPEN' };

export type CancelRoundResult =
  | { cancelled: true }
  | { cancelled: false; reason: 'ROUND_NOT_OPEN' };

/* ------------------------------------------------------------------ */
/*  Events                                                             */
/* ------------------------------------------------------------------ */

export interface SessionSummary {
  sessionId: string;
  soldCount: number;
  unsoldCount: number;
  totalValue: number;
  participantCount: number;
}

/**
 * Structured event records. The core never formats text; subscribers render.
 */
export type AuctionEvent =
  | { type: 'SESSION_STARTED'; sessionId: string; queueLength: number }
  | { type: 'QUEUE_LOADED'; sessionId: string; queueLength: number }
  | {
      type: 'ROUND_OPENED';
      roundId: string;
      sessionId: string;
      item: ItemRef;
      mode: RoundMode;
      durationSec: number;
      quickBids: number[];
    }
  | {
      type: 'BID_ACCEPTED';
      roundId: string;
      bid: Bid;
      previousBidderId: string | null;
      quickBids: number[];
    }
  | {
      type: 'BID_REJECTED';
      roundId: string | null;
      bidderId: string;
      rejection: BidRejection;
    }
  | { type: 'TIME_RESET'; roundId: string; durationSec: number; endsAt: number }
  | {
      type: 'BID_UNDONE';
      roundId: string;
      removed: Bid;
      highBid: number;
      highBidderId: string | null;
    }
  | { type: 'ROUND_PAUSED'; roundId: string; remainingMs: number | null }
  | { type: 'ROUND_RESUMED'; roundId: string; durationMs: number }
  | { type: 'FINAL_CALL_STARTED'; roundId: string; graceSec: number }
  | { type: 'FINAL_CALL_ABORTED'; roundId: string; highBid: number }
  | {
      type: 'ROUND_FINALIZED';
      roundId: string;
      sessionId: string;
      reason: FinalizeReason;
      outcome: RoundOutcome;
      participants: string[];
      mode: RoundMode;
    }
  | {
      type: 'SETTLEMENT_FAILED';
      roundId: string;
      outcome: RoundOutcome;
      error: string;
      attempts: number;
    }
  | { type: 'ROUND_CANCELLED'; roundId: string; sessionId: string; item: ItemRef }
  | {
      type: 'BREAK_STARTED';
      sessionId: string;
      durationSec: number;
      endsAt: number;
      nextItem: ItemRef | null;
    }
  | { type: 'BREAK_SKIPPED'; sessionId: string }
  | { type: 'SESSION_FINISHED'; summary: SessionSummary };

export type AuctionEventType = AuctionEvent['type'];

/** Engine operations return their result plus the events they produced. */
export interface Transition<R> {
  result: R;
  events: AuctionEvent[];
}

/* ------------------------------------------------------------------ */
/*  Session                                                            */
/* ------------------------------------------------------------------ */

export type SessionStatus = 'ACTIVE' | 'FINISHED';

export interface BreakState {
  startedAt: number;
  endsAt: number;
  durationSec: number;
}

export interface SessionState {
  id: string;
  status: SessionStatus;
  queue: ItemRef[];
  currentRoundId: string | null;
  soldCount: number;
  unsoldCount: number;
  totalValue: number;
  participants: string[];
  breakState: BreakState | null;
  /** Between rounds with no break running: waiting for an admin advance. */
  awaitingAdvance: boolean;
  createdAt: number;
  finishedAt: number | null;
}
