import { quickBidOptions, validateBid } from './bid-validator';
import type {
  BeginFinalizeResult,
  BidderSnapshot,
  BidSource,
  CancelRoundResult,
  CreateRoundInput,
  FinalizeReason,
  OpenRoundResult,
  PauseRoundResult,
  PlaceBidResult,
  RawBidAmount,
  ResumePolicy,
  ResumeRoundResult,
  RoundOutcome,
  RoundState,
  SettlementProgress,
  Transition,
  UndoBidResult,
} from './types';

function clone<T>(value: T): T {
  return JSON.parse(JSON.stringify(value)) as T;
}

function transition<R>(result: R, events: Transition<R>['events'] = []): Transition<R> {
  return { result, events };
}

export function initialSettlementProgress(): SettlementProgress {
  return {
    debited: false,
    acquisitionRecorded: false,
    itemMarked: false,
    attempts: 0,
    lastError: null,
  };
}

/**
 * Pure round engine: deterministic, no timers, no I/O.
 * Every operation returns its result plus the event records it produced;
 * the caller owns scheduling, persistence and delivery.
 */
export class RoundEngine {
  private state: RoundState;

  constructor(input: CreateRoundInput) {
    this.state = {
      id: input.id,
      sessionId: input.sessionId,
      item: clone(input.item),
      status: 'PENDING',
      mode: input.mode,
      durationSec: input.durationSec,
      highBid: 0,
      highBidderId: null,
      bids: [],
      bidSequence: 0,
      outcome: null,
      finalizeReason: null,
      settlement: null,
      rules: clone(input.rules),
      pausedRemainingMs: null,
      createdAt: input.createdAt,
      startedAt: null,
      endedAt: null,
    };
  }

  static fromState(state: RoundState): RoundEngine {
    const engine = new RoundEngine({
      id: state.id,
      sessionId: state.sessionId,
      item: state.item,
      mode: state.mode,
      durationSec: state.durationSec,
      rules: state.rules,
      createdAt: state.createdAt,
    });
    engine.setState(state);
    return engine;
  }

  /**
   * Transition PENDING → ACTIVE.
   */
  open(now: number): Transition<OpenRoundResult> {
    if (this.state.status !== 'PENDING') {
      return transition<OpenRoundResult>({
        opened: false,
        reason: `Round cannot open from status ${this.state.status}`,
      });
    }
    this.state.status = 'ACTIVE';
    this.state.startedAt = now;
    return transition<OpenRoundResult>({ opened: true }, [
      {
        type: 'ROUND_OPENED',
        roundId: this.state.id,
        sessionId: this.state.sessionId,
        item: clone(this.state.item),
        mode: this.state.mode,
        durationSec: this.state.durationSec,
        quickBids: quickBidOptions(this.state),
      },
    ]);
  }

  /**
   * Validate and, when legal, append a bid. Rejections leave state untouched.
   */
  submitBid(
    bidder: BidderSnapshot,
    raw: RawBidAmount,
    source: BidSource,
    now: number,
  ): Transition<PlaceBidResult> {
    const decision = validateBid(raw, this.state, bidder);
    if (!decision.accepted) {
      return transition<PlaceBidResult>(decision, [
        {
          type: 'BID_REJECTED',
          roundId: this.state.id,
          bidderId: bidder.bidderId,
          rejection: decision,
        },
      ]);
    }

    const previousBidderId = this.state.highBidderId;
    const bid = {
      bidderId: bidder.bidderId,
      amount: decision.amount,
      placedAt: now,
      source,
    };
    this.state.bids.push(bid);
    this.state.highBid = bid.amount;
    this.state.highBidderId = bid.bidderId;
    this.state.bidSequence += 1;

    return transition<PlaceBidResult>(
      { accepted: true, amount: bid.amount, bid: { ...bid } },
      [
        {
          type: 'BID_ACCEPTED',
          roundId: this.state.id,
          bid: { ...bid },
          previousBidderId,
          quickBids: quickBidOptions(this.state),
        },
      ],
    );
  }

  /**
   * Pop the tail bid and recompute the lead from the new tail.
   */
  undoLastBid(): Transition<UndoBidResult> {
    if (this.state.status !== 'ACTIVE' && this.state.status !== 'PAUSED') {
      return transition<UndoBidResult>({ undone: false, reason: 'ROUND_NOT_OPEN' });
    }
    const removed = this.state.bids.pop();
    if (!removed) {
      return transition<UndoBidResult>({ undone: false, reason: 'NOTHING_TO_UNDO' });
    }
    const tail = this.state.bids[this.state.bids.length - 1];
    this.state.highBid = tail?.amount ?? 0;
    this.state.highBidderId = tail?.bidderId ?? null;

    return transition<UndoBidResult>(
      {
        undone: true,
        removed,
        highBid: this.state.highBid,
        highBidderId: this.state.highBidderId,
      },
      [
        {
          type: 'BID_UNDONE',
          roundId: this.state.id,
          removed: { ...removed },
          highBid: this.state.highBid,
          highBidderId: this.state.highBidderId,
        },
      ],
    );
  }

  /**
   * ACTIVE → PAUSED. `remainingMs` is what the countdown had left, if any.
   */
  pause(remainingMs: number | null): Transition<PauseRoundResult> {
    if (this.state.status === 'PAUSED') {
      return transition<PauseRoundResult>({ paused: false, reason: 'ALREADY_PAUSED' });
    }
    if (this.state.status !== 'ACTIVE') {
      return transition<PauseRoundResult>({ paused: false, reason: 'ROUND_NOT_OPEN' });
    }
    this.state.status = 'PAUSED';
    this.state.pausedRemainingMs = remainingMs;
    return transition<PauseRoundResult>({ paused: true }, [
      { type: 'ROUND_PAUSED', roundId: this.state.id, remainingMs },
    ]);
  }

  /**
   * PAUSED → ACTIVE. Returns the countdown length the caller should start.
   */
  resume(policy: ResumePolicy): Transition<ResumeRoundResult> {
    if (this.state.status === 'ACTIVE') {
      return transition<ResumeRoundResult>({ resumed: false, reason: 'NOT_PAUSED' });
    }
    if (this.state.status !== 'PAUSED') {
      return transition<ResumeRoundResult>({ resumed: false, reason: 'ROUND_NOT_OPEN' });
    }
    const full = this.state.durationSec * 1000;
    const remaining = this.state.pausedRemainingMs;
    const durationMs =
      policy === 'PRESERVE_REMAINING' && remaining !== null && remaining > 0
        ? remaining
        : full;
    this.state.status = 'ACTIVE';
    this.state.pausedRemainingMs = null;
    return transition<ResumeRoundResult>({ resumed: true, durationMs }, [
      { type: 'ROUND_RESUMED', roundId: this.state.id, durationMs },
    ]);
  }

  /**
   * Leave ACTIVE (or PAUSED, for a skip) and fix the outcome. Only the first
   * caller succeeds; everyone after sees ALREADY_FINAL.
   */
  beginFinalize(reason: FinalizeReason, now: number): Transition<BeginFinalizeResult> {
    const { status } = this.state;
    if (status === 'SETTLING' || status === 'COMPLETED' || status === 'CANCELLED') {
      return transition<BeginFinalizeResult>({ begun: false, reason: 'ALREADY_FINAL' });
    }
    const skippable = reason === 'SKIPPED' && status === 'PAUSED';
    if (status !== 'ACTIVE' && !skippable) {
      return transition<BeginFinalizeResult>({ begun: false, reason: 'ROUND_NOT_OPEN' });
    }

    const item = clone(this.state.item);
    const outcome: RoundOutcome =
      reason !== 'SKIPPED' && this.state.highBidderId !== null
        ? {
            kind: 'SOLD',
            bidderId: this.state.highBidderId,
            amount: this.state.highBid,
            item,
          }
        : { kind: 'UNSOLD', item };

    this.state.status = 'SETTLING';
    this.state.outcome = outcome;
    this.state.finalizeReason = reason;
    this.state.settlement = initialSettlementProgress();
    this.state.pausedRemainingMs = null;
    this.state.endedAt = now;
    return transition<BeginFinalizeResult>({ begun: true, outcome: clone(outcome) });
  }

  recordSettlementProgress(progress: SettlementProgress): void {
    if (this.state.status !== 'SETTLING') return;
    this.state.settlement = { ...progress };
  }

  /**
   * Settlement attempt failed; the round stays SETTLING so it can be retried.
   */
  failSettlement(error: string): Transition<{ attempts: number }> {
    const progress = this.state.settlement ?? initialSettlementProgress();
    progress.attempts += 1;
    progress.lastError = error;
    this.state.settlement = progress;
    const outcome = this.state.outcome;
    if (this.state.status !== 'SETTLING' || !outcome) {
      return transition({ attempts: progress.attempts });
    }
    return transition({ attempts: progress.attempts }, [
      {
        type: 'SETTLEMENT_FAILED',
        roundId: this.state.id,
        outcome: clone(outcome),
        error,
        attempts: progress.attempts,
      },
    ]);
  }

  /**
   * SETTLING → COMPLETED once settlement is confirmed.
   */
  completeSettlement(): Transition<{ completed: boolean }> {
    const outcome = this.state.outcome;
    const reason = this.state.finalizeReason;
    if (this.state.status !== 'SETTLING' || !outcome || !reason) {
      return transition({ completed: false });
    }
    const progress = this.state.settlement ?? initialSettlementProgress();
    progress.attempts += 1;
    progress.lastError = null;
    this.state.settlement = progress;
    this.state.status = 'COMPLETED';
    return transition({ completed: true }, [
      {
        type: 'ROUND_FINALIZED',
        roundId: this.state.id,
        sessionId: this.state.sessionId,
        reason,
        outcome: clone(outcome),
        participants: this.participants(),
        mode: this.state.mode,
      },
    ]);
  }

  /**
   * ACTIVE | PAUSED → CANCELLED. No outcome and no settlement.
   */
  cancel(now: number): Transition<CancelRoundResult> {
    if (this.state.status !== 'ACTIVE' && this.state.status !== 'PAUSED') {
      return transition<CancelRoundResult>({ cancelled: false, reason: 'ROUND_NOT_OPEN' });
    }
    this.state.status = 'CANCELLED';
    this.state.pausedRemainingMs = null;
    this.state.endedAt = now;
    return transition<CancelRoundResult>({ cancelled: true }, [
      {
        type: 'ROUND_CANCELLED',
        roundId: this.state.id,
        sessionId: this.state.sessionId,
        item: clone(this.state.item),
      },
    ]);
  }

  /** Distinct bidders in the current history, in first-bid order. */
  participants(): string[] {
    return [...new Set(this.state.bids.map((b) => b.bidderId))];
  }

  getState(): RoundState {
    return clone(this.state);
  }

  setState(state: RoundState): void {
    this.state = clone(state);
  }
}
