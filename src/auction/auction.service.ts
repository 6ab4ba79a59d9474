import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { ACCOUNT_PROVIDER, type AccountProvider } from '../accounts/account-provider';
import { KeyedMutex } from '../common/keyed-mutex';
import { RedisService } from '../redis/redis.service';
import { AuctionEventBus } from './auction-events';
import { AuctionPersistenceService } from './auction-persistence.service';
import { AuctionSettingsService } from './auction-settings.service';
import { CountdownClock } from './countdown-clock';
import { RoundEngine } from './engine';
import type {
  AuctionEvent,
  BidRejection,
  BidSource,
  CancelRoundResult,
  FinalizeReason,
  ItemRef,
  PauseRoundResult,
  PlaceBidResult,
  RawBidAmount,
  ResumeRoundResult,
  RoundOutcome,
  RoundState,
  UndoBidResult,
} from './engine';
import { SettlementService } from './settlement.service';

const LIVE_ROUND_LOCK = 'live-round';

export type OpenRoundOutcome =
  | { opened: true; round: RoundState }
  | { opened: false; reason: string };

export type FinalCallResult =
  | { started: true; graceSec: number; endsAt: number }
  | { started: false; reason: 'ROUND_NOT_OPEN' | 'ALREADY_CALLED' };

export type FinalizeRoundResult =
  | { finalized: true; outcome: RoundOutcome; settled: boolean }
  | { finalized: false; reason: 'ALREADY_FINAL' | 'ROUND_NOT_OPEN' };

export type RetrySettlementResult =
  | { retried: true; settled: boolean }
  | { retried: false; reason: 'NOT_SETTLING' };

export interface PlaceBidOptions {
  source?: BidSource;
  idempotencyKey?: string;
}

/** Round state plus the clock readings a client needs to render it. */
export type LiveRoundView = RoundState & {
  endsAt: number | null;
  finalCallEndsAt: number | null;
};

interface PendingFinalCall {
  roundId: string;
  bidSequence: number;
}

export const roundTimerId = (roundId: string) => `round:${roundId}`;
export const finalCallTimerId = (roundId: string) => `${roundId}:final-call`;
export const settlementRetryTimerId = (roundId: string) =>
  `${roundId}:settlement-retry`;

/**
 * Serialization point for the live round. Bids, timer expiries and admin
 * commands all run through one mutex; the engine decides, this service wires
 * the clock, persistence, settlement and event delivery around it.
 */
@Injectable()
export class AuctionService implements OnApplicationBootstrap {
  private readonly logger = new Logger(AuctionService.name);
  private readonly mutex = new KeyedMutex();
  private current: RoundEngine | null = null;
  private pendingFinalCall: PendingFinalCall | null = null;

  constructor(
    private readonly redis: RedisService,
    private readonly persistence: AuctionPersistenceService,
    private readonly settlement: SettlementService,
    private readonly settings: AuctionSettingsService,
    private readonly clock: CountdownClock,
    private readonly events: AuctionEventBus,
    @Inject(ACCOUNT_PROVIDER) private readonly accounts: AccountProvider,
  ) {}

  /* ------------------------------------------------------------------ */
  /*  RECOVERY: re-hydrate the open round on startup                     */
  /* ------------------------------------------------------------------ */

  async onApplicationBootstrap(): Promise<void> {
    await this.recover();
  }

  async recover(): Promise<void> {
    await this.withLiveRound(async (events) => {
      const state = await this.persistence.loadOpenRound();
      if (!state) return;

      const owned = await this.redis.reclaimActiveRound(state.id);
      if (!owned) {
        this.logger.warn(
          `Round ${state.id} is open but another process holds the live slot; not resuming`,
        );
        return;
      }

      const engine = RoundEngine.fromState(state);
      this.current = engine;
      this.logger.log(`Recovered round ${state.id} (${state.status})`);

      if (state.status === 'ACTIVE' && state.mode === 'TIMED') {
        this.restartCountdown(engine, state.durationSec * 1000, events);
      } else if (state.status === 'SETTLING') {
        await this.settleLocked(engine, events);
      }
    });
  }

  /* ------------------------------------------------------------------ */
  /*  PUBLIC API                                                         */
  /* ------------------------------------------------------------------ */

  /** Open a round for `item`. Fails while any other round holds the live slot. */
  async openRound(sessionId: string, item: ItemRef): Promise<OpenRoundOutcome> {
    return this.withLiveRound(async (events) => {
      const existing = this.current?.getState();
      if (existing) {
        return {
          opened: false,
          reason: `Round ${existing.id} is still ${existing.status}`,
        };
      }

      const settings = this.settings.get();
      const id = randomUUID();
      const claimed = await this.redis.claimActiveRound(id);
      if (!claimed) {
        const holder = await this.redis.currentActiveRound();
        return {
          opened: false,
          reason: `Live slot is held by round ${holder ?? 'unknown'}`,
        };
      }

      const now = Date.now();
      const engine = new RoundEngine({
        id,
        sessionId,
        item,
        mode: settings.mode,
        durationSec: settings.roundDurationSec,
        rules: settings.bidRules,
        createdAt: now,
      });
      const t = engine.open(now);
      if (!t.result.opened) {
        await this.redis.releaseActiveRound(id);
        return t.result;
      }

      try {
        await this.persistence.saveRound(engine.getState());
      } catch (err) {
        const e = err instanceof Error ? err : new Error(String(err));
        this.logger.error(`Failed to persist round ${id}: ${e.message}`, e.stack);
        await this.redis.releaseActiveRound(id);
        return { opened: false, reason: 'Round could not be recorded' };
      }

      this.current = engine;
      this.pendingFinalCall = null;
      events.push(...t.events);
      if (engine.getState().mode === 'TIMED') {
        this.startCountdown(engine, settings.roundDurationSec * 1000);
      }
      this.logger.log(`Round ${id} opened for ${item.name} (${settings.mode})`);
      return { opened: true, round: engine.getState() };
    });
  }

  /**
   * Place a bid on the live round. Replays a stored result for a repeated
   * idempotency key; otherwise cooldown, account lookup, validation, durable
   * record and countdown reset happen in that order.
   */
  async placeBid(
    bidderId: string,
    raw: RawBidAmount,
    options: PlaceBidOptions = {},
  ): Promise<PlaceBidResult> {
    return this.withLiveRound(async (events) => {
      const engine = this.current;
      const roundId = engine?.getState().id ?? null;
      if (!engine || !roundId) {
        return this.rejectBid(events, null, bidderId, {
          accepted: false,
          reason: 'ROUND_NOT_OPEN',
          message: 'No round is open for bids',
        });
      }

      const idempotencyKey = options.idempotencyKey?.trim().slice(0, 128) || null;
      if (idempotencyKey) {
        const existing = await this.redis.getBidIdempotencyResult(
          roundId,
          bidderId,
          idempotencyKey,
        );
        if (existing) return existing;

        const claimed = await this.redis.claimBidIdempotency(
          roundId,
          bidderId,
          idempotencyKey,
        );
        if (!claimed) {
          const settled = await this.waitForBidIdempotencyResult(
            roundId,
            bidderId,
            idempotencyKey,
          );
          return (
            settled ?? {
              accepted: false,
              reason: 'BID_NOT_RECORDED',
              message: 'Duplicate bid in progress',
            }
          );
        }
      }

      if (!idempotencyKey) {
        return this.decideBid(engine, roundId, bidderId, raw, options, events);
      }

      try {
        const result = await this.decideBid(engine, roundId, bidderId, raw, options, events);
        await this.redis.storeBidIdempotencyResult(roundId, bidderId, idempotencyKey, result);
        return result;
      } catch (err) {
        await this.redis
          .releaseBidIdempotency(roundId, bidderId, idempotencyKey)
          .catch((releaseErr: Error) =>
            this.logger.error(
              `Failed to release bid claim ${idempotencyKey} on ${roundId}: ${releaseErr.message}`,
              releaseErr.stack,
            ),
          );
        throw err;
      }
    });
  }

  private async decideBid(
    engine: RoundEngine,
    roundId: string,
    bidderId: string,
    raw: RawBidAmount,
    options: PlaceBidOptions,
    events: AuctionEvent[],
  ): Promise<PlaceBidResult> {
    const before = engine.getState();
    if (before.status === 'ACTIVE') {
      const { bidCooldownMs } = this.settings.get();
      const free = await this.redis.claimBidCooldown(bidderId, bidCooldownMs);
      if (!free) {
        return this.rejectBid(events, roundId, bidderId, {
          accepted: false,
          reason: 'BID_COOLDOWN',
          message: `Wait ${bidCooldownMs}ms between bids`,
        });
      }
    }

    const [balance, banned] = await Promise.all([
      this.accounts.getBalance(bidderId),
      this.accounts.isBanned(bidderId),
    ]);

    const t = engine.submitBid(
      { bidderId, balance, banned },
      raw,
      options.source ?? 'COMMAND',
      Date.now(),
    );
    if (!t.result.accepted) {
      events.push(...t.events);
      return t.result;
    }

    const accepted = t.result;
    try {
      await this.persistence.appendBid(engine.getState(), accepted.bid);
    } catch (err) {
      const e = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Failed to persist bid on ${roundId}: ${e.message}`, e.stack);
      engine.setState(before);
      return this.rejectBid(events, roundId, bidderId, {
        accepted: false,
        reason: 'BID_NOT_RECORDED',
        message: 'Bid could not be recorded; please retry',
      });
    }

    events.push(...t.events);
    this.abortFinalCall(engine, events);
    if (before.mode === 'TIMED') {
      this.restartCountdown(engine, before.durationSec * 1000, events);
    }
    return accepted;
  }

  async undoLastBid(): Promise<UndoBidResult> {
    return this.withLiveRound(async (events) => {
      const engine = this.current;
      if (!engine) return { undone: false, reason: 'ROUND_NOT_OPEN' };

      const t = engine.undoLastBid();
      if (!t.result.undone) return t.result;

      events.push(...t.events);
      await this.persistence
        .truncateBids(engine.getState())
        .catch((err: Error) =>
          this.logger.error(`Failed to persist undo: ${err.message}`, err.stack),
        );
      return t.result;
    });
  }

  async pause(): Promise<PauseRoundResult> {
    return this.withLiveRound(async (events) => {
      const engine = this.current;
      if (!engine) return { paused: false, reason: 'ROUND_NOT_OPEN' };
      const { id } = engine.getState();

      const remaining = this.clock.remaining(roundTimerId(id));
      const t = engine.pause(remaining);
      if (!t.result.paused) return t.result;

      this.clock.cancel(roundTimerId(id));
      this.abortFinalCall(engine, events);
      events.push(...t.events);
      await this.saveRound(engine);
      return t.result;
    });
  }

  async resume(): Promise<ResumeRoundResult> {
    return this.withLiveRound(async (events) => {
      const engine = this.current;
      if (!engine) return { resumed: false, reason: 'ROUND_NOT_OPEN' };

      const t = engine.resume(this.settings.get().resumePolicy);
      if (!t.result.resumed) return t.result;

      events.push(...t.events);
      if (engine.getState().mode === 'TIMED') {
        this.startCountdown(engine, t.result.durationMs);
      }
      await this.saveRound(engine);
      return t.result;
    });
  }

  /**
   * Announce the last chance to bid. The round closes when the grace window
   * ends unless a bid is accepted in the meantime.
   */
  async finalCall(): Promise<FinalCallResult> {
    return this.withLiveRound(async (events) => {
      const engine = this.current;
      const state = engine?.getState();
      if (!engine || !state || state.status !== 'ACTIVE') {
        return { started: false, reason: 'ROUND_NOT_OPEN' };
      }
      if (this.pendingFinalCall?.roundId === state.id) {
        return { started: false, reason: 'ALREADY_CALLED' };
      }

      const { finalCallGraceSec } = this.settings.get();
      this.clock.cancel(roundTimerId(state.id));
      this.pendingFinalCall = { roundId: state.id, bidSequence: state.bidSequence };
      const handle = this.clock.start(
        finalCallTimerId(state.id),
        finalCallGraceSec * 1000,
        (_id, generation) => this.expire(() => this.onFinalCallExpired(state.id, generation)),
      );
      events.push({
        type: 'FINAL_CALL_STARTED',
        roundId: state.id,
        graceSec: finalCallGraceSec,
      });
      return { started: true, graceSec: finalCallGraceSec, endsAt: handle.endsAt };
    });
  }

  /** Close the live round as unsold, whatever bids it holds. Works while paused. */
  async skipToUnsold(): Promise<FinalizeRoundResult> {
    return this.forceFinalize('SKIPPED');
  }

  /** Exactly-once close. Every caller after the first sees ALREADY_FINAL. */
  async forceFinalize(reason: FinalizeReason): Promise<FinalizeRoundResult> {
    return this.withLiveRound(async (events) => {
      const engine = this.current;
      if (!engine) return { finalized: false, reason: 'ROUND_NOT_OPEN' };
      return this.finalizeLocked(engine, reason, events);
    });
  }

  async retrySettlement(): Promise<RetrySettlementResult> {
    return this.withLiveRound(async (events) => {
      const engine = this.current;
      if (!engine || engine.getState().status !== 'SETTLING') {
        return { retried: false, reason: 'NOT_SETTLING' };
      }
      this.clock.cancel(settlementRetryTimerId(engine.getState().id));
      const settled = await this.settleLocked(engine, events);
      return { retried: true, settled };
    });
  }

  /** Abandon the live round without an outcome. Used when a session ends early. */
  async cancelRound(): Promise<CancelRoundResult> {
    return this.withLiveRound(async (events) => {
      const engine = this.current;
      if (!engine) return { cancelled: false, reason: 'ROUND_NOT_OPEN' };

      const t = engine.cancel(Date.now());
      if (!t.result.cancelled) return t.result;

      const { id } = engine.getState();
      this.clearRoundTimers(id);
      events.push(...t.events);
      await this.saveRound(engine);
      await this.releaseSlot(id);
      this.current = null;
      this.logger.log(`Round ${id} cancelled`);
      return t.result;
    });
  }

  getCurrentRound(): LiveRoundView | null {
    const state = this.current?.getState();
    if (!state) return null;
    return {
      ...state,
      endsAt: this.clock.endsAt(roundTimerId(state.id)),
      finalCallEndsAt: this.clock.endsAt(finalCallTimerId(state.id)),
    };
  }

  async getRound(roundId: string): Promise<RoundState | null> {
    const state = this.current?.getState();
    if (state?.id === roundId) return state;
    return this.persistence.loadRound(roundId);
  }

  /* ------------------------------------------------------------------ */
  /*  TIMER LOGIC                                                        */
  /* ------------------------------------------------------------------ */

  private startCountdown(engine: RoundEngine, durationMs: number): number {
    const { id } = engine.getState();
    this.clock.cancel(roundTimerId(id));
    const handle = this.clock.start(roundTimerId(id), durationMs, (_id, generation) =>
      this.expire(() => this.onRoundTimerExpired(id, generation)),
    );
    return handle.endsAt;
  }

  private restartCountdown(
    engine: RoundEngine,
    durationMs: number,
    events: AuctionEvent[],
  ): void {
    const { id, durationSec } = engine.getState();
    const endsAt = this.clock.has(roundTimerId(id))
      ? this.clock.reset(roundTimerId(id), durationMs).endsAt
      : this.startCountdown(engine, durationMs);
    events.push({ type: 'TIME_RESET', roundId: id, durationSec, endsAt });
  }

  private async onRoundTimerExpired(roundId: string, generation: number): Promise<void> {
    await this.withLiveRound(async (events) => {
      const engine = this.current;
      if (
        !this.clock.isCurrent(roundTimerId(roundId), generation) ||
        !engine ||
        engine.getState().id !== roundId
      ) {
        this.logger.debug(`Ignoring stale countdown expiry for ${roundId}`);
        return;
      }
      this.clock.cancel(roundTimerId(roundId));
      await this.finalizeLocked(engine, 'TIMER_EXPIRED', events);
    });
  }

  private async onFinalCallExpired(roundId: string, generation: number): Promise<void> {
    await this.withLiveRound(async (events) => {
      const engine = this.current;
      const pending = this.pendingFinalCall;
      if (
        !this.clock.isCurrent(finalCallTimerId(roundId), generation) ||
        !engine ||
        !pending ||
        pending.roundId !== roundId
      ) {
        this.logger.debug(`Ignoring stale final call expiry for ${roundId}`);
        return;
      }
      this.clock.cancel(finalCallTimerId(roundId));
      this.pendingFinalCall = null;
      if (engine.getState().bidSequence !== pending.bidSequence) {
        this.logger.debug(`Final call on ${roundId} was overtaken by a bid`);
        return;
      }
      await this.finalizeLocked(engine, 'FINAL_CALL', events);
    });
  }

  private async onSettlementRetry(roundId: string, generation: number): Promise<void> {
    await this.withLiveRound(async (events) => {
      const engine = this.current;
      if (
        !this.clock.isCurrent(settlementRetryTimerId(roundId), generation) ||
        !engine ||
        engine.getState().id !== roundId ||
        engine.getState().status !== 'SETTLING'
      ) {
        this.logger.debug(`Ignoring stale settlement retry for ${roundId}`);
        return;
      }
      this.clock.cancel(settlementRetryTimerId(roundId));
      await this.settleLocked(engine, events);
    });
  }

  private abortFinalCall(engine: RoundEngine, events: AuctionEvent[]): void {
    const { id, highBid } = engine.getState();
    if (this.pendingFinalCall?.roundId !== id) return;
    this.clock.cancel(finalCallTimerId(id));
    this.pendingFinalCall = null;
    events.push({ type: 'FINAL_CALL_ABORTED', roundId: id, highBid });
  }

  private clearRoundTimers(roundId: string): void {
    this.clock.cancel(roundTimerId(roundId));
    this.clock.cancel(finalCallTimerId(roundId));
    this.clock.cancel(settlementRetryTimerId(roundId));
    if (this.pendingFinalCall?.roundId === roundId) this.pendingFinalCall = null;
  }

  /* ------------------------------------------------------------------ */
  /*  FINALIZE + SETTLEMENT                                              */
  /* ------------------------------------------------------------------ */

  private async finalizeLocked(
    engine: RoundEngine,
    reason: FinalizeReason,
    events: AuctionEvent[],
  ): Promise<FinalizeRoundResult> {
    const t = engine.beginFinalize(reason, Date.now());
    const { id } = engine.getState();
    if (!t.result.begun) {
      this.logger.warn(`Finalize (${reason}) on ${id} refused: ${t.result.reason}`);
      return { finalized: false, reason: t.result.reason };
    }

    this.clearRoundTimers(id);
    events.push(...t.events);
    await this.saveRound(engine);
    this.logger.log(`Round ${id} closed (${reason}): ${t.result.outcome.kind}`);

    const settled = await this.settleLocked(engine, events);
    return { finalized: true, outcome: t.result.outcome, settled };
  }

  /**
   * Run (or resume) settlement for a SETTLING round. On success the round is
   * completed and the live slot released; on failure it stays SETTLING and a
   * retry is scheduled while attempts remain.
   */
  private async settleLocked(engine: RoundEngine, events: AuctionEvent[]): Promise<boolean> {
    const state = engine.getState();
    const { outcome, settlement } = state;
    if (state.status !== 'SETTLING' || !outcome || !settlement) return false;

    try {
      await this.settlement.settle(state.id, outcome, settlement, async (progress) => {
        engine.recordSettlementProgress(progress);
        await this.persistence.saveRound(engine.getState());
      });
    } catch (err) {
      const e = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Settlement of ${state.id} failed: ${e.message}`, e.stack);
      const failed = engine.failSettlement(e.message);
      events.push(...failed.events);
      await this.saveRound(engine);
      this.scheduleSettlementRetry(state.id, failed.result.attempts);
      return false;
    }

    const t = engine.completeSettlement();
    events.push(...t.events);
    await this.saveRound(engine);
    await this.releaseSlot(state.id);
    this.current = null;
    return true;
  }

  private scheduleSettlementRetry(roundId: string, attempts: number): void {
    const { maxAttempts, delayMs } = this.settings.get().settlementRetry;
    if (attempts >= maxAttempts) {
      this.logger.warn(
        `Settlement of ${roundId} held after ${attempts} attempt(s); waiting for an admin retry`,
      );
      return;
    }
    const id = settlementRetryTimerId(roundId);
    this.clock.cancel(id);
    this.clock.start(id, delayMs, (_id, generation) =>
      this.expire(() => this.onSettlementRetry(roundId, generation)),
    );
  }

  /* ------------------------------------------------------------------ */
  /*  INTERNAL                                                           */
  /* ------------------------------------------------------------------ */

  /** Run under the live-round lock; events are published once it is released. */
  private async withLiveRound<T>(fn: (events: AuctionEvent[]) => Promise<T>): Promise<T> {
    const events: AuctionEvent[] = [];
    try {
      return await this.mutex.run(LIVE_ROUND_LOCK, () => fn(events));
    } finally {
      this.events.publish(events);
    }
  }

  private expire(handler: () => Promise<void>): void {
    handler().catch((err: unknown) => {
      const e = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Timer handler failed: ${e.message}`, e.stack);
    });
  }

  private rejectBid(
    events: AuctionEvent[],
    roundId: string | null,
    bidderId: string,
    rejection: BidRejection,
  ): BidRejection {
    events.push({ type: 'BID_REJECTED', roundId, bidderId, rejection });
    return rejection;
  }

  private async saveRound(engine: RoundEngine): Promise<void> {
    const state = engine.getState();
    await this.persistence
      .saveRound(state)
      .catch((err: Error) =>
        this.logger.error(`Failed to persist round ${state.id}: ${err.message}`, err.stack),
      );
  }

  private async releaseSlot(roundId: string): Promise<void> {
    await this.redis
      .releaseActiveRound(roundId)
      .catch((err: Error) =>
        this.logger.error(`Failed to release live slot for ${roundId}: ${err.message}`, err.stack),
      );
  }

  private async waitForBidIdempotencyResult(
    roundId: string,
    bidderId: string,
    idempotencyKey: string,
  ): Promise<PlaceBidResult | null> {
    const maxAttempts = 40;
    for (let i = 0; i < maxAttempts; i += 1) {
      const result = await this.redis.getBidIdempotencyResult(
        roundId,
        bidderId,
        idempotencyKey,
      );
      if (result) return result;
      await new Promise((resolve) => setTimeout(resolve, 25));
    }
    return null;
  }
}
