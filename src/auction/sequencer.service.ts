import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { KeyedMutex } from '../common/keyed-mutex';
import { ITEM_SOURCE, type ItemSource } from '../items/item-source';
import { AuctionEventBus } from './auction-events';
import { AuctionPersistenceService } from './auction-persistence.service';
import { AuctionSettingsService } from './auction-settings.service';
import { AuctionService } from './auction.service';
import { CountdownClock } from './countdown-clock';
import { SessionEngine } from './engine';
import type {
  AuctionEvent,
  ItemRef,
  RoundState,
  SessionState,
  SessionSummary,
} from './engine';

const SESSION_LOCK = 'session';

export const breakTimerId = (sessionId: string) => `break:${sessionId}`;

const participantsOf = (round: RoundState): string[] => [
  ...new Set(round.bids.map((b) => b.bidderId)),
];

type RoundFinalizedEvent = Extract<AuctionEvent, { type: 'ROUND_FINALIZED' }>;
type RoundCancelledEvent = Extract<AuctionEvent, { type: 'ROUND_CANCELLED' }>;

export interface LoadQueueResult {
  sessionId: string;
  queueLength: number;
  newSession: boolean;
}

export type AdvanceResult =
  | { advanced: true; roundId: string; item: ItemRef }
  | { advanced: false; reason: 'NO_SESSION' | 'ROUND_IN_PROGRESS' }
  | { advanced: false; reason: 'ROUND_NOT_OPENED'; message: string }
  | { advanced: false; reason: 'SESSION_FINISHED'; summary: SessionSummary };

export type SkipBreakResult =
  | { skipped: true; advance: AdvanceResult }
  | { skipped: false; reason: 'NO_SESSION' | 'NO_BREAK' };

export type FinishSessionResult =
  | { finished: true; summary: SessionSummary }
  | { finished: false; reason: 'NO_SESSION' | 'ROUND_IN_PROGRESS' };

export type SessionView = SessionState & { breakEndsAt: number | null };

/**
 * Drives a session: pulls the next item, asks the coordinator to open its
 * round, and reacts to the round closing with a break (timed mode) or a wait
 * for an explicit advance (manual-call mode).
 */
@Injectable()
export class SequencerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SequencerService.name);
  private readonly mutex = new KeyedMutex();
  private session: SessionEngine | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly auction: AuctionService,
    private readonly persistence: AuctionPersistenceService,
    private readonly settings: AuctionSettingsService,
    private readonly clock: CountdownClock,
    private readonly events: AuctionEventBus,
    @Inject(ITEM_SOURCE) private readonly items: ItemSource,
  ) {}

  async onModuleInit(): Promise<void> {
    this.unsubscribe = this.events.subscribe((event) => {
      if (event.type === 'ROUND_FINALIZED') {
        const finalized: RoundFinalizedEvent = event;
        this.handle(() => this.onRoundFinalized(finalized));
      } else if (event.type === 'ROUND_CANCELLED') {
        const cancelled: RoundCancelledEvent = event;
        this.handle(() => this.onRoundCancelled(cancelled));
      }
    });
    await this.recover();
  }

  onModuleDestroy(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Restore the active session. Break countdowns are not resumed: a session
   * that was between rounds waits for an explicit advance.
   */
  async recover(): Promise<void> {
    await this.withSession(async () => {
      const state = await this.persistence.loadActiveSession();
      if (!state) return;
      const session = SessionEngine.fromState(state);

      if (state.currentRoundId) {
        const round = await this.persistence.loadRound(state.currentRoundId);
        if (round?.status === 'COMPLETED' && round.outcome) {
          session.recordOutcome(round.outcome, participantsOf(round));
        } else if (!round || round.status === 'CANCELLED') {
          session.detachRound();
        }
      }
      if (!session.getState().currentRoundId) session.waitForAdvance();

      this.session = session;
      await this.save();
      this.logger.log(`Recovered session ${state.id}`);
    });
  }

  /* ------------------------------------------------------------------ */
  /*  PUBLIC API                                                         */
  /* ------------------------------------------------------------------ */

  /**
   * Replace the backlog, starting a new session if none is active. Without
   * `items` the catalogue's available items are used.
   */
  async loadQueue(items?: ItemRef[]): Promise<LoadQueueResult> {
    const queue = items ?? (await this.items.nextAvailableItems());
    return this.withSession(async (events) => {
      const existing = this.session;
      if (existing && !existing.isFinished()) {
        events.push(...existing.replaceQueue(queue));
        await this.save();
        return { sessionId: existing.id, queueLength: queue.length, newSession: false };
      }

      const session = new SessionEngine(randomUUID(), queue, Date.now());
      this.session = session;
      events.push(...session.started());
      await this.save();
      this.logger.log(`Session ${session.id} started with ${queue.length} item(s)`);
      return { sessionId: session.id, queueLength: queue.length, newSession: true };
    });
  }

  async advance(): Promise<AdvanceResult> {
    return this.withSession((events) => this.advanceLocked(events));
  }

  async skipBreak(): Promise<SkipBreakResult> {
    return this.withSession(async (events) => {
      const session = this.activeSession();
      if (!session) return { skipped: false, reason: 'NO_SESSION' };

      const t = session.skipBreak();
      if (!t.result.skipped) return { skipped: false, reason: 'NO_BREAK' };

      this.clock.cancel(breakTimerId(session.id));
      events.push(...t.events);
      const advance = await this.advanceLocked(events);
      return { skipped: true, advance };
    });
  }

  /** Close the session between rounds. Refused while a round is running. */
  async finishSession(): Promise<FinishSessionResult> {
    return this.withSession(async (events) => {
      const session = this.activeSession();
      if (!session) return { finished: false, reason: 'NO_SESSION' };
      if (session.getState().currentRoundId) {
        return { finished: false, reason: 'ROUND_IN_PROGRESS' };
      }
      const summary = this.finishLocked(session, events);
      await this.save();
      return { finished: true, summary };
    });
  }

  /** Close the session now, cancelling the running round if it is still open. */
  async endSession(): Promise<FinishSessionResult> {
    return this.withSession(async (events) => {
      const session = this.activeSession();
      if (!session) return { finished: false, reason: 'NO_SESSION' };

      const { currentRoundId } = session.getState();
      if (currentRoundId) {
        const cancelled = await this.auction.cancelRound();
        if (!cancelled.cancelled) {
          // A closed round still counts toward the session it belongs to.
          const round = await this.auction.getRound(currentRoundId);
          if (round?.status === 'SETTLING') {
            return { finished: false, reason: 'ROUND_IN_PROGRESS' };
          }
          if (round?.status === 'COMPLETED' && round.outcome) {
            session.recordOutcome(round.outcome, participantsOf(round));
          } else {
            this.logger.warn(
              `Session ${session.id} ended while round ${currentRoundId} could not be cancelled (${cancelled.reason})`,
            );
          }
        }
        session.detachRound();
      }
      const summary = this.finishLocked(session, events);
      await this.save();
      return { finished: true, summary };
    });
  }

  getSession(): SessionView | null {
    const state = this.session?.getState();
    if (!state) return null;
    return { ...state, breakEndsAt: this.clock.endsAt(breakTimerId(state.id)) };
  }

  /* ------------------------------------------------------------------ */
  /*  ROUND LIFECYCLE                                                    */
  /* ------------------------------------------------------------------ */

  private async onRoundFinalized(event: RoundFinalizedEvent): Promise<void> {
    await this.withSession(async (events) => {
      const session = this.session;
      if (
        !session ||
        session.isFinished() ||
        session.getState().currentRoundId !== event.roundId
      ) {
        this.logger.debug(`Round ${event.roundId} finalized outside the current session`);
        return;
      }
      session.recordOutcome(event.outcome, event.participants);

      if (session.peek() === null) {
        this.finishLocked(session, events);
      } else if (event.mode === 'TIMED') {
        await this.startBreakLocked(session, events);
      } else {
        session.waitForAdvance();
      }
      await this.save();
    });
  }

  private async onRoundCancelled(event: RoundCancelledEvent): Promise<void> {
    await this.withSession(async () => {
      const session = this.session;
      if (!session || session.getState().currentRoundId !== event.roundId) return;
      session.detachRound();
      if (!session.isFinished()) session.waitForAdvance();
      await this.save();
    });
  }

  private async startBreakLocked(session: SessionEngine, events: AuctionEvent[]): Promise<void> {
    const { breakDurationSec } = this.settings.get();
    if (breakDurationSec <= 0) {
      await this.advanceLocked(events);
      return;
    }
    events.push(...session.startBreak(breakDurationSec, Date.now()));
    const sessionId = session.id;
    this.clock.cancel(breakTimerId(sessionId));
    this.clock.start(breakTimerId(sessionId), breakDurationSec * 1000, (_id, generation) =>
      this.handle(() => this.onBreakExpired(sessionId, generation)),
    );
  }

  private async onBreakExpired(sessionId: string, generation: number): Promise<void> {
    await this.withSession(async (events) => {
      if (
        !this.clock.isCurrent(breakTimerId(sessionId), generation) ||
        this.session?.id !== sessionId
      ) {
        this.logger.debug(`Ignoring stale break expiry for ${sessionId}`);
        return;
      }
      this.clock.cancel(breakTimerId(sessionId));
      await this.advanceLocked(events);
    });
  }

  private async advanceLocked(events: AuctionEvent[]): Promise<AdvanceResult> {
    const session = this.activeSession();
    if (!session) return { advanced: false, reason: 'NO_SESSION' };
    if (session.getState().currentRoundId) {
      return { advanced: false, reason: 'ROUND_IN_PROGRESS' };
    }

    this.clock.cancel(breakTimerId(session.id));
    const item = session.dequeue();
    if (!item) {
      const summary = this.finishLocked(session, events);
      await this.save();
      return { advanced: false, reason: 'SESSION_FINISHED', summary };
    }

    const opened = await this.auction.openRound(session.id, item);
    if (!opened.opened) {
      session.requeue(item);
      session.waitForAdvance();
      await this.save();
      this.logger.warn(`Could not open round for ${item.name}: ${opened.reason}`);
      return { advanced: false, reason: 'ROUND_NOT_OPENED', message: opened.reason };
    }

    session.attachRound(opened.round.id);
    await this.save();
    return { advanced: true, roundId: opened.round.id, item };
  }

  private finishLocked(session: SessionEngine, events: AuctionEvent[]): SessionSummary {
    this.clock.cancel(breakTimerId(session.id));
    const t = session.finish(Date.now());
    events.push(...t.events);
    if (t.events.length > 0) {
      const s = t.result;
      this.logger.log(
        `Session ${s.sessionId} finished: ${s.soldCount} sold, ${s.unsoldCount} unsold, total ${s.totalValue}`,
      );
    }
    return t.result;
  }

  /* ------------------------------------------------------------------ */
  /*  INTERNAL                                                           */
  /* ------------------------------------------------------------------ */

  private activeSession(): SessionEngine | null {
    const session = this.session;
    return session && !session.isFinished() ? session : null;
  }

  private async withSession<T>(fn: (events: AuctionEvent[]) => Promise<T>): Promise<T> {
    const events: AuctionEvent[] = [];
    try {
      return await this.mutex.run(SESSION_LOCK, () => fn(events));
    } finally {
      this.events.publish(events);
    }
  }

  private handle(handler: () => Promise<void>): void {
    handler().catch((err: unknown) => {
      const e = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Session handler failed: ${e.message}`, e.stack);
    });
  }

  private async save(): Promise<void> {
    const state = this.session?.getState();
    if (!state) return;
    await this.persistence
      .saveSession(state)
      .catch((err: Error) =>
        this.logger.error(`Failed to persist session ${state.id}: ${err.message}`, err.stack),
      );
  }
}
