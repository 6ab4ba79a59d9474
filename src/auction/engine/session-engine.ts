import type {
  AuctionEvent,
  ItemRef,
  RoundOutcome,
  SessionState,
  SessionSummary,
  Transition,
} from './types';

function clone<T>(value: T): T {
  return JSON.parse(JSON.stringify(value)) as T;
}

/**
 * Pure session engine: the ordered backlog, running aggregates and break
 * state. Round creation and timers live in the sequencer.
 */
export class SessionEngine {
  private state: SessionState;

  constructor(id: string, queue: ItemRef[], now: number) {
    this.state = {
      id,
      status: 'ACTIVE',
      queue: clone(queue),
      currentRoundId: null,
      soldCount: 0,
      unsoldCount: 0,
      totalValue: 0,
      participants: [],
      breakState: null,
      awaitingAdvance: true,
      createdAt: now,
      finishedAt: null,
    };
  }

  static fromState(state: SessionState): SessionEngine {
    const engine = new SessionEngine(state.id, [], state.createdAt);
    engine.setState(state);
    return engine;
  }

  get id(): string {
    return this.state.id;
  }

  isFinished(): boolean {
    return this.state.status === 'FINISHED';
  }

  started(): AuctionEvent[] {
    return [
      {
        type: 'SESSION_STARTED',
        sessionId: this.state.id,
        queueLength: this.state.queue.length,
      },
    ];
  }

  /** Replace the pending backlog. The running round, if any, is untouched. */
  replaceQueue(items: ItemRef[]): AuctionEvent[] {
    this.state.queue = clone(items);
    return [
      {
        type: 'QUEUE_LOADED',
        sessionId: this.state.id,
        queueLength: this.state.queue.length,
      },
    ];
  }

  peek(): ItemRef | null {
    const next = this.state.queue[0];
    return next ? clone(next) : null;
  }

  /** Pop the next item and leave any break or wait state. */
  dequeue(): ItemRef | null {
    const next = this.state.queue.shift() ?? null;
    this.state.breakState = null;
    this.state.awaitingAdvance = false;
    return next;
  }

  /** Put an item back at the head of the queue (round failed to open). */
  requeue(item: ItemRef): void {
    this.state.queue.unshift(clone(item));
  }

  attachRound(roundId: string): void {
    this.state.currentRoundId = roundId;
  }

  recordOutcome(outcome: RoundOutcome, participants: string[]): void {
    if (outcome.kind === 'SOLD') {
      this.state.soldCount += 1;
      this.state.totalValue += outcome.amount;
    } else {
      this.state.unsoldCount += 1;
    }
    const seen = new Set(this.state.participants);
    for (const bidderId of participants) {
      if (!seen.has(bidderId)) {
        seen.add(bidderId);
        this.state.participants.push(bidderId);
      }
    }
    this.state.currentRoundId = null;
  }

  detachRound(): void {
    this.state.currentRoundId = null;
  }

  startBreak(durationSec: number, now: number): AuctionEvent[] {
    const endsAt = now + durationSec * 1000;
    this.state.breakState = { startedAt: now, endsAt, durationSec };
    this.state.awaitingAdvance = false;
    return [
      {
        type: 'BREAK_STARTED',
        sessionId: this.state.id,
        durationSec,
        endsAt,
        nextItem: this.peek(),
      },
    ];
  }

  inBreak(): boolean {
    return this.state.breakState !== null;
  }

  skipBreak(): Transition<{ skipped: boolean }> {
    if (!this.state.breakState) {
      return { result: { skipped: false }, events: [] };
    }
    this.state.breakState = null;
    return {
      result: { skipped: true },
      events: [{ type: 'BREAK_SKIPPED', sessionId: this.state.id }],
    };
  }

  waitForAdvance(): void {
    this.state.breakState = null;
    this.state.awaitingAdvance = true;
  }

  /**
   * Close the session. A second call returns the same summary with no event.
   */
  finish(now: number): Transition<SessionSummary> {
    const summary = this.summary();
    if (this.state.status === 'FINISHED') {
      return { result: summary, events: [] };
    }
    this.state.status = 'FINISHED';
    this.state.finishedAt = now;
    this.state.breakState = null;
    this.state.awaitingAdvance = false;
    return {
      result: summary,
      events: [{ type: 'SESSION_FINISHED', summary }],
    };
  }

  summary(): SessionSummary {
    return {
      sessionId: this.state.id,
      soldCount: this.state.soldCount,
      unsoldCount: this.state.unsoldCount,
      totalValue: this.state.totalValue,
      participantCount: this.state.participants.length,
    };
  }

  getState(): SessionState {
    return clone(this.state);
  }

  setState(state: SessionState): void {
    this.state = clone(state);
  }
}
