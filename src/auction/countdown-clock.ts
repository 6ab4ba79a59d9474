import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';

export type ExpiryCallback = (id: string, generation: number) => void;

export interface TimerHandle {
  id: string;
  generation: number;
  endsAt: number;
  cancel(): void;
}

interface TimerEntry {
  timeout: ReturnType<typeof setTimeout> | null;
  generation: number;
  endsAt: number;
  onExpire: ExpiryCallback;
}

export class AlreadyRunningError extends Error {
  constructor(readonly timerId: string) {
    super(`Timer ${timerId} is already running`);
    this.name = 'AlreadyRunningError';
  }
}

export class TimerNotFoundError extends Error {
  constructor(readonly timerId: string) {
    super(`Timer ${timerId} not found`);
    this.name = 'TimerNotFoundError';
  }
}

/**
 * One countdown per id. Every start/reset gets a fresh generation; an expiry
 * is delivered at most once and only for the generation it was scheduled with.
 *
 * Reset is synchronous: clearTimeout runs before the new timeout is armed, so a
 * pre-reset expiry has either already been delivered or never will be.
 * Consumers that hop onto a lock before acting must re-check
 * {@link isCurrent} with the generation they were handed.
 */
@Injectable()
export class CountdownClock implements OnModuleDestroy {
  private readonly logger = new Logger(CountdownClock.name);
  private readonly timers = new Map<string, TimerEntry>();
  private generationSeq = 0;

  start(id: string, durationMs: number, onExpire: ExpiryCallback): TimerHandle {
    if (this.has(id)) throw new AlreadyRunningError(id);
    const entry: TimerEntry = {
      timeout: null,
      generation: 0,
      endsAt: 0,
      onExpire,
    };
    this.timers.set(id, entry);
    return this.arm(id, entry, durationMs);
  }

  reset(id: string, durationMs: number): TimerHandle {
    const entry = this.timers.get(id);
    if (!entry) throw new TimerNotFoundError(id);
    if (entry.timeout) clearTimeout(entry.timeout);
    return this.arm(id, entry, durationMs);
  }

  /** Idempotent. Returns whether a pending countdown was stopped. */
  cancel(id: string): boolean {
    const entry = this.timers.get(id);
    if (!entry) return false;
    const wasPending = entry.timeout !== null;
    if (entry.timeout) clearTimeout(entry.timeout);
    this.timers.delete(id);
    return wasPending;
  }

  /** True while a countdown for `id` is armed and has not fired. */
  has(id: string): boolean {
    return this.timers.get(id)?.timeout != null;
  }

  /** Milliseconds left, or null when nothing is armed for `id`. */
  remaining(id: string): number | null {
    const entry = this.timers.get(id);
    if (!entry || entry.timeout === null) return null;
    return Math.max(0, entry.endsAt - Date.now());
  }

  endsAt(id: string): number | null {
    const entry = this.timers.get(id);
    return entry && entry.timeout !== null ? entry.endsAt : null;
  }

  /**
   * Whether `generation` is still the latest start/reset for `id`. Stays true
   * after that generation fires, until the id is reset, restarted or cancelled.
   */
  isCurrent(id: string, generation: number): boolean {
    return this.timers.get(id)?.generation === generation;
  }

  cancelAll(): void {
    for (const id of [...this.timers.keys()]) this.cancel(id);
  }

  onModuleDestroy(): void {
    this.cancelAll();
  }

  private arm(id: string, entry: TimerEntry, durationMs: number): TimerHandle {
    const generation = ++this.generationSeq;
    const delay = Math.max(0, durationMs);
    entry.generation = generation;
    entry.endsAt = Date.now() + delay;
    entry.timeout = setTimeout(() => this.fire(id, generation), delay);
    return {
      id,
      generation,
      endsAt: entry.endsAt,
      cancel: () => {
        if (this.isCurrent(id, generation)) this.cancel(id);
      },
    };
  }

  private fire(id: string, generation: number): void {
    const entry = this.timers.get(id);
    if (!entry || entry.generation !== generation || entry.timeout === null) {
      this.logger.debug(`Suppressed stale expiry id=${id} gen=${generation}`);
      return;
    }
    entry.timeout = null;
    try {
      entry.onExpire(id, generation);
    } catch (err) {
      const e = err instanceof Error ? err : new Error(String(err));
      this.logger.error(`Expiry callback failed for ${id}: ${e.message}`, e.stack);
    }
  }
}
