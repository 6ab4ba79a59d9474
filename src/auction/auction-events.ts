import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter } from 'node:events';
import type { AuctionEvent } from './engine';

const AUCTION_EVENT = 'auctionEvent';

export type AuctionEventListener = (event: AuctionEvent) => void;

/**
 * Delivers event records produced by the engines. Publishing happens after
 * the producing critical section, so listeners may call back into the
 * services without deadlocking. A throwing listener is logged and skipped.
 */
@Injectable()
export class AuctionEventBus {
  private readonly emitter = new EventEmitter();
  private readonly logger = new Logger(AuctionEventBus.name);

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  publish(events: readonly AuctionEvent[]): void {
    for (const event of events) {
      this.emitter.emit(AUCTION_EVENT, event);
    }
  }

  subscribe(listener: AuctionEventListener): () => void {
    const guarded = (event: AuctionEvent) => {
      try {
        listener(event);
      } catch (err) {
        const e = err instanceof Error ? err : new Error(String(err));
        this.logger.error(`Listener failed on ${event.type}: ${e.message}`, e.stack);
      }
    };
    this.emitter.on(AUCTION_EVENT, guarded);
    return () => {
      this.emitter.off(AUCTION_EVENT, guarded);
    };
  }
}
