import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService, type Queryable } from '../database/database.service';
import type {
  Bid,
  BidRules,
  BidSource,
  BreakState,
  FinalizeReason,
  ItemRef,
  RoundMode,
  RoundOutcome,
  RoundState,
  RoundStatus,
  SessionState,
  SessionStatus,
  SettlementProgress,
} from './engine';

interface RoundRow {
  id: string;
  session_id: string;
  item: ItemRef;
  status: RoundStatus;
  mode: RoundMode;
  duration_sec: number;
  high_bid: string;
  high_bidder_id: string | null;
  bid_sequence: number;
  outcome: RoundOutcome | null;
  finalize_reason: FinalizeReason | null;
  settlement: SettlementProgress | null;
  rules: BidRules;
  paused_remaining_ms: string | null;
  created_at: string;
  started_at: string | null;
  ended_at: string | null;
}

interface BidRow {
  bidder_id: string;
  amount: string;
  source: BidSource;
  placed_at: string;
}

interface SessionRow {
  id: string;
  status: SessionStatus;
  queue: ItemRef[];
  current_round_id: string | null;
  sold_count: number;
  unsold_count: number;
  total_value: string;
  participants: string[];
  break_state: BreakState | null;
  awaiting_advance: boolean;
  created_at: string;
  finished_at: string | null;
}

const nullableNumber = (value: string | null): number | null =>
  value === null ? null : Number(value);

/**
 * Durable copy of rounds, bid history and sessions. The in-memory engines are
 * authoritative while running; these rows let a restart pick up an open round
 * and any settlement still owed.
 */
@Injectable()
export class AuctionPersistenceService {
  private readonly logger = new Logger(AuctionPersistenceService.name);

  constructor(private readonly db: DatabaseService) {}

  /* ------------------------------------------------------------------ */
  /*  WRITES                                                             */
  /* ------------------------------------------------------------------ */

  /** Upsert the round row. Bid history is written separately. */
  async saveRound(state: RoundState): Promise<void> {
    await this.writeRound(this.db, state);
  }

  /** Append one accepted bid and the lead it produced, atomically. */
  async appendBid(state: RoundState, bid: Bid): Promise<void> {
    const position = state.bids.length - 1;
    await this.db.runInTransaction(async (client) => {
      await client.query(
        `INSERT INTO auction_round_bids (round_id, position, bidder_id, amount, source, placed_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         ON CONFLICT (round_id, position) DO UPDATE
         SET bidder_id = EXCLUDED.bidder_id, amount = EXCLUDED.amount,
             source = EXCLUDED.source, placed_at = EXCLUDED.placed_at`,
        [state.id, position, bid.bidderId, bid.amount, bid.source, bid.placedAt],
      );
      await this.writeRound(client, state);
    });
  }

  /** Drop bids past the current history length (after an undo). */
  async truncateBids(state: RoundState): Promise<void> {
    await this.db.runInTransaction(async (client) => {
      await client.query(
        'DELETE FROM auction_round_bids WHERE round_id = $1 AND position >= $2',
        [state.id, state.bids.length],
      );
      await this.writeRound(client, state);
    });
  }

  async saveSession(state: SessionState): Promise<void> {
    await this.db.query(
      `INSERT INTO auction_sessions
         (id, status, queue, current_round_id, sold_count, unsold_count, total_value,
          participants, break_state, awaiting_advance, created_at, finished_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       ON CONFLICT (id) DO UPDATE SET
         status = EXCLUDED.status,
         queue = EXCLUDED.queue,
         current_round_id = EXCLUDED.current_round_id,
         sold_count = EXCLUDED.sold_count,
         unsold_count = EXCLUDED.unsold_count,
         total_value = EXCLUDED.total_value,
         participants = EXCLUDED.participants,
         break_state = EXCLUDED.break_state,
         awaiting_advance = EXCLUDED.awaiting_advance,
         finished_at = EXCLUDED.finished_at`,
      [
        state.id,
        state.status,
        JSON.stringify(state.queue),
        state.currentRoundId,
        state.soldCount,
        state.unsoldCount,
        state.totalValue,
        JSON.stringify(state.participants),
        state.breakState ? JSON.stringify(state.breakState) : null,
        state.awaitingAdvance,
        state.createdAt,
        state.finishedAt,
      ],
    );
  }

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  /** The round occupying the live slot, if a previous process left one. */
  async loadOpenRound(): Promise<RoundState | null> {
    const result = await this.db.query<RoundRow>(
      `SELECT * FROM auction_rounds
       WHERE status IN ('ACTIVE', 'PAUSED', 'SETTLING')
       ORDER BY created_at DESC
       LIMIT 1`,
    );
    const row = result.rows[0];
    return row ? this.withBids(row) : null;
  }

  async loadRound(roundId: string): Promise<RoundState | null> {
    const result = await this.db.query<RoundRow>(
      'SELECT * FROM auction_rounds WHERE id = $1',
      [roundId],
    );
    const row = result.rows[0];
    return row ? this.withBids(row) : null;
  }

  async loadActiveSession(): Promise<SessionState | null> {
    const result = await this.db.query<SessionRow>(
      `SELECT * FROM auction_sessions
       WHERE status = 'ACTIVE'
       ORDER BY created_at DESC
       LIMIT 1`,
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      id: row.id,
      status: row.status,
      queue: row.queue,
      currentRoundId: row.current_round_id,
      soldCount: row.sold_count,
      unsoldCount: row.unsold_count,
      totalValue: Number(row.total_value),
      participants: row.participants,
      breakState: row.break_state,
      awaitingAdvance: row.awaiting_advance,
      createdAt: Number(row.created_at),
      finishedAt: nullableNumber(row.finished_at),
    };
  }

  /* ------------------------------------------------------------------ */
  /*  HELPERS                                                            */
  /* ------------------------------------------------------------------ */

  private async writeRound(q: Queryable, state: RoundState): Promise<void> {
    await q.query(
      `INSERT INTO auction_rounds
         (id, session_id, item, status, mode, duration_sec, high_bid, high_bidder_id,
          bid_sequence, outcome, finalize_reason, settlement, rules, paused_remaining_ms,
          created_at, started_at, ended_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)
       ON CONFLICT (id) DO UPDATE SET
         status = EXCLUDED.status,
         high_bid = EXCLUDED.high_bid,
         high_bidder_id = EXCLUDED.high_bidder_id,
         bid_sequence = EXCLUDED.bid_sequence,
         outcome = EXCLUDED.outcome,
         finalize_reason = EXCLUDED.finalize_reason,
         settlement = EXCLUDED.settlement,
         paused_remaining_ms = EXCLUDED.paused_remaining_ms,
         started_at = EXCLUDED.started_at,
         ended_at = EXCLUDED.ended_at`,
      [
        state.id,
        state.sessionId,
        JSON.stringify(state.item),
        state.status,
        state.mode,
        state.durationSec,
        state.highBid,
        state.highBidderId,
        state.bidSequence,
        state.outcome ? JSON.stringify(state.outcome) : null,
        state.finalizeReason,
        state.settlement ? JSON.stringify(state.settlement) : null,
        JSON.stringify(state.rules),
        state.pausedRemainingMs,
        state.createdAt,
        state.startedAt,
        state.endedAt,
      ],
    );
  }

  private async withBids(row: RoundRow): Promise<RoundState> {
    const bids = await this.db.query<BidRow>(
      `SELECT bidder_id, amount, source, placed_at FROM auction_round_bids
       WHERE round_id = $1 ORDER BY position ASC`,
      [row.id],
    );
    const state: RoundState = {
      id: row.id,
      sessionId: row.session_id,
      item: row.item,
      status: row.status,
      mode: row.mode,
      durationSec: row.duration_sec,
      highBid: Number(row.high_bid),
      highBidderId: row.high_bidder_id,
      bids: bids.rows.map((b) => ({
        bidderId: b.bidder_id,
        amount: Number(b.amount),
        source: b.source,
        placedAt: Number(b.placed_at),
      })),
      bidSequence: row.bid_sequence,
      outcome: row.outcome,
      finalizeReason: row.finalize_reason,
      settlement: row.settlement,
      rules: row.rules,
      pausedRemainingMs: nullableNumber(row.paused_remaining_ms),
      createdAt: Number(row.created_at),
      startedAt: nullableNumber(row.started_at),
      endedAt: nullableNumber(row.ended_at),
    };
    const tail = state.bids[state.bids.length - 1];
    if ((tail?.amount ?? 0) !== state.highBid) {
      this.logger.warn(
        `Round ${row.id} high bid ${state.highBid} disagrees with bid history; using history`,
      );
      state.highBid = tail?.amount ?? 0;
      state.highBidderId = tail?.bidderId ?? null;
    }
    return state;
  }
}
