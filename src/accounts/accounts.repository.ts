import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { ItemRef } from '../auction/engine';
import type {
  AccountProvider,
  BidderAccount,
  DebitResult,
} from './account-provider';

interface BidderRow {
  id: string;
  display_name: string;
  balance: string;
  banned: boolean;
}

function toAccount(row: BidderRow): BidderAccount {
  return {
    id: row.id,
    displayName: row.display_name,
    balance: Number(row.balance),
    banned: row.banned,
  };
}

/**
 * PostgreSQL-backed bidder accounts. Balances are never cached: every read
 * goes to the database.
 */
@Injectable()
export class AccountsRepository implements AccountProvider {
  private readonly logger = new Logger(AccountsRepository.name);

  constructor(private readonly db: DatabaseService) {}

  async getAccount(bidderId: string): Promise<BidderAccount | null> {
    const result = await this.db.query<BidderRow>(
      'SELECT id, display_name, balance, banned FROM bidders WHERE id = $1',
      [bidderId],
    );
    const row = result.rows[0];
    return row ? toAccount(row) : null;
  }

  async getBalance(bidderId: string): Promise<number> {
    const account = await this.getAccount(bidderId);
    return account?.balance ?? 0;
  }

  async isBanned(bidderId: string): Promise<boolean> {
    const account = await this.getAccount(bidderId);
    return account?.banned ?? false;
  }

  /**
   * Debit once per reference. The bidder row is locked for the duration so
   * concurrent debits for one bidder queue behind each other.
   */
  async debit(
    bidderId: string,
    amount: number,
    reference: string,
  ): Promise<DebitResult> {
    return this.db.runInTransaction<DebitResult>(async (client) => {
      const locked = await client.query<{ balance: string }>(
        'SELECT balance FROM bidders WHERE id = $1 FOR UPDATE',
        [bidderId],
      );
      const row = locked.rows[0];
      if (!row) return { debited: false, reason: 'ACCOUNT_NOT_FOUND' };

      const existing = await client.query(
        'SELECT 1 FROM bidder_debits WHERE reference = $1',
        [reference],
      );
      if (existing.rowCount && existing.rowCount > 0) {
        this.logger.debug(`Debit ${reference} already applied`);
        return { debited: true, balance: Number(row.balance), replayed: true };
      }

      if (Number(row.balance) < amount) {
        return { debited: false, reason: 'INSUFFICIENT_FUNDS' };
      }

      await client.query(
        'INSERT INTO bidder_debits (reference, bidder_id, amount) VALUES ($1, $2, $3)',
        [reference, bidderId, amount],
      );
      const updated = await client.query<{ balance: string }>(
        'UPDATE bidders SET balance = balance - $2 WHERE id = $1 RETURNING balance',
        [bidderId, amount],
      );
      const balance = Number(updated.rows[0]?.balance ?? 0);
      return { debited: true, balance, replayed: false };
    });
  }

  async recordAcquisition(
    bidderId: string,
    item: ItemRef,
    amount: number,
    reference: string,
  ): Promise<void> {
    await this.db.query(
      `INSERT INTO bidder_acquisitions (reference, bidder_id, item_id, item_name, amount)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (reference) DO NOTHING`,
      [reference, bidderId, item.id, item.name, amount],
    );
  }
}
