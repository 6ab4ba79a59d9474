import type { ItemRef } from '../auction/engine';

export const ACCOUNT_PROVIDER = Symbol('ACCOUNT_PROVIDER');

export interface BidderAccount {
  id: string;
  displayName: string;
  balance: number;
  banned: boolean;
}

export type DebitResult =
  | { debited: true; balance: number; replayed: boolean }
  | { debited: false; reason: 'ACCOUNT_NOT_FOUND' | 'INSUFFICIENT_FUNDS' };

/**
 * Bidder accounts are owned outside the auction core. The core reads balance
 * and ban state, and on a win asks for a debit and an acquisition record.
 *
 * `debit` and `recordAcquisition` must be idempotent per `reference`: a
 * second call with the same reference changes nothing and reports success.
 */
export interface AccountProvider {
  getAccount(bidderId: string): Promise<BidderAccount | null>;
  getBalance(bidderId: string): Promise<number>;
  isBanned(bidderId: string): Promise<boolean>;
  debit(bidderId: string, amount: number, reference: string): Promise<DebitResult>;
  recordAcquisition(
    bidderId: string,
    item: ItemRef,
    amount: number,
    reference: string,
  ): Promise<void>;
}
