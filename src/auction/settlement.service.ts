import { Inject, Injectable, Logger } from '@nestjs/common';
import { ACCOUNT_PROVIDER, type AccountProvider } from '../accounts/account-provider';
import { ITEM_SOURCE, type ItemSource } from '../items/item-source';
import type { RoundOutcome, SettlementProgress } from './engine';

export type SettlementStep = 'DEBIT' | 'ACQUISITION' | 'ITEM_STATUS' | 'PROGRESS';

export class SettlementError extends Error {
  constructor(
    message: string,
    readonly step: SettlementStep,
  ) {
    super(message);
    this.name = 'SettlementError';
  }
}

export interface SettlementConfirmation {
  roundId: string;
  outcome: RoundOutcome;
  progress: SettlementProgress;
  settledAt: number;
}

export type ProgressListener = (progress: SettlementProgress) => Promise<void>;

/** Reference that makes account effects for one round apply once. */
export function settlementReference(roundId: string): string {
  return `round:${roundId}`;
}

/**
 * Applies the consequence of a closed round. Work is split into steps; each
 * finished step is reported through `onProgress` before the next starts, so a
 * retry picks up at the first unfinished step. Account effects also carry the
 * round reference, which the account provider deduplicates.
 */
@Injectable()
export class SettlementService {
  private readonly logger = new Logger(SettlementService.name);

  constructor(
    @Inject(ACCOUNT_PROVIDER) private readonly accounts: AccountProvider,
    @Inject(ITEM_SOURCE) private readonly items: ItemSource,
  ) {}

  async settle(
    roundId: string,
    outcome: RoundOutcome,
    current: SettlementProgress,
    onProgress: ProgressListener,
  ): Promise<SettlementConfirmation> {
    const progress: SettlementProgress = { ...current };
    const reference = settlementReference(roundId);

    const advance = async (mark: (p: SettlementProgress) => void) => {
      mark(progress);
      await this.step('PROGRESS', () => onProgress({ ...progress }));
    };

    if (outcome.kind === 'SOLD') {
      const { bidderId, amount, item } = outcome;

      if (!progress.debited) {
        const debit = await this.step('DEBIT', () =>
          this.accounts.debit(bidderId, amount, reference),
        );
        if (!debit.debited) {
          throw new SettlementError(
            `Debit of ${amount} from ${bidderId} rejected: ${debit.reason}`,
            'DEBIT',
          );
        }
        if (debit.replayed) {
          this.logger.warn(`Debit ${reference} was already applied; not charging again`);
        }
        await advance((p) => {
          p.debited = true;
        });
      }

      if (!progress.acquisitionRecorded) {
        await this.step('ACQUISITION', () =>
          this.accounts.recordAcquisition(bidderId, item, amount, reference),
        );
        await advance((p) => {
          p.acquisitionRecorded = true;
        });
      }

      if (!progress.itemMarked) {
        await this.step('ITEM_STATUS', () =>
          this.items.markSold(item, bidderId, amount),
        );
        await advance((p) => {
          p.itemMarked = true;
        });
      }

      this.logger.log(`Settled round ${roundId}: ${item.name} sold to ${bidderId} for ${amount}`);
    } else {
      if (!progress.itemMarked) {
        await this.step('ITEM_STATUS', () => this.items.markUnsold(outcome.item));
        await advance((p) => {
          p.itemMarked = true;
        });
      }
      this.logger.log(`Settled round ${roundId}: ${outcome.item.name} unsold`);
    }

    return { roundId, outcome, progress: { ...progress }, settledAt: Date.now() };
  }

  private async step<T>(step: SettlementStep, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof SettlementError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new SettlementError(`${step} failed: ${message}`, step);
    }
  }
}
