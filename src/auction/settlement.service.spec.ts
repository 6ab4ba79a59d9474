import { Logger } from '@nestjs/common';
import type { RoundOutcome, SettlementProgress } from './engine';
import { initialSettlementProgress } from './engine';
import {
  SettlementError,
  SettlementService,
  settlementReference,
} from './settlement.service';
import { InMemoryAccounts, InMemoryItems } from '../testing/doubles';
import { M, testItem } from '../testing/fixtures';

describe('SettlementService', () => {
  const item = testItem({ id: 'item-7', name: 'Vintage Clock' });
  const sold: RoundOutcome = { kind: 'SOLD', bidderId: 'alice', amount: 12 * M, item };
  let accounts: InMemoryAccounts;
  let items: InMemoryItems;
  let service: SettlementService;
  let onProgress: jest.Mock<Promise<void>, [SettlementProgress]>;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    accounts = new InMemoryAccounts([{ id: 'alice', balance: 50 * M }]);
    items = new InMemoryItems([item]);
    service = new SettlementService(accounts, items);
    onProgress = jest.fn<Promise<void>, [SettlementProgress]>(async () => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('uses the round id as the settlement reference', () => {
    expect(settlementReference('r1')).toBe('round:r1');
  });

  it('debits, records the acquisition and marks the item sold', async () => {
    const confirmation = await service.settle('r1', sold, initialSettlementProgress(), onProgress);

    expect(accounts.accounts.get('alice')?.balance).toBe(38 * M);
    expect(accounts.debits.get('round:r1')).toEqual({ bidderId: 'alice', amount: 12 * M });
    expect(accounts.acquisitions.get('round:r1')).toEqual({
      bidderId: 'alice',
      itemId: 'item-7',
      amount: 12 * M,
      reference: 'round:r1',
    });
    expect(items.sold.get('item-7')).toEqual({ bidderId: 'alice', amount: 12 * M });

    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(onProgress).toHaveBeenLastCalledWith({
      debited: true,
      acquisitionRecorded: true,
      itemMarked: true,
      attempts: 0,
      lastError: null,
    });
    expect(confirmation).toMatchObject({
      roundId: 'r1',
      outcome: sold,
      progress: { debited: true, acquisitionRecorded: true, itemMarked: true },
    });
  });

  it('resumes at the first unfinished step', async () => {
    const debit = jest.spyOn(accounts, 'debit');
    const progress = { ...initialSettlementProgress(), debited: true, attempts: 1 };

    await service.settle('r1', sold, progress, onProgress);

    expect(debit).not.toHaveBeenCalled();
    expect(accounts.accounts.get('alice')?.balance).toBe(50 * M);
    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(items.sold.has('item-7')).toBe(true);
  });

  it('never charges twice for the same round', async () => {
    await service.settle('r1', sold, initialSettlementProgress(), onProgress);
    await service.settle('r1', sold, initialSettlementProgress(), onProgress);

    expect(accounts.accounts.get('alice')?.balance).toBe(38 * M);
    expect(accounts.debits.size).toBe(1);
  });

  it('raises a SettlementError when the debit is refused', async () => {
    accounts.add({ id: 'alice', balance: 5 * M });

    const error = await service
      .settle('r1', sold, initialSettlementProgress(), onProgress)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SettlementError);
    expect(error).toMatchObject({
      step: 'DEBIT',
      message: 'Debit of 12000000 from alice rejected: INSUFFICIENT_FUNDS',
    });
    expect(onProgress).not.toHaveBeenCalled();
    expect(items.sold.size).toBe(0);
  });

  it('wraps collaborator failures with the step that failed', async () => {
    jest.spyOn(items, 'markSold').mockRejectedValueOnce(new Error('catalogue down'));

    const error = await service
      .settle('r1', sold, initialSettlementProgress(), onProgress)
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ step: 'ITEM_STATUS', message: 'ITEM_STATUS failed: catalogue down' });
    expect(onProgress).toHaveBeenCalledTimes(2);
    expect(onProgress).toHaveBeenLastCalledWith(
      expect.objectContaining({ debited: true, acquisitionRecorded: true, itemMarked: false }),
    );
  });

  it('fails when progress cannot be stored', async () => {
    onProgress.mockRejectedValueOnce(new Error('db down'));

    const error = await service
      .settle('r1', sold, initialSettlementProgress(), onProgress)
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ step: 'PROGRESS', message: 'PROGRESS failed: db down' });
    expect(accounts.acquisitions.size).toBe(0);
  });

  it('marks an unsold item without touching accounts', async () => {
    const debit = jest.spyOn(accounts, 'debit');

    await service.settle('r2', { kind: 'UNSOLD', item }, initialSettlementProgress(), onProgress);

    expect(debit).not.toHaveBeenCalled();
    expect(items.unsold.has('item-7')).toBe(true);
    expect(onProgress).toHaveBeenCalledTimes(1);
  });
});
