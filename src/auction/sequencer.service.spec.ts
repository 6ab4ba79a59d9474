import { Logger } from '@nestjs/common';
import { SessionEngine } from './engine';
import type { AuctionEvent } from './engine';
import { createAuctionHarness, type AuctionHarness, type HarnessOptions } from '../testing/auction-harness';
import {
  InMemoryAccounts,
  InMemoryItems,
  InMemoryPersistence,
  RedisTestDouble,
} from '../testing/doubles';
import { M, openRound, testItem } from '../testing/fixtures';

const itemA = testItem({ id: 'a', name: 'Item A' });
const itemB = testItem({ id: 'b', name: 'Item B' });
const itemC = testItem({ id: 'c', name: 'Item C' });

describe('SequencerService', () => {
  let h: AuctionHarness;

  async function setup(options: HarnessOptions = {}): Promise<AuctionHarness> {
    h = await createAuctionHarness({
      accounts: new InMemoryAccounts([{ id: 'alice', balance: 100 * M }]),
      items: new InMemoryItems([itemA, itemB]),
      ...options,
    });
    return h;
  }

  async function startSession(): Promise<string> {
    await h.sequencer.loadQueue();
    const advanced = await h.sequencer.advance();
    if (!advanced.advanced) throw new Error(advanced.reason);
    return advanced.roundId;
  }

  const ofType = <T extends AuctionEvent['type']>(type: T) =>
    h.events.filter((e): e is Extract<AuctionEvent, { type: T }> => e.type === type);

  beforeEach(() => {
    jest.useFakeTimers({ now: 0, doNotFake: ['nextTick', 'setImmediate'] });
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await h.close();
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  describe('loadQueue', () => {
    it('starts a session from the available catalogue items', async () => {
      await setup();

      const result = await h.sequencer.loadQueue();

      expect(result).toEqual({ sessionId: expect.any(String), queueLength: 2, newSession: true });
      expect(h.events).toEqual([
        { type: 'SESSION_STARTED', sessionId: result.sessionId, queueLength: 2 },
      ]);
      expect(h.sequencer.getSession()).toMatchObject({
        id: result.sessionId,
        status: 'ACTIVE',
        queue: [itemA, itemB],
        awaitingAdvance: true,
        breakEndsAt: null,
      });
      expect(h.persistence.sessions.get(result.sessionId)?.status).toBe('ACTIVE');
    });

    it('replaces the backlog of a running session', async () => {
      await setup();
      const first = await h.sequencer.loadQueue();

      const second = await h.sequencer.loadQueue([itemC]);

      expect(second).toEqual({ sessionId: first.sessionId, queueLength: 1, newSession: false });
      expect(ofType('QUEUE_LOADED')).toEqual([
        { type: 'QUEUE_LOADED', sessionId: first.sessionId, queueLength: 1 },
      ]);
      expect(h.sequencer.getSession()?.queue).toEqual([itemC]);
    });

    it('starts a fresh session once the previous one has finished', async () => {
      await setup();
      const first = await h.sequencer.loadQueue();
      await h.sequencer.finishSession();

      const second = await h.sequencer.loadQueue([itemC]);

      expect(second.newSession).toBe(true);
      expect(second.sessionId).not.toBe(first.sessionId);
    });
  });

  describe('advance', () => {
    it('opens a round for the head of the queue', async () => {
      await setup();
      await h.sequencer.loadQueue();

      const result = await h.sequencer.advance();

      expect(result).toEqual({ advanced: true, roundId: expect.any(String), item: itemA });
      expect(h.auction.getCurrentRound()?.item).toEqual(itemA);
      expect(h.sequencer.getSession()).toMatchObject({
        queue: [itemB],
        currentRoundId: h.auction.getCurrentRound()?.id,
        awaitingAdvance: false,
      });
    });

    it('refuses while a round is in progress', async () => {
      await setup();
      await startSession();

      expect(await h.sequencer.advance()).toEqual({ advanced: false, reason: 'ROUND_IN_PROGRESS' });
    });

    it('needs a session', async () => {
      await setup();
      expect(await h.sequencer.advance()).toEqual({ advanced: false, reason: 'NO_SESSION' });
    });

    it('finishes the session when the queue is empty', async () => {
      await setup();
      const { sessionId } = await h.sequencer.loadQueue([]);

      expect(await h.sequencer.advance()).toEqual({
        advanced: false,
        reason: 'SESSION_FINISHED',
        summary: { sessionId, soldCount: 0, unsoldCount: 0, totalValue: 0, participantCount: 0 },
      });
      expect(h.sequencer.getSession()?.status).toBe('FINISHED');
    });

    it('puts the item back when the round cannot open', async () => {
      const redis = new RedisTestDouble();
      redis.activeRound = 'elsewhere';
      await setup({ redis });
      await h.sequencer.loadQueue();

      expect(await h.sequencer.advance()).toEqual({
        advanced: false,
        reason: 'ROUND_NOT_OPENED',
        message: 'Live slot is held by round elsewhere',
      });
      expect(h.sequencer.getSession()).toMatchObject({
        queue: [itemA, itemB],
        currentRoundId: null,
        awaitingAdvance: true,
      });
    });
  });

  describe('timed sessions', () => {
    it('takes a break after a round closes, then opens the next item', async () => {
      await setup();
      const { sessionId } = await h.sequencer.loadQueue();
      await h.sequencer.advance();

      await h.auction.skipToUnsold();
      await h.flush();

      expect(ofType('BREAK_STARTED')).toEqual([
        { type: 'BREAK_STARTED', sessionId, durationSec: 30, endsAt: 30_000, nextItem: itemB },
      ]);
      expect(h.sequencer.getSession()).toMatchObject({
        unsoldCount: 1,
        currentRoundId: null,
        breakState: { startedAt: 0, endsAt: 30_000, durationSec: 30 },
        breakEndsAt: 30_000,
      });

      await jest.advanceTimersByTimeAsync(30_000);

      const opened = ofType('ROUND_OPENED');
      expect(opened).toHaveLength(2);
      expect(opened[1]?.item).toEqual(itemB);
      expect(h.sequencer.getSession()).toMatchObject({
        currentRoundId: opened[1]?.roundId,
        breakState: null,
        queue: [],
      });
    });

    it('skips a running break straight into the next round', async () => {
      await setup();
      await startSession();
      await h.auction.skipToUnsold();
      await h.flush();

      const result = await h.sequencer.skipBreak();

      expect(result).toEqual({
        skipped: true,
        advance: { advanced: true, roundId: expect.any(String), item: itemB },
      });
      expect(ofType('BREAK_SKIPPED')).toHaveLength(1);
      expect(h.sequencer.getSession()?.breakEndsAt).toBeNull();

      await jest.advanceTimersByTimeAsync(30_000);
      expect(ofType('ROUND_OPENED')).toHaveLength(2);
    });

    it('has nothing to skip outside a break', async () => {
      await setup();
      expect(await h.sequencer.skipBreak()).toEqual({ skipped: false, reason: 'NO_SESSION' });

      await startSession();
      expect(await h.sequencer.skipBreak()).toEqual({ skipped: false, reason: 'NO_BREAK' });
    });

    it('advances at once when breaks are disabled', async () => {
      await setup({ settings: { breakDurationSec: 0 } });
      await startSession();

      await h.auction.skipToUnsold();
      await h.flush();

      expect(ofType('BREAK_STARTED')).toHaveLength(0);
      expect(h.auction.getCurrentRound()?.item).toEqual(itemB);
    });

    it('finishes the session after the last item', async () => {
      await setup({ items: new InMemoryItems([itemA]) });
      const { sessionId } = await h.sequencer.loadQueue();
      await h.sequencer.advance();

      await h.auction.skipToUnsold();
      await h.flush();

      expect(ofType('SESSION_FINISHED')).toEqual([
        {
          type: 'SESSION_FINISHED',
          summary: { sessionId, soldCount: 0, unsoldCount: 1, totalValue: 0, participantCount: 0 },
        },
      ]);
      expect(ofType('BREAK_STARTED')).toHaveLength(0);
      expect(h.persistence.sessions.get(sessionId)?.status).toBe('FINISHED');
      expect(await h.sequencer.advance()).toEqual({ advanced: false, reason: 'NO_SESSION' });
    });
  });

  describe('manual-call sessions', () => {
    it('waits for an advance after each round', async () => {
      await setup({ settings: { mode: 'MANUAL_CALL' } });
      await startSession();
      await h.auction.placeBid('alice', '10');
      await h.auction.finalCall();

      await jest.advanceTimersByTimeAsync(5_000);

      expect(h.sequencer.getSession()).toMatchObject({
        soldCount: 1,
        totalValue: 10 * M,
        participants: ['alice'],
        currentRoundId: null,
        awaitingAdvance: true,
        breakState: null,
      });
      expect(ofType('BREAK_STARTED')).toHaveLength(0);
      expect(h.auction.getCurrentRound()).toBeNull();

      expect(await h.sequencer.advance()).toMatchObject({ advanced: true, item: itemB });
    });
  });

  describe('finishSession', () => {
    it('is refused while a round runs, and stops a pending break', async () => {
      await setup();
      const roundId = await startSession();
      expect(await h.sequencer.finishSession()).toEqual({
        finished: false,
        reason: 'ROUND_IN_PROGRESS',
      });

      await h.auction.skipToUnsold();
      await h.flush();
      const result = await h.sequencer.finishSession();

      expect(result).toMatchObject({ finished: true, summary: { unsoldCount: 1 } });
      expect(h.sequencer.getSession()).toMatchObject({ status: 'FINISHED', breakEndsAt: null });
      await jest.advanceTimersByTimeAsync(30_000);
      expect(ofType('ROUND_OPENED').map((e) => e.roundId)).toEqual([roundId]);
    });

    it('needs a session', async () => {
      await setup();
      expect(await h.sequencer.finishSession()).toEqual({ finished: false, reason: 'NO_SESSION' });
    });
  });

  describe('endSession', () => {
    it('cancels the running round and closes the session', async () => {
      await setup();
      const { sessionId } = await h.sequencer.loadQueue();
      await h.sequencer.advance();
      await h.auction.placeBid('alice', '10');

      expect(await h.sequencer.endSession()).toEqual({
        finished: true,
        summary: { sessionId, soldCount: 0, unsoldCount: 0, totalValue: 0, participantCount: 0 },
      });
      await h.flush();

      expect(ofType('ROUND_CANCELLED')).toHaveLength(1);
      expect(h.auction.getCurrentRound()).toBeNull();
      expect(h.sequencer.getSession()).toMatchObject({ status: 'FINISHED', currentRoundId: null });
      expect(h.accounts.accounts.get('alice')?.balance).toBe(100 * M);
    });

    it('is refused while the round is settling, and counts it once settled', async () => {
      await setup();
      const { sessionId } = await h.sequencer.loadQueue();
      await h.sequencer.advance();
      await h.auction.placeBid('alice', '10');
      jest.spyOn(h.accounts, 'debit').mockRejectedValueOnce(new Error('ledger offline'));
      await h.auction.forceFinalize('FINAL_CALL');

      expect(await h.sequencer.endSession()).toEqual({
        finished: false,
        reason: 'ROUND_IN_PROGRESS',
      });
      expect(h.sequencer.getSession()).toMatchObject({ status: 'ACTIVE' });

      expect(await h.auction.retrySettlement()).toEqual({ retried: true, settled: true });
      await h.flush();
      expect(h.sequencer.getSession()).toMatchObject({ soldCount: 1, currentRoundId: null });

      expect(await h.sequencer.endSession()).toEqual({
        finished: true,
        summary: { sessionId, soldCount: 1, unsoldCount: 0, totalValue: 10 * M, participantCount: 1 },
      });
      expect(h.persistence.sessions.get(sessionId)?.status).toBe('FINISHED');
    });
  });

  describe('recovery', () => {
    function storedSession(): SessionEngine {
      const session = new SessionEngine('s-1', [itemA, itemB], 0);
      session.dequeue();
      session.attachRound('round-1');
      return session;
    }

    it('records a round that completed before the restart and waits for an advance', async () => {
      const round = openRound({ item: itemA });
      round.submitBid({ bidderId: 'alice', balance: 100 * M, banned: false }, '10', 'COMMAND', 2_000);
      round.beginFinalize('TIMER_EXPIRED', 61_000);
      round.completeSettlement();
      const persistence = new InMemoryPersistence();
      await persistence.saveRound(round.getState());
      await persistence.saveSession(storedSession().getState());

      await setup({ persistence });

      expect(h.sequencer.getSession()).toMatchObject({
        id: 's-1',
        soldCount: 1,
        totalValue: 10 * M,
        participants: ['alice'],
        currentRoundId: null,
        awaitingAdvance: true,
        queue: [itemB],
      });
      expect(await h.sequencer.advance()).toMatchObject({ advanced: true, item: itemB });
    });

    it('follows a recovered live round to its close', async () => {
      const round = openRound({ item: itemA });
      round.submitBid({ bidderId: 'alice', balance: 100 * M, banned: false }, '10', 'COMMAND', 2_000);
      const persistence = new InMemoryPersistence();
      await persistence.saveRound(round.getState());
      await persistence.saveSession(storedSession().getState());

      await setup({ persistence });
      expect(h.sequencer.getSession()?.currentRoundId).toBe('round-1');

      await jest.advanceTimersByTimeAsync(60_000);

      expect(h.sequencer.getSession()).toMatchObject({ soldCount: 1, currentRoundId: null });
      expect(ofType('BREAK_STARTED')).toEqual([
        { type: 'BREAK_STARTED', sessionId: 's-1', durationSec: 30, endsAt: 90_000, nextItem: itemB },
      ]);
    });

    it('does not resume a break that was running', async () => {
      const session = new SessionEngine('s-1', [itemA, itemB], 0);
      session.startBreak(30, 0);
      const persistence = new InMemoryPersistence();
      await persistence.saveSession(session.getState());

      await setup({ persistence });

      expect(h.sequencer.getSession()).toMatchObject({
        breakState: null,
        awaitingAdvance: true,
        breakEndsAt: null,
      });
    });
  });
});
