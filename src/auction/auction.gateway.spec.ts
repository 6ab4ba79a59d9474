import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import type { Server, Socket } from 'socket.io';
import { ACCOUNT_PROVIDER } from '../accounts/account-provider';
import { BidderTokenService } from '../auth/bidder-token.service';
import { AuctionEventBus } from './auction-events';
import { AuctionGateway, LIVE_ROOM } from './auction.gateway';
import { AuctionService } from './auction.service';
import type { AuctionEvent } from './engine';
import { SequencerService } from './sequencer.service';
import { InMemoryAccounts } from '../testing/doubles';
import { M } from '../testing/fixtures';

interface FakeClient {
  id: string;
  handshake: { auth: Record<string, unknown> };
  emit: jest.Mock;
  join: jest.Mock;
  leave: jest.Mock;
  disconnect: jest.Mock;
}

function fakeClient(id: string, auth: Record<string, unknown> = {}) {
  const client: FakeClient = {
    id,
    handshake: { auth },
    emit: jest.fn(),
    join: jest.fn(async () => undefined),
    leave: jest.fn(async () => undefined),
    disconnect: jest.fn(),
  };
  return { client, socket: client as unknown as Socket };
}

describe('AuctionGateway', () => {
  let gateway: AuctionGateway;
  let bus: AuctionEventBus;
  let accounts: InMemoryAccounts;
  let tokens: BidderTokenService;
  let auctionService: { getCurrentRound: jest.Mock; placeBid: jest.Mock };
  let sequencer: { getSession: jest.Mock };
  let roomEmit: jest.Mock;
  let to: jest.Mock;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    accounts = new InMemoryAccounts([{ id: 'alice', displayName: 'Alice', balance: 100 * M }]);
    auctionService = {
      getCurrentRound: jest.fn().mockReturnValue(null),
      placeBid: jest.fn(),
    };
    sequencer = { getSession: jest.fn().mockReturnValue(null) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuctionGateway,
        AuctionEventBus,
        { provide: AuctionService, useValue: auctionService },
        { provide: SequencerService, useValue: sequencer },
        { provide: ACCOUNT_PROVIDER, useValue: accounts },
        BidderTokenService,
        {
          provide: ConfigService,
          useValue: new ConfigService({ bidder: { tokenSecret: 'test-secret' } }),
        },
      ],
    }).compile();

    gateway = module.get(AuctionGateway);
    bus = module.get(AuctionEventBus);
    tokens = module.get(BidderTokenService);
    roomEmit = jest.fn();
    to = jest.fn(() => ({ emit: roomEmit }));
    gateway.server = { to } as unknown as Server;
    gateway.onModuleInit();
  });

  afterEach(() => {
    gateway.onModuleDestroy();
    jest.restoreAllMocks();
  });

  async function connected(id = 'c1') {
    const fake = fakeClient(id, { bidderId: 'alice', token: tokens.sign('alice') });
    await gateway.handleConnection(fake.socket);
    return fake;
  }

  describe('handleConnection', () => {
    it('admits a known bidder into their private room', async () => {
      const { client } = await connected();

      expect(client.join).toHaveBeenCalledWith('bidder:alice');
      expect(client.emit).not.toHaveBeenCalled();
      expect(client.disconnect).not.toHaveBeenCalled();
    });

    it('disconnects a socket without a bidder id', async () => {
      const { client, socket } = fakeClient('c2', { bidderId: '  ' });

      await gateway.handleConnection(socket);

      expect(client.emit).toHaveBeenCalledWith('auth_error', { message: 'bidderId required' });
      expect(client.disconnect).toHaveBeenCalledWith(true);
    });

    it('disconnects a bidder id sent without a token', async () => {
      const { client, socket } = fakeClient('c6', { bidderId: 'alice' });

      await gateway.handleConnection(socket);

      expect(client.emit).toHaveBeenCalledWith('auth_error', { message: 'Invalid bidder token' });
      expect(client.disconnect).toHaveBeenCalledWith(true);
      expect(client.join).not.toHaveBeenCalled();
    });

    it('disconnects a token issued for another bidder', async () => {
      const getAccount = jest.spyOn(accounts, 'getAccount');
      const { client, socket } = fakeClient('c7', { bidderId: 'alice', token: tokens.sign('bob') });

      await gateway.handleConnection(socket);
      await gateway.handleJoinAuction(socket);

      expect(client.emit).toHaveBeenCalledWith('auth_error', { message: 'Invalid bidder token' });
      expect(getAccount).not.toHaveBeenCalled();
      expect(client.join).not.toHaveBeenCalled();
    });

    it('disconnects an unknown bidder', async () => {
      const { client, socket } = fakeClient('c3', {
        bidderId: 'mallory',
        token: tokens.sign('mallory'),
      });

      await gateway.handleConnection(socket);

      expect(client.emit).toHaveBeenCalledWith('auth_error', { message: 'Unknown bidder' });
      expect(client.disconnect).toHaveBeenCalledWith(true);
    });

    it('disconnects when the account lookup fails', async () => {
      jest.spyOn(accounts, 'getAccount').mockRejectedValueOnce(new Error('db down'));
      const { client, socket } = fakeClient('c4', { bidderId: 'alice', token: tokens.sign('alice') });

      await gateway.handleConnection(socket);

      expect(client.emit).toHaveBeenCalledWith('auth_error', { message: 'Authentication failed' });
      expect(client.disconnect).toHaveBeenCalledWith(true);
    });
  });

  describe('handleJoinAuction', () => {
    it('joins the live room and sends the current state', async () => {
      const { client, socket } = await connected();

      await gateway.handleJoinAuction(socket);

      expect(client.join).toHaveBeenCalledWith(LIVE_ROOM);
      expect(client.emit).toHaveBeenCalledWith('round_state', { round: null });
      expect(client.emit).toHaveBeenCalledWith('session_state', { session: null });
    });

    it('requires a completed handshake', async () => {
      const { client, socket } = fakeClient('c5');

      await gateway.handleJoinAuction(socket);

      expect(client.join).not.toHaveBeenCalled();
      expect(client.emit).toHaveBeenCalledWith('auth_error', { message: 'Authentication required' });
    });

    it('forgets the bidder on disconnect', async () => {
      const { client, socket } = await connected();
      gateway.handleDisconnect(socket);

      await gateway.handleJoinAuction(socket);

      expect(client.join).not.toHaveBeenCalledWith(LIVE_ROOM);
    });
  });

  describe('handleLeaveAuction', () => {
    it('leaves the live room', async () => {
      const { client, socket } = await connected();

      await gateway.handleLeaveAuction(socket);

      expect(client.leave).toHaveBeenCalledWith(LIVE_ROOM);
    });
  });

  describe('handlePlaceBid', () => {
    it('bids as the handshake bidder and answers with the result', async () => {
      const result = { accepted: false, reason: 'BID_COOLDOWN', message: 'Wait 500ms between bids' };
      auctionService.placeBid.mockResolvedValue(result);
      const { client, socket } = await connected();

      await gateway.handlePlaceBid(socket, { amount: '12', bidderId: 'bob', idempotencyKey: 'k-1' });

      expect(auctionService.placeBid).toHaveBeenCalledWith('alice', '12', {
        source: 'COMMAND',
        idempotencyKey: 'k-1',
      });
      expect(client.emit).toHaveBeenCalledWith('bid_result', result);
    });

    it('answers a malformed payload without bidding', async () => {
      const { client, socket } = await connected();

      await gateway.handlePlaceBid(socket, { source: 'COMMAND' });

      expect(auctionService.placeBid).not.toHaveBeenCalled();
      expect(client.emit).toHaveBeenCalledWith(
        'bid_result',
        expect.objectContaining({ accepted: false, reason: 'INVALID_AMOUNT' }),
      );
    });
  });

  describe('event delivery', () => {
    it('sends rejections to the bidder only', () => {
      const event: AuctionEvent = {
        type: 'BID_REJECTED',
        roundId: 'r1',
        bidderId: 'bob',
        rejection: { accepted: false, reason: 'BELOW_CURRENT_BID', message: 'too low' },
      };

      bus.publish([event]);

      expect(to).toHaveBeenCalledWith('bidder:bob');
      expect(roomEmit).toHaveBeenCalledWith('bid_rejected', event);
    });

    it('sends everything else to the live room under its snake-case name', () => {
      const event: AuctionEvent = { type: 'ROUND_PAUSED', roundId: 'r1', remainingMs: 12_000 };

      bus.publish([event]);

      expect(to).toHaveBeenCalledWith(LIVE_ROOM);
      expect(roomEmit).toHaveBeenCalledWith('round_paused', event);
    });

    it('stops delivering after shutdown', () => {
      gateway.onModuleDestroy();

      bus.publish([{ type: 'BREAK_SKIPPED', sessionId: 's1' }]);

      expect(to).not.toHaveBeenCalled();
    });
  });
});
