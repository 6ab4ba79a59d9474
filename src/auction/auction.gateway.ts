import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
} from '@nestjs/websockets';
import {
  Inject,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { Server, Socket } from 'socket.io';
import { ACCOUNT_PROVIDER, type AccountProvider } from '../accounts/account-provider';
import { BidderTokenService } from '../auth/bidder-token.service';
import { AuctionEventBus } from './auction-events';
import { socketBidSchema } from './auction.schemas';
import { AuctionService } from './auction.service';
import type { AuctionEvent } from './engine';
import { SequencerService } from './sequencer.service';

export const LIVE_ROOM = 'auction:live';
export const bidderRoom = (bidderId: string) => `bidder:${bidderId}`;

interface HandshakeCredentials {
  bidderId: string;
  token: string;
}

interface SocketSession {
  bidderId: string;
  displayName: string;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled auction event: ${JSON.stringify(value)}`);
}

/**
 * Realtime sink: renders event records onto socket.io rooms and accepts bids
 * from connected bidders. Event names are the record types in snake case.
 */
@WebSocketGateway({ cors: { origin: '*' } })
export class AuctionGateway implements OnModuleInit, OnModuleDestroy {
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(AuctionGateway.name);
  private readonly sessionBySocketId = new Map<string, SocketSession>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly auctionService: AuctionService,
    private readonly sequencer: SequencerService,
    private readonly events: AuctionEventBus,
    @Inject(ACCOUNT_PROVIDER) private readonly accounts: AccountProvider,
    private readonly tokens: BidderTokenService,
  ) {}

  async handleConnection(client: Socket): Promise<void> {
    const credentials = this.extractCredentials(client);
    if (!credentials) {
      client.emit('auth_error', { message: 'bidderId required' });
      client.disconnect(true);
      return;
    }

    try {
      if (!this.tokens.verify(credentials.bidderId, credentials.token)) {
        this.logger.warn(`Socket ${client.id} sent a bad token for ${credentials.bidderId}`);
        client.emit('auth_error', { message: 'Invalid bidder token' });
        client.disconnect(true);
        return;
      }

      const account = await this.accounts.getAccount(credentials.bidderId);
      if (!account) {
        client.emit('auth_error', { message: 'Unknown bidder' });
        client.disconnect(true);
        return;
      }
      this.sessionBySocketId.set(client.id, {
        bidderId: account.id,
        displayName: account.displayName,
      });
      await client.join(bidderRoom(account.id));
      this.logger.debug(`Socket connected id=${client.id} bidder=${account.id}`);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      this.logger.warn(`Socket handshake failed: ${msg}`);
      client.emit('auth_error', { message: 'Authentication failed' });
      client.disconnect(true);
    }
  }

  handleDisconnect(client: Socket): void {
    this.sessionBySocketId.delete(client.id);
  }

  private extractCredentials(client: Socket): HandshakeCredentials | null {
    const auth: Record<string, unknown> = client.handshake.auth ?? {};
    const bidderId = auth['bidderId'];
    if (typeof bidderId !== 'string' || !bidderId.trim()) return null;
    const token = auth['token'];
    return {
      bidderId: bidderId.trim(),
      token: typeof token === 'string' ? token.trim() : '',
    };
  }

  private requireSession(client: Socket): SocketSession | null {
    const session = this.sessionBySocketId.get(client.id) ?? null;
    if (!session) {
      client.emit('auth_error', { message: 'Authentication required' });
      client.disconnect(true);
      return null;
    }
    return session;
  }

  onModuleInit(): void {
    this.unsubscribe = this.events.subscribe((event) => this.broadcast(event));
  }

  onModuleDestroy(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  broadcast(event: AuctionEvent): void {
    const name = event.type.toLowerCase();
    switch (event.type) {
      case 'BID_REJECTED':
        this.server.to(bidderRoom(event.bidderId)).emit(name, event);
        return;
      case 'SESSION_STARTED':
      case 'QUEUE_LOADED':
      case 'ROUND_OPENED':
      case 'BID_ACCEPTED':
      case 'TIME_RESET':
      case 'BID_UNDONE':
      case 'ROUND_PAUSED':
      case 'ROUND_RESUMED':
      case 'FINAL_CALL_STARTED':
      case 'FINAL_CALL_ABORTED':
      case 'ROUND_FINALIZED':
      case 'SETTLEMENT_FAILED':
      case 'ROUND_CANCELLED':
      case 'BREAK_STARTED':
      case 'BREAK_SKIPPED':
      case 'SESSION_FINISHED':
        this.server.to(LIVE_ROOM).emit(name, event);
        return;
      default:
        assertNever(event);
    }
  }

  @SubscribeMessage('join_auction')
  async handleJoinAuction(client: Socket): Promise<void> {
    if (!this.requireSession(client)) return;

    await client.join(LIVE_ROOM);
    client.emit('round_state', { round: this.auctionService.getCurrentRound() });
    client.emit('session_state', { session: this.sequencer.getSession() });
  }

  @SubscribeMessage('leave_auction')
  async handleLeaveAuction(client: Socket): Promise<void> {
    if (!this.requireSession(client)) return;
    await client.leave(LIVE_ROOM);
  }

  @SubscribeMessage('place_bid')
  async handlePlaceBid(client: Socket, payload: unknown): Promise<void> {
    const session = this.requireSession(client);
    if (!session) return;

    const parsed = socketBidSchema.safeParse(payload);
    if (!parsed.success) {
      client.emit('bid_result', {
        accepted: false,
        reason: 'INVALID_AMOUNT',
        message: parsed.error.issues[0]?.message ?? 'amount required',
      });
      return;
    }
    const result = await this.auctionService.placeBid(
      session.bidderId,
      parsed.data.amount,
      { source: parsed.data.source, idempotencyKey: parsed.data.idempotencyKey },
    );
    client.emit('bid_result', result);
  }
}
