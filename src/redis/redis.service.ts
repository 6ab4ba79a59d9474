import { Injectable, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import type { PlaceBidResult } from '../auction/engine';

const ACTIVE_ROUND_KEY = 'auction:active-round';

/**
 * Lua script for releasing the live-round slot only when we still hold it.
 * KEYS[1] = active round key, ARGV[1] = round id
 */
const RELEASE_ACTIVE_ROUND_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly client: Redis;
  private readonly logger = new Logger(RedisService.name);

  constructor(config: ConfigService) {
    const url = config.get<string>('redis.url') ?? 'redis://localhost:6379';
    this.client = new Redis(url);
    this.client.on('error', (err) =>
      this.logger.error('Redis connection error', err),
    );
    this.client.on('connect', () => this.logger.log('Connected to Redis'));
  }

  private bidIdempotencyPendingKey(
    roundId: string,
    bidderId: string,
    idempotencyKey: string,
  ): string {
    return `auction:round:${roundId}:bidder:${bidderId}:idem:${idempotencyKey}:pending`;
  }

  private bidIdempotencyResultKey(
    roundId: string,
    bidderId: string,
    idempotencyKey: string,
  ): string {
    return `auction:round:${roundId}:bidder:${bidderId}:idem:${idempotencyKey}:result`;
  }

  private cooldownKey(bidderId: string): string {
    return `auction:bidder:${bidderId}:cooldown`;
  }

  /**
   * Claim the system-wide live slot. Only one round may be ACTIVE, PAUSED or
   * SETTLING at a time, across every process sharing this Redis.
   */
  async claimActiveRound(roundId: string): Promise<boolean> {
    const result = await this.client.set(ACTIVE_ROUND_KEY, roundId, 'NX');
    return result === 'OK';
  }

  /** Re-assert ownership after a restart; succeeds if free or already ours. */
  async reclaimActiveRound(roundId: string): Promise<boolean> {
    if (await this.claimActiveRound(roundId)) return true;
    return (await this.currentActiveRound()) === roundId;
  }

  async releaseActiveRound(roundId: string): Promise<void> {
    await this.client.eval(RELEASE_ACTIVE_ROUND_SCRIPT, 1, ACTIVE_ROUND_KEY, roundId);
  }

  async currentActiveRound(): Promise<string | null> {
    return this.client.get(ACTIVE_ROUND_KEY);
  }

  /** Per-bidder rate limit. Returns false while the previous bid's window is open. */
  async claimBidCooldown(bidderId: string, windowMs: number): Promise<boolean> {
    if (windowMs <= 0) return true;
    const result = await this.client.set(
      this.cooldownKey(bidderId),
      '1',
      'PX',
      windowMs,
      'NX',
    );
    return result === 'OK';
  }

  async claimBidIdempotency(
    roundId: string,
    bidderId: string,
    idempotencyKey: string,
    ttlSec = 30,
  ): Promise<boolean> {
    const result = await this.client.set(
      this.bidIdempotencyPendingKey(roundId, bidderId, idempotencyKey),
      '1',
      'EX',
      ttlSec,
      'NX',
    );
    return result === 'OK';
  }

  async getBidIdempotencyResult(
    roundId: string,
    bidderId: string,
    idempotencyKey: string,
  ): Promise<PlaceBidResult | null> {
    const raw = await this.client.get(
      this.bidIdempotencyResultKey(roundId, bidderId, idempotencyKey),
    );
    if (!raw) return null;
    try {
      return JSON.parse(raw) as PlaceBidResult;
    } catch (err) {
      this.logger.warn(`Discarding unreadable idempotency result for ${bidderId}: ${String(err)}`);
      return null;
    }
  }

  async storeBidIdempotencyResult(
    roundId: string,
    bidderId: string,
    idempotencyKey: string,
    result: PlaceBidResult,
    ttlSec = 600,
  ): Promise<void> {
    const pipeline = this.client.pipeline();
    pipeline.set(
      this.bidIdempotencyResultKey(roundId, bidderId, idempotencyKey),
      JSON.stringify(result),
      'EX',
      ttlSec,
    );
    pipeline.del(this.bidIdempotencyPendingKey(roundId, bidderId, idempotencyKey));
    await pipeline.exec();
  }

  async releaseBidIdempotency(
    roundId: string,
    bidderId: string,
    idempotencyKey: string,
  ): Promise<void> {
    await this.client.del(this.bidIdempotencyPendingKey(roundId, bidderId, idempotencyKey));
  }

  async onModuleDestroy() {
    await this.client.quit();
  }
}
