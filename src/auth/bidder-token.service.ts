import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac, timingSafeEqual } from 'node:crypto';

/**
 * Bidder credentials for the socket handshake: an HMAC-SHA256 of the bidder id
 * under `BIDDER_TOKEN_SECRET`, base64url encoded. The front end that knows who
 * the bidder is holds the same secret and issues the token.
 */
@Injectable()
export class BidderTokenService {
  private readonly logger = new Logger(BidderTokenService.name);

  constructor(private readonly config: ConfigService) {}

  sign(bidderId: string): string {
    return createHmac('sha256', this.secret()).update(bidderId).digest('base64url');
  }

  verify(bidderId: string, token: string): boolean {
    const expected = Buffer.from(this.sign(bidderId));
    const given = Buffer.from(token);
    return expected.length === given.length && timingSafeEqual(expected, given);
  }

  private secret(): string {
    const secret = this.config.get<string>('bidder.tokenSecret');
    if (!secret) {
      this.logger.error('BIDDER_TOKEN_SECRET is not set in environment');
      throw new UnauthorizedException('Server auth configuration error');
    }
    return secret;
  }
}
