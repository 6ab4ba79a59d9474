import { Global, Module } from '@nestjs/common';
import { AdminGuard } from './admin.guard';
import { BidderTokenService } from './bidder-token.service';

@Global()
@Module({
  providers: [AdminGuard, BidderTokenService],
  exports: [AdminGuard, BidderTokenService],
})
export class AuthModule {}
