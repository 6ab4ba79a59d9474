import { Module } from '@nestjs/common';
import { AuctionController } from './auction.controller';
import { AuctionEventBus } from './auction-events';
import { AuctionGateway } from './auction.gateway';
import { AuctionPersistenceService } from './auction-persistence.service';
import { AuctionService } from './auction.service';
import { AuctionSettingsService } from './auction-settings.service';
import { CountdownClock } from './countdown-clock';
import { SequencerService } from './sequencer.service';
import { SettlementService } from './settlement.service';

@Module({
  controllers: [AuctionController],
  providers: [
    AuctionEventBus,
    AuctionSettingsService,
    CountdownClock,
    AuctionPersistenceService,
    SettlementService,
    AuctionService,
    SequencerService,
    AuctionGateway,
  ],
  exports: [AuctionService, SequencerService, AuctionEventBus],
})
export class AuctionModule {}
