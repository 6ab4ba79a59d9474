import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AdminGuard } from '../auth/admin.guard';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { AuctionSettingsService } from './auction-settings.service';
import {
  loadQueueSchema,
  placeBidSchema,
  type LoadQueueBody,
  type PlaceBidBody,
} from './auction.schemas';
import { AuctionService } from './auction.service';
import { SequencerService } from './sequencer.service';

@Controller('auction')
export class AuctionController {
  constructor(
    private readonly auctionService: AuctionService,
    private readonly sequencer: SequencerService,
    private readonly settings: AuctionSettingsService,
  ) {}

  /* ------------------------------------------------------------------ */
  /*  READS                                                              */
  /* ------------------------------------------------------------------ */

  @Get('round')
  currentRound() {
    return { round: this.auctionService.getCurrentRound() };
  }

  @Get('rounds/:id')
  async getRound(@Param('id', ParseUUIDPipe) id: string) {
    const round = await this.auctionService.getRound(id);
    if (!round) throw new NotFoundException('Round not found');
    return round;
  }

  @Get('session')
  session() {
    return { session: this.sequencer.getSession() };
  }

  /* ------------------------------------------------------------------ */
  /*  BIDS                                                               */
  /* ------------------------------------------------------------------ */

  /** Bids relayed by a trusted front end (chat bot, web app). */
  @Post('bids')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async placeBid(@Body(new ZodValidationPipe(placeBidSchema)) body: PlaceBidBody) {
    return this.auctionService.placeBid(body.bidderId, body.amount, {
      source: body.source,
      idempotencyKey: body.idempotencyKey,
    });
  }

  /* ------------------------------------------------------------------ */
  /*  ADMIN COMMANDS                                                     */
  /* ------------------------------------------------------------------ */

  @Post('queue')
  @UseGuards(AdminGuard)
  async loadQueue(@Body(new ZodValidationPipe(loadQueueSchema)) body: LoadQueueBody) {
    return this.sequencer.loadQueue(body.items);
  }

  @Post('advance')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async advance() {
    const result = await this.sequencer.advance();
    if (!result.advanced && result.reason !== 'SESSION_FINISHED') {
      throw new BadRequestException(
        result.reason === 'ROUND_NOT_OPENED' ? result.message : result.reason,
      );
    }
    return result;
  }

  @Post('pause')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async pause() {
    const result = await this.auctionService.pause();
    if (!result.paused) throw new BadRequestException(result.reason);
    return result;
  }

  @Post('resume')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async resume() {
    const result = await this.auctionService.resume();
    if (!result.resumed) throw new BadRequestException(result.reason);
    return result;
  }

  @Post('undo')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async undo() {
    const result = await this.auctionService.undoLastBid();
    if (!result.undone) throw new BadRequestException(result.reason);
    return result;
  }

  @Post('final-call')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async finalCall() {
    const result = await this.auctionService.finalCall();
    if (!result.started) throw new BadRequestException(result.reason);
    return result;
  }

  @Post('skip')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async skip() {
    const result = await this.auctionService.skipToUnsold();
    if (!result.finalized) throw new BadRequestException(result.reason);
    return result;
  }

  @Post('skip-break')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async skipBreak() {
    const result = await this.sequencer.skipBreak();
    if (!result.skipped) throw new BadRequestException(result.reason);
    return result;
  }

  @Post('finish')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async finish() {
    const result = await this.sequencer.finishSession();
    if (!result.finished) throw new BadRequestException(result.reason);
    return result;
  }

  @Post('end-session')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async endSession() {
    const result = await this.sequencer.endSession();
    if (!result.finished) throw new BadRequestException(result.reason);
    return result;
  }

  @Post('retry-settlement')
  @HttpCode(200)
  @UseGuards(AdminGuard)
  async retrySettlement() {
    const result = await this.auctionService.retrySettlement();
    if (!result.retried) throw new BadRequestException(result.reason);
    return result;
  }

  @Get('settings')
  @UseGuards(AdminGuard)
  getSettings() {
    return this.settings.get();
  }

  @Patch('settings')
  @UseGuards(AdminGuard)
  updateSettings(@Body() body: unknown) {
    const result = this.settings.update(body);
    if (!result.updated) {
      throw new BadRequestException({ message: 'Invalid settings', issues: result.issues });
    }
    return result.settings;
  }
}
