import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  auctionSettingsSchema,
  settingsPatchSchema,
} from './auction.schemas';
import type { BidRules, ResumePolicy, RoundMode } from './engine';

export interface AuctionSettings {
  mode: RoundMode;
  roundDurationSec: number;
  breakDurationSec: number;
  finalCallGraceSec: number;
  resumePolicy: ResumePolicy;
  bidCooldownMs: number;
  settlementRetry: { maxAttempts: number; delayMs: number };
  bidRules: BidRules;
}

export type UpdateSettingsResult =
  | { updated: true; settings: AuctionSettings }
  | { updated: false; issues: string[] };

/**
 * Holds the live auction settings. Reads return a copy; every runtime change
 * goes through {@link update}. Rounds take their own snapshot when they open,
 * so a change never alters a round already running.
 */
@Injectable()
export class AuctionSettingsService {
  private readonly logger = new Logger(AuctionSettingsService.name);
  private settings: AuctionSettings;

  constructor(config: ConfigService) {
    const parsed = auctionSettingsSchema.safeParse(config.get<unknown>('auction'));
    if (!parsed.success) {
      throw new Error(
        `Invalid auction configuration: ${parsed.error.issues
          .map((i) => `${i.path.join('.')}: ${i.message}`)
          .join('; ')}`,
      );
    }
    this.settings = parsed.data;
  }

  get(): AuctionSettings {
    return JSON.parse(JSON.stringify(this.settings)) as AuctionSettings;
  }

  update(patch: unknown): UpdateSettingsResult {
    const parsedPatch = settingsPatchSchema.safeParse(patch);
    if (!parsedPatch.success) {
      return {
        updated: false,
        issues: parsedPatch.error.issues.map(
          (i) => `${i.path.join('.')}: ${i.message}`,
        ),
      };
    }
    const { bidRules, settlementRetry, ...top } = parsedPatch.data;
    const merged = {
      ...this.settings,
      ...top,
      settlementRetry: { ...this.settings.settlementRetry, ...settlementRetry },
      bidRules: { ...this.settings.bidRules, ...bidRules },
    };
    const validated = auctionSettingsSchema.safeParse(merged);
    if (!validated.success) {
      return {
        updated: false,
        issues: validated.error.issues.map(
          (i) => `${i.path.join('.')}: ${i.message}`,
        ),
      };
    }
    this.settings = validated.data;
    this.logger.log(`Settings updated: ${Object.keys(parsedPatch.data).join(', ')}`);
    return { updated: true, settings: this.get() };
  }
}
