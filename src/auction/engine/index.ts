export { RoundEngine, initialSettlementProgress } from './round-engine';
export { SessionEngine } from './session-engine';
export {
  validateBid,
  minimumNextBid,
  quickBidOptions,
  isSingleStepZone,
} from './bid-validator';
export { normalizeBidAmount, maxLegalAmount, referencePrice } from './bid-amount';
export { OPEN_ROUND_STATUSES } from './types';
export type {
  AuctionEvent,
  AuctionEventType,
  BeginFinalizeResult,
  Bid,
  BidDecision,
  BidderSnapshot,
  BidRejection,
  BidRejectionCode,
  BidRules,
  BidSource,
  BreakState,
  CancelRoundResult,
  CreateRoundInput,
  FinalizeReason,
  FirstBidPolicy,
  ItemRef,
  OpenRoundResult,
  PauseRoundResult,
  PlaceBidResult,
  QuickBidTier,
  RawBidAmount,
  ResumePolicy,
  ResumeRoundResult,
  RoundMode,
  RoundOutcome,
  RoundState,
  RoundStatus,
  SessionState,
  SessionStatus,
  SessionSummary,
  SettlementProgress,
  Transition,
  UndoBidResult,
} from './types';
