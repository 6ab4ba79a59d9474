import type { ItemRef } from '../auction/engine';

export const ITEM_SOURCE = Symbol('ITEM_SOURCE');

/**
 * Catalogue of items waiting to be auctioned. Marking is idempotent: marking
 * an item with the status it already has is a no-op.
 */
export interface ItemSource {
  nextAvailableItems(): Promise<ItemRef[]>;
  markSold(item: ItemRef, bidderId: string, amount: number): Promise<void>;
  markUnsold(item: ItemRef): Promise<void>;
}
