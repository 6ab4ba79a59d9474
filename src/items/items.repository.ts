import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { ItemRef } from '../auction/engine';
import type { ItemSource } from './item-source';

interface ItemRow {
  id: string;
  name: string;
  base_price: string;
  metadata: Record<string, unknown> | null;
}

@Injectable()
export class ItemsRepository implements ItemSource {
  constructor(private readonly db: DatabaseService) {}

  /** Items never auctioned yet, in catalogue order. */
  async nextAvailableItems(): Promise<ItemRef[]> {
    const result = await this.db.query<ItemRow>(
      `SELECT id, name, base_price, metadata FROM auction_items
       WHERE status = 'AVAILABLE'
       ORDER BY position ASC, id ASC`,
    );
    return result.rows.map((row) => ({
      id: row.id,
      name: row.name,
      basePrice: Number(row.base_price),
      metadata: row.metadata ?? {},
    }));
  }

  async markSold(item: ItemRef, bidderId: string, amount: number): Promise<void> {
    await this.db.query(
      `UPDATE auction_items
       SET status = 'SOLD', sold_to = $2, sold_price = $3, updated_at = now()
       WHERE id = $1`,
      [item.id, bidderId, amount],
    );
  }

  /** Back into the unsold pool for later review or re-listing. */
  async markUnsold(item: ItemRef): Promise<void> {
    await this.db.query(
      `UPDATE auction_items
       SET status = 'UNSOLD', sold_to = NULL, sold_price = NULL, updated_at = now()
       WHERE id = $1`,
      [item.id],
    );
  }
}
