import { Global, Module } from '@nestjs/common';
import { ITEM_SOURCE } from './item-source';
import { ItemsRepository } from './items.repository';

@Global()
@Module({
  providers: [{ provide: ITEM_SOURCE, useClass: ItemsRepository }],
  exports: [ITEM_SOURCE],
})
export class ItemsModule {}
