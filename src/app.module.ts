import { Module } from '@nestjs/common';
import { AccountsModule } from './accounts/accounts.module';
import { AuctionModule } from './auction/auction.module';
import { AuthModule } from './auth/auth.module';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { ItemsModule } from './items/items.module';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    RedisModule,
    AccountsModule,
    ItemsModule,
    AuthModule,
    AuctionModule,
  ],
})
export class AppModule {}
