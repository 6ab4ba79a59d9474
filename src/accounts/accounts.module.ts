import { Global, Module } from '@nestjs/common';
import { ACCOUNT_PROVIDER } from './account-provider';
import { AccountsRepository } from './accounts.repository';

@Global()
@Module({
  providers: [{ provide: ACCOUNT_PROVIDER, useClass: AccountsRepository }],
  exports: [ACCOUNT_PROVIDER],
})
export class AccountsModule {}
