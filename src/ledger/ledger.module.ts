import { Module } from '@nestjs/common';
import { TableStoreModule } from '../table-store/table-store.module';
import { LedgerService } from './ledger.service';

@Module({
  imports: [TableStoreModule],
  providers: [LedgerService],
  exports: [LedgerService],
})
export class LedgerModule {}
