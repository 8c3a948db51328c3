import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { TableStoreService } from './table-store.service';

@Module({
  imports: [DatabaseModule],
  providers: [TableStoreService],
  exports: [TableStoreService],
})
export class TableStoreModule {}
