import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { ExportsModule } from '../exports/exports.module';
import { ReportsService } from './reports.service';
import { ReportsController } from './reports.controller';

@Module({
  imports: [LedgerModule, ExportsModule],
  providers: [ReportsService],
  controllers: [ReportsController],
})
export class ReportsModule {}
