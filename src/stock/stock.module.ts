import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { ProductsModule } from '../products/products.module';
import { ExportsModule } from '../exports/exports.module';
import { StockService } from './stock.service';
import { StockController } from './stock.controller';

@Module({
  imports: [LedgerModule, ProductsModule, ExportsModule],
  providers: [StockService],
  controllers: [StockController],
  exports: [StockService],
})
export class StockModule {}
