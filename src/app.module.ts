import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database/database.module';
import { I18nModule } from './i18n/i18n.module';
import { TableStoreModule } from './table-store/table-store.module';
import { LedgerModule } from './ledger/ledger.module';
import { ProductsModule } from './products/products.module';
import { MovementsModule } from './movements/movements.module';
import { StockModule } from './stock/stock.module';
import { ReportsModule } from './reports/reports.module';
import { ExportsModule } from './exports/exports.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    I18nModule,
    DatabaseModule,
    TableStoreModule,
    LedgerModule,
    ProductsModule,
    MovementsModule,
    StockModule,
    ReportsModule,
    ExportsModule,
  ],
})
export class AppModule { }
