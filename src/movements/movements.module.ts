import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { ProductsModule } from '../products/products.module';
import { MovementsService } from './movements.service';
import { MovementsController } from './movements.controller';

@Module({
  imports: [LedgerModule, ProductsModule],
  providers: [MovementsService],
  controllers: [MovementsController],
  exports: [MovementsService],
})
export class MovementsModule {}
