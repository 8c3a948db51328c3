import { Controller, Get, Param, Query, Res } from '@nestjs/common';
import { StockService } from './stock.service';
import { StockQueryDto } from './dto/stock-query.dto';
import { FileResponse, sendFile } from '../exports/send-file';

@Controller('api/v1/stock')
export class StockController {
  constructor(private readonly stockService: StockService) {}

  @Get()
  async getAll(@Query() query: StockQueryDto) {
    return this.stockService.getAll(query.includeEmpty);
  }

  // must stay above :productCode
  @Get('export')
  async export(@Query() query: StockQueryDto, @Res() res: FileResponse) {
    const file = await this.stockService.export(query.format ?? 'xlsx', query.includeEmpty);
    sendFile(res, file);
  }

  @Get(':productCode')
  async getForProduct(@Param('productCode') productCode: string) {
    return this.stockService.getForProduct(productCode);
  }
}
