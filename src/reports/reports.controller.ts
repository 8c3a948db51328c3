import { Controller, Get, Query, Res } from '@nestjs/common';
import { ReportsService } from './reports.service';
import { ReportQueryDto } from './dto/report-query.dto';
import { MovementFilter } from './report-filter';
import { FileResponse, sendFile } from '../exports/send-file';

@Controller('api/v1/reports')
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('movements')
  async movements(@Query() query: ReportQueryDto) {
    return this.reportsService.movements(toFilter(query));
  }

  @Get('movements/export')
  async exportMovements(@Query() query: ReportQueryDto, @Res() res: FileResponse) {
    const file = await this.reportsService.export(toFilter(query), query.format ?? 'xlsx');
    sendFile(res, file);
  }
}

function toFilter({ startDate, endDate, productCode }: ReportQueryDto): MovementFilter {
  return { startDate, endDate, productCode };
}
