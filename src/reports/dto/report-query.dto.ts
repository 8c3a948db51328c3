import { IsIn, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';
import { DATE_PATTERN } from '../../common/dates';
import { EXPORT_FORMATS, ExportFormat } from '../../exports/exports.types';

export class ReportQueryDto {
  @Matches(DATE_PATTERN, { message: 'startDate must be YYYY-MM-DD' })
  startDate!: string;

  @Matches(DATE_PATTERN, { message: 'endDate must be YYYY-MM-DD' })
  endDate!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  productCode?: string;

  @IsOptional()
  @IsIn(EXPORT_FORMATS)
  format?: ExportFormat;
}
