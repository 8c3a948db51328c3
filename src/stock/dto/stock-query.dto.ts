import { Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsOptional } from 'class-validator';
import { EXPORT_FORMATS, ExportFormat } from '../../exports/exports.types';

export class StockQueryDto {
  // query strings arrive as text
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true' || value === '1')
  @IsBoolean()
  includeEmpty?: boolean;

  @IsOptional()
  @IsIn(EXPORT_FORMATS)
  format?: ExportFormat;
}
