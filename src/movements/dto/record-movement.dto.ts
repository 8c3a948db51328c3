import { IsEnum, IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength } from 'class-validator';
import { MovementKind } from '../../ledger/ledger.types';

export class RecordMovementDto {
  @IsString()
  @IsNotEmpty()
  productCode!: string;

  @IsEnum(MovementKind)
  kind!: MovementKind;

  // sign is checked by the recorder so it can answer with movement.invalid_quantity
  @IsNumber({ allowNaN: false, allowInfinity: false })
  quantity!: number;

  @IsOptional()
  @IsString()
  @MaxLength(32)
  unit?: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  note?: string;

  @IsOptional()
  @IsString()
  effectiveDate?: string; // YYYY-MM-DD
}
