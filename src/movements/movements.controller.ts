import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { MovementsService } from './movements.service';
import { RecordMovementDto } from './dto/record-movement.dto';
import { ListMovementsDto } from './dto/list-movements.dto';
import { divergedException } from './movements.errors';

const DEFAULT_LIMIT = 50;

@Controller('api/v1/movements')
export class MovementsController {
  constructor(private readonly movementsService: MovementsService) {}

  @Get()
  async recent(@Query() query: ListMovementsDto) {
    return this.movementsService.recent(query.limit ?? DEFAULT_LIMIT);
  }

  @Post()
  async record(@Body() dto: RecordMovementDto) {
    const outcome = await this.movementsService.record(dto);
    if (outcome.state === 'diverged') {
      throw divergedException(outcome);
    }
    return outcome;
  }
}
