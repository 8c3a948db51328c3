import {
    BadRequestException,
    ConflictException,
    HttpException,
    NotFoundException,
    ServiceUnavailableException,
    UnprocessableEntityException,
} from '@nestjs/common';
import type { RecorderError } from './movement-recorder';
import type { RecordOutcome } from './movements.types';

export function rejectionException(error: RecorderError): HttpException {
    switch (error.kind) {
        case 'UnknownProduct':
            return new NotFoundException({ key: 'product.not_found', vars: { code: error.productCode } });
        case 'InvalidQuantity':
            return new BadRequestException({ key: 'movement.invalid_quantity', vars: { quantity: String(error.quantity) } });
        case 'InvalidDate':
            return new BadRequestException({ key: 'movement.invalid_date', vars: { date: error.effectiveDate } });
        case 'InsufficientStock':
            return new UnprocessableEntityException({
                key: 'stock.insufficient',
                vars: { code: error.productCode, available: String(error.available), requested: String(error.requested) },
                details: { available: error.available },
            });
    }
}

export function divergedException(outcome: Extract<RecordOutcome, { state: 'diverged' }>): HttpException {
    const body = {
        key: outcome.reason === 'conflict' ? 'movement.persist_conflict' : 'movement.persist_failed',
        vars: { code: outcome.movement.productCode },
        details: { state: outcome.state, synced: outcome.synced, movement: outcome.movement },
    };
    return outcome.reason === 'conflict' ? new ConflictException(body) : new ServiceUnavailableException(body);
}
