import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isValidTimeZone } from '../common/dates';
import { LedgerService } from '../ledger/ledger.service';
import { ProductsService } from '../products/products.service';
import { sortForDisplay } from '../reports/report-filter';
import { StoreConflictError } from '../table-store/table-store.errors';
import { RecordMovementDto } from './dto/record-movement.dto';
import { recordMovement } from './movement-recorder';
import { rejectionException } from './movements.errors';
import { PersistFailure, RecentMovements, RecordOutcome } from './movements.types';

export const DEFAULT_TIME_ZONE = 'Europe/Istanbul';

@Injectable()
export class MovementsService {
    private readonly logger = new Logger(MovementsService.name);
    private readonly timeZone: string;

    constructor(
        private readonly ledgerService: LedgerService,
        private readonly productsService: ProductsService,
        configService: ConfigService,
    ) {
        const zone = configService.get<string>('APP_TIMEZONE') || DEFAULT_TIME_ZONE;
        if (!isValidTimeZone(zone)) {
            throw new Error(`FATAL ERROR: APP_TIMEZONE '${zone}' is not a known time zone.`);
        }
        this.timeZone = zone;
    }

    async record(dto: RecordMovementDto): Promise<RecordOutcome> {
        const [catalog, { ledger }] = await Promise.all([
            this.productsService.findAll(),
            this.ledgerService.load(),
        ]);

        const attempt = recordMovement(ledger, catalog, dto, new Date(), this.timeZone, (state) =>
            this.logger.debug(`Recording ${dto.kind} for ${dto.productCode}: ${state}`),
        );
        if (!attempt.ok) {
            throw rejectionException(attempt.error);
        }

        const { movement } = attempt;
        this.logger.debug(`Recording ${dto.kind} for ${dto.productCode}: persisting`);
        try {
            const persisted = await this.ledgerService.persist(attempt.ledger);
            this.logger.log(`Recorded ${movement.kind} of ${movement.quantity} for ${movement.productCode}`);
            return { state: 'committed', synced: true, movement, revision: persisted.revision };
        } catch (error) {
            const reason: PersistFailure = error instanceof StoreConflictError ? 'conflict' : 'unavailable';
            this.logger.error(
                `Movement for ${movement.productCode} was not written (${reason}); it exists only in this response`,
                error instanceof Error ? error.stack : String(error),
            );
            return { state: 'diverged', synced: false, movement, reason };
        }
    }

    async recent(limit: number): Promise<RecentMovements> {
        const { ledger, issues } = await this.ledgerService.load();
        const sorted = sortForDisplay(ledger.movements);
        return { items: sorted.slice(0, limit), total: sorted.length, malformedRows: issues.length };
    }
}
