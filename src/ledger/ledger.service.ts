import { Injectable, Logger } from '@nestjs/common';
import { TableStoreService } from '../table-store/table-store.service';
import { TableName } from '../table-store/table-store.types';
import { MOVEMENT_COLUMNS, movementToRow, rowToMovement } from './ledger.rows';
import { LedgerLoad, MalformedRow, Movement, MovementLedger } from './ledger.types';

// Data rows start below the header row
const FIRST_DATA_ROW = 2;

@Injectable()
export class LedgerService {
    private readonly logger = new Logger(LedgerService.name);

    constructor(private readonly tableStore: TableStoreService) { }

    async load(): Promise<LedgerLoad> {
        const snapshot = await this.tableStore.loadTable(TableName.MOVEMENTS);

        const movements: Movement[] = [];
        const issues: MalformedRow[] = [];
        snapshot.rows.forEach((row, index) => {
            const decoded = rowToMovement(row, index + FIRST_DATA_ROW);
            issues.push(...decoded.issues);
            if (decoded.movement) movements.push(decoded.movement);
        });

        if (issues.length > 0) {
            const skipped = issues.filter((i) => i.action === 'skipped').length;
            this.logger.warn(
                `Ledger loaded with ${issues.length} malformed field(s): ${skipped} row(s) skipped, ${issues.length - skipped} value(s) coerced`,
            );
        }

        return { ledger: { movements, revision: snapshot.revision }, issues };
    }

    /**
     * Writes the whole ledger back, replacing the sheet. Fails with StoreConflictError
     * when someone else wrote the workbook after this ledger was loaded.
     */
    async persist(ledger: MovementLedger): Promise<MovementLedger> {
        const written = await this.tableStore.replaceTable(
            TableName.MOVEMENTS,
            ledger.movements.map(movementToRow),
            { columns: MOVEMENT_COLUMNS, expectedRevision: ledger.revision },
        );
        return { movements: ledger.movements, revision: written.revision };
    }
}
