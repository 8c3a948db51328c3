import type { Movement } from '../ledger/ledger.types';

export type PersistFailure = 'conflict' | 'unavailable';

export type RecordOutcome =
    | { state: 'committed'; synced: true; movement: Movement; revision: string | null }
    // local append succeeded but the workbook was not updated
    | { state: 'diverged'; synced: false; movement: Movement; reason: PersistFailure };

export interface RecentMovements {
    items: Movement[];
    total: number;
    malformedRows: number;
}
