import type { Movement } from '../ledger/ledger.types';
import type { MovementTotals } from './report-filter';

export interface MovementReport {
    items: Movement[];
    totals: MovementTotals;
    malformedRows: number;
}
