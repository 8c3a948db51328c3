import { TableName } from '../table-store/table-store.types';

export enum MovementKind {
    IN = 'in',
    OUT = 'out',
}

export interface Movement {
    productCode: string;
    /** Product name as it was when the movement was recorded. */
    productName: string;
    kind: MovementKind;
    quantity: number;
    unit: string;
    note: string;
    effectiveDate: string; // YYYY-MM-DD
    recordedAt: string; // YYYY-MM-DD HH:mm, configured time zone
}

export interface MovementLedger {
    readonly movements: readonly Movement[];
    /** Workbook revision the ledger was read at, used to detect concurrent writers. */
    readonly revision: string | null;
}

export interface MalformedRow {
    table: TableName;
    /** Sheet row number, header being row 1. */
    row: number;
    field: string;
    value: string | null;
    action: 'coerced' | 'skipped';
    reason: string;
}

export interface LedgerLoad {
    ledger: MovementLedger;
    issues: MalformedRow[];
}
