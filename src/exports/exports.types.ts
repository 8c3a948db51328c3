import type { TableRow } from '../table-store/table-store.types';

export type ExportFormat = 'xlsx' | 'csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['xlsx', 'csv'];

export interface ExportTable {
    /** File name without extension. */
    name: string;
    sheetName: string;
    columns: readonly string[];
    rows: TableRow[];
}

export interface ExportFile {
    buffer: Buffer;
    contentType: string;
    filename: string;
}
