export type CellValue = string | number | boolean | Date | null;

export type TableRow = Record<string, CellValue>;

// Sheet names inside the workbook
export enum TableName {
    PRODUCTS = 'urunler',
    MOVEMENTS = 'hareketler',
}

export interface TableSnapshot {
    rows: TableRow[];
    /** Revision of the workbook document the rows were read from; null when it does not exist yet. */
    revision: string | null;
}

export interface ReplaceTableOptions {
    columns?: readonly string[];
    // undefined skips the concurrency check; null expects the document not to exist yet
    expectedRevision?: string | null;
}

export interface WorkbookAttachment {
    content_type?: string;
    data?: string;
    stub?: boolean;
}

export interface WorkbookDocument {
    _id: string;
    _rev?: string;
    _attachments?: Record<string, WorkbookAttachment>;
}

/** The slice of a nano DocumentScope the store talks to. */
export interface WorkbookDb {
    get(docname: string, params: { attachments: boolean }): Promise<WorkbookDocument>;
    attachment: {
        insert(
            docname: string,
            attname: string,
            att: Buffer,
            contenttype: string,
            params?: { rev?: string },
        ): Promise<{ id: string; rev: string }>;
    };
}
