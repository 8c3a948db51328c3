import { Injectable, Inject, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as XLSX from 'xlsx';
import { DATABASE_CONNECTION } from '../database/database.constants';
import { TimeoutError, withTimeout } from '../common/timeouts';
import { StoreConflictError, StorePersistError, statusCodeOf } from './table-store.errors';
import { ReplaceTableOptions, TableName, TableRow, TableSnapshot, WorkbookDb } from './table-store.types';

export const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const DEFAULT_ATTACHMENT = 'depot.xlsx';
const DEFAULT_TIMEOUT_MS = 10_000;
// first attempt plus one retry
const UPLOAD_ATTEMPTS = 2;

interface LoadedWorkbook {
    workbook: XLSX.WorkBook;
    revision: string | null;
}

@Injectable()
export class TableStoreService {
    private readonly logger = new Logger(TableStoreService.name);
    private readonly docId: string;
    private readonly attachmentName: string;
    private readonly timeoutMs: number;

    constructor(
        @Inject(DATABASE_CONNECTION) private readonly db: WorkbookDb,
        configService: ConfigService,
    ) {
        const docId = configService.get<string>('WORKBOOK_DOC_ID');
        if (!docId) {
            throw new Error('FATAL ERROR: WORKBOOK_DOC_ID is not defined in the environment variables.');
        }

        const timeout = Number(configService.get<string>('STORE_TIMEOUT_MS') ?? DEFAULT_TIMEOUT_MS);
        if (!Number.isFinite(timeout) || timeout < 0) {
            throw new Error('FATAL ERROR: STORE_TIMEOUT_MS must be a non-negative number of milliseconds.');
        }

        this.docId = docId;
        this.attachmentName = configService.get<string>('WORKBOOK_ATTACHMENT') || DEFAULT_ATTACHMENT;
        this.timeoutMs = timeout;
    }

    async loadTable(name: TableName): Promise<TableSnapshot> {
        let loaded: LoadedWorkbook;
        try {
            loaded = await this.readWorkbook();
        } catch (error) {
            this.logger.error(`Failed to load sheet '${name}'`, error instanceof Error ? error.stack : String(error));
            throw new ServiceUnavailableException({ key: 'store.unavailable' });
        }

        const sheet = loaded.workbook.Sheets[name];
        if (!sheet) {
            return { rows: [], revision: loaded.revision };
        }

        const rows = XLSX.utils.sheet_to_json<TableRow>(sheet, { defval: null, raw: true });
        return { rows, revision: loaded.revision };
    }

    /**
     * Overwrites one sheet with `rows`, keeping every other sheet of the workbook.
     * Throws StoreConflictError when `expectedRevision` no longer matches the stored
     * document and StorePersistError for anything else.
     */
    async replaceTable(name: TableName, rows: TableRow[], options: ReplaceTableOptions = {}): Promise<TableSnapshot> {
        let current: LoadedWorkbook;
        try {
            current = await this.readWorkbook();
        } catch (error) {
            throw new StorePersistError(`Could not read workbook before writing sheet '${name}'`, error);
        }

        if (options.expectedRevision !== undefined && options.expectedRevision !== current.revision) {
            throw new StoreConflictError(options.expectedRevision, current.revision);
        }

        const sheet = XLSX.utils.json_to_sheet(rows, options.columns ? { header: [...options.columns] } : undefined);
        current.workbook.Sheets[name] = sheet;
        if (!current.workbook.SheetNames.includes(name)) {
            current.workbook.SheetNames.push(name);
        }

        const buffer: Buffer = XLSX.write(current.workbook, { type: 'buffer', bookType: 'xlsx' });
        const revision = await this.upload(name, buffer, current.revision);

        this.logger.log(`Wrote sheet '${name}' (${rows.length} rows) at revision ${revision}`);
        return { rows, revision };
    }

    private async readWorkbook(): Promise<LoadedWorkbook> {
        try {
            const doc = await withTimeout(
                this.db.get(this.docId, { attachments: true }),
                this.timeoutMs,
                'workbook download',
            );
            const entry = doc._attachments?.[this.attachmentName];
            const revision = doc._rev ?? null;
            if (!entry?.data) {
                return { workbook: XLSX.utils.book_new(), revision };
            }

            const workbook = XLSX.read(Buffer.from(entry.data, 'base64'), { type: 'buffer', cellDates: true });
            return { workbook, revision };
        } catch (error) {
            if (statusCodeOf(error) === 404) {
                // No workbook yet: behave as an empty one
                return { workbook: XLSX.utils.book_new(), revision: null };
            }
            throw error;
        }
    }

    private async upload(name: TableName, buffer: Buffer, revision: string | null): Promise<string> {
        let lastError: unknown;
        for (let attempt = 1; attempt <= UPLOAD_ATTEMPTS; attempt++) {
            try {
                const res = await withTimeout(
                    this.db.attachment.insert(
                        this.docId,
                        this.attachmentName,
                        buffer,
                        XLSX_CONTENT_TYPE,
                        revision ? { rev: revision } : {},
                    ),
                    this.timeoutMs,
                    'workbook upload',
                );
                return res.rev;
            } catch (error) {
                if (statusCodeOf(error) === 409) {
                    if (attempt === 1) throw new StoreConflictError(revision, null);
                    // the failed first attempt may have been applied after all
                    return this.confirmEarlierUpload(name, buffer, revision, error);
                }
                lastError = error;
                if (!isTransient(error) || attempt === UPLOAD_ATTEMPTS) break;
                this.logger.warn(`Workbook upload attempt ${attempt} failed, retrying once`);
            }
        }

        this.logger.error('Workbook upload failed', lastError instanceof Error ? lastError.stack : String(lastError));
        throw new StorePersistError('Workbook upload failed', lastError);
    }

    /**
     * Resolves a 409 on the retry. Returns the stored revision when the document moved
     * on and its sheet holds exactly what was uploaded; otherwise the outcome is unknown
     * and reported as StorePersistError, never as a conflict.
     */
    private async confirmEarlierUpload(
        name: TableName,
        buffer: Buffer,
        sentRevision: string | null,
        conflict: unknown,
    ): Promise<string> {
        let stored: LoadedWorkbook;
        try {
            stored = await this.readWorkbook();
        } catch (error) {
            throw new StorePersistError(`Outcome of the upload of sheet '${name}' is unknown`, error);
        }

        const uploaded = XLSX.read(buffer, { type: 'buffer', cellDates: true });
        if (stored.revision !== null && stored.revision !== sentRevision && sameSheet(stored.workbook, uploaded, name)) {
            this.logger.warn(`Earlier upload of sheet '${name}' was applied despite the timeout, revision ${stored.revision}`);
            return stored.revision;
        }

        this.logger.error(`Upload of sheet '${name}' was rejected on retry and the stored sheet differs`);
        throw new StorePersistError(`Outcome of the upload of sheet '${name}' is unknown`, conflict);
    }
}

function sameSheet(a: XLSX.WorkBook, b: XLSX.WorkBook, name: TableName): boolean {
    const sheetA = a.Sheets[name];
    const sheetB = b.Sheets[name];
    if (!sheetA || !sheetB) return false;
    const options = { defval: null, raw: true };
    return (
        JSON.stringify(XLSX.utils.sheet_to_json(sheetA, options)) ===
        JSON.stringify(XLSX.utils.sheet_to_json(sheetB, options))
    );
}

function isTransient(error: unknown): boolean {
    if (error instanceof TimeoutError) return true;
    const status = statusCodeOf(error);
    // no status means the request never got an answer
    return status === undefined || status >= 500;
}
