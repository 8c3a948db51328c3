export class StoreConflictError extends Error {
    constructor(
        readonly expectedRevision: string | null,
        readonly actualRevision: string | null,
    ) {
        super(`Workbook changed since it was read (expected ${expectedRevision ?? 'none'}, found ${actualRevision ?? 'none'})`);
        this.name = 'StoreConflictError';
    }
}

export class StorePersistError extends Error {
    constructor(message: string, readonly cause?: unknown) {
        super(message);
        this.name = 'StorePersistError';
    }
}

export function statusCodeOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
        return error.statusCode;
    }
    return undefined;
}
