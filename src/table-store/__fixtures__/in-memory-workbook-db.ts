import { WorkbookAttachment, WorkbookDb, WorkbookDocument } from '../table-store.types';

export class FakeCouchError extends Error {
    constructor(readonly statusCode: number) {
        super(`couch error ${statusCode}`);
    }
}

/** `before-write` stalls without storing; `after-write` stores and then never answers. */
export type InsertStall = 'before-write' | 'after-write';

type InsertBehaviour = { fail: unknown } | { stall: InsertStall };

interface StoredDoc {
    rev: number;
    attachments: Map<string, { contentType: string; data: Buffer }>;
}

/** In-process stand-in for the CouchDB document that holds the workbook. */
export class InMemoryWorkbookDb implements WorkbookDb {
    private readonly docs = new Map<string, StoredDoc>();
    private readonly insertBehaviours: InsertBehaviour[] = [];
    private getFailure: unknown = null;
    private stallGet = false;
    insertCalls = 0;

    readonly attachment = {
        insert: async (
            docname: string,
            attname: string,
            att: Buffer,
            contenttype: string,
            params: { rev?: string } = {},
        ): Promise<{ id: string; rev: string }> => {
            this.insertCalls++;
            const behaviour = this.insertBehaviours.shift();
            if (behaviour && 'fail' in behaviour) throw behaviour.fail;
            if (behaviour?.stall === 'before-write') return never();

            const existing = this.docs.get(docname);
            const currentRev = existing ? revString(existing.rev) : undefined;
            if (params.rev !== currentRev) throw new FakeCouchError(409);

            const doc = existing ?? { rev: 0, attachments: new Map() };
            doc.rev++;
            doc.attachments.set(attname, { contentType: contenttype, data: Buffer.from(att) });
            this.docs.set(docname, doc);
            if (behaviour?.stall === 'after-write') return never();
            return { id: docname, rev: revString(doc.rev) };
        },
    };

    async get(docname: string, params: { attachments: boolean }): Promise<WorkbookDocument> {
        if (this.stallGet) {
            this.stallGet = false;
            return never();
        }
        if (this.getFailure !== null) {
            const failure = this.getFailure;
            this.getFailure = null;
            throw failure;
        }

        const doc = this.docs.get(docname);
        if (!doc) throw new FakeCouchError(404);

        const _attachments: Record<string, WorkbookAttachment> = {};
        for (const [name, att] of doc.attachments) {
            _attachments[name] = params.attachments
                ? { content_type: att.contentType, data: att.data.toString('base64') }
                : { content_type: att.contentType, stub: true };
        }
        return { _id: docname, _rev: revString(doc.rev), _attachments };
    }

    failNextInsert(error: unknown): void {
        this.insertBehaviours.push({ fail: error });
    }

    stallNextInsert(stall: InsertStall): void {
        this.insertBehaviours.push({ stall });
    }

    stallNextGet(): void {
        this.stallGet = true;
    }

    failNextGet(error: unknown): void {
        this.getFailure = error;
    }

    revisionOf(docname: string): string | null {
        const doc = this.docs.get(docname);
        return doc ? revString(doc.rev) : null;
    }
}

function never(): Promise<never> {
    return new Promise<never>(() => undefined);
}

function revString(rev: number): string {
    return `${rev}-fake`;
}
