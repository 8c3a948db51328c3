import { parseCellDate, parseCellTimestamp } from '../common/dates';
import { CellValue, TableName, TableRow } from '../table-store/table-store.types';
import { MalformedRow, Movement, MovementKind } from './ledger.types';

export const MOVEMENT_COLUMNS = [
    'tarih',
    'kayit_zamani',
    'islem_turu',
    'urun_kodu',
    'urun_adi',
    'miktar',
    'birim',
    'aciklama',
] as const;

// Literals used in the spreadsheet for the kind column
export const KIND_LABELS: Record<MovementKind, string> = {
    [MovementKind.IN]: 'Giriş',
    [MovementKind.OUT]: 'Çıkış',
};

const KIND_BY_LABEL = new Map<string, MovementKind>(
    Object.values(MovementKind).map((kind) => [KIND_LABELS[kind].normalize('NFC'), kind]),
);

export interface DecodedMovementRow {
    movement: Movement | null;
    issues: MalformedRow[];
}

export function parseKind(value: CellValue): MovementKind | null {
    if (typeof value !== 'string') return null;
    return KIND_BY_LABEL.get(value.trim().normalize('NFC')) ?? null;
}

export function movementToRow(movement: Movement): TableRow {
    return {
        tarih: movement.effectiveDate,
        kayit_zamani: movement.recordedAt,
        islem_turu: KIND_LABELS[movement.kind],
        urun_kodu: movement.productCode,
        urun_adi: movement.productName,
        miktar: movement.quantity,
        birim: movement.unit,
        aciklama: movement.note,
    };
}

/**
 * Decodes one `hareketler` row. Rows with an unknown kind, no product code or an
 * unreadable date are skipped; an unreadable quantity becomes 0. Every such
 * decision is returned as a MalformedRow.
 */
export function rowToMovement(row: TableRow, rowNumber: number): DecodedMovementRow {
    const issues: MalformedRow[] = [];
    const issue = (field: string, action: MalformedRow['action'], reason: string) =>
        issues.push({
            table: TableName.MOVEMENTS,
            row: rowNumber,
            field,
            value: describeCell(row[field]),
            action,
            reason,
        });

    const kind = parseKind(row.islem_turu ?? null);
    if (!kind) {
        issue('islem_turu', 'skipped', 'unknown movement kind');
        return { movement: null, issues };
    }

    const productCode = text(row.urun_kodu);
    if (!productCode) {
        issue('urun_kodu', 'skipped', 'missing product code');
        return { movement: null, issues };
    }

    const date = parseCellDate(row.tarih ?? null);
    if (!date) {
        issue('tarih', 'skipped', 'unreadable date');
        return { movement: null, issues };
    }

    let quantity = toQuantity(row.miktar ?? null);
    if (quantity === null) {
        issue('miktar', 'coerced', 'unreadable quantity, counted as 0');
        quantity = 0;
    } else if (quantity < 0) {
        issue('miktar', 'coerced', 'negative quantity, counted as 0');
        quantity = 0;
    }

    let recordedAt = date.timestamp ?? `${date.date} 00:00`;
    const rawRecordedAt = row.kayit_zamani ?? null;
    if (rawRecordedAt !== null && rawRecordedAt !== '') {
        const parsed = parseCellTimestamp(rawRecordedAt);
        if (parsed) {
            recordedAt = parsed;
        } else {
            issue('kayit_zamani', 'coerced', `unreadable timestamp, using ${recordedAt}`);
        }
    }

    return {
        movement: {
            productCode,
            productName: text(row.urun_adi),
            kind,
            quantity,
            unit: text(row.birim),
            note: text(row.aciklama),
            effectiveDate: date.date,
            recordedAt,
        },
        issues,
    };
}

export function text(value: CellValue | undefined): string {
    if (value === null || value === undefined) return '';
    if (value instanceof Date) return value.toISOString();
    return String(value).trim();
}

function toQuantity(value: CellValue): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value !== 'string') return null;
    const raw = value.trim();
    // accept a decimal comma as well as a point
    if (!/^-?\d+(?:[.,]\d+)?$/.test(raw)) return null;
    return Number(raw.replace(',', '.'));
}

function describeCell(value: CellValue | undefined): string | null {
    if (value === null || value === undefined) return null;
    return text(value);
}
