import { Movement, MovementKind } from '../ledger/ledger.types';
import { roundQuantity } from '../stock/stock-aggregator';

export interface MovementFilter {
    startDate: string; // inclusive, YYYY-MM-DD
    endDate: string; // inclusive, YYYY-MM-DD
    productCode?: string;
}

export interface MovementTotals {
    totalIn: number;
    totalOut: number;
    net: number;
}

// Dates are YYYY-MM-DD, so string comparison is calendar order.
export function filterMovements(movements: readonly Movement[], filter: MovementFilter): Movement[] {
    return movements.filter(
        (m) =>
            m.effectiveDate >= filter.startDate &&
            m.effectiveDate <= filter.endDate &&
            (filter.productCode === undefined || m.productCode === filter.productCode),
    );
}

export function summarize(movements: readonly Movement[]): MovementTotals {
    let totalIn = 0;
    let totalOut = 0;
    for (const m of movements) {
        const quantity = Number.isFinite(m.quantity) ? m.quantity : 0;
        if (m.kind === MovementKind.IN) totalIn += quantity;
        else totalOut += quantity;
    }
    totalIn = roundQuantity(totalIn);
    totalOut = roundQuantity(totalOut);
    return { totalIn, totalOut, net: roundQuantity(totalIn - totalOut) };
}

/** Newest first by effective date, then by recording time. Presentation only. */
export function sortForDisplay(movements: readonly Movement[]): Movement[] {
    return [...movements].sort((a, b) => {
        if (a.effectiveDate !== b.effectiveDate) return a.effectiveDate < b.effectiveDate ? 1 : -1;
        if (a.recordedAt !== b.recordedAt) return a.recordedAt < b.recordedAt ? 1 : -1;
        return 0;
    });
}
