import { formatMinute, isCalendarDate, todayIn } from '../common/dates';
import { appendMovement } from '../ledger/ledger';
import { Movement, MovementKind, MovementLedger } from '../ledger/ledger.types';
import type { Product } from '../products/products.types';
import { availableFor } from '../stock/stock-aggregator';

export type RecordingState =
    | 'validating'
    | 'checking_stock'
    | 'appending'
    | 'persisting'
    | 'rejected'
    | 'diverged'
    | 'committed';

export type RecorderError =
    | { kind: 'UnknownProduct'; productCode: string }
    | { kind: 'InvalidQuantity'; quantity: number }
    | { kind: 'InvalidDate'; effectiveDate: string }
    | { kind: 'InsufficientStock'; productCode: string; available: number; requested: number };

export interface RecordMovementInput {
    productCode: string;
    kind: MovementKind;
    quantity: number;
    unit?: string;
    note?: string;
    /** Defaults to today in the configured time zone. */
    effectiveDate?: string;
}

export type RecordAttempt =
    | { ok: false; error: RecorderError }
    | { ok: true; movement: Movement; ledger: MovementLedger };

/**
 * Validates a movement against the catalog and the current ledger and, when it is
 * acceptable, returns the ledger with the stamped movement appended. Persisting
 * the result is the caller's job. A rejected attempt leaves nothing changed.
 */
export function recordMovement(
    ledger: MovementLedger,
    catalog: readonly Product[],
    input: RecordMovementInput,
    now: Date,
    timeZone: string,
    onTransition: (state: RecordingState) => void = () => undefined,
): RecordAttempt {
    const reject = (error: RecorderError): RecordAttempt => {
        onTransition('rejected');
        return { ok: false, error };
    };

    onTransition('validating');
    const product = catalog.find((p) => p.code === input.productCode);
    if (!product) {
        return reject({ kind: 'UnknownProduct', productCode: input.productCode });
    }
    // zero is accepted
    if (!Number.isFinite(input.quantity) || input.quantity < 0) {
        return reject({ kind: 'InvalidQuantity', quantity: input.quantity });
    }
    if (input.effectiveDate !== undefined && !isCalendarDate(input.effectiveDate)) {
        return reject({ kind: 'InvalidDate', effectiveDate: input.effectiveDate });
    }

    if (input.kind === MovementKind.OUT) {
        onTransition('checking_stock');
        const available = availableFor(ledger.movements, product.code);
        if (input.quantity > available) {
            return reject({ kind: 'InsufficientStock', productCode: product.code, available, requested: input.quantity });
        }
    }

    onTransition('appending');
    const movement: Movement = {
        productCode: product.code,
        productName: product.name,
        kind: input.kind,
        quantity: input.quantity,
        unit: input.unit?.trim() ?? '',
        note: input.note?.trim() ?? '',
        effectiveDate: input.effectiveDate ?? todayIn(now, timeZone),
        recordedAt: formatMinute(now, timeZone),
    };

    return { ok: true, movement, ledger: appendMovement(ledger, movement) };
}
