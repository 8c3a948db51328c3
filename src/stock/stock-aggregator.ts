import { Movement, MovementKind } from '../ledger/ledger.types';
import { StockLevel } from './stock.types';

/** Rounds to 6 decimal places (inventory quantity precision). */
export function roundQuantity(value: number): number {
    return parseFloat(value.toFixed(6));
}

export function signedQuantity(movement: Movement): number {
    const quantity = Number.isFinite(movement.quantity) ? movement.quantity : 0;
    return movement.kind === MovementKind.IN ? quantity : -quantity;
}

/**
 * Net on-hand quantity per (product code, product name, unit), in order of first
 * appearance. Products without movements are not listed.
 */
export function netStock(movements: readonly Movement[]): StockLevel[] {
    const levels = new Map<string, StockLevel>();

    for (const movement of movements) {
        const key = JSON.stringify([movement.productCode, movement.productName, movement.unit]);
        const level = levels.get(key) ?? {
            productCode: movement.productCode,
            productName: movement.productName,
            unit: movement.unit,
            netQuantity: 0,
        };
        level.netQuantity += signedQuantity(movement);
        levels.set(key, level);
    }

    return [...levels.values()].map((level) => ({ ...level, netQuantity: roundQuantity(level.netQuantity) }));
}

// Sums every name/unit variant of the code; this is what a withdrawal is checked against.
export function availableFor(movements: readonly Movement[], productCode: string): number {
    let total = 0;
    for (const movement of movements) {
        if (movement.productCode === productCode) total += signedQuantity(movement);
    }
    return roundQuantity(total);
}
