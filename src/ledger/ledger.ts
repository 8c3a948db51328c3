import { Movement, MovementLedger } from './ledger.types';

export function emptyLedger(revision: string | null = null): MovementLedger {
    return { movements: [], revision };
}

// Never mutates the input; insertion order is kept for display.
export function appendMovement(ledger: MovementLedger, movement: Movement): MovementLedger {
    return { movements: [...ledger.movements, movement], revision: ledger.revision };
}
