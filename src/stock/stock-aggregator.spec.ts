import { Movement, MovementKind } from '../ledger/ledger.types';
import { availableFor, netStock, roundQuantity } from './stock-aggregator';

const movement = (productCode: string, kind: MovementKind, quantity: number, overrides: Partial<Movement> = {}): Movement => ({
  productCode,
  productName: `Product ${productCode}`,
  kind,
  quantity,
  unit: 'adet',
  note: '',
  effectiveDate: '2024-03-05',
  recordedAt: '2024-03-05 10:00',
  ...overrides,
});

describe('stock aggregator', () => {
  it('should return no levels for an empty ledger', () => {
    expect(netStock([])).toEqual([]);
    expect(availableFor([], 'P1')).toBe(0);
  });

  it('should sum signed quantities per product', () => {
    const levels = netStock([
      movement('P1', MovementKind.IN, 10),
      movement('P1', MovementKind.OUT, 4),
      movement('P2', MovementKind.IN, 3),
    ]);

    expect(levels).toEqual([
      { productCode: 'P1', productName: 'Product P1', unit: 'adet', netQuantity: 6 },
      { productCode: 'P2', productName: 'Product P2', unit: 'adet', netQuantity: 3 },
    ]);
  });

  it('should not depend on the order of movements', () => {
    const movements = [
      movement('P1', MovementKind.IN, 10),
      movement('P2', MovementKind.IN, 7.25),
      movement('P1', MovementKind.OUT, 4),
      movement('P2', MovementKind.OUT, 0.25),
      movement('P1', MovementKind.IN, 1.5),
    ];
    const byCode = (levels: ReturnType<typeof netStock>) =>
      Object.fromEntries(levels.map((l) => [l.productCode, l.netQuantity]));

    const forward = byCode(netStock(movements));
    const backward = byCode(netStock([...movements].reverse()));
    const shuffled = byCode(netStock([movements[3], movements[0], movements[4], movements[2], movements[1]]));

    expect(forward).toEqual({ P1: 7.5, P2: 7 });
    expect(backward).toEqual(forward);
    expect(shuffled).toEqual(forward);
  });

  it('should keep separate rows for a different name or unit of the same code', () => {
    const levels = netStock([
      movement('P1', MovementKind.IN, 10),
      movement('P1', MovementKind.IN, 2, { unit: 'kutu' }),
    ]);

    expect(levels.map((l) => [l.unit, l.netQuantity])).toEqual([
      ['adet', 10],
      ['kutu', 2],
    ]);
    expect(availableFor([movement('P1', MovementKind.IN, 10), movement('P1', MovementKind.IN, 2, { unit: 'kutu' })], 'P1')).toBe(12);
  });

  it('should treat a non-finite quantity as zero', () => {
    const levels = netStock([movement('P1', MovementKind.IN, 5), movement('P1', MovementKind.IN, Number.NaN)]);

    expect(levels[0].netQuantity).toBe(5);
  });

  it('should absorb floating point noise', () => {
    expect(availableFor([movement('P1', MovementKind.IN, 0.1), movement('P1', MovementKind.IN, 0.2)], 'P1')).toBe(0.3);
    expect(roundQuantity(1 / 3)).toBe(0.333333);
  });
});
