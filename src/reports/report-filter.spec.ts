import { Movement, MovementKind } from '../ledger/ledger.types';
import { filterMovements, sortForDisplay, summarize } from './report-filter';

const movement = (
  productCode: string,
  kind: MovementKind,
  quantity: number,
  effectiveDate: string,
  recordedAt: string,
): Movement => ({
  productCode,
  productName: `Product ${productCode}`,
  kind,
  quantity,
  unit: 'adet',
  note: '',
  effectiveDate,
  recordedAt,
});

describe('report filter', () => {
  const ledger = [
    movement('P1', MovementKind.IN, 10, '2024-03-01', '2024-03-01 08:00'),
    // recorded a day late for the 2nd
    movement('P1', MovementKind.OUT, 4, '2024-03-02', '2024-03-03 09:15'),
    movement('P2', MovementKind.IN, 6, '2024-03-02', '2024-03-02 12:00'),
    movement('P2', MovementKind.OUT, 1.5, '2024-03-04', '2024-03-04 16:45'),
  ];

  it('should return nothing and zero totals for an empty ledger', () => {
    const filtered = filterMovements([], { startDate: '2024-01-01', endDate: '2024-12-31' });

    expect(filtered).toEqual([]);
    expect(summarize(filtered)).toEqual({ totalIn: 0, totalOut: 0, net: 0 });
  });

  it('should include both bounds and keep ledger order', () => {
    const filtered = filterMovements(ledger, { startDate: '2024-03-02', endDate: '2024-03-04' });

    expect(filtered).toEqual([ledger[1], ledger[2], ledger[3]]);
  });

  it('should select a single day by effective date, not by recording time', () => {
    const filtered = filterMovements(ledger, { startDate: '2024-03-02', endDate: '2024-03-02' });

    expect(filtered).toEqual([ledger[1], ledger[2]]);
    expect(filterMovements(ledger, { startDate: '2024-03-03', endDate: '2024-03-03' })).toEqual([]);
  });

  it('should restrict to one product when a code is given', () => {
    const filtered = filterMovements(ledger, { startDate: '2024-03-01', endDate: '2024-03-31', productCode: 'P2' });

    expect(filtered).toEqual([ledger[2], ledger[3]]);
  });

  it('should total inbound and outbound quantities', () => {
    expect(summarize(ledger)).toEqual({ totalIn: 16, totalOut: 5.5, net: 10.5 });
  });

  it('should sort newest first for display without touching the input', () => {
    const sorted = sortForDisplay(ledger);

    expect(sorted).toEqual([ledger[3], ledger[1], ledger[2], ledger[0]]);
    expect(ledger[0].effectiveDate).toBe('2024-03-01');
  });
});
