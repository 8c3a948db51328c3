import * as XLSX from 'xlsx';
import { ExportService } from './export.service';
import { ExportTable } from './exports.types';

describe('ExportService', () => {
  const service = new ExportService();

  const table: ExportTable = {
    name: 'rapor',
    sheetName: 'Rapor',
    columns: ['urun_kodu', 'urun_adi', 'miktar'],
    rows: [
      { urun_kodu: 'P1', urun_adi: 'Vida', miktar: 10 },
      { urun_kodu: 'P2', urun_adi: 'Somun, büyük', miktar: 2.5 },
    ],
  };

  it('should render csv with a header row and quoted separators', () => {
    const file = service.render(table, 'csv');

    expect(file.filename).toBe('rapor.csv');
    expect(file.contentType).toBe('text/csv; charset=utf-8');
    expect(file.buffer.toString('utf8')).toBe(
      ['urun_kodu,urun_adi,miktar', 'P1,Vida,10', 'P2,"Somun, büyük",2.5'].join('\n'),
    );
  });

  it('should render an xlsx workbook with one named sheet', () => {
    const file = service.render(table, 'xlsx');

    const workbook = XLSX.read(file.buffer, { type: 'buffer' });

    expect(file.filename).toBe('rapor.xlsx');
    expect(workbook.SheetNames).toEqual(['Rapor']);
    expect(XLSX.utils.sheet_to_json(workbook.Sheets.Rapor)).toEqual(table.rows);
  });

  it('should write the header even when there are no rows', () => {
    const file = service.render({ ...table, rows: [] }, 'csv');

    expect(file.buffer.toString('utf8')).toBe('urun_kodu,urun_adi,miktar');
  });
});
