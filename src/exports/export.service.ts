import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { XLSX_CONTENT_TYPE } from '../table-store/table-store.service';
import { ExportFile, ExportFormat, ExportTable } from './exports.types';

const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

@Injectable()
export class ExportService {
    render(table: ExportTable, format: ExportFormat): ExportFile {
        const worksheet = XLSX.utils.json_to_sheet(table.rows, { header: [...table.columns] });
        worksheet['!cols'] = table.columns.map((column) => ({ wch: Math.max(12, column.length + 2) }));

        if (format === 'csv') {
            return {
                buffer: Buffer.from(XLSX.utils.sheet_to_csv(worksheet), 'utf8'),
                contentType: CSV_CONTENT_TYPE,
                filename: `${table.name}.csv`,
            };
        }

        const workbook = XLSX.utils.book_new();
        XLSX.utils.book_append_sheet(workbook, worksheet, table.sheetName);
        const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });

        return { buffer, contentType: XLSX_CONTENT_TYPE, filename: `${table.name}.xlsx` };
    }
}
