import { BadRequestException, Injectable } from '@nestjs/common';
import { LedgerService } from '../ledger/ledger.service';
import { MOVEMENT_COLUMNS, movementToRow } from '../ledger/ledger.rows';
import { ExportService } from '../exports/export.service';
import { ExportFile, ExportFormat } from '../exports/exports.types';
import { isCalendarDate } from '../common/dates';
import { MovementFilter, filterMovements, sortForDisplay, summarize } from './report-filter';
import { MovementReport } from './reports.types';

@Injectable()
export class ReportsService {
    constructor(
        private readonly ledgerService: LedgerService,
        private readonly exportService: ExportService,
    ) { }

    async movements(filter: MovementFilter): Promise<MovementReport> {
        assertRange(filter);

        const { ledger, issues } = await this.ledgerService.load();
        const filtered = filterMovements(ledger.movements, filter);

        return {
            items: sortForDisplay(filtered),
            totals: summarize(filtered),
            malformedRows: issues.length,
        };
    }

    async export(filter: MovementFilter, format: ExportFormat): Promise<ExportFile> {
        const { items } = await this.movements(filter);
        return this.exportService.render(
            {
                name: 'rapor',
                sheetName: 'Rapor',
                columns: MOVEMENT_COLUMNS,
                rows: items.map(movementToRow),
            },
            format,
        );
    }
}

function assertRange(filter: MovementFilter): void {
    const { startDate, endDate } = filter;
    if (!isCalendarDate(startDate) || !isCalendarDate(endDate) || startDate > endDate) {
        throw new BadRequestException({ key: 'report.invalid_range', vars: { startDate, endDate } });
    }
}
