import { Injectable } from '@nestjs/common';
import { LedgerService } from '../ledger/ledger.service';
import { ProductsService } from '../products/products.service';
import { ExportService } from '../exports/export.service';
import { ExportFile, ExportFormat } from '../exports/exports.types';
import { availableFor, netStock } from './stock-aggregator';
import { ProductAvailability, StockLevel, StockView } from './stock.types';

export const STOCK_COLUMNS = ['urun_kodu', 'urun_adi', 'birim', 'net_miktar'] as const;

@Injectable()
export class StockService {
    constructor(
        private readonly ledgerService: LedgerService,
        private readonly productsService: ProductsService,
        private readonly exportService: ExportService,
    ) { }

    /**
     * Net stock from the ledger. With `includeEmpty`, catalog products that never
     * moved are added with a zero quantity.
     */
    async getAll(includeEmpty = false): Promise<StockView> {
        const { ledger, issues } = await this.ledgerService.load();
        const items = netStock(ledger.movements);

        if (includeEmpty) {
            const moved = new Set(items.map((level) => level.productCode));
            const products = await this.productsService.findAll();
            for (const product of products) {
                if (moved.has(product.code)) continue;
                items.push({ productCode: product.code, productName: product.name, unit: '', netQuantity: 0 });
            }
        }

        return { items, malformedRows: issues.length };
    }

    async getForProduct(productCode: string): Promise<ProductAvailability> {
        const [product, { ledger }] = await Promise.all([
            this.productsService.findByCode(productCode),
            this.ledgerService.load(),
        ]);
        return {
            productCode: product.code,
            productName: product.name,
            available: availableFor(ledger.movements, product.code),
        };
    }

    async export(format: ExportFormat, includeEmpty = false): Promise<ExportFile> {
        const { items } = await this.getAll(includeEmpty);
        return this.exportService.render(
            {
                name: 'stok',
                sheetName: 'Stok',
                columns: STOCK_COLUMNS,
                rows: items.map(toStockRow),
            },
            format,
        );
    }
}

function toStockRow(level: StockLevel) {
    return {
        urun_kodu: level.productCode,
        urun_adi: level.productName,
        birim: level.unit,
        net_miktar: level.netQuantity,
    };
}
