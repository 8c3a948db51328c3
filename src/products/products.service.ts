import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { TableStoreService } from '../table-store/table-store.service';
import { TableName } from '../table-store/table-store.types';
import { text } from '../ledger/ledger.rows';
import type { MalformedRow } from '../ledger/ledger.types';
import { Product, ProductList } from './products.types';

export interface CatalogLoad {
    products: Product[];
    issues: MalformedRow[];
}

@Injectable()
export class ProductsService {
    private readonly logger = new Logger(ProductsService.name);

    constructor(private readonly tableStore: TableStoreService) { }

    async loadCatalog(): Promise<CatalogLoad> {
        const snapshot = await this.tableStore.loadTable(TableName.PRODUCTS);

        const seen = new Set<string>();
        const products: Product[] = [];
        const issues: MalformedRow[] = [];

        snapshot.rows.forEach((row, index) => {
            const rowNumber = index + 2;
            const code = text(row.urun_kodu);
            if (!code) {
                issues.push({ table: TableName.PRODUCTS, row: rowNumber, field: 'urun_kodu', value: null, action: 'skipped', reason: 'missing product code' });
                return;
            }
            // first occurrence of a code wins
            if (seen.has(code)) {
                issues.push({ table: TableName.PRODUCTS, row: rowNumber, field: 'urun_kodu', value: code, action: 'skipped', reason: 'duplicate product code' });
                return;
            }
            seen.add(code);
            products.push({ code, name: text(row.urun_adi) });
        });

        if (issues.length > 0) {
            this.logger.warn(`Product catalog loaded with ${issues.length} skipped row(s)`);
        }

        return { products, issues };
    }

    async list(): Promise<ProductList> {
        const { products, issues } = await this.loadCatalog();
        return { items: products, malformedRows: issues.length };
    }

    async findAll(): Promise<Product[]> {
        const { products } = await this.loadCatalog();
        return products;
    }

    async findByCode(code: string): Promise<Product> {
        const product = (await this.findAll()).find((p) => p.code === code);
        if (!product) {
            throw new NotFoundException({ key: 'product.not_found', vars: { code } });
        }
        return product;
    }
}
