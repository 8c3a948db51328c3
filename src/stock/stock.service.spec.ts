import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LedgerService } from '../ledger/ledger.service';
import { ProductsService } from '../products/products.service';
import { ExportService } from '../exports/export.service';
import { TableStoreService } from '../table-store/table-store.service';
import { TableName } from '../table-store/table-store.types';
import { InMemoryWorkbookDb } from '../table-store/__fixtures__/in-memory-workbook-db';
import { StockService } from './stock.service';

describe('StockService', () => {
  let stockService: StockService;

  beforeEach(async () => {
    const tableStore = new TableStoreService(
      new InMemoryWorkbookDb(),
      new ConfigService({ WORKBOOK_DOC_ID: 'depot-workbook', STORE_TIMEOUT_MS: '0' }),
    );
    const productsService = new ProductsService(tableStore);
    stockService = new StockService(new LedgerService(tableStore), productsService, new ExportService());

    await tableStore.replaceTable(TableName.PRODUCTS, [
      { urun_kodu: 'P1', urun_adi: 'Vida' },
      { urun_kodu: 'P2', urun_adi: 'Somun' },
      { urun_kodu: 'P3', urun_adi: 'Pul' },
    ]);
    await tableStore.replaceTable(TableName.MOVEMENTS, [
      { tarih: '2024-03-01', kayit_zamani: '2024-03-01 10:00', islem_turu: 'Giriş', urun_kodu: 'P1', urun_adi: 'Vida', miktar: 10, birim: 'adet', aciklama: '' },
      { tarih: '2024-03-02', kayit_zamani: '2024-03-02 11:00', islem_turu: 'Çıkış', urun_kodu: 'P1', urun_adi: 'Vida', miktar: 3, birim: 'adet', aciklama: '' },
      { tarih: '2024-03-02', kayit_zamani: '2024-03-02 12:00', islem_turu: 'Giriş', urun_kodu: 'P2', urun_adi: 'Somun', miktar: 2.5, birim: 'kg', aciklama: '' },
      { tarih: '2024-03-03', kayit_zamani: '2024-03-03 09:00', islem_turu: 'Transfer', urun_kodu: 'P2', urun_adi: 'Somun', miktar: 1, birim: 'kg', aciklama: '' },
    ]);
  });

  describe('getAll', () => {
    it('should list only products that moved', async () => {
      const view = await stockService.getAll();

      expect(view).toEqual({
        items: [
          { productCode: 'P1', productName: 'Vida', unit: 'adet', netQuantity: 7 },
          { productCode: 'P2', productName: 'Somun', unit: 'kg', netQuantity: 2.5 },
        ],
        malformedRows: 1,
      });
    });

    it('should add untouched catalog products at zero when asked', async () => {
      const view = await stockService.getAll(true);

      expect(view.items.map((i) => [i.productCode, i.netQuantity])).toEqual([
        ['P1', 7],
        ['P2', 2.5],
        ['P3', 0],
      ]);
      expect(view.items[2]).toEqual({ productCode: 'P3', productName: 'Pul', unit: '', netQuantity: 0 });
    });
  });

  describe('getForProduct', () => {
    it('should return the available quantity of a catalog product', async () => {
      await expect(stockService.getForProduct('P1')).resolves.toEqual({
        productCode: 'P1',
        productName: 'Vida',
        available: 7,
      });
    });

    it('should return zero for a product that never moved', async () => {
      await expect(stockService.getForProduct('P3')).resolves.toMatchObject({ available: 0 });
    });

    it('should throw NotFoundException for an unknown code', async () => {
      await expect(stockService.getForProduct('P9')).rejects.toThrow(NotFoundException);
    });
  });

  describe('export', () => {
    it('should render stock rows as csv with the wire headers', async () => {
      const file = await stockService.export('csv', true);

      expect(file.filename).toBe('stok.csv');
      expect(file.buffer.toString('utf8')).toBe(
        'urun_kodu,urun_adi,birim,net_miktar\nP1,Vida,adet,7\nP2,Somun,kg,2.5\nP3,Pul,,0',
      );
    });

    it('should name the xlsx download after the stock sheet', async () => {
      const file = await stockService.export('xlsx');

      expect(file.filename).toBe('stok.xlsx');
      expect(file.contentType).toBe('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
    });
  });
});
