export interface StockLevel {
    productCode: string;
    productName: string;
    unit: string;
    netQuantity: number;
}

export interface StockView {
    items: StockLevel[];
    malformedRows: number;
}

export interface ProductAvailability {
    productCode: string;
    productName: string;
    available: number;
}
