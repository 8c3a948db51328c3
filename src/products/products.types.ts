export interface Product {
    code: string;
    name: string;
}

export interface ProductList {
    items: Product[];
    malformedRows: number;
}
