export interface Product {
  id: string;
  baseName: string;
  baseBrand: string | null;
  category: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProductAlias {
  aliasText: string;
  productId: string;
  updatedAt: Date;
}
