export interface Issuer {
  name: string;
  cnpj: string;
  address?: string | undefined;
}

export interface Consumer {
  cpf?: string | undefined;
  name?: string | undefined;
}

export interface LineItem {
  sequence: number;
  description: string;
  code?: string | undefined;
  quantity: number;
  unit: string | null;
  unitPrice: number;
  totalPrice: number;
}

export interface Payment {
  method: string;
  amount: number;
}

export interface FiscalDocument {
  readonly accessKey: string;
  readonly issuer: Issuer;
  readonly number?: string | undefined;
  readonly series?: string | undefined;
  readonly issuedAtText?: string | undefined;
  readonly issuedAt?: string | undefined;
  readonly consumer?: Consumer | undefined;
  readonly totalValue: number;
  readonly paidValue: number;
  readonly taxes?: number | undefined;
  readonly declaredItemCount?: number | undefined;
  readonly items: readonly LineItem[];
  readonly payments: readonly Payment[];
}

export interface StoredLineItem extends LineItem {
  accessKey: string;
  categorySuggested: string | null;
  categoryConfirmed: string | null;
  classificationSource: string | null;
  confidence: number | null;
  productId: string | null;
  issuerName?: string | undefined;
  issuedAt?: string | undefined;
}

export interface ReceiptSummary {
  accessKey: string;
  issuerName: string;
  issuedAt?: string | undefined;
  totalValue: number;
  itemCount: number;
  pendingItems: number;
}
