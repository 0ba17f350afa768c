/**
 * Product stock and inventory ledger types
 */

export enum TransactionKind {
  RESERVE = 'reserve',
  RELEASE = 'release',
  SHIP_MARK = 'ship-mark',
  ADJUST = 'adjust',
}

export interface ProductSummary {
  id: string;
  code: string;
  name: string;
  unit: string;
}

export interface Product extends ProductSummary {
  quantityAvailable: number;
  baselineQuantity: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProductStock extends Product {
  // Net quantity held by unreleased reservations across all invoices
  allocatedQuantity: number;
}

export interface InventoryTransaction {
  id: string;
  sequence: number;
  productId: string;
  invoiceId: string | null;
  kind: TransactionKind;
  delta: number;
  note: string | null;
  createdBy: string;
  createdAt: Date;
}

/**
 * Ledger entry not yet written: produced by the coordinator and
 * compensation engine, committed by the store.
 */
export interface LedgerEntryDraft {
  productId: string;
  invoiceId: string | null;
  kind: TransactionKind;
  delta: number;
  note: string | null;
}

// Database row types (snake_case from PostgreSQL)
export interface ProductRow {
  id: string;
  code: string;
  name: string;
  unit: string;
  quantity_available: number | string;
  baseline_quantity: number | string;
  created_at: string;
  updated_at: string;
}

export interface InventoryTransactionRow {
  id: string;
  seq: number | string;
  product_id: string;
  invoice_id: string | null;
  kind: string;
  delta: number | string;
  note: string | null;
  created_by: string;
  created_at: string;
}

export interface TransactionFilter {
  productId?: string;
  invoiceId?: string;
  kind?: TransactionKind;
  limit: number;
  offset: number;
}

export interface StockAdjustmentInput {
  productId: string;
  delta: number;
  note?: string;
}

export interface ProductReconciliation {
  productId: string;
  baselineQuantity: number;
  ledgerNet: number;
  expected: number;
  actual: number;
}

export interface ReconcileResult {
  checkedCount: number;
  inconsistent: ProductReconciliation[];
}
