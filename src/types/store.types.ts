/**
 * Persistence contracts the services depend on.
 *
 * The Supabase repositories implement them in production; every multi-row
 * write goes through a single call (`commit`, `create`, `applyAdjustment`)
 * so that it is applied atomically or not at all.
 */
import type { StockShortfall } from './error.types';
import type {
  Invoice,
  InvoiceDetails,
  InvoiceListQuery,
  InvoiceStatus,
  NewInvoice,
  TrackingInfo,
} from './invoice.types';
import type {
  InventoryTransaction,
  LedgerEntryDraft,
  Product,
  TransactionFilter,
} from './inventory.types';
import type { CustomerWithAccounts } from './party.types';
import type { PaginatedResult } from './api.types';

/**
 * Writes of one transition. The store applies them only if the invoice is
 * still in `expectedStatus`, and adds each entry's delta to its product's
 * `quantity_available` only if the result stays non-negative.
 */
export interface TransitionCommit {
  invoiceId: string;
  expectedStatus: InvoiceStatus;
  nextStatus: InvoiceStatus;
  actorId: string;
  tracking: TrackingInfo | null;
  entries: LedgerEntryDraft[];
}

export type CommitResult =
  | { outcome: 'committed' }
  | { outcome: 'not_found' }
  | { outcome: 'status_mismatch'; currentStatus: InvoiceStatus }
  | { outcome: 'stock_guard'; shortfalls: StockShortfall[] }
  | { outcome: 'release_guard'; productId: string; unreleased: number; requested: number };

export type AdjustmentResult =
  | { outcome: 'committed'; transaction: InventoryTransaction; product: Product }
  | { outcome: 'not_found' }
  | { outcome: 'stock_guard'; shortfalls: StockShortfall[] };

export interface InvoiceStore {
  findById(id: string): Promise<Invoice | null>;
  findStatus(id: string): Promise<InvoiceStatus | null>;
  findDetails(id: string): Promise<InvoiceDetails | null>;
  list(query: InvoiceListQuery): Promise<PaginatedResult<InvoiceDetails>>;
  create(invoice: NewInvoice): Promise<Invoice>;
  commit(unit: TransitionCommit): Promise<CommitResult>;
}

export interface ProductStore {
  findById(id: string): Promise<Product | null>;
  findByIds(ids: readonly string[]): Promise<Product[]>;
  listIds(): Promise<string[]>;
}

export interface LedgerStore {
  listByInvoice(invoiceId: string): Promise<InventoryTransaction[]>;
  listByProducts(productIds: readonly string[]): Promise<InventoryTransaction[]>;
  list(filter: TransactionFilter): Promise<PaginatedResult<InventoryTransaction>>;
  applyAdjustment(entry: LedgerEntryDraft, actorId: string): Promise<AdjustmentResult>;
}

export interface CustomerStore {
  findById(id: string): Promise<CustomerWithAccounts | null>;
}

export interface Stores {
  invoices: InvoiceStore;
  products: ProductStore;
  ledger: LedgerStore;
  customers: CustomerStore;
}
