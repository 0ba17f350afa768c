/**
 * Invoice domain types
 */
import type { CustomerRow, CustomerWithAccounts, UserRole, UserRow, UserSummary } from './party.types';
import type { ProductSummary } from './inventory.types';

export enum InvoiceStatus {
  WAREHOUSE_PENDING = 'warehouse_pending',
  ACCOUNTANT_PENDING = 'accountant_pending',
  APPROVED = 'approved',
  SHIPPED = 'shipped',
  DELIVERED = 'delivered',
  CANCELLED = 'cancelled',
}

export const ALL_INVOICE_STATUSES: readonly InvoiceStatus[] = Object.values(InvoiceStatus);

export enum PaymentType {
  CASH = 'cash',
  CHECK = 'check',
  MIXED = 'mixed',
}

// Named operations that move an invoice between statuses
export type InvoiceAction = 'reserve' | 'approve' | 'ship' | 'deliver' | 'cancel';

export type PaymentBreakdown = Partial<Record<PaymentType.CASH | PaymentType.CHECK, number>>;

export interface TrackingInfo {
  carrierName: string;
  trackingCode: string;
  shippingDate: string;
  numberOfPackages: number;
}

// A roll as measured in the warehouse, one measurement per piece
export interface DetailedRoll {
  pieces: { measurement: number }[];
}

// How a line's quantity was counted, kept next to the derived quantity
export interface RollCount {
  rollsCount: number | null;
  piecesPerRoll: number | null;
  detailedRolls: DetailedRoll[] | null;
}

export interface InvoiceLineItem extends Readonly<RollCount> {
  readonly id: string;
  readonly productId: string;
  readonly quantity: number;
  readonly unit: string;
  readonly unitPrice: number;
  readonly lineTotal: number;
}

export interface Invoice {
  id: string;
  invoiceNumber: string;
  customerId: string;
  createdBy: string;
  status: InvoiceStatus;
  paymentType: PaymentType;
  paymentBreakdown: PaymentBreakdown | null;
  subtotal: number;
  total: number;
  items: readonly InvoiceLineItem[];
  tracking: TrackingInfo | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ResolvedLineItem extends InvoiceLineItem {
  product: ProductSummary;
}

/**
 * Invoice with every reference resolved: what reads and transitions return.
 */
export interface InvoiceDetails extends Omit<Invoice, 'items'> {
  items: ResolvedLineItem[];
  customer: CustomerWithAccounts;
  creator: UserSummary;
}

// Database row types (snake_case from PostgreSQL)
export interface InvoiceItemRow {
  id: string;
  invoice_id: string;
  product_id: string;
  position: number;
  quantity: number | string;
  unit: string;
  unit_price: number | string;
  rolls_count: number | string | null;
  pieces_per_roll: number | string | null;
  detailed_rolls: unknown;
}

export interface InvoiceRow {
  id: string;
  items?: InvoiceItemRow[];
  invoice_number: string;
  customer_id: string;
  created_by: string;
  status: string;
  payment_type: string;
  payment_breakdown: Record<string, unknown> | null;
  subtotal: number | string;
  total: number | string;
  tracking_info: Record<string, unknown> | null;
  created_at: string;
  updated_at: string;
}

// Invoice row with its embedded relations, as selected for InvoiceDetails
export interface InvoiceDetailsRow extends InvoiceRow {
  items: (InvoiceItemRow & { product: ProductSummary })[];
  customer: CustomerRow;
  creator: UserRow;
}

/**
 * Create invoice line. The quantity is either given directly or counted in
 * rolls: detailed rolls win over `rollsCount` x `piecesPerRoll`, which wins
 * over `quantity`.
 */
export interface CreateInvoiceLineInput {
  productId: string;
  quantity?: number;
  rollsCount?: number;
  piecesPerRoll?: number;
  detailedRolls?: DetailedRoll[];
  unit: string;
  unitPrice: number;
}

// Line with its quantity resolved and rounded, as stored
export interface NewInvoiceLine extends RollCount {
  productId: string;
  quantity: number;
  unit: string;
  unitPrice: number;
}

export interface CreateInvoiceInput {
  customerId: string;
  paymentType: PaymentType;
  paymentBreakdown?: PaymentBreakdown;
  items: CreateInvoiceLineInput[];
}

// Fully computed invoice handed to the store for insertion
export interface NewInvoice {
  customerId: string;
  createdBy: string;
  paymentType: PaymentType;
  paymentBreakdown: PaymentBreakdown | null;
  subtotal: number;
  total: number;
  items: NewInvoiceLine[];
}

export interface InvoiceFilter {
  status?: InvoiceStatus;
  customerId?: string;
  paymentType?: PaymentType;
  createdBy?: string;
  startDate?: Date;
  endDate?: Date;
  limit: number;
  offset: number;
}

// Filter after the role restriction has been folded in
export interface InvoiceListQuery extends Omit<InvoiceFilter, 'status'> {
  statuses: InvoiceStatus[];
}

export interface Actor {
  userId: string;
  role: UserRole;
}
