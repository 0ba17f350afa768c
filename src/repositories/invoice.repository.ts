import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  Invoice,
  InvoiceDetails,
  InvoiceDetailsRow,
  InvoiceItemRow,
  InvoiceLineItem,
  InvoiceListQuery,
  InvoiceRow,
  InvoiceStatus,
  NewInvoice,
  PaymentBreakdown,
  PaymentType,
  TrackingInfo,
} from '../types/invoice.types';
import { UserRole, UserRow, UserSummary } from '../types/party.types';
import { CommitResult, InvoiceStore, TransitionCommit } from '../types/store.types';
import { PaginatedResult } from '../types/api.types';
import { StockShortfall } from '../types/error.types';
import { mapToCustomer, CUSTOMER_SELECT } from './customer.repository';
import { roundMoney, roundQuantity, toNumber } from '../utils/quantity';
import { componentLogger } from '../config/logger';

const log = componentLogger('InvoiceRepository');

const INVOICE_SELECT = '*, items:invoice_items(*)';

const INVOICE_DETAILS_SELECT = `
  *,
  items:invoice_items(*, product:products(id, code, name, unit)),
  customer:customers(${CUSTOMER_SELECT}),
  creator:users!invoices_created_by_fkey(id, email, first_name, last_name, role, is_active)
`;

const statusSchema = z.nativeEnum(InvoiceStatus);
const paymentTypeSchema = z.nativeEnum(PaymentType);
const roleSchema = z.nativeEnum(UserRole);

const paymentBreakdownSchema = z
  .object({
    cash: z.coerce.number().optional(),
    check: z.coerce.number().optional(),
  })
  .nullable();

// tracking_info is stored snake_case
const trackingInfoRowSchema = z
  .object({
    carrier_name: z.string(),
    tracking_code: z.string(),
    shipping_date: z.string(),
    number_of_packages: z.coerce.number().int(),
  })
  .nullable();

const detailedRollsSchema = z
  .array(z.object({ pieces: z.array(z.object({ measurement: z.coerce.number() })) }))
  .nullable();

const shortfallRowSchema = z.object({
  product_id: z.string(),
  requested: z.coerce.number(),
  available: z.coerce.number(),
  shortfall: z.coerce.number(),
});

// Result of apply_invoice_transition()
const commitResultSchema = z.discriminatedUnion('outcome', [
  z.object({ outcome: z.literal('committed') }),
  z.object({ outcome: z.literal('not_found') }),
  z.object({ outcome: z.literal('status_mismatch'), current_status: statusSchema }),
  z.object({ outcome: z.literal('stock_guard'), shortfalls: z.array(shortfallRowSchema) }),
  z.object({
    outcome: z.literal('release_guard'),
    product_id: z.string(),
    unreleased: z.coerce.number(),
    requested: z.coerce.number(),
  }),
]);

export function mapToShortfall(row: z.infer<typeof shortfallRowSchema>): StockShortfall {
  return {
    productId: row.product_id,
    requested: roundQuantity(row.requested),
    available: roundQuantity(row.available),
    shortfall: roundQuantity(row.shortfall),
  };
}

export const parseShortfalls = (value: unknown): StockShortfall[] =>
  z.array(shortfallRowSchema).parse(value).map(mapToShortfall);

/**
 * Invoice Repository
 *
 * Reads invoices with their relations and applies every invoice write through
 * a PostgreSQL function:
 *
 * - create_invoice: numbers the invoice and inserts it with its line items
 * - apply_invoice_transition: in one transaction
 *   1. locks the invoice row and re-checks the expected status
 *   2. locks the touched product rows with SELECT ... FOR UPDATE, ascending
 *   3. refuses entries that would take any product below zero
 *   4. refuses releases larger than what the invoice still holds
 *   5. appends the ledger entries, applies their deltas and writes the status
 *
 * Refusals come back as a typed outcome, never as a partial write.
 */
export class InvoiceRepository implements InvoiceStore {
  constructor(private client: SupabaseClient) {}

  async findById(id: string): Promise<Invoice | null> {
    const { data, error } = await this.client.from('invoices').select(INVOICE_SELECT).eq('id', id).single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      log.error('Failed to find invoice', { id, error: error.message });
      throw new Error(`Failed to find invoice: ${error.message}`);
    }

    return data ? this.mapToInvoice(data) : null;
  }

  async findStatus(id: string): Promise<InvoiceStatus | null> {
    const { data, error } = await this.client.from('invoices').select('status').eq('id', id).single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      log.error('Failed to read invoice status', { id, error: error.message });
      throw new Error(`Failed to read invoice status: ${error.message}`);
    }

    return data ? statusSchema.parse(data.status) : null;
  }

  async findDetails(id: string): Promise<InvoiceDetails | null> {
    const { data, error } = await this.client
      .from('invoices')
      .select(INVOICE_DETAILS_SELECT)
      .eq('id', id)
      .single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      log.error('Failed to find invoice details', { id, error: error.message });
      throw new Error(`Failed to find invoice details: ${error.message}`);
    }

    return data ? this.mapToDetails(data) : null;
  }

  /**
   * Page of invoices, newest first. `total` counts every row matching the
   * filter, so callers must fold the role restriction into `statuses`.
   */
  async list(query: InvoiceListQuery): Promise<PaginatedResult<InvoiceDetails>> {
    let request = this.client
      .from('invoices')
      .select(INVOICE_DETAILS_SELECT, { count: 'exact' })
      .in('status', query.statuses);

    if (query.customerId) request = request.eq('customer_id', query.customerId);
    if (query.paymentType) request = request.eq('payment_type', query.paymentType);
    if (query.createdBy) request = request.eq('created_by', query.createdBy);
    if (query.startDate) request = request.gte('created_at', query.startDate.toISOString());
    if (query.endDate) request = request.lte('created_at', query.endDate.toISOString());

    const { data, error, count } = await request
      .order('created_at', { ascending: false })
      .range(query.offset, query.offset + query.limit - 1);

    if (error) {
      log.error('Failed to list invoices', { error: error.message });
      throw new Error(`Failed to list invoices: ${error.message}`);
    }

    return {
      rows: (data ?? []).map((row: InvoiceDetailsRow) => this.mapToDetails(row)),
      total: count ?? 0,
    };
  }

  /**
   * Create an invoice with its line items using the create_invoice function
   */
  async create(invoice: NewInvoice): Promise<Invoice> {
    log.debug('Creating invoice', { customerId: invoice.customerId, itemCount: invoice.items.length });

    const { data: invoiceId, error } = await this.client.rpc('create_invoice', {
      p_customer_id: invoice.customerId,
      p_created_by: invoice.createdBy,
      p_payment_type: invoice.paymentType,
      p_payment_breakdown: invoice.paymentBreakdown,
      p_subtotal: invoice.subtotal,
      p_total: invoice.total,
      p_items: invoice.items.map((item) => ({
        product_id: item.productId,
        quantity: item.quantity,
        unit: item.unit,
        unit_price: item.unitPrice,
        rolls_count: item.rollsCount,
        pieces_per_roll: item.piecesPerRoll,
        detailed_rolls: item.detailedRolls,
      })),
    });

    if (error) {
      log.error('Failed to create invoice', {
        error: error.message,
        code: error.code,
        details: error.details,
        hint: error.hint,
      });
      throw new Error(`Failed to create invoice: ${error.message}`);
    }

    const created = await this.findById(z.string().uuid().parse(invoiceId));
    if (!created) {
      throw new Error('Invoice created but not found');
    }

    return created;
  }

  /**
   * Apply one transition atomically using the apply_invoice_transition function
   */
  async commit(unit: TransitionCommit): Promise<CommitResult> {
    log.debug('Committing invoice transition', {
      invoiceId: unit.invoiceId,
      from: unit.expectedStatus,
      to: unit.nextStatus,
      entryCount: unit.entries.length,
    });

    const { data, error } = await this.client.rpc('apply_invoice_transition', {
      p_invoice_id: unit.invoiceId,
      p_expected_status: unit.expectedStatus,
      p_next_status: unit.nextStatus,
      p_actor_id: unit.actorId,
      p_tracking: unit.tracking && {
        carrier_name: unit.tracking.carrierName,
        tracking_code: unit.tracking.trackingCode,
        shipping_date: unit.tracking.shippingDate,
        number_of_packages: unit.tracking.numberOfPackages,
      },
      p_entries: unit.entries.map((entry) => ({
        product_id: entry.productId,
        kind: entry.kind,
        delta: entry.delta,
        note: entry.note,
      })),
    });

    if (error) {
      log.error('Failed to commit invoice transition', {
        invoiceId: unit.invoiceId,
        error: error.message,
        code: error.code,
        details: error.details,
      });
      throw new Error(`Failed to commit invoice transition: ${error.message}`);
    }

    const result = commitResultSchema.parse(data);

    switch (result.outcome) {
      case 'status_mismatch':
        return { outcome: 'status_mismatch', currentStatus: result.current_status };
      case 'stock_guard':
        return { outcome: 'stock_guard', shortfalls: result.shortfalls.map(mapToShortfall) };
      case 'release_guard':
        return {
          outcome: 'release_guard',
          productId: result.product_id,
          unreleased: roundQuantity(result.unreleased),
          requested: roundQuantity(result.requested),
        };
      case 'not_found':
        return { outcome: 'not_found' };
      case 'committed':
        return { outcome: 'committed' };
    }
  }

  /**
   * Map database row to domain model
   */
  private mapToInvoice(row: InvoiceRow): Invoice {
    const items = [...(row.items ?? [])].sort((a, b) => a.position - b.position);

    return {
      id: row.id,
      invoiceNumber: row.invoice_number,
      customerId: row.customer_id,
      createdBy: row.created_by,
      status: statusSchema.parse(row.status),
      paymentType: paymentTypeSchema.parse(row.payment_type),
      paymentBreakdown: this.mapToBreakdown(row.payment_breakdown),
      subtotal: toNumber(row.subtotal),
      total: toNumber(row.total),
      items: items.map((item) => this.mapToLineItem(item)),
      tracking: this.mapToTracking(row.tracking_info),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }

  private mapToDetails(row: InvoiceDetailsRow): InvoiceDetails {
    const items = [...row.items].sort((a, b) => a.position - b.position);

    return {
      ...this.mapToInvoice({ ...row, items: [] }),
      items: items.map((item) => ({
        ...this.mapToLineItem(item),
        product: {
          id: item.product.id,
          code: item.product.code,
          name: item.product.name,
          unit: item.product.unit,
        },
      })),
      customer: mapToCustomer(row.customer),
      creator: this.mapToUser(row.creator),
    };
  }

  private mapToLineItem(row: InvoiceItemRow): InvoiceLineItem {
    const quantity = toNumber(row.quantity);
    const unitPrice = toNumber(row.unit_price);

    return {
      id: row.id,
      productId: row.product_id,
      quantity,
      unit: row.unit,
      unitPrice,
      lineTotal: roundMoney(quantity * unitPrice),
      rollsCount: row.rolls_count === null ? null : toNumber(row.rolls_count),
      piecesPerRoll: row.pieces_per_roll === null ? null : toNumber(row.pieces_per_roll),
      detailedRolls: detailedRollsSchema.parse(row.detailed_rolls ?? null),
    };
  }

  private mapToUser(row: UserRow): UserSummary {
    return {
      id: row.id,
      email: row.email,
      firstName: row.first_name,
      lastName: row.last_name,
      role: roleSchema.parse(row.role),
      isActive: row.is_active,
    };
  }

  private mapToBreakdown(value: unknown): PaymentBreakdown | null {
    const breakdown = paymentBreakdownSchema.parse(value ?? null);
    if (!breakdown) return null;

    return {
      ...(breakdown.cash !== undefined && { [PaymentType.CASH]: breakdown.cash }),
      ...(breakdown.check !== undefined && { [PaymentType.CHECK]: breakdown.check }),
    };
  }

  private mapToTracking(value: unknown): TrackingInfo | null {
    const tracking = trackingInfoRowSchema.parse(value ?? null);
    if (!tracking) return null;

    return {
      carrierName: tracking.carrier_name,
      trackingCode: tracking.tracking_code,
      shippingDate: tracking.shipping_date,
      numberOfPackages: tracking.number_of_packages,
    };
  }
}
