import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  InventoryTransaction,
  InventoryTransactionRow,
  LedgerEntryDraft,
  TransactionFilter,
  TransactionKind,
} from '../types/inventory.types';
import { AdjustmentResult, LedgerStore } from '../types/store.types';
import { PaginatedResult } from '../types/api.types';
import { ProductRepository } from './product.repository';
import { parseShortfalls } from './invoice.repository';
import { chunk, fetchAllPages } from './paging';
import { toNumber } from '../utils/quantity';
import { componentLogger } from '../config/logger';

const log = componentLogger('LedgerRepository');

const kindSchema = z.nativeEnum(TransactionKind);

// Result of apply_stock_adjustment()
const adjustmentResultSchema = z.discriminatedUnion('outcome', [
  z.object({ outcome: z.literal('committed'), transaction_id: z.string().uuid() }),
  z.object({ outcome: z.literal('not_found') }),
  z.object({ outcome: z.literal('stock_guard'), shortfalls: z.unknown() }),
]);

/**
 * Ledger Repository
 *
 * Reads the append-only inventory_transactions table. Entries are only ever
 * inserted by the ledger functions, together with the stock change they
 * describe.
 */
export class LedgerRepository implements LedgerStore {
  constructor(
    private client: SupabaseClient,
    private products: ProductRepository
  ) {}

  /**
   * Ledger of one invoice, oldest first
   */
  async listByInvoice(invoiceId: string): Promise<InventoryTransaction[]> {
    const { rows, error } = await fetchAllPages<InventoryTransactionRow>((from, to) =>
      this.client
        .from('inventory_transactions')
        .select('*')
        .eq('invoice_id', invoiceId)
        .order('seq', { ascending: true })
        .range(from, to)
    );

    if (error) {
      log.error('Failed to list invoice transactions', { invoiceId, error: error.message });
      throw new Error(`Failed to list invoice transactions: ${error.message}`);
    }

    return rows.map((row) => this.mapToTransaction(row));
  }

  /**
   * Every entry of the given products in ledger order. Ids go out in chunks
   * and each chunk is read page by page; the ledger is append-only, so
   * `seq` ranges stay stable while new entries land behind them.
   */
  async listByProducts(productIds: readonly string[]): Promise<InventoryTransaction[]> {
    const transactions: InventoryTransaction[] = [];

    for (const ids of chunk(productIds)) {
      const { rows, error } = await fetchAllPages<InventoryTransactionRow>((from, to) =>
        this.client
          .from('inventory_transactions')
          .select('*')
          .in('product_id', ids)
          .order('seq', { ascending: true })
          .range(from, to)
      );

      if (error) {
        log.error('Failed to list product transactions', { count: productIds.length, error: error.message });
        throw new Error(`Failed to list product transactions: ${error.message}`);
      }

      transactions.push(...rows.map((row) => this.mapToTransaction(row)));
    }

    return transactions.sort((a, b) => a.sequence - b.sequence);
  }

  /**
   * Page of ledger entries, newest first
   */
  async list(filter: TransactionFilter): Promise<PaginatedResult<InventoryTransaction>> {
    let request = this.client.from('inventory_transactions').select('*', { count: 'exact' });

    if (filter.productId) request = request.eq('product_id', filter.productId);
    if (filter.invoiceId) request = request.eq('invoice_id', filter.invoiceId);
    if (filter.kind) request = request.eq('kind', filter.kind);

    const { data, error, count } = await request
      .order('seq', { ascending: false })
      .range(filter.offset, filter.offset + filter.limit - 1);

    if (error) {
      log.error('Failed to list transactions', { error: error.message });
      throw new Error(`Failed to list transactions: ${error.message}`);
    }

    return {
      rows: (data ?? []).map((row: InventoryTransactionRow) => this.mapToTransaction(row)),
      total: count ?? 0,
    };
  }

  /**
   * Append a manual adjustment using the apply_stock_adjustment function,
   * which locks the product row and refuses to go below zero
   */
  async applyAdjustment(entry: LedgerEntryDraft, actorId: string): Promise<AdjustmentResult> {
    log.debug('Applying stock adjustment', { productId: entry.productId, delta: entry.delta });

    const { data, error } = await this.client.rpc('apply_stock_adjustment', {
      p_product_id: entry.productId,
      p_delta: entry.delta,
      p_note: entry.note,
      p_actor_id: actorId,
    });

    if (error) {
      log.error('Failed to apply stock adjustment', {
        productId: entry.productId,
        error: error.message,
        code: error.code,
        details: error.details,
      });
      throw new Error(`Failed to apply stock adjustment: ${error.message}`);
    }

    const result = adjustmentResultSchema.parse(data);

    switch (result.outcome) {
      case 'not_found':
        return { outcome: 'not_found' };

      case 'stock_guard':
        return { outcome: 'stock_guard', shortfalls: parseShortfalls(result.shortfalls) };

      case 'committed': {
        const [transaction, product] = await Promise.all([
          this.findTransaction(result.transaction_id),
          this.products.findById(entry.productId),
        ]);
        if (!product) {
          throw new Error('Stock adjusted but product not found');
        }
        return { outcome: 'committed', transaction, product };
      }
    }
  }

  private async findTransaction(id: string): Promise<InventoryTransaction> {
    const { data, error } = await this.client.from('inventory_transactions').select('*').eq('id', id).single();

    if (error) {
      log.error('Failed to find transaction', { id, error: error.message });
      throw new Error(`Failed to find transaction: ${error.message}`);
    }

    return this.mapToTransaction(data);
  }

  /**
   * Map database row to domain model
   */
  private mapToTransaction(row: InventoryTransactionRow): InventoryTransaction {
    return {
      id: row.id,
      sequence: toNumber(row.seq),
      productId: row.product_id,
      invoiceId: row.invoice_id,
      kind: kindSchema.parse(row.kind),
      delta: toNumber(row.delta),
      note: row.note,
      createdBy: row.created_by,
      createdAt: new Date(row.created_at),
    };
  }
}
