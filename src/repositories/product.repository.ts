import { SupabaseClient } from '@supabase/supabase-js';
import { Product, ProductRow } from '../types/inventory.types';
import { ProductStore } from '../types/store.types';
import { toNumber } from '../utils/quantity';
import { chunk, fetchAllPages } from './paging';
import { componentLogger } from '../config/logger';

const log = componentLogger('ProductRepository');

/**
 * Product Repository
 *
 * Reads the products table. Stock is never written here: only the ledger
 * functions change `quantity_available`.
 */
export class ProductRepository implements ProductStore {
  constructor(private client: SupabaseClient) {}

  /**
   * Find product by ID
   */
  async findById(id: string): Promise<Product | null> {
    const { data, error } = await this.client.from('products').select('*').eq('id', id).single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      log.error('Failed to find product', { id, error: error.message });
      throw new Error(`Failed to find product: ${error.message}`);
    }

    return data ? this.mapToProduct(data) : null;
  }

  /**
   * Find every product in `ids`; absent ids are simply missing from the result
   */
  async findByIds(ids: readonly string[]): Promise<Product[]> {
    const products: Product[] = [];

    // A chunk never holds more rows than the page size, no paging needed
    for (const part of chunk(ids)) {
      const { data, error } = await this.client.from('products').select('*').in('id', part);

      if (error) {
        log.error('Failed to find products', { count: ids.length, error: error.message });
        throw new Error(`Failed to find products: ${error.message}`);
      }

      products.push(...(data ?? []).map((row: ProductRow) => this.mapToProduct(row)));
    }

    return products.sort((a, b) => a.id.localeCompare(b.id));
  }

  async listIds(): Promise<string[]> {
    const { rows, error } = await fetchAllPages<Pick<ProductRow, 'id'>>((from, to) =>
      this.client.from('products').select('id').order('id', { ascending: true }).range(from, to)
    );

    if (error) {
      log.error('Failed to list product ids', { error: error.message });
      throw new Error(`Failed to list product ids: ${error.message}`);
    }

    return rows.map((row) => row.id);
  }

  /**
   * Map database row to domain model
   */
  private mapToProduct(row: ProductRow): Product {
    return {
      id: row.id,
      code: row.code,
      name: row.name,
      unit: row.unit,
      quantityAvailable: toNumber(row.quantity_available),
      baselineQuantity: toNumber(row.baseline_quantity),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
