import { AdjustmentResult, LedgerStore, ProductStore } from '../types/store.types';
import { Actor } from '../types/invoice.types';
import {
  InventoryTransaction,
  Product,
  ProductStock,
  StockAdjustmentInput,
  TransactionFilter,
  TransactionKind,
} from '../types/inventory.types';
import { PaginatedResult } from '../types/api.types';
import {
  ConflictError,
  ErrorCode,
  InsufficientStockError,
  NotFoundError,
  ValidationError,
} from '../types/error.types';
import { assertAuthorized } from '../policies/authorization.policy';
import { unreleasedByProduct } from './compensation.service';
import { productLockKey } from './invoice.service';
import { KeyedLock, LockTimeoutError } from '../utils/keyed-lock';
import { roundQuantity } from '../utils/quantity';
import { assertNever } from '../utils/assert-never';
import { componentLogger } from '../config/logger';

const log = componentLogger('InventoryService');

export interface InventoryServiceOptions {
  lockTimeoutMs: number;
  maxAttempts: number;
}

export interface StockAdjustment {
  transaction: InventoryTransaction;
  product: Product;
}

/**
 * Inventory Service
 *
 * Stock lookups, the ledger listing and manual stock adjustments
 */
export class InventoryService {
  constructor(
    private productStore: ProductStore,
    private ledgerStore: LedgerStore,
    private locks: KeyedLock,
    private options: InventoryServiceOptions
  ) {}

  /**
   * Get product stock with the quantity still held by reservations
   *
   * Returns:
   * - quantityAvailable (free to reserve)
   * - baselineQuantity (stock before the first ledger entry)
   * - allocatedQuantity (reserved and not yet released, across invoices)
   */
  async getStock(productId: string): Promise<ProductStock> {
    log.debug('Getting product stock', { productId });

    const product = await this.productStore.findById(productId);

    if (!product) {
      throw new NotFoundError(ErrorCode.PRODUCT_NOT_FOUND, `Product with ID ${productId} not found`);
    }

    const transactions = await this.ledgerStore.listByProducts([productId]);
    const allocatedQuantity = unreleasedByProduct(transactions).get(productId) ?? 0;

    return { ...product, allocatedQuantity };
  }

  async listTransactions(filter: TransactionFilter): Promise<PaginatedResult<InventoryTransaction>> {
    log.debug('Listing ledger transactions', { ...filter });
    return this.ledgerStore.list(filter);
  }

  /**
   * Append an `adjust` entry and apply its delta under the product lock.
   * The store refuses a delta that would take stock below zero.
   */
  async adjustStock(input: StockAdjustmentInput, actor: Actor): Promise<StockAdjustment> {
    assertAuthorized(actor.role, 'adjust-stock');

    // Rounded first: a delta below the column precision would write zero
    const delta = roundQuantity(input.delta);
    if (delta === 0) {
      throw new ValidationError('Delta must not be zero', { field: 'delta' });
    }

    const entry = {
      productId: input.productId,
      invoiceId: null,
      kind: TransactionKind.ADJUST,
      delta,
      note: input.note ?? null,
    };

    log.info('Adjusting stock', { productId: input.productId, delta, actorId: actor.userId });

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      let result: AdjustmentResult;

      try {
        const release = await this.locks.acquire([productLockKey(input.productId)], this.options.lockTimeoutMs);
        try {
          result = await this.ledgerStore.applyAdjustment(entry, actor.userId);
        } finally {
          release();
        }
      } catch (error) {
        if (error instanceof LockTimeoutError) {
          log.warn('Lock contention, retrying stock adjustment', { productId: input.productId, attempt });
          continue;
        }
        throw error;
      }

      switch (result.outcome) {
        case 'committed':
          log.info('Stock adjusted', {
            productId: input.productId,
            delta,
            quantityAvailable: result.product.quantityAvailable,
          });
          return { transaction: result.transaction, product: result.product };

        case 'not_found':
          throw new NotFoundError(ErrorCode.PRODUCT_NOT_FOUND, `Product with ID ${input.productId} not found`);

        case 'stock_guard':
          throw new InsufficientStockError(result.shortfalls);

        default:
          return assertNever(result);
      }
    }

    throw new ConflictError(
      `Could not adjust stock of product ${input.productId}: contention persisted after ${this.options.maxAttempts} attempts`,
      { productId: input.productId, attempts: this.options.maxAttempts }
    );
  }
}
