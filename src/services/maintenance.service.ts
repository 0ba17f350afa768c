import { LedgerStore, ProductStore } from '../types/store.types';
import { Actor } from '../types/invoice.types';
import { ProductReconciliation, ReconcileResult } from '../types/inventory.types';
import { assertAuthorized } from '../policies/authorization.policy';
import { roundQuantity, totalsBy } from '../utils/quantity';
import { logger } from '../config/logger';

/**
 * Maintenance Service
 *
 * Handles maintenance operations like ledger reconciliation
 */
export class MaintenanceService {
  constructor(
    private productStore: ProductStore,
    private ledgerStore: LedgerStore
  ) {}

  /**
   * Reconcile stock against the ledger
   *
   * For every product checks that
   *   baseline_quantity + SUM(delta) = quantity_available
   *
   * Read-only: mismatches are reported, never repaired. Runs over all
   * products when `productIds` is omitted.
   */
  async reconcile(productIds: readonly string[] | undefined, actor: Actor): Promise<ReconcileResult> {
    assertAuthorized(actor.role, 'reconcile');

    const ids = productIds ? [...new Set(productIds)] : await this.productStore.listIds();
    logger.info('Running ledger reconciliation', { productCount: ids.length });

    const [products, transactions] = await Promise.all([
      this.productStore.findByIds(ids),
      this.ledgerStore.listByProducts(ids),
    ]);
    const ledgerNet = totalsBy(
      transactions,
      (transaction) => transaction.productId,
      (transaction) => transaction.delta
    );

    const inconsistent: ProductReconciliation[] = [];

    for (const product of products) {
      const net = ledgerNet.get(product.id) ?? 0;
      const expected = roundQuantity(product.baselineQuantity + net);

      if (expected !== product.quantityAvailable) {
        inconsistent.push({
          productId: product.id,
          baselineQuantity: product.baselineQuantity,
          ledgerNet: net,
          expected,
          actual: product.quantityAvailable,
        });
      }
    }

    if (inconsistent.length > 0) {
      logger.error('Ledger reconciliation found mismatches', { inconsistent });
    } else {
      logger.info('Ledger reconciliation complete', { checkedCount: products.length });
    }

    return { checkedCount: products.length, inconsistent };
  }
}
