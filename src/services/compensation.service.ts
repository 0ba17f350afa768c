import { LedgerStore } from '../types/store.types';
import { Invoice } from '../types/invoice.types';
import { InventoryTransaction, LedgerEntryDraft, TransactionKind } from '../types/inventory.types';
import { LedgerInconsistentError } from '../types/error.types';
import { roundQuantity, totalsBy } from '../utils/quantity';
import { logger } from '../config/logger';

/**
 * Net quantity still held per product: reserved amounts minus releases.
 * Ship marks and adjustments do not count.
 */
export function unreleasedByProduct(transactions: readonly InventoryTransaction[]): Map<string, number> {
  const held = new Map<string, number>();

  for (const transaction of transactions) {
    if (transaction.kind !== TransactionKind.RESERVE && transaction.kind !== TransactionKind.RELEASE) {
      continue;
    }
    // reserve deltas are negative, release deltas positive
    const current = held.get(transaction.productId) ?? 0;
    held.set(transaction.productId, roundQuantity(current - transaction.delta));
  }

  return held;
}

/**
 * Cancellation / Compensation Engine
 *
 * Works out the exact inverse of whatever an invoice still holds in the
 * ledger. An invoice that never reserved produces no entries.
 */
export class CompensationEngine {
  constructor(private ledgerStore: LedgerStore) {}

  async planCompensation(invoice: Invoice): Promise<LedgerEntryDraft[]> {
    const transactions = await this.ledgerStore.listByInvoice(invoice.id);
    const unreleased = unreleasedByProduct(transactions);

    if ([...unreleased.values()].every((quantity) => quantity === 0)) {
      logger.debug('Nothing to release for invoice', { invoiceId: invoice.id });
      return [];
    }

    const expected = totalsBy(
      invoice.items,
      (item) => item.productId,
      (item) => item.quantity
    );
    const productIds = new Set([...expected.keys(), ...unreleased.keys()]);

    for (const productId of productIds) {
      const held = unreleased.get(productId) ?? 0;
      const owed = expected.get(productId) ?? 0;

      if (held !== owed) {
        logger.error('Invoice ledger does not match its line items', {
          invoiceId: invoice.id,
          productId,
          held,
          owed,
        });
        throw new LedgerInconsistentError(
          `Invoice ${invoice.id} holds ${held} of product ${productId} but its line items total ${owed}`,
          { invoiceId: invoice.id, productId, held, owed }
        );
      }
    }

    return invoice.items.map((item) => ({
      productId: item.productId,
      invoiceId: invoice.id,
      kind: TransactionKind.RELEASE,
      delta: item.quantity,
      note: `Released by cancellation of invoice ${invoice.invoiceNumber}`,
    }));
  }
}
