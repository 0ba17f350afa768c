import { ProductStore } from '../types/store.types';
import { Invoice } from '../types/invoice.types';
import { LedgerEntryDraft, Product, TransactionKind } from '../types/inventory.types';
import {
  ErrorCode,
  InsufficientStockError,
  NotFoundError,
  StockShortfall,
} from '../types/error.types';
import { roundQuantity, totalsBy } from '../utils/quantity';
import { logger } from '../config/logger';

/**
 * Compares requested totals per product with what is available and returns
 * every product that cannot be served, in request order.
 */
export function findShortfalls(
  requested: ReadonlyMap<string, number>,
  products: ReadonlyMap<string, Pick<Product, 'quantityAvailable'>>
): StockShortfall[] {
  const shortfalls: StockShortfall[] = [];

  for (const [productId, quantity] of requested) {
    const available = products.get(productId)?.quantityAvailable ?? 0;

    if (available < quantity) {
      shortfalls.push({
        productId,
        requested: quantity,
        available,
        shortfall: roundQuantity(quantity - available),
      });
    }
  }

  return shortfalls;
}

/**
 * Reservation Coordinator
 *
 * Plans the ledger entries that move an invoice's stock. Plans are only
 * computed here; the invoice store applies them together with the status
 * write and re-checks the stock guard inside the same database transaction,
 * so a plan made from a stale read can never oversell.
 */
export class ReservationCoordinator {
  constructor(private productStore: ProductStore) {}

  /**
   * All-or-nothing reservation plan: one `reserve` entry per line item, or
   * InsufficientStockError naming every product that is short.
   */
  async planReservation(invoice: Invoice): Promise<LedgerEntryDraft[]> {
    const requested = totalsBy(
      invoice.items,
      (item) => item.productId,
      (item) => item.quantity
    );
    const productIds = [...requested.keys()];
    const products = await this.productStore.findByIds(productIds);
    const productsById = new Map(products.map((product) => [product.id, product]));

    const missing = productIds.filter((id) => !productsById.has(id));
    if (missing.length > 0) {
      throw new NotFoundError(
        ErrorCode.PRODUCT_NOT_FOUND,
        `Products not found: ${missing.join(', ')}`,
        { productIds: missing }
      );
    }

    const shortfalls = findShortfalls(requested, productsById);
    if (shortfalls.length > 0) {
      logger.debug('Reservation rejected for insufficient stock', {
        invoiceId: invoice.id,
        shortfalls,
      });
      throw new InsufficientStockError(shortfalls);
    }

    return invoice.items.map((item) => ({
      productId: item.productId,
      invoiceId: invoice.id,
      kind: TransactionKind.RESERVE,
      delta: -item.quantity,
      note: `Reserved for invoice ${invoice.invoiceNumber}`,
    }));
  }

  /**
   * Zero-delta audit markers: the stock already left `quantity_available`
   * when it was reserved.
   */
  planShipmentMarks(invoice: Invoice): LedgerEntryDraft[] {
    return invoice.items.map((item) => ({
      productId: item.productId,
      invoiceId: invoice.id,
      kind: TransactionKind.SHIP_MARK,
      delta: 0,
      note: `Shipped with invoice ${invoice.invoiceNumber}`,
    }));
  }
}
