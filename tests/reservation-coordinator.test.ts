import { describe, it, expect, beforeEach } from 'vitest';
import { ReservationCoordinator, findShortfalls } from '../src/services/reservation.service';
import { ErrorCode, InsufficientStockError, NotFoundError } from '../src/types/error.types';
import { TransactionKind } from '../src/types/inventory.types';
import { TestContext, createTestContext } from './support/fixtures';

describe('findShortfalls', () => {
  it('lists every product below its requested total, in request order', () => {
    const requested = new Map([
      ['b', 3],
      ['a', 5],
      ['c', 1.5],
    ]);
    const products = new Map([
      ['a', { quantityAvailable: 5 }],
      ['b', { quantityAvailable: 2 }],
      ['c', { quantityAvailable: 0.25 }],
    ]);

    expect(findShortfalls(requested, products)).toEqual([
      { productId: 'b', requested: 3, available: 2, shortfall: 1 },
      { productId: 'c', requested: 1.5, available: 0.25, shortfall: 1.25 },
    ]);
  });
});

describe('ReservationCoordinator', () => {
  let ctx: TestContext;
  let coordinator: ReservationCoordinator;

  beforeEach(() => {
    ctx = createTestContext();
    coordinator = new ReservationCoordinator(ctx.db.productStore);
  });

  it('plans one reserve entry per line item', async () => {
    const silk = ctx.addProduct('SILK', 10);
    const wool = ctx.addProduct('WOOL', 4);
    const invoice = await ctx.createInvoice([
      [silk, 2.5],
      [wool, 4],
    ]);

    const entries = await coordinator.planReservation(invoice);

    expect(entries).toEqual([
      {
        productId: silk.id,
        invoiceId: invoice.id,
        kind: TransactionKind.RESERVE,
        delta: -2.5,
        note: `Reserved for invoice ${invoice.invoiceNumber}`,
      },
      {
        productId: wool.id,
        invoiceId: invoice.id,
        kind: TransactionKind.RESERVE,
        delta: -4,
        note: `Reserved for invoice ${invoice.invoiceNumber}`,
      },
    ]);
  });

  it('aggregates lines of the same product before checking stock', async () => {
    const linen = ctx.addProduct('LINEN', 6);
    const invoice = await ctx.createInvoice([
      [linen, 4],
      [linen, 4],
    ]);

    const error = await coordinator.planReservation(invoice).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InsufficientStockError);
    if (error instanceof InsufficientStockError) {
      expect(error.shortfalls).toEqual([{ productId: linen.id, requested: 8, available: 6, shortfall: 2 }]);
    }
  });

  it('names every short product', async () => {
    const a = ctx.addProduct('A', 5);
    const b = ctx.addProduct('B', 2);
    const c = ctx.addProduct('C', 0);
    const invoice = await ctx.createInvoice([
      [a, 5],
      [b, 3],
      [c, 1],
    ]);

    const error = await coordinator.planReservation(invoice).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InsufficientStockError);
    if (error instanceof InsufficientStockError) {
      expect(error.code).toBe(ErrorCode.INSUFFICIENT_STOCK);
      expect(error.shortfalls.map((shortfall) => [shortfall.productId, shortfall.shortfall])).toEqual([
        [b.id, 1],
        [c.id, 1],
      ]);
    }
  });

  it('fails with NotFound when a product has disappeared', async () => {
    const a = ctx.addProduct('A', 5);
    const invoice = await ctx.createInvoice([[a, 1]]);
    ctx.db.products.delete(a.id);

    const error = await coordinator.planReservation(invoice).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    if (error instanceof NotFoundError) {
      expect(error.code).toBe(ErrorCode.PRODUCT_NOT_FOUND);
      expect(error.details).toEqual({ productIds: [a.id] });
    }
  });

  it('plans zero-delta ship marks', async () => {
    const a = ctx.addProduct('A', 5);
    const invoice = await ctx.createInvoice([[a, 3]]);

    expect(coordinator.planShipmentMarks(invoice)).toEqual([
      {
        productId: a.id,
        invoiceId: invoice.id,
        kind: TransactionKind.SHIP_MARK,
        delta: 0,
        note: `Shipped with invoice ${invoice.invoiceNumber}`,
      },
    ]);
  });
});
