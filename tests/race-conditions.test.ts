import { describe, it, expect, beforeEach } from 'vitest';
import { InvoiceDetails, InvoiceStatus } from '../src/types/invoice.types';
import { ConflictError } from '../src/types/error.types';
import { TRACKING, TestContext, createTestContext } from './support/fixtures';

/**
 * Race Condition Tests
 *
 * Competing transitions on the same invoice:
 * 1. Double reserve: stock is taken once
 * 2. Cancel vs Approve: one wins, the loser gets a Conflict
 * 3. Concurrent cancellations: stock is released once
 * 4. Cancel vs Ship: shipped invoices keep their stock
 */

type Settled = PromiseSettledResult<InvoiceDetails>;

const outcomes = (results: Settled[]) => ({
  fulfilled: results.filter((result) => result.status === 'fulfilled'),
  conflicts: results.filter((result) => result.status === 'rejected' && result.reason instanceof ConflictError),
});

describe('Competing transitions', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext({ lockTimeoutMs: 5000 });
  });

  it('reserves an invoice once when two requests race', async () => {
    const silk = ctx.addProduct('SILK', 10);
    const created = await ctx.createInvoice([[silk, 4]]);

    const results = await Promise.allSettled([
      ctx.container.invoiceService.reserve(created.id, ctx.warehouse),
      ctx.container.invoiceService.reserve(created.id, ctx.admin),
    ]);

    const { fulfilled, conflicts } = outcomes(results);
    expect(fulfilled).toHaveLength(1);
    expect(conflicts).toHaveLength(1);
    expect(ctx.db.available(silk.id)).toBe(6);
    expect(ctx.db.transactions).toHaveLength(1);
  });

  it('lets exactly one of cancel and approve win', async () => {
    const silk = ctx.addProduct('SILK', 10);
    const created = await ctx.createInvoice([[silk, 4]]);
    await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);

    const results = await Promise.allSettled([
      ctx.container.invoiceService.cancel(created.id, ctx.admin),
      ctx.container.invoiceService.approve(created.id, ctx.accountant),
    ]);

    const { fulfilled, conflicts } = outcomes(results);
    expect(fulfilled).toHaveLength(1);
    expect(conflicts).toHaveLength(1);

    const status = ctx.db.invoices.get(created.id)?.status;
    expect(status === InvoiceStatus.CANCELLED || status === InvoiceStatus.APPROVED).toBe(true);
    expect(ctx.db.available(silk.id)).toBe(status === InvoiceStatus.CANCELLED ? 10 : 6);
    expect(ctx.db.ledgerBalances()).toBe(true);
  });

  it('releases stock once under concurrent cancellations', async () => {
    const silk = ctx.addProduct('SILK', 10);
    const created = await ctx.createInvoice([[silk, 4]]);
    await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);

    const results = await Promise.allSettled([
      ctx.container.invoiceService.cancel(created.id, ctx.admin),
      ctx.container.invoiceService.cancel(created.id, ctx.accountant),
      ctx.container.invoiceService.cancel(created.id, ctx.admin),
    ]);

    const { fulfilled, conflicts } = outcomes(results);
    expect(fulfilled).toHaveLength(1);
    expect(conflicts).toHaveLength(2);
    expect(ctx.db.available(silk.id)).toBe(10);
    expect(ctx.db.transactions.map((t) => t.delta)).toEqual([-4, 4]);
  });

  it('never releases the stock of an invoice that shipped', async () => {
    const silk = ctx.addProduct('SILK', 10);
    const created = await ctx.createInvoice([[silk, 4]]);
    await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);
    await ctx.container.invoiceService.approve(created.id, ctx.accountant);

    const results = await Promise.allSettled([
      ctx.container.invoiceService.ship(created.id, TRACKING, ctx.warehouse),
      ctx.container.invoiceService.cancel(created.id, ctx.admin),
    ]);

    const { fulfilled, conflicts } = outcomes(results);
    expect(fulfilled).toHaveLength(1);
    expect(conflicts).toHaveLength(1);

    const status = ctx.db.invoices.get(created.id)?.status;
    expect(ctx.db.available(silk.id)).toBe(status === InvoiceStatus.SHIPPED ? 6 : 10);
    expect(ctx.db.ledgerBalances()).toBe(true);
  });
});
