import { describe, it, expect, beforeEach } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import {
  CreateInvoiceLineInput,
  InvoiceAction,
  InvoiceDetails,
  InvoiceStatus,
  PaymentType,
  TrackingInfo,
} from '../src/types/invoice.types';
import { TransactionKind } from '../src/types/inventory.types';
import {
  ConflictError,
  ErrorCode,
  ForbiddenError,
  InsufficientStockError,
  InvalidTransitionError,
  LedgerInconsistentError,
  NotFoundError,
  ValidationError,
} from '../src/types/error.types';
import { INVOICE_ACTIONS, canTransition } from '../src/policies/transition.policy';
import { TRACKING, TestContext, createTestContext } from './support/fixtures';

describe('InvoiceService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe('createInvoice', () => {
    it('creates a warehouse_pending invoice without touching stock', async () => {
      const silk = ctx.addProduct('SILK', 10);

      const invoice = await ctx.container.invoiceService.createInvoice(
        {
          customerId: ctx.customer.id,
          paymentType: PaymentType.CASH,
          items: [
            { productId: silk.id, quantity: 2.5, unit: 'meter', unitPrice: 12 },
            { productId: silk.id, quantity: 1, unit: 'meter', unitPrice: 12.5 },
          ],
        },
        ctx.accountant
      );

      expect(invoice.status).toBe(InvoiceStatus.WAREHOUSE_PENDING);
      expect(invoice.invoiceNumber).toBe('INV-2026-001');
      expect(invoice.subtotal).toBe(42.5);
      expect(invoice.total).toBe(42.5);
      expect(invoice.items.map((item) => item.lineTotal)).toEqual([30, 12.5]);
      expect(invoice.items[0]?.product).toEqual({ id: silk.id, code: 'SILK', name: 'Fabric SILK', unit: 'meter' });
      expect(invoice.customer.fullName).toBe('Mina Rahimi');
      expect(invoice.creator.id).toBe(ctx.accountant.userId);
      expect(invoice.paymentBreakdown).toBeNull();
      expect(ctx.db.available(silk.id)).toBe(10);
      expect(ctx.db.transactions).toHaveLength(0);
    });

    it('keeps the breakdown of a mixed payment', async () => {
      const silk = ctx.addProduct('SILK', 10);

      const invoice = await ctx.container.invoiceService.createInvoice(
        {
          customerId: ctx.customer.id,
          paymentType: PaymentType.MIXED,
          paymentBreakdown: { cash: 10, check: 20 },
          items: [{ productId: silk.id, quantity: 3, unit: 'meter', unitPrice: 10 }],
        },
        ctx.admin
      );

      expect(invoice.paymentBreakdown).toEqual({ cash: 10, check: 20 });
    });

    it('requires a breakdown for mixed payments', async () => {
      const silk = ctx.addProduct('SILK', 10);

      await expect(
        ctx.container.invoiceService.createInvoice(
          {
            customerId: ctx.customer.id,
            paymentType: PaymentType.MIXED,
            items: [{ productId: silk.id, quantity: 1, unit: 'meter', unitPrice: 10 }],
          },
          ctx.accountant
        )
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects an invoice without line items', async () => {
      await expect(
        ctx.container.invoiceService.createInvoice(
          { customerId: ctx.customer.id, paymentType: PaymentType.CASH, items: [] },
          ctx.accountant
        )
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('does not let the warehouse create invoices', async () => {
      const silk = ctx.addProduct('SILK', 10);

      await expect(ctx.createInvoice([[silk, 1]], ctx.warehouse)).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('lists every missing product in one NotFound', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const missingA = uuidv4();
      const missingB = uuidv4();

      const error = await ctx.container.invoiceService
        .createInvoice(
          {
            customerId: ctx.customer.id,
            paymentType: PaymentType.CASH,
            items: [
              { productId: missingA, quantity: 1, unit: 'meter', unitPrice: 1 },
              { productId: silk.id, quantity: 1, unit: 'meter', unitPrice: 1 },
              { productId: missingB, quantity: 1, unit: 'meter', unitPrice: 1 },
            ],
          },
          ctx.accountant
        )
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.code).toBe(ErrorCode.PRODUCT_NOT_FOUND);
        expect(error.details).toEqual({ productIds: [missingA, missingB] });
      }
      expect(ctx.db.invoices.size).toBe(0);
    });

    it('fails with CUSTOMER_NOT_FOUND for an unknown customer', async () => {
      const silk = ctx.addProduct('SILK', 10);

      const error = await ctx.container.invoiceService
        .createInvoice(
          {
            customerId: uuidv4(),
            paymentType: PaymentType.CASH,
            items: [{ productId: silk.id, quantity: 1, unit: 'meter', unitPrice: 1 }],
          },
          ctx.accountant
        )
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.code).toBe(ErrorCode.CUSTOMER_NOT_FOUND);
      }
    });
  });

  describe('createInvoice quantities', () => {
    const create = (line: CreateInvoiceLineInput) =>
      ctx.container.invoiceService.createInvoice(
        { customerId: ctx.customer.id, paymentType: PaymentType.CASH, items: [line] },
        ctx.accountant
      );

    it('rejects a quantity that rounds to zero', async () => {
      const silk = ctx.addProduct('SILK', 10);

      const error = await create({ productId: silk.id, quantity: 0.0004, unit: 'meter', unitPrice: 10 }).catch(
        (err: unknown) => err
      );

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.details).toEqual({ field: 'items.0.quantity', quantity: 0 });
      }
      expect(ctx.db.invoices.size).toBe(0);
    });

    it('stores quantities rounded to the meter precision', async () => {
      const silk = ctx.addProduct('SILK', 10);

      const invoice = await create({ productId: silk.id, quantity: 1.2504, unit: 'meter', unitPrice: 2 });

      expect(invoice.items[0]?.quantity).toBe(1.25);
      expect(invoice.total).toBe(2.5);
    });

    it('multiplies rolls_count by pieces_per_roll', async () => {
      const silk = ctx.addProduct('SILK', 100);

      const invoice = await create({ productId: silk.id, rollsCount: 3, piecesPerRoll: 12.5, unit: 'meter', unitPrice: 2 });
      await ctx.container.invoiceService.reserve(invoice.id, ctx.warehouse);

      expect(invoice.items[0]).toMatchObject({
        quantity: 37.5,
        rollsCount: 3,
        piecesPerRoll: 12.5,
        detailedRolls: null,
        lineTotal: 75,
      });
      expect(ctx.db.available(silk.id)).toBe(62.5);
    });

    it('sums detailed roll measurements ahead of any other count', async () => {
      const silk = ctx.addProduct('SILK', 100);
      const detailedRolls = [{ pieces: [{ measurement: 10.5 }, { measurement: 9.25 }] }, { pieces: [{ measurement: 20 }] }];

      const invoice = await create({
        productId: silk.id,
        quantity: 1,
        rollsCount: 5,
        piecesPerRoll: 100,
        detailedRolls,
        unit: 'meter',
        unitPrice: 1,
      });

      expect(invoice.items[0]?.quantity).toBe(39.75);
      expect(invoice.items[0]?.detailedRolls).toEqual(detailedRolls);
      expect(invoice.total).toBe(39.75);
    });

    it('requires pieces_per_roll with rolls_count', async () => {
      const silk = ctx.addProduct('SILK', 100);

      const error = await create({ productId: silk.id, rollsCount: 3, unit: 'meter', unitPrice: 2 }).catch(
        (err: unknown) => err
      );

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe(`pieces_per_roll is required with rolls_count for product ${silk.id}`);
        expect(error.details).toEqual({ field: 'items.0.piecesPerRoll' });
      }
      expect(ctx.db.invoices.size).toBe(0);
    });

    it('rounds unit prices to cents before computing totals', async () => {
      const silk = ctx.addProduct('SILK', 10);

      const invoice = await create({ productId: silk.id, quantity: 3, unit: 'meter', unitPrice: 3.333 });

      expect(invoice.items[0]).toMatchObject({ unitPrice: 3.33, lineTotal: 9.99 });
      expect(invoice.subtotal).toBe(9.99);
      expect(invoice.total).toBe(9.99);
    });
  });

  describe('reserve', () => {
    it('decrements stock and records one reserve entry per line', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 8]]);

      const invoice = await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);

      expect(invoice.status).toBe(InvoiceStatus.ACCOUNTANT_PENDING);
      expect(ctx.db.available(silk.id)).toBe(2);
      expect(ctx.db.transactions.map((t) => [t.kind, t.delta, t.invoiceId, t.createdBy])).toEqual([
        [TransactionKind.RESERVE, -8, created.id, ctx.warehouse.userId],
      ]);
    });

    it('is all or nothing when one product is short', async () => {
      const a = ctx.addProduct('A', 5);
      const b = ctx.addProduct('B', 2);
      const created = await ctx.createInvoice([
        [a, 5],
        [b, 3],
      ]);

      const error = await ctx.container.invoiceService.reserve(created.id, ctx.warehouse).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InsufficientStockError);
      if (error instanceof InsufficientStockError) {
        expect(error.shortfalls).toEqual([{ productId: b.id, requested: 3, available: 2, shortfall: 1 }]);
      }
      expect(ctx.db.available(a.id)).toBe(5);
      expect(ctx.db.available(b.id)).toBe(2);
      expect(ctx.db.transactions).toHaveLength(0);
      expect(ctx.db.invoices.get(created.id)?.status).toBe(InvoiceStatus.WAREHOUSE_PENDING);
    });

    it('reserves fractional quantities exactly', async () => {
      const cotton = ctx.addProduct('COTTON', 10);
      const created = await ctx.createInvoice([
        [cotton, 0.1],
        [cotton, 0.2],
      ]);

      await ctx.container.invoiceService.reserve(created.id, ctx.admin);

      expect(ctx.db.available(cotton.id)).toBe(9.7);
      expect(ctx.db.ledgerBalances()).toBe(true);
    });

    it('checks the role before the status', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 1]]);
      await ctx.container.invoiceService.cancel(created.id, ctx.accountant);

      // accountant may not reserve at all, even though the status would also fail
      await expect(ctx.container.invoiceService.reserve(created.id, ctx.accountant)).rejects.toBeInstanceOf(
        ForbiddenError
      );
      await expect(ctx.container.invoiceService.reserve(created.id, ctx.warehouse)).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
    });

    it('fails with INVOICE_NOT_FOUND for an unknown invoice', async () => {
      const error = await ctx.container.invoiceService.reserve(uuidv4(), ctx.warehouse).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.code).toBe(ErrorCode.INVOICE_NOT_FOUND);
      }
    });
  });

  describe('ship', () => {
    it('stores tracking and writes stock-neutral ship marks', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const wool = ctx.addProduct('WOOL', 10);
      const created = await ctx.createInvoice([
        [silk, 3],
        [wool, 1],
      ]);
      await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);
      await ctx.container.invoiceService.approve(created.id, ctx.accountant);

      const shipped = await ctx.container.invoiceService.ship(created.id, TRACKING, ctx.warehouse);

      expect(shipped.status).toBe(InvoiceStatus.SHIPPED);
      expect(shipped.tracking).toEqual(TRACKING);
      expect(ctx.db.available(silk.id)).toBe(7);
      expect(ctx.db.available(wool.id)).toBe(9);
      expect(
        ctx.db.transactions.filter((t) => t.kind === TransactionKind.SHIP_MARK).map((t) => [t.productId, t.delta])
      ).toEqual([
        [silk.id, 0],
        [wool.id, 0],
      ]);
    });

    it('validates tracking before touching anything', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 3]]);
      await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);
      await ctx.container.invoiceService.approve(created.id, ctx.accountant);
      const before = ctx.db.transactions.length;
      const incomplete: TrackingInfo = { ...TRACKING, trackingCode: '  ', numberOfPackages: 0 };

      const error = await ctx.container.invoiceService
        .ship(created.id, incomplete, ctx.warehouse)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.details).toEqual({
          errors: [
            { field: 'trackingCode', message: 'Tracking code is required' },
            { field: 'numberOfPackages', message: 'At least one package is required' },
          ],
        });
      }
      expect(ctx.db.transactions).toHaveLength(before);
      expect(ctx.db.invoices.get(created.id)?.status).toBe(InvoiceStatus.APPROVED);
    });
  });

  describe('cancel', () => {
    it('releases exactly what was reserved', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 8]]);
      await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);
      expect(ctx.db.available(silk.id)).toBe(2);

      const cancelled = await ctx.container.invoiceService.cancel(created.id, ctx.accountant);

      expect(cancelled.status).toBe(InvoiceStatus.CANCELLED);
      expect(ctx.db.available(silk.id)).toBe(10);
      expect(ctx.db.transactions.map((t) => [t.kind, t.delta])).toEqual([
        [TransactionKind.RESERVE, -8],
        [TransactionKind.RELEASE, 8],
      ]);
      expect(ctx.db.ledgerBalances()).toBe(true);
    });

    it('releases an approved invoice too', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 4]]);
      await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);
      await ctx.container.invoiceService.approve(created.id, ctx.accountant);

      await ctx.container.invoiceService.cancel(created.id, ctx.admin);

      expect(ctx.db.available(silk.id)).toBe(10);
    });

    it('writes no ledger entry for an invoice that never reserved', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 8]]);

      const cancelled = await ctx.container.invoiceService.cancel(created.id, ctx.accountant);

      expect(cancelled.status).toBe(InvoiceStatus.CANCELLED);
      expect(ctx.db.transactions).toHaveLength(0);
      expect(ctx.db.available(silk.id)).toBe(10);
    });

    it('rejects a second cancel without releasing twice', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 8]]);
      await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);
      await ctx.container.invoiceService.cancel(created.id, ctx.accountant);

      await expect(ctx.container.invoiceService.cancel(created.id, ctx.accountant)).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
      expect(ctx.db.available(silk.id)).toBe(10);
      expect(ctx.db.transactions).toHaveLength(2);
    });

    it('cannot cancel a shipped invoice', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 8]]);
      await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);
      await ctx.container.invoiceService.approve(created.id, ctx.accountant);
      await ctx.container.invoiceService.ship(created.id, TRACKING, ctx.warehouse);

      await expect(ctx.container.invoiceService.cancel(created.id, ctx.admin)).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
      expect(ctx.db.available(silk.id)).toBe(2);
    });
  });

  describe('transition closure', () => {
    const run = (action: InvoiceAction, invoiceId: string): Promise<InvoiceDetails> => {
      const service = ctx.container.invoiceService;
      switch (action) {
        case 'reserve':
          return service.reserve(invoiceId, ctx.admin);
        case 'approve':
          return service.approve(invoiceId, ctx.admin);
        case 'ship':
          return service.ship(invoiceId, TRACKING, ctx.admin);
        case 'deliver':
          return service.deliver(invoiceId, ctx.admin);
        case 'cancel':
          return service.cancel(invoiceId, ctx.admin);
      }
    };

    it('rejects every action whose precondition fails and writes nothing', async () => {
      const silk = ctx.addProduct('SILK', 100);
      const path: InvoiceAction[] = ['reserve', 'approve', 'ship', 'deliver'];
      const created = await ctx.createInvoice([[silk, 1]]);

      for (let step = 0; step <= path.length; step++) {
        const invoice = ctx.db.invoices.get(created.id);
        if (!invoice) throw new Error('invoice missing');

        for (const action of INVOICE_ACTIONS.filter((candidate) => !canTransition(invoice.status, candidate))) {
          const ledgerSize = ctx.db.transactions.length;
          await expect(run(action, created.id)).rejects.toBeInstanceOf(InvalidTransitionError);
          expect(ctx.db.transactions).toHaveLength(ledgerSize);
          expect(ctx.db.invoices.get(created.id)?.status).toBe(invoice.status);
        }

        const next = path[step];
        if (next) await run(next, created.id);
      }

      expect(ctx.db.invoices.get(created.id)?.status).toBe(InvoiceStatus.DELIVERED);
      expect(ctx.db.available(silk.id)).toBe(99);
      expect(ctx.db.ledgerBalances()).toBe(true);
    });
  });

  describe('contention', () => {
    it('retries when stock changes between planning and commit, then reports the shortfall', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 8]]);
      let interfered = false;
      ctx.db.beforeCommit = () => {
        if (interfered) return;
        interfered = true;
        // another process takes stock after our plan was made
        const product = ctx.db.products.get(silk.id);
        if (product) ctx.db.products.set(silk.id, { ...product, quantityAvailable: 5, baselineQuantity: 5 });
      };

      const error = await ctx.container.invoiceService.reserve(created.id, ctx.warehouse).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InsufficientStockError);
      if (error instanceof InsufficientStockError) {
        expect(error.shortfalls).toEqual([{ productId: silk.id, requested: 8, available: 5, shortfall: 3 }]);
      }
      expect(ctx.db.transactions).toHaveLength(0);
    });

    it('gives up with Conflict after the configured attempts', async () => {
      ctx = createTestContext({ maxAttempts: 2 });
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 8]]);
      let commits = 0;
      ctx.db.beforeCommit = () => {
        commits += 1;
        // stock drops below the request at every commit and comes back before the next plan
        const product = ctx.db.products.get(silk.id);
        if (product) ctx.db.products.set(silk.id, { ...product, quantityAvailable: 1 });
        setImmediate(() => {
          const current = ctx.db.products.get(silk.id);
          if (current) ctx.db.products.set(silk.id, { ...current, quantityAvailable: 10 });
        });
      };

      const error = await ctx.container.invoiceService.reserve(created.id, ctx.warehouse).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConflictError);
      expect(commits).toBe(2);
      expect(ctx.db.transactions).toHaveLength(0);
    });

    it('reports Conflict when the status changed after it was read', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 1]]);
      ctx.db.beforeCommit = (unit) => {
        const invoice = ctx.db.invoices.get(unit.invoiceId);
        if (invoice) ctx.db.invoices.set(invoice.id, { ...invoice, status: InvoiceStatus.CANCELLED });
      };

      const reserveError = await ctx.container.invoiceService
        .reserve(created.id, ctx.warehouse)
        .catch((err: unknown) => err);

      expect(reserveError).toBeInstanceOf(ConflictError);
      if (reserveError instanceof ConflictError) {
        expect(reserveError.details).toEqual({
          invoiceId: created.id,
          expectedStatus: InvoiceStatus.WAREHOUSE_PENDING,
          currentStatus: InvoiceStatus.CANCELLED,
        });
      }
      expect(ctx.db.transactions).toHaveLength(0);
    });
  });

  describe('release guard', () => {
    it('refuses a release larger than what the invoice still holds', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 4]]);
      await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);

      const result = await ctx.db.invoiceStore.commit({
        invoiceId: created.id,
        expectedStatus: InvoiceStatus.ACCOUNTANT_PENDING,
        nextStatus: InvoiceStatus.CANCELLED,
        actorId: ctx.admin.userId,
        tracking: null,
        entries: [{ productId: silk.id, invoiceId: created.id, kind: TransactionKind.RELEASE, delta: 5, note: null }],
      });

      expect(result).toEqual({ outcome: 'release_guard', productId: silk.id, unreleased: 4, requested: 5 });
      expect(ctx.db.transactions.map((t) => [t.kind, t.delta])).toEqual([[TransactionKind.RESERVE, -4]]);
      expect(ctx.db.available(silk.id)).toBe(6);
      expect(ctx.db.invoices.get(created.id)?.status).toBe(InvoiceStatus.ACCOUNTANT_PENDING);
    });

    it('reports LEDGER_INCONSISTENT when a release lands between planning and commit', async () => {
      const silk = ctx.addProduct('SILK', 10);
      const created = await ctx.createInvoice([[silk, 4]]);
      await ctx.container.invoiceService.reserve(created.id, ctx.warehouse);
      ctx.db.beforeCommit = () => {
        ctx.db.beforeCommit = null;
        // a release written outside the service, after the cancel was planned
        ctx.db.transactions.push({
          id: uuidv4(),
          sequence: 99,
          productId: silk.id,
          invoiceId: created.id,
          kind: TransactionKind.RELEASE,
          delta: 1,
          note: null,
          createdBy: ctx.admin.userId,
          createdAt: new Date('2026-03-02T00:00:00.000Z'),
        });
      };
      const commitsBefore = ctx.db.commitCount;

      const error = await ctx.container.invoiceService.cancel(created.id, ctx.accountant).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LedgerInconsistentError);
      if (error instanceof LedgerInconsistentError) {
        expect(error.code).toBe(ErrorCode.LEDGER_INCONSISTENT);
        expect(error.statusCode).toBe(500);
        expect(error.details).toEqual({ invoiceId: created.id, productId: silk.id, unreleased: 3, requested: 4 });
      }
      expect(ctx.db.commitCount).toBe(commitsBefore);
      expect(ctx.db.transactions.map((t) => [t.kind, t.delta])).toEqual([
        [TransactionKind.RESERVE, -4],
        [TransactionKind.RELEASE, 1],
      ]);
      expect(ctx.db.available(silk.id)).toBe(6);
      expect(ctx.db.invoices.get(created.id)?.status).toBe(InvoiceStatus.ACCOUNTANT_PENDING);
    });
  });
});
