import { CommitResult, CustomerStore, InvoiceStore, ProductStore } from '../types/store.types';
import {
  Actor,
  CreateInvoiceInput,
  Invoice,
  InvoiceAction,
  InvoiceDetails,
  PaymentType,
  TrackingInfo,
} from '../types/invoice.types';
import {
  ConflictError,
  ErrorCode,
  LedgerInconsistentError,
  NotFoundError,
  ValidationError,
} from '../types/error.types';
import { assertAuthorized } from '../policies/authorization.policy';
import { resolveTransition } from '../policies/transition.policy';
import { trackingInfoSchema } from '../validators/invoice.validator';
import { ReservationCoordinator } from './reservation.service';
import { CompensationEngine } from './compensation.service';
import { UnitOfWork } from './unit-of-work';
import { lineTotal, resolveLine } from './line-quantity';
import { KeyedLock, LockTimeoutError } from '../utils/keyed-lock';
import { sumMoney } from '../utils/quantity';
import { assertNever } from '../utils/assert-never';
import { componentLogger } from '../config/logger';

const log = componentLogger('InvoiceService');

export interface InvoiceServiceOptions {
  lockTimeoutMs: number;
  maxAttempts: number;
}

export const invoiceLockKey = (invoiceId: string): string => `invoice:${invoiceId}`;
export const productLockKey = (productId: string): string => `product:${productId}`;

/**
 * Invoice Service
 *
 * Creates invoices and drives them through the transition table. Every
 * transition follows the same path:
 *
 * 1. Load the invoice and consult the authorization gate
 * 2. Resolve the transition (precondition on the current status)
 * 3. Lock the invoice, plus its products when stock moves (ascending keys)
 * 4. Re-read the status under the lock; a change means a concurrent
 *    transition won, so the caller gets a Conflict
 * 5. Run the side effect into a UnitOfWork and commit it in one store call,
 *    which re-checks the status and the stock guard atomically
 *
 * Lock timeouts and stock-guard trips at commit are retried from step 1 up
 * to `maxAttempts` times; everything else surfaces as is.
 */
export class InvoiceService {
  constructor(
    private invoiceStore: InvoiceStore,
    private customerStore: CustomerStore,
    private productStore: ProductStore,
    private coordinator: ReservationCoordinator,
    private compensation: CompensationEngine,
    private locks: KeyedLock,
    private options: InvoiceServiceOptions
  ) {}

  /**
   * Create an invoice in `warehouse_pending`. No stock is touched until the
   * warehouse reserves it.
   */
  async createInvoice(input: CreateInvoiceInput, actor: Actor): Promise<InvoiceDetails> {
    assertAuthorized(actor.role, 'create');

    if (input.items.length === 0) {
      throw new ValidationError('An invoice needs at least one line item');
    }
    if (input.paymentType === PaymentType.MIXED && !input.paymentBreakdown) {
      throw new ValidationError('Payment breakdown is required for mixed payments', {
        field: 'paymentBreakdown',
      });
    }

    const lines = input.items.map((item, position) => resolveLine(item, position));

    log.info('Creating invoice', {
      customerId: input.customerId,
      itemCount: input.items.length,
      createdBy: actor.userId,
    });

    const customer = await this.customerStore.findById(input.customerId);
    if (!customer) {
      throw new NotFoundError(ErrorCode.CUSTOMER_NOT_FOUND, `Customer with ID ${input.customerId} not found`);
    }

    const productIds = [...new Set(input.items.map((item) => item.productId))];
    const products = await this.productStore.findByIds(productIds);
    const found = new Set(products.map((product) => product.id));
    const missing = productIds.filter((id) => !found.has(id));
    if (missing.length > 0) {
      throw new NotFoundError(ErrorCode.PRODUCT_NOT_FOUND, `Products not found: ${missing.join(', ')}`, {
        productIds: missing,
      });
    }

    const subtotal = sumMoney(lines.map(lineTotal));

    const invoice = await this.invoiceStore.create({
      customerId: input.customerId,
      createdBy: actor.userId,
      paymentType: input.paymentType,
      paymentBreakdown: input.paymentType === PaymentType.MIXED ? input.paymentBreakdown ?? null : null,
      subtotal,
      total: subtotal,
      items: lines,
    });

    log.info('Invoice created', { invoiceId: invoice.id, invoiceNumber: invoice.invoiceNumber });
    return this.loadDetails(invoice.id);
  }

  async reserve(invoiceId: string, actor: Actor): Promise<InvoiceDetails> {
    return this.transition('reserve', invoiceId, actor);
  }

  async approve(invoiceId: string, actor: Actor): Promise<InvoiceDetails> {
    return this.transition('approve', invoiceId, actor);
  }

  /**
   * Tracking info is validated before anything is read or written
   */
  async ship(invoiceId: string, tracking: TrackingInfo, actor: Actor): Promise<InvoiceDetails> {
    const parsed = trackingInfoSchema.safeParse(tracking);

    if (!parsed.success) {
      throw new ValidationError('Invalid tracking information', {
        errors: parsed.error.errors.map((err) => ({
          field: err.path.join('.'),
          message: err.message,
        })),
      });
    }

    return this.transition('ship', invoiceId, actor, parsed.data);
  }

  async deliver(invoiceId: string, actor: Actor): Promise<InvoiceDetails> {
    return this.transition('deliver', invoiceId, actor);
  }

  async cancel(invoiceId: string, actor: Actor): Promise<InvoiceDetails> {
    return this.transition('cancel', invoiceId, actor);
  }

  private async transition(
    action: InvoiceAction,
    invoiceId: string,
    actor: Actor,
    tracking: TrackingInfo | null = null
  ): Promise<InvoiceDetails> {
    const { maxAttempts } = this.options;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const invoice = await this.loadInvoice(invoiceId);

      assertAuthorized(actor.role, action, invoice.status);
      const transition = resolveTransition(invoice.status, action);
      const unit = new UnitOfWork(invoice, transition, actor.userId);

      log.debug('Running transition', { invoiceId, action, from: invoice.status, attempt });

      let result: CommitResult;
      try {
        result = await this.commitUnderLock(unit, tracking);
      } catch (error) {
        if (error instanceof LockTimeoutError) {
          log.warn('Lock contention, retrying transition', { invoiceId, action, attempt, key: error.key });
          continue;
        }
        throw error;
      }

      switch (result.outcome) {
        case 'committed':
          log.info('Invoice transitioned', {
            invoiceId,
            action,
            from: invoice.status,
            to: transition.to,
            ledgerEntries: unit.ledgerEntries.length,
            actorId: actor.userId,
          });
          return this.loadDetails(invoiceId);

        case 'not_found':
          throw this.invoiceNotFound(invoiceId);

        case 'status_mismatch':
          throw new ConflictError(
            `Invoice ${invoiceId} moved to ${result.currentStatus} concurrently; refetch and retry`,
            { invoiceId, expectedStatus: invoice.status, currentStatus: result.currentStatus }
          );

        case 'stock_guard':
          log.warn('Stock changed between planning and commit, retrying transition', {
            invoiceId,
            action,
            attempt,
            shortfalls: result.shortfalls,
          });
          continue;

        case 'release_guard':
          throw new LedgerInconsistentError(
            `Release of ${result.requested} exceeds the ${result.unreleased} still reserved for product ${result.productId}`,
            { invoiceId, productId: result.productId, unreleased: result.unreleased, requested: result.requested }
          );

        default:
          return assertNever(result);
      }
    }

    throw new ConflictError(`Could not ${action} invoice ${invoiceId}: contention persisted after ${maxAttempts} attempts`, {
      invoiceId,
      action,
      attempts: maxAttempts,
    });
  }

  private async commitUnderLock(unit: UnitOfWork, tracking: TrackingInfo | null): Promise<CommitResult> {
    const release = await this.locks.acquire(this.lockKeysFor(unit), this.options.lockTimeoutMs);

    try {
      const current = await this.invoiceStore.findStatus(unit.invoice.id);
      if (current === null) {
        throw this.invoiceNotFound(unit.invoice.id);
      }
      if (current !== unit.expectedStatus) {
        throw new ConflictError(
          `Invoice ${unit.invoice.id} moved to ${current} concurrently; refetch and retry`,
          { invoiceId: unit.invoice.id, expectedStatus: unit.expectedStatus, currentStatus: current }
        );
      }

      await this.runEffect(unit, tracking);

      return await this.invoiceStore.commit(unit.toCommit());
    } finally {
      release();
    }
  }

  private async runEffect(unit: UnitOfWork, tracking: TrackingInfo | null): Promise<void> {
    const { effect } = unit.transition;

    switch (effect) {
      case 'reserve-stock':
        unit.recordAll(await this.coordinator.planReservation(unit.invoice));
        return;

      case 'mark-shipment':
        if (!tracking) {
          throw new ValidationError('Tracking information is required to ship an invoice');
        }
        unit.attachTracking(tracking);
        unit.recordAll(this.coordinator.planShipmentMarks(unit.invoice));
        return;

      case 'compensate':
        unit.recordAll(await this.compensation.planCompensation(unit.invoice));
        return;

      case 'none':
        return;

      default:
        assertNever(effect);
    }
  }

  private lockKeysFor(unit: UnitOfWork): string[] {
    const keys = [invoiceLockKey(unit.invoice.id)];
    const { effect } = unit.transition;

    if (effect === 'reserve-stock' || effect === 'compensate') {
      unit.invoice.items.forEach((item) => keys.push(productLockKey(item.productId)));
    }

    return keys;
  }

  private async loadInvoice(invoiceId: string): Promise<Invoice> {
    const invoice = await this.invoiceStore.findById(invoiceId);

    if (!invoice) {
      throw this.invoiceNotFound(invoiceId);
    }

    return invoice;
  }

  private async loadDetails(invoiceId: string): Promise<InvoiceDetails> {
    const details = await this.invoiceStore.findDetails(invoiceId);

    if (!details) {
      throw this.invoiceNotFound(invoiceId);
    }

    return details;
  }

  private invoiceNotFound(invoiceId: string): NotFoundError {
    return new NotFoundError(ErrorCode.INVOICE_NOT_FOUND, `Invoice with ID ${invoiceId} not found`);
  }
}
