import { InvoiceStore, LedgerStore } from '../types/store.types';
import { Actor, InvoiceDetails, InvoiceFilter } from '../types/invoice.types';
import { InventoryTransaction } from '../types/inventory.types';
import { PaginatedResult } from '../types/api.types';
import { ErrorCode, NotFoundError } from '../types/error.types';
import { assertAuthorized, visibleStatuses } from '../policies/authorization.policy';
import { logger } from '../config/logger';

/**
 * Invoice Query Service
 *
 * Read-only access to invoices. The role restriction is folded into the
 * store query so that `total` only ever counts rows the caller can see.
 */
export class InvoiceQueryService {
  constructor(
    private invoiceStore: InvoiceStore,
    private ledgerStore: LedgerStore
  ) {}

  async getInvoice(invoiceId: string, actor: Actor): Promise<InvoiceDetails> {
    logger.debug('Getting invoice', { invoiceId, role: actor.role });

    const invoice = await this.invoiceStore.findDetails(invoiceId);

    if (!invoice) {
      throw new NotFoundError(ErrorCode.INVOICE_NOT_FOUND, `Invoice with ID ${invoiceId} not found`);
    }

    assertAuthorized(actor.role, 'view', invoice.status);
    return invoice;
  }

  /**
   * A requested status outside the role's visible set yields an empty page
   * without touching the store.
   */
  async listInvoices(filter: InvoiceFilter, actor: Actor): Promise<PaginatedResult<InvoiceDetails>> {
    const { status, ...rest } = filter;
    const allowed = visibleStatuses(actor.role);
    const statuses = status ? allowed.filter((visible) => visible === status) : [...allowed];

    if (statuses.length === 0) {
      logger.debug('Requested status not visible to role', { role: actor.role, status });
      return { rows: [], total: 0 };
    }

    return this.invoiceStore.list({ ...rest, statuses });
  }

  /**
   * Ledger of one invoice, oldest first
   */
  async getInvoiceTransactions(invoiceId: string, actor: Actor): Promise<InventoryTransaction[]> {
    const status = await this.invoiceStore.findStatus(invoiceId);

    if (status === null) {
      throw new NotFoundError(ErrorCode.INVOICE_NOT_FOUND, `Invoice with ID ${invoiceId} not found`);
    }

    assertAuthorized(actor.role, 'view', status);
    return this.ledgerStore.listByInvoice(invoiceId);
  }
}
