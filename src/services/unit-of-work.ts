import { Invoice, InvoiceStatus, TrackingInfo } from '../types/invoice.types';
import { LedgerEntryDraft } from '../types/inventory.types';
import { TransitionCommit } from '../types/store.types';
import { TransitionDefinition } from '../policies/transition.policy';

/**
 * Collects the writes of a single invoice transition. Side effects only
 * record into it; nothing reaches the store until `InvoiceStore.commit`
 * receives `toCommit()`.
 */
export class UnitOfWork {
  private readonly entries: LedgerEntryDraft[] = [];
  private tracking: TrackingInfo | null;

  constructor(
    readonly invoice: Invoice,
    readonly transition: TransitionDefinition,
    readonly actorId: string
  ) {
    this.tracking = invoice.tracking;
  }

  get expectedStatus(): InvoiceStatus {
    return this.invoice.status;
  }

  record(entry: LedgerEntryDraft): void {
    this.entries.push(entry);
  }

  recordAll(entries: readonly LedgerEntryDraft[]): void {
    entries.forEach((entry) => this.record(entry));
  }

  attachTracking(tracking: TrackingInfo): void {
    this.tracking = tracking;
  }

  get ledgerEntries(): readonly LedgerEntryDraft[] {
    return this.entries;
  }

  /**
   * Product ids whose stock this unit touches, ascending
   */
  touchedProductIds(): string[] {
    return [...new Set(this.entries.map((entry) => entry.productId))].sort();
  }

  toCommit(): TransitionCommit {
    return {
      invoiceId: this.invoice.id,
      expectedStatus: this.expectedStatus,
      nextStatus: this.transition.to,
      actorId: this.actorId,
      tracking: this.tracking,
      entries: [...this.entries],
    };
  }
}
