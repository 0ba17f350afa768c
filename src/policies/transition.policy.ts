import { InvoiceAction, InvoiceStatus } from '../types/invoice.types';
import { UserRole } from '../types/party.types';
import { InvalidTransitionError } from '../types/error.types';

/**
 * Side effect a transition runs inside its unit of work
 */
export type TransitionEffect = 'reserve-stock' | 'mark-shipment' | 'compensate' | 'none';

export interface TransitionDefinition {
  action: InvoiceAction;
  roles: readonly UserRole[];
  from: readonly InvoiceStatus[];
  effect: TransitionEffect;
  to: InvoiceStatus;
}

/**
 * Invoice lifecycle:
 *
 *   warehouse_pending -> accountant_pending -> approved -> shipped -> delivered
 *          \__________________\__________________\--> cancelled
 *
 * `cancel` is only accepted while stock is still in the warehouse.
 */
export const TRANSITIONS: Readonly<Record<InvoiceAction, TransitionDefinition>> = {
  reserve: {
    action: 'reserve',
    roles: [UserRole.WAREHOUSE, UserRole.ADMIN],
    from: [InvoiceStatus.WAREHOUSE_PENDING],
    effect: 'reserve-stock',
    to: InvoiceStatus.ACCOUNTANT_PENDING,
  },
  approve: {
    action: 'approve',
    roles: [UserRole.ACCOUNTANT, UserRole.ADMIN],
    from: [InvoiceStatus.ACCOUNTANT_PENDING],
    effect: 'none',
    to: InvoiceStatus.APPROVED,
  },
  ship: {
    action: 'ship',
    roles: [UserRole.WAREHOUSE, UserRole.ADMIN],
    from: [InvoiceStatus.APPROVED],
    effect: 'mark-shipment',
    to: InvoiceStatus.SHIPPED,
  },
  deliver: {
    action: 'deliver',
    roles: [UserRole.WAREHOUSE, UserRole.ADMIN],
    from: [InvoiceStatus.SHIPPED],
    effect: 'none',
    to: InvoiceStatus.DELIVERED,
  },
  cancel: {
    action: 'cancel',
    roles: [UserRole.ADMIN, UserRole.ACCOUNTANT],
    from: [InvoiceStatus.WAREHOUSE_PENDING, InvoiceStatus.ACCOUNTANT_PENDING, InvoiceStatus.APPROVED],
    effect: 'compensate',
    to: InvoiceStatus.CANCELLED,
  },
};

export const INVOICE_ACTIONS: readonly InvoiceAction[] = ['reserve', 'approve', 'ship', 'deliver', 'cancel'];

export const TERMINAL_STATUSES: readonly InvoiceStatus[] = [
  InvoiceStatus.DELIVERED,
  InvoiceStatus.CANCELLED,
];

export function canTransition(status: InvoiceStatus, action: InvoiceAction): boolean {
  return TRANSITIONS[action].from.includes(status);
}

/**
 * Returns the transition for `action` when `status` satisfies its
 * precondition, throws InvalidTransitionError otherwise.
 */
export function resolveTransition(status: InvoiceStatus, action: InvoiceAction): TransitionDefinition {
  const transition = TRANSITIONS[action];

  if (!transition.from.includes(status)) {
    throw new InvalidTransitionError(action, status, transition.from);
  }

  return transition;
}

/**
 * Actions that are legal from `status`, in table order
 */
export function availableActions(status: InvoiceStatus): InvoiceAction[] {
  return INVOICE_ACTIONS.filter((action) => canTransition(status, action));
}
