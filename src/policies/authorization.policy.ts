import { ALL_INVOICE_STATUSES, InvoiceAction, InvoiceStatus } from '../types/invoice.types';
import { UserRole } from '../types/party.types';
import { ForbiddenError } from '../types/error.types';
import { TRANSITIONS } from './transition.policy';

export type GatedAction =
  | InvoiceAction
  | 'create'
  | 'view'
  | 'adjust-stock'
  | 'reconcile';

export type AuthorizationDecision = { allowed: true } | { allowed: false; reason: string };

const STATUS_VISIBILITY: Readonly<Record<UserRole, readonly InvoiceStatus[]>> = {
  [UserRole.ADMIN]: ALL_INVOICE_STATUSES,
  // No pre-creation draft state exists here, so accountants see every status
  [UserRole.ACCOUNTANT]: ALL_INVOICE_STATUSES,
  [UserRole.WAREHOUSE]: [InvoiceStatus.WAREHOUSE_PENDING, InvoiceStatus.APPROVED, InvoiceStatus.SHIPPED],
};

const NON_TRANSITION_ROLES: Readonly<Record<'create' | 'adjust-stock' | 'reconcile', readonly UserRole[]>> = {
  create: [UserRole.ADMIN, UserRole.ACCOUNTANT],
  'adjust-stock': [UserRole.ADMIN, UserRole.WAREHOUSE],
  reconcile: [UserRole.ADMIN],
};

export function visibleStatuses(role: UserRole): readonly InvoiceStatus[] {
  return STATUS_VISIBILITY[role];
}

/**
 * Pure permission check. `status` is the invoice's current status and is
 * only consulted for `view`; transition preconditions are the state
 * machine's concern.
 */
export function authorize(
  role: UserRole,
  action: GatedAction,
  status: InvoiceStatus | null = null
): AuthorizationDecision {
  switch (action) {
    case 'view':
      if (status !== null && !STATUS_VISIBILITY[role].includes(status)) {
        return { allowed: false, reason: `Role ${role} cannot view invoices in status ${status}` };
      }
      return { allowed: true };

    case 'create':
    case 'adjust-stock':
    case 'reconcile':
      return decide(role, action, NON_TRANSITION_ROLES[action]);

    default:
      return decide(role, action, TRANSITIONS[action].roles);
  }
}

export function assertAuthorized(role: UserRole, action: GatedAction, status: InvoiceStatus | null = null): void {
  const decision = authorize(role, action, status);

  if (!decision.allowed) {
    throw new ForbiddenError(decision.reason, { role, action, ...(status !== null && { status }) });
  }
}

function decide(role: UserRole, action: GatedAction, roles: readonly UserRole[]): AuthorizationDecision {
  if (roles.includes(role)) {
    return { allowed: true };
  }

  return {
    allowed: false,
    reason: `Role ${role} is not allowed to ${action}; allowed roles: ${roles.join(', ')}`,
  };
}
