import { describe, it, expect } from 'vitest';
import { assertAuthorized, authorize, visibleStatuses } from '../src/policies/authorization.policy';
import { InvoiceStatus } from '../src/types/invoice.types';
import { UserRole } from '../src/types/party.types';
import { ErrorCode, ForbiddenError } from '../src/types/error.types';

describe('Authorization gate', () => {
  it('grants transitions to the roles in the table', () => {
    expect(authorize(UserRole.WAREHOUSE, 'reserve').allowed).toBe(true);
    expect(authorize(UserRole.ADMIN, 'reserve').allowed).toBe(true);
    expect(authorize(UserRole.ACCOUNTANT, 'approve').allowed).toBe(true);
    expect(authorize(UserRole.WAREHOUSE, 'ship').allowed).toBe(true);
    expect(authorize(UserRole.WAREHOUSE, 'deliver').allowed).toBe(true);
    expect(authorize(UserRole.ACCOUNTANT, 'cancel').allowed).toBe(true);
  });

  it('denies transitions to other roles with a reason', () => {
    expect(authorize(UserRole.ACCOUNTANT, 'reserve')).toEqual({
      allowed: false,
      reason: 'Role accountant is not allowed to reserve; allowed roles: warehouse, admin',
    });
    expect(authorize(UserRole.WAREHOUSE, 'approve').allowed).toBe(false);
    expect(authorize(UserRole.ACCOUNTANT, 'ship').allowed).toBe(false);
    expect(authorize(UserRole.WAREHOUSE, 'cancel').allowed).toBe(false);
  });

  it('gates the non-transition operations', () => {
    expect(authorize(UserRole.ACCOUNTANT, 'create').allowed).toBe(true);
    expect(authorize(UserRole.WAREHOUSE, 'create').allowed).toBe(false);
    expect(authorize(UserRole.WAREHOUSE, 'adjust-stock').allowed).toBe(true);
    expect(authorize(UserRole.ACCOUNTANT, 'adjust-stock').allowed).toBe(false);
    expect(authorize(UserRole.ADMIN, 'reconcile').allowed).toBe(true);
    expect(authorize(UserRole.WAREHOUSE, 'reconcile').allowed).toBe(false);
  });

  it('restricts what the warehouse can view', () => {
    expect(visibleStatuses(UserRole.WAREHOUSE)).toEqual([
      InvoiceStatus.WAREHOUSE_PENDING,
      InvoiceStatus.APPROVED,
      InvoiceStatus.SHIPPED,
    ]);
    expect(authorize(UserRole.WAREHOUSE, 'view', InvoiceStatus.ACCOUNTANT_PENDING)).toEqual({
      allowed: false,
      reason: 'Role warehouse cannot view invoices in status accountant_pending',
    });
    expect(authorize(UserRole.WAREHOUSE, 'view', InvoiceStatus.SHIPPED).allowed).toBe(true);
  });

  it('lets admins and accountants view every status', () => {
    expect(visibleStatuses(UserRole.ADMIN)).toHaveLength(6);
    expect(visibleStatuses(UserRole.ACCOUNTANT)).toHaveLength(6);
    expect(authorize(UserRole.ACCOUNTANT, 'view', InvoiceStatus.CANCELLED).allowed).toBe(true);
  });

  it('throws ForbiddenError with the role, action and status', () => {
    try {
      assertAuthorized(UserRole.WAREHOUSE, 'view', InvoiceStatus.DELIVERED);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ForbiddenError);
      if (!(error instanceof ForbiddenError)) return;
      expect(error.code).toBe(ErrorCode.FORBIDDEN);
      expect(error.statusCode).toBe(403);
      expect(error.details).toEqual({ role: 'warehouse', action: 'view', status: 'delivered' });
    }
  });
});
