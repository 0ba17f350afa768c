/**
 * Customer and staff user types (read-only, owned by other services)
 */

export enum UserRole {
  ADMIN = 'admin',
  ACCOUNTANT = 'accountant',
  WAREHOUSE = 'warehouse',
}

export interface UserSummary {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  isActive: boolean;
}

export interface BankAccount {
  id: string;
  bankName: string;
  accountNumber: string;
  iban: string | null;
}

export interface Customer {
  id: string;
  firstName: string;
  lastName: string;
  fullName: string;
  phone: string;
  address: string | null;
  city: string | null;
  province: string | null;
}

export interface CustomerWithAccounts extends Customer {
  bankAccounts: BankAccount[];
}

// Database row types (snake_case from PostgreSQL)
export interface UserRow {
  id: string;
  email: string;
  first_name: string;
  last_name: string;
  role: string;
  is_active: boolean;
}

export interface BankAccountRow {
  id: string;
  customer_id: string;
  bank_name: string;
  account_number: string;
  iban: string | null;
}

export interface CustomerRow {
  id: string;
  first_name: string;
  last_name: string;
  phone: string;
  address: string | null;
  city: string | null;
  province: string | null;
  bank_accounts?: BankAccountRow[];
}
