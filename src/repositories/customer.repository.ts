import { SupabaseClient } from '@supabase/supabase-js';
import { BankAccountRow, CustomerRow, CustomerWithAccounts } from '../types/party.types';
import { CustomerStore } from '../types/store.types';
import { componentLogger } from '../config/logger';

const log = componentLogger('CustomerRepository');

export const CUSTOMER_SELECT = '*, bank_accounts:customer_bank_accounts(*)';

/**
 * Map a customer row (with embedded bank accounts) to the domain model
 */
export function mapToCustomer(row: CustomerRow): CustomerWithAccounts {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    fullName: `${row.first_name} ${row.last_name}`.trim(),
    phone: row.phone,
    address: row.address,
    city: row.city,
    province: row.province,
    bankAccounts: (row.bank_accounts ?? []).map((account: BankAccountRow) => ({
      id: account.id,
      bankName: account.bank_name,
      accountNumber: account.account_number,
      iban: account.iban,
    })),
  };
}

/**
 * Customer Repository (read-only)
 */
export class CustomerRepository implements CustomerStore {
  constructor(private client: SupabaseClient) {}

  async findById(id: string): Promise<CustomerWithAccounts | null> {
    const { data, error } = await this.client.from('customers').select(CUSTOMER_SELECT).eq('id', id).single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      log.error('Failed to find customer', { id, error: error.message });
      throw new Error(`Failed to find customer: ${error.message}`);
    }

    return data ? mapToCustomer(data) : null;
  }
}
