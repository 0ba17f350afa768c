import { v4 as uuidv4 } from 'uuid';
import { InMemoryDatabase } from './in-memory-database';
import { Container, createContainer } from '../../src/container';
import { Actor, CreateInvoiceLineInput, InvoiceDetails, PaymentType } from '../../src/types/invoice.types';
import { Product } from '../../src/types/inventory.types';
import { CustomerWithAccounts, UserRole } from '../../src/types/party.types';
import { signAccessToken } from '../../src/utils/jwt';

export const TEST_JWT_SECRET = 'test-secret';

export interface TestContext {
  db: InMemoryDatabase;
  container: Container;
  admin: Actor;
  accountant: Actor;
  warehouse: Actor;
  customer: CustomerWithAccounts;
  addProduct(code: string, quantity: number): Product;
  createInvoice(items: Array<[Product, number]>, actor?: Actor): Promise<InvoiceDetails>;
}

export interface TestContextOptions {
  lockTimeoutMs?: number;
  maxAttempts?: number;
}

export function tokenFor(actor: Actor): string {
  return signAccessToken({ sub: actor.userId, role: actor.role }, TEST_JWT_SECRET);
}

function addUser(db: InMemoryDatabase, role: UserRole, firstName: string): Actor {
  const id = uuidv4();
  db.users.set(id, {
    id,
    email: `${firstName.toLowerCase()}@example.test`,
    firstName,
    lastName: 'Tester',
    role,
    isActive: true,
  });
  return { userId: id, role };
}

/**
 * Fresh in-memory database with one user per role and one customer, and a
 * container wired over it
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const db = new InMemoryDatabase();
  const container = createContainer(db.stores, {
    jwtSecret: TEST_JWT_SECRET,
    lockTimeoutMs: options.lockTimeoutMs ?? 1000,
    maxAttempts: options.maxAttempts ?? 3,
  });

  const admin = addUser(db, UserRole.ADMIN, 'Ada');
  const accountant = addUser(db, UserRole.ACCOUNTANT, 'Carla');
  const warehouse = addUser(db, UserRole.WAREHOUSE, 'Walt');

  const customer: CustomerWithAccounts = {
    id: uuidv4(),
    firstName: 'Mina',
    lastName: 'Rahimi',
    fullName: 'Mina Rahimi',
    phone: '555-0100',
    address: '12 Loom Street',
    city: 'Springfield',
    province: 'North',
    bankAccounts: [{ id: uuidv4(), bankName: 'Test Bank', accountNumber: '000111', iban: null }],
  };
  db.customers.set(customer.id, customer);

  const addProduct = (code: string, quantity: number): Product => {
    const at = new Date('2026-01-01T00:00:00.000Z');
    const product: Product = {
      id: uuidv4(),
      code,
      name: `Fabric ${code}`,
      unit: 'meter',
      quantityAvailable: quantity,
      baselineQuantity: quantity,
      createdAt: at,
      updatedAt: at,
    };
    db.products.set(product.id, product);
    return product;
  };

  const createInvoice = (items: Array<[Product, number]>, actor: Actor = accountant): Promise<InvoiceDetails> => {
    const lines: CreateInvoiceLineInput[] = items.map(([product, quantity]) => ({
      productId: product.id,
      quantity,
      unit: product.unit,
      unitPrice: 10,
    }));

    return container.invoiceService.createInvoice(
      { customerId: customer.id, paymentType: PaymentType.CASH, items: lines },
      actor
    );
  };

  return { db, container, admin, accountant, warehouse, customer, addProduct, createInvoice };
}

export const TRACKING = {
  carrierName: 'Fast Freight',
  trackingCode: 'FF-1001',
  shippingDate: '2026-03-14',
  numberOfPackages: 2,
};
