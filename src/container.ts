import { SupabaseClient } from '@supabase/supabase-js';
import { Stores } from './types/store.types';
import { InvoiceRepository } from './repositories/invoice.repository';
import { ProductRepository } from './repositories/product.repository';
import { LedgerRepository } from './repositories/ledger.repository';
import { CustomerRepository } from './repositories/customer.repository';
import { InvoiceService } from './services/invoice.service';
import { InvoiceQueryService } from './services/invoice-query.service';
import { InventoryService } from './services/inventory.service';
import { MaintenanceService } from './services/maintenance.service';
import { ReservationCoordinator } from './services/reservation.service';
import { CompensationEngine } from './services/compensation.service';
import { InvoiceController } from './controllers/invoice.controller';
import { InventoryController } from './controllers/inventory.controller';
import { MaintenanceController } from './controllers/maintenance.controller';
import { KeyedLock } from './utils/keyed-lock';

export interface ContainerOptions {
  jwtSecret: string;
  lockTimeoutMs: number;
  maxAttempts: number;
}

export interface Container {
  jwtSecret: string;
  invoiceService: InvoiceService;
  invoiceQueryService: InvoiceQueryService;
  inventoryService: InventoryService;
  maintenanceService: MaintenanceService;
  invoiceController: InvoiceController;
  inventoryController: InventoryController;
  maintenanceController: MaintenanceController;
}

/**
 * Wires services and controllers over a set of stores. One KeyedLock is
 * shared by every service so invoice and product keys are linearized
 * together.
 */
export function createContainer(stores: Stores, options: ContainerOptions): Container {
  const locks = new KeyedLock();
  const lockOptions = { lockTimeoutMs: options.lockTimeoutMs, maxAttempts: options.maxAttempts };

  const invoiceService = new InvoiceService(
    stores.invoices,
    stores.customers,
    stores.products,
    new ReservationCoordinator(stores.products),
    new CompensationEngine(stores.ledger),
    locks,
    lockOptions
  );
  const invoiceQueryService = new InvoiceQueryService(stores.invoices, stores.ledger);
  const inventoryService = new InventoryService(stores.products, stores.ledger, locks, lockOptions);
  const maintenanceService = new MaintenanceService(stores.products, stores.ledger);

  return {
    jwtSecret: options.jwtSecret,
    invoiceService,
    invoiceQueryService,
    inventoryService,
    maintenanceService,
    invoiceController: new InvoiceController(invoiceService, invoiceQueryService),
    inventoryController: new InventoryController(inventoryService),
    maintenanceController: new MaintenanceController(maintenanceService),
  };
}

/**
 * Stores backed by Supabase
 */
export function createSupabaseStores(client: SupabaseClient): Stores {
  const products = new ProductRepository(client);

  return {
    invoices: new InvoiceRepository(client),
    products,
    ledger: new LedgerRepository(client, products),
    customers: new CustomerRepository(client),
  };
}
