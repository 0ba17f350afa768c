import { Router } from 'express';
import { Container } from '../container';
import { authenticate } from '../middleware/auth.middleware';
import { HealthCheckResponse } from '../types/api.types';
import { createInvoiceRoutes } from './v1/invoices.routes';
import { createInventoryRoutes } from './v1/inventory.routes';
import { createMaintenanceRoutes } from './v1/maintenance.routes';

/**
 * API Routes Aggregator
 */
export function createRoutes(container: Container): Router {
  const router = Router();
  const requireAuth = authenticate(container.jwtSecret);

  // Health check endpoint
  router.get('/health', (_req, res) => {
    const health: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
    res.status(200).json(health);
  });

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Fabric Order Ledger API',
    });
  });

  // v1 routes
  router.use('/v1/invoices', requireAuth, createInvoiceRoutes(container.invoiceController));
  router.use('/v1/inventory', requireAuth, createInventoryRoutes(container.inventoryController));
  router.use('/v1/maintenance', requireAuth, createMaintenanceRoutes(container.maintenanceController));

  return router;
}
