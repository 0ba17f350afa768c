import { Router } from 'express';
import { MaintenanceController } from '../../controllers/maintenance.controller';

/**
 * Maintenance routes (v1)
 */
export function createMaintenanceRoutes(maintenanceController: MaintenanceController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/maintenance/reconcile:
   *   post:
   *     summary: Reconcile stock against the ledger
   *     description: Checks baseline_quantity + SUM(delta) = quantity_available for each product. Admin only.
   *     tags: [Maintenance]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: false
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               product_ids:
   *                 type: array
   *                 description: Defaults to every product
   *                 items:
   *                   type: string
   *                   format: uuid
   *     responses:
   *       200:
   *         description: Reconciliation report
   *       403:
   *         description: Admin only
   */
  router.post('/reconcile', maintenanceController.reconcile);

  return router;
}
