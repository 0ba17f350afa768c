import { Router } from 'express';
import { InventoryController } from '../../controllers/inventory.controller';

/**
 * Inventory routes (v1)
 */
export function createInventoryRoutes(inventoryController: InventoryController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/inventory/products/{id}:
   *   get:
   *     summary: Get product stock
   *     tags: [Inventory]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Product with available, baseline and allocated quantities
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ProductStock'
   *       404:
   *         description: Product not found
   */
  router.get('/products/:id', inventoryController.getStock);

  /**
   * @swagger
   * /v1/inventory/transactions:
   *   get:
   *     summary: List ledger entries, newest first
   *     tags: [Inventory]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: product_id
   *         schema:
   *           type: string
   *           format: uuid
   *       - in: query
   *         name: invoice_id
   *         schema:
   *           type: string
   *           format: uuid
   *       - in: query
   *         name: kind
   *         schema:
   *           type: string
   *           enum: [reserve, release, ship-mark, adjust]
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           minimum: 1
   *           maximum: 100
   *           default: 50
   *       - in: query
   *         name: offset
   *         schema:
   *           type: integer
   *           minimum: 0
   *           default: 0
   *     responses:
   *       200:
   *         description: Page of ledger entries
   */
  router.get('/transactions', inventoryController.listTransactions);

  /**
   * @swagger
   * /v1/inventory/adjustments:
   *   post:
   *     summary: Record a manual stock adjustment
   *     description: Appends an adjust entry and applies its delta. Roles admin, warehouse.
   *     tags: [Inventory]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - product_id
   *               - delta
   *             properties:
   *               product_id:
   *                 type: string
   *                 format: uuid
   *               delta:
   *                 type: number
   *                 description: Signed, non-zero
   *               note:
   *                 type: string
   *                 maxLength: 500
   *     responses:
   *       201:
   *         description: Adjustment recorded
   *       404:
   *         description: Product not found
   *       409:
   *         description: Stock would become negative
   */
  router.post('/adjustments', inventoryController.adjustStock);

  return router;
}
