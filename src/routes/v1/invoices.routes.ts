import { Router } from 'express';
import { InvoiceController } from '../../controllers/invoice.controller';

/**
 * Invoice routes (v1)
 */
export function createInvoiceRoutes(invoiceController: InvoiceController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/invoices:
   *   post:
   *     summary: Create an invoice
   *     description: Creates an invoice in warehouse_pending. No stock is reserved yet. Roles admin, accountant.
   *     tags: [Invoices]
   *     security:
   *       - bearerAuth: []
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - customer_id
   *               - payment_type
   *               - items
   *             properties:
   *               customer_id:
   *                 type: string
   *                 format: uuid
   *               payment_type:
   *                 type: string
   *                 enum: [cash, check, mixed]
   *               payment_breakdown:
   *                 type: object
   *                 description: Required when payment_type is mixed
   *                 properties:
   *                   cash:
   *                     type: number
   *                     minimum: 0
   *                   check:
   *                     type: number
   *                     minimum: 0
   *               items:
   *                 type: array
   *                 minItems: 1
   *                 items:
   *                   $ref: '#/components/schemas/InvoiceLineInput'
   *     responses:
   *       201:
   *         description: Invoice created
   *       400:
   *         description: Validation failed
   *       403:
   *         description: Role not allowed to create invoices
   *       404:
   *         description: Customer or product not found
   *   get:
   *     summary: List invoices visible to the caller
   *     tags: [Invoices]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - in: query
   *         name: status
   *         schema:
   *           $ref: '#/components/schemas/InvoiceStatus'
   *       - in: query
   *         name: customer_id
   *         schema:
   *           type: string
   *           format: uuid
   *       - in: query
   *         name: payment_type
   *         schema:
   *           type: string
   *           enum: [cash, check, mixed]
   *       - in: query
   *         name: created_by
   *         schema:
   *           type: string
   *           format: uuid
   *       - in: query
   *         name: start_date
   *         schema:
   *           type: string
   *           format: date-time
   *       - in: query
   *         name: end_date
   *         schema:
   *           type: string
   *           format: date-time
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           minimum: 1
   *           maximum: 100
   *           default: 20
   *       - in: query
   *         name: offset
   *         schema:
   *           type: integer
   *           minimum: 0
   *           default: 0
   *     responses:
   *       200:
   *         description: Page of invoices, newest first
   */
  router.post('/', invoiceController.createInvoice);
  router.get('/', invoiceController.listInvoices);

  /**
   * @swagger
   * /v1/invoices/{id}:
   *   get:
   *     summary: Get invoice by ID
   *     tags: [Invoices]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/InvoiceId'
   *     responses:
   *       200:
   *         description: Invoice with items, customer and creator resolved
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Invoice'
   *       403:
   *         description: Role cannot view invoices in this status
   *       404:
   *         description: Invoice not found
   */
  router.get('/:id', invoiceController.getInvoice);

  /**
   * @swagger
   * /v1/invoices/{id}/transactions:
   *   get:
   *     summary: Ledger entries of an invoice, oldest first
   *     tags: [Invoices]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/InvoiceId'
   *     responses:
   *       200:
   *         description: Ledger entries
   *       404:
   *         description: Invoice not found
   */
  router.get('/:id/transactions', invoiceController.getInvoiceTransactions);

  /**
   * @swagger
   * /v1/invoices/{id}/reserve:
   *   post:
   *     summary: Reserve stock for every line item
   *     description: warehouse_pending to accountant_pending. All or nothing. Roles warehouse, admin.
   *     tags: [Invoice lifecycle]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/InvoiceId'
   *     responses:
   *       200:
   *         description: Stock reserved
   *       409:
   *         description: Invalid transition, insufficient stock (every shortfall listed) or concurrent update
   */
  router.post('/:id/reserve', invoiceController.reserveInvoice);

  /**
   * @swagger
   * /v1/invoices/{id}/approve:
   *   post:
   *     summary: Approve an invoice
   *     description: accountant_pending to approved. Roles accountant, admin.
   *     tags: [Invoice lifecycle]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/InvoiceId'
   *     responses:
   *       200:
   *         description: Invoice approved
   *       409:
   *         description: Invalid transition or concurrent update
   */
  router.post('/:id/approve', invoiceController.approveInvoice);

  /**
   * @swagger
   * /v1/invoices/{id}/ship:
   *   post:
   *     summary: Ship an invoice
   *     description: approved to shipped. Stock-neutral. Roles warehouse, admin.
   *     tags: [Invoice lifecycle]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/InvoiceId'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/TrackingInfo'
   *     responses:
   *       200:
   *         description: Invoice shipped
   *       400:
   *         description: Missing or invalid tracking information
   *       409:
   *         description: Invalid transition or concurrent update
   */
  router.post('/:id/ship', invoiceController.shipInvoice);

  /**
   * @swagger
   * /v1/invoices/{id}/deliver:
   *   post:
   *     summary: Mark an invoice delivered
   *     description: shipped to delivered. Roles warehouse, admin.
   *     tags: [Invoice lifecycle]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/InvoiceId'
   *     responses:
   *       200:
   *         description: Invoice delivered
   *       409:
   *         description: Invalid transition or concurrent update
   */
  router.post('/:id/deliver', invoiceController.deliverInvoice);

  /**
   * @swagger
   * /v1/invoices/{id}/cancel:
   *   post:
   *     summary: Cancel an invoice
   *     description: From warehouse_pending, accountant_pending or approved. Releases exactly what was reserved. Roles admin, accountant.
   *     tags: [Invoice lifecycle]
   *     security:
   *       - bearerAuth: []
   *     parameters:
   *       - $ref: '#/components/parameters/InvoiceId'
   *     responses:
   *       200:
   *         description: Invoice cancelled
   *       409:
   *         description: Invalid transition or concurrent update
   */
  router.post('/:id/cancel', invoiceController.cancelInvoice);

  return router;
}
