import { Request, Response } from 'express';
import { InventoryService } from '../services/inventory.service';
import { createPaginatedResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { requireActor } from '../middleware/auth.middleware';
import {
  adjustStockSchema,
  listTransactionsSchema,
  productIdParamsSchema,
} from '../validators/inventory.validator';

/**
 * Inventory Controller
 *
 * HTTP request handlers for stock and ledger endpoints
 */
export class InventoryController {
  constructor(private inventoryService: InventoryService) {}

  /**
   * GET /v1/inventory/products/:id
   * Get product stock with allocated quantity
   */
  getStock = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(productIdParamsSchema, req);
    requireActor(req);

    const stock = await this.inventoryService.getStock(params.id);

    res.status(200).json(createSuccessResponse(stock));
  });

  /**
   * GET /v1/inventory/transactions
   * List ledger entries, newest first
   */
  listTransactions = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(listTransactionsSchema, req);
    requireActor(req);

    const page = await this.inventoryService.listTransactions({
      ...(query.product_id && { productId: query.product_id }),
      ...(query.invoice_id && { invoiceId: query.invoice_id }),
      ...(query.kind && { kind: query.kind }),
      limit: query.limit,
      offset: query.offset,
    });

    res.status(200).json(createPaginatedResponse(page, query));
  });

  /**
   * POST /v1/inventory/adjustments
   * Record a manual stock adjustment
   */
  adjustStock = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(adjustStockSchema, req);

    const adjustment = await this.inventoryService.adjustStock(
      {
        productId: body.product_id,
        delta: body.delta,
        ...(body.note && { note: body.note }),
      },
      requireActor(req)
    );

    res.status(201).json(createSuccessResponse(adjustment, 'Stock adjusted'));
  });
}
