import { Request, Response } from 'express';
import { MaintenanceService } from '../services/maintenance.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { requireActor } from '../middleware/auth.middleware';
import { reconcileSchema } from '../validators/inventory.validator';

/**
 * Maintenance Controller
 *
 * HTTP request handlers for maintenance endpoints
 */
export class MaintenanceController {
  constructor(private maintenanceService: MaintenanceService) {}

  /**
   * POST /v1/maintenance/reconcile
   * Check every product's stock against its ledger
   */
  reconcile = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(reconcileSchema, req);

    const result = await this.maintenanceService.reconcile(body.product_ids, requireActor(req));

    res
      .status(200)
      .json(
        createSuccessResponse(
          result,
          `Checked ${result.checkedCount} products, ${result.inconsistent.length} inconsistent`
        )
      );
  });
}
