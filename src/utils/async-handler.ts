import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Wraps an async route handler so a rejected promise reaches the error
 * middleware instead of becoming an unhandled rejection.
 *
 * Usage:
 * ```typescript
 * reserveInvoice = asyncHandler(async (req, res) => {
 *   const invoice = await this.invoiceService.reserve(req.params.id, requireActor(req));
 *   res.json(createSuccessResponse(invoice));
 * });
 * ```
 */
export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};
