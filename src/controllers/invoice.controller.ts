import { Request, Response } from 'express';
import { InvoiceService } from '../services/invoice.service';
import { InvoiceQueryService } from '../services/invoice-query.service';
import { createPaginatedResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../utils/parse-request';
import { requireActor } from '../middleware/auth.middleware';
import {
  createInvoiceSchema,
  invoiceIdParamsSchema,
  listInvoicesSchema,
  shipInvoiceSchema,
} from '../validators/invoice.validator';

/**
 * Invoice Controller
 *
 * HTTP request handlers for invoice endpoints
 */
export class InvoiceController {
  constructor(
    private invoiceService: InvoiceService,
    private queryService: InvoiceQueryService
  ) {}

  /**
   * POST /v1/invoices
   * Create an invoice in warehouse_pending
   */
  createInvoice = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createInvoiceSchema, req);

    const invoice = await this.invoiceService.createInvoice(
      {
        customerId: body.customer_id,
        paymentType: body.payment_type,
        ...(body.payment_breakdown && { paymentBreakdown: body.payment_breakdown }),
        items: body.items.map((item) => ({
          productId: item.product_id,
          quantity: item.quantity,
          rollsCount: item.rolls_count,
          piecesPerRoll: item.pieces_per_roll,
          detailedRolls: item.detailed_rolls,
          unit: item.unit,
          unitPrice: item.unit_price,
        })),
      },
      requireActor(req)
    );

    res.status(201).json(createSuccessResponse(invoice, 'Invoice created'));
  });

  /**
   * GET /v1/invoices
   * List invoices visible to the caller's role
   */
  listInvoices = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(listInvoicesSchema, req);

    const page = await this.queryService.listInvoices(
      {
        ...(query.status && { status: query.status }),
        ...(query.customer_id && { customerId: query.customer_id }),
        ...(query.payment_type && { paymentType: query.payment_type }),
        ...(query.created_by && { createdBy: query.created_by }),
        ...(query.start_date && { startDate: query.start_date }),
        ...(query.end_date && { endDate: query.end_date }),
        limit: query.limit,
        offset: query.offset,
      },
      requireActor(req)
    );

    res.status(200).json(createPaginatedResponse(page, query));
  });

  /**
   * GET /v1/invoices/:id
   * Get a fully resolved invoice
   */
  getInvoice = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(invoiceIdParamsSchema, req);

    const invoice = await this.queryService.getInvoice(params.id, requireActor(req));

    res.status(200).json(createSuccessResponse(invoice));
  });

  /**
   * GET /v1/invoices/:id/transactions
   * Get the ledger entries written for an invoice
   */
  getInvoiceTransactions = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(invoiceIdParamsSchema, req);

    const transactions = await this.queryService.getInvoiceTransactions(params.id, requireActor(req));

    res.status(200).json(createSuccessResponse(transactions));
  });

  /**
   * POST /v1/invoices/:id/reserve
   */
  reserveInvoice = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(invoiceIdParamsSchema, req);

    const invoice = await this.invoiceService.reserve(params.id, requireActor(req));

    res.status(200).json(createSuccessResponse(invoice, 'Stock reserved'));
  });

  /**
   * POST /v1/invoices/:id/approve
   */
  approveInvoice = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(invoiceIdParamsSchema, req);

    const invoice = await this.invoiceService.approve(params.id, requireActor(req));

    res.status(200).json(createSuccessResponse(invoice, 'Invoice approved'));
  });

  /**
   * POST /v1/invoices/:id/ship
   */
  shipInvoice = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(shipInvoiceSchema, req);

    const invoice = await this.invoiceService.ship(
      params.id,
      {
        carrierName: body.carrier_name,
        trackingCode: body.tracking_code,
        shippingDate: body.shipping_date,
        numberOfPackages: body.number_of_packages,
      },
      requireActor(req)
    );

    res.status(200).json(createSuccessResponse(invoice, 'Invoice shipped'));
  });

  /**
   * POST /v1/invoices/:id/deliver
   */
  deliverInvoice = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(invoiceIdParamsSchema, req);

    const invoice = await this.invoiceService.deliver(params.id, requireActor(req));

    res.status(200).json(createSuccessResponse(invoice, 'Invoice delivered'));
  });

  /**
   * POST /v1/invoices/:id/cancel
   */
  cancelInvoice = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(invoiceIdParamsSchema, req);

    const invoice = await this.invoiceService.cancel(params.id, requireActor(req));

    res.status(200).json(createSuccessResponse(invoice, 'Invoice cancelled'));
  });
}
