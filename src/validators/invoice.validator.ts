import { z } from 'zod';
import { InvoiceStatus, PaymentType } from '../types/invoice.types';

/**
 * Invoice validation schemas
 */

const quantitySchema = z
  .number({
    required_error: 'Quantity is required',
    invalid_type_error: 'Quantity must be a number',
  })
  .positive('Quantity must be positive')
  .max(1_000_000, 'Quantity is too large');

const amountSchema = z.number().nonnegative('Amount cannot be negative');

const rollCountSchema = z.number().positive('Roll count must be positive').max(100_000, 'Roll count is too large');

const detailedRollSchema = z.object({
  pieces: z
    .array(z.object({ measurement: quantitySchema }))
    .min(1, 'A roll needs at least one piece')
    .max(100),
});

const paymentBreakdownSchema = z
  .object({
    cash: amountSchema.optional(),
    check: amountSchema.optional(),
  })
  .strict();

// Domain-level tracking info, checked again by the service before any write
export const trackingInfoSchema = z.object({
  carrierName: z.string().trim().min(1, 'Carrier name is required'),
  trackingCode: z.string().trim().min(1, 'Tracking code is required'),
  shippingDate: z.string().trim().min(1, 'Shipping date is required'),
  numberOfPackages: z
    .number({ required_error: 'Number of packages is required' })
    .int('Number of packages must be an integer')
    .min(1, 'At least one package is required'),
});

export const invoiceIdParamsSchema = z.object({
  params: z.object({
    id: z.string().uuid('Invalid invoice ID format'),
  }),
});

// Create invoice request schema
export const createInvoiceSchema = z.object({
  body: z
    .object({
      customer_id: z.string().uuid('Invalid customer ID format'),
      payment_type: z.nativeEnum(PaymentType),
      payment_breakdown: paymentBreakdownSchema.optional(),
      items: z
        .array(
          z
            .object({
              product_id: z.string().uuid('Invalid product ID format'),
              quantity: quantitySchema.optional(),
              rolls_count: rollCountSchema.optional(),
              pieces_per_roll: quantitySchema.optional(),
              detailed_rolls: z.array(detailedRollSchema).max(500).optional(),
              unit: z.string().trim().min(1, 'Unit is required').max(32),
              unit_price: amountSchema,
            })
            .refine(
              (item) =>
                item.quantity !== undefined ||
                item.rolls_count !== undefined ||
                (item.detailed_rolls !== undefined && item.detailed_rolls.length > 0),
              { message: 'Quantity, rolls_count or detailed_rolls is required', path: ['quantity'] }
            )
            .refine((item) => item.rolls_count === undefined || item.pieces_per_roll !== undefined, {
              message: 'pieces_per_roll is required with rolls_count',
              path: ['pieces_per_roll'],
            })
        )
        .min(1, 'An invoice needs at least one line item')
        .max(200, 'An invoice can have at most 200 line items'),
    })
    .refine((body) => body.payment_type !== PaymentType.MIXED || body.payment_breakdown !== undefined, {
      message: 'Payment breakdown is required for mixed payments',
      path: ['payment_breakdown'],
    }),
});

// Ship invoice request schema
export const shipInvoiceSchema = invoiceIdParamsSchema.extend({
  body: z.object({
    carrier_name: z.string({ required_error: 'Carrier name is required' }).trim().min(1, 'Carrier name is required'),
    tracking_code: z.string({ required_error: 'Tracking code is required' }).trim().min(1, 'Tracking code is required'),
    shipping_date: z.string({ required_error: 'Shipping date is required' }).trim().min(1, 'Shipping date is required'),
    number_of_packages: z
      .number({
        required_error: 'Number of packages is required',
        invalid_type_error: 'Number of packages must be a number',
      })
      .int('Number of packages must be an integer')
      .min(1, 'At least one package is required'),
  }),
});

// List invoices query schema
export const listInvoicesSchema = z.object({
  query: z
    .object({
      status: z.nativeEnum(InvoiceStatus).optional(),
      customer_id: z.string().uuid('Invalid customer ID format').optional(),
      payment_type: z.nativeEnum(PaymentType).optional(),
      created_by: z.string().uuid('Invalid user ID format').optional(),
      start_date: z.coerce.date().optional(),
      end_date: z.coerce.date().optional(),
      limit: z.coerce.number().int().min(1).max(100).default(20),
      offset: z.coerce.number().int().min(0).default(0),
    })
    .refine((q) => !q.start_date || !q.end_date || q.start_date <= q.end_date, {
      message: 'start_date must not be after end_date',
      path: ['start_date'],
    }),
});

// Infer TypeScript types from schemas
export type CreateInvoiceRequest = z.infer<typeof createInvoiceSchema>;
export type ShipInvoiceRequest = z.infer<typeof shipInvoiceSchema>;
export type ListInvoicesRequest = z.infer<typeof listInvoicesSchema>;
