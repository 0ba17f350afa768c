import { z } from 'zod';
import { TransactionKind } from '../types/inventory.types';

/**
 * Inventory and maintenance validation schemas
 */

// Get product stock schema
export const productIdParamsSchema = z.object({
  params: z.object({
    id: z.string().uuid('Invalid product ID format'),
  }),
});

// List ledger transactions query schema
export const listTransactionsSchema = z.object({
  query: z.object({
    product_id: z.string().uuid('Invalid product ID format').optional(),
    invoice_id: z.string().uuid('Invalid invoice ID format').optional(),
    kind: z.nativeEnum(TransactionKind).optional(),
    limit: z.coerce.number().int().min(1).max(100).default(50),
    offset: z.coerce.number().int().min(0).default(0),
  }),
});

// Manual stock adjustment schema
export const adjustStockSchema = z.object({
  body: z.object({
    product_id: z.string().uuid('Invalid product ID format'),
    delta: z
      .number({
        required_error: 'Delta is required',
        invalid_type_error: 'Delta must be a number',
      })
      .refine((value) => value !== 0, 'Delta must not be zero'),
    note: z.string().trim().max(500, 'Note must be at most 500 characters').optional(),
  }),
});

// Reconcile request schema (all products when product_ids is omitted)
export const reconcileSchema = z.object({
  body: z
    .object({
      product_ids: z.array(z.string().uuid('Invalid product ID format')).min(1).max(500).optional(),
    })
    .default({}),
});

// Infer TypeScript types from schemas
export type ListTransactionsRequest = z.infer<typeof listTransactionsSchema>;
export type AdjustStockRequest = z.infer<typeof adjustStockSchema>;
export type ReconcileRequest = z.infer<typeof reconcileSchema>;
