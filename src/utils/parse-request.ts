import { Request } from 'express';
import { z } from 'zod';

/**
 * Parses the request parts a `{ body, params, query }` schema describes.
 *
 * Throws ZodError, which the error middleware turns into a 400 with
 * per-field details.
 *
 * Usage:
 * ```typescript
 * const { body } = parseRequest(createInvoiceSchema, req);
 * ```
 */
export const parseRequest = <S extends z.ZodTypeAny>(schema: S, req: Request): z.infer<S> =>
  schema.parse({
    body: req.body,
    params: req.params,
    query: req.query,
  });
