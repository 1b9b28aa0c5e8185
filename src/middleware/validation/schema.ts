import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

export type ReviewPagination = { limit: number; offset: number };

const uuidSchema = z.string().uuid();

export const paginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  offset: z.coerce.number().int().min(0).optional()
});

export function validateUuidParam(paramName = 'id') {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = uuidSchema.safeParse(req.params[paramName]);
    if (!result.success) {
      return res.status(400).json({ error: `${paramName} must be a UUID.` });
    }
    next();
  };
}

/** Parses `?limit=&offset=` into `req.reviewPagination`; out-of-range values are a 400. */
export function validatePagination(defaultLimit = 20) {
  return (req: Request, res: Response, next: NextFunction) => {
    const parsed = paginationQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    req.reviewPagination = { limit: parsed.data.limit ?? defaultLimit, offset: parsed.data.offset ?? 0 };
    next();
  };
}
