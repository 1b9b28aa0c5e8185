import type { ReviewPagination } from '../middleware/validation/schema';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      reviewPagination?: ReviewPagination;
    }
  }
}

export {};
