import type { Request, Response, NextFunction } from 'express';
import { DocumentParseError } from '../../services/documentIntake.service';

export type ErrorResponse = { status: number; body: Record<string, unknown> };

/**
 * Service error codes (carried as `Error.message`) mapped to HTTP responses.
 */
export type ErrorHandlerMap = Record<string, (error: Error) => ErrorResponse>;

/**
 * Wraps an async route handler: mapped service errors become their response,
 * anything else is logged and answered with 500.
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap?: ErrorHandlerMap
) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      const mapper = error instanceof Error && errorMap ? errorMap[error.message] : undefined;
      if (mapper && error instanceof Error) {
        const mapped = mapper(error);
        return res.status(mapped.status).json(mapped.body);
      }

      console.error(error);
      return res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error && { details: error.message })
      });
    }
  };
}

export function createErrorResponse(status: number, message: string, details?: unknown): ErrorResponse {
  return { status, body: { error: message, ...(details !== undefined && { details }) } };
}

export const poReviewErrorMap: ErrorHandlerMap = {
  DOCUMENT_PARSE_FAILED: (error) =>
    error instanceof DocumentParseError
      ? createErrorResponse(422, error.details.message, { document: error.details.document })
      : createErrorResponse(422, 'Document could not be parsed.'),
  REVIEW_NOT_FOUND: () => createErrorResponse(404, 'PO review not found.')
};

export const masterDataErrorMap: ErrorHandlerMap = {
  SKU_NOT_FOUND: () => createErrorResponse(404, 'SKU not found in product master or stock ledger.'),
  MASTER_DATA_RELOAD_FAILED: () => createErrorResponse(503, 'Master data reload failed; the previous snapshot is still in use.')
};

export const settingsErrorMap: ErrorHandlerMap = {
  SETTINGS_SAVE_FAILED: () => createErrorResponse(500, 'Failed to save settings.')
};
