import { getRequestContext } from '../lib/requestContext';

export const PO_REVIEW_EVENT = {
  REVIEW_COMPLETED: 'PO_REVIEW_COMPLETED',
  MASTER_DATA_RELOADED: 'MASTER_DATA_RELOADED',
  MASTER_DATA_RELOAD_FAILED: 'MASTER_DATA_RELOAD_FAILED',
  MASTER_DATA_REMOTE_LOOKUP_FAILED: 'MASTER_DATA_REMOTE_LOOKUP_FAILED',
  DOCUMENT_PARSE_FAILED: 'DOCUMENT_PARSE_FAILED'
} as const;

export type PoReviewEventName = (typeof PO_REVIEW_EVENT)[keyof typeof PO_REVIEW_EVENT];

export type ReviewCompletedPayload = {
  reviewId: string;
  aggregateDocNumber: string;
  breakdownDocNumber: string | null;
  lineCount: number;
  palletCount: number;
  mismatchCount: number;
  warningCount: number;
};

export type MasterDataReloadedPayload = {
  source: string;
  productCount: number;
  stockSkuCount: number;
  durationMs: number;
};

export type MasterDataFailurePayload = {
  source: string;
  skuCount: number;
  error: {
    code: string | null;
    message: string;
  };
};

export type DocumentParseFailedPayload = {
  documentName: string;
  role: 'aggregate' | 'breakdown';
  error: string;
};

export type PoReviewEventPayloadMap = {
  [PO_REVIEW_EVENT.REVIEW_COMPLETED]: ReviewCompletedPayload;
  [PO_REVIEW_EVENT.MASTER_DATA_RELOADED]: MasterDataReloadedPayload;
  [PO_REVIEW_EVENT.MASTER_DATA_RELOAD_FAILED]: MasterDataFailurePayload;
  [PO_REVIEW_EVENT.MASTER_DATA_REMOTE_LOOKUP_FAILED]: MasterDataFailurePayload;
  [PO_REVIEW_EVENT.DOCUMENT_PARSE_FAILED]: DocumentParseFailedPayload;
};

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object';
}

function hasString(value: Record<string, unknown>, key: string): boolean {
  return typeof value[key] === 'string' && value[key] !== '';
}

function hasNullableString(value: Record<string, unknown>, key: string): boolean {
  return value[key] === null || typeof value[key] === 'string';
}

function hasCount(value: Record<string, unknown>, key: string): boolean {
  const candidate = value[key];
  return typeof candidate === 'number' && Number.isFinite(candidate) && candidate >= 0;
}

export function isReviewCompletedPayload(payload: unknown): payload is ReviewCompletedPayload {
  if (!isObject(payload)) return false;
  return (
    hasString(payload, 'reviewId')
    && typeof payload.aggregateDocNumber === 'string'
    && hasNullableString(payload, 'breakdownDocNumber')
    && hasCount(payload, 'lineCount')
    && hasCount(payload, 'palletCount')
    && hasCount(payload, 'mismatchCount')
    && hasCount(payload, 'warningCount')
  );
}

export function isMasterDataReloadedPayload(payload: unknown): payload is MasterDataReloadedPayload {
  if (!isObject(payload)) return false;
  return (
    hasString(payload, 'source')
    && hasCount(payload, 'productCount')
    && hasCount(payload, 'stockSkuCount')
    && hasCount(payload, 'durationMs')
  );
}

export function isMasterDataFailurePayload(payload: unknown): payload is MasterDataFailurePayload {
  if (!isObject(payload) || !isObject(payload.error)) return false;
  return (
    hasString(payload, 'source')
    && hasCount(payload, 'skuCount')
    && hasNullableString(payload.error, 'code')
    && typeof payload.error.message === 'string'
  );
}

export function isDocumentParseFailedPayload(payload: unknown): payload is DocumentParseFailedPayload {
  if (!isObject(payload)) return false;
  return (
    typeof payload.documentName === 'string'
    && (payload.role === 'aggregate' || payload.role === 'breakdown')
    && hasString(payload, 'error')
  );
}

export function isPoReviewEventPayload<T extends PoReviewEventName>(
  event: T,
  payload: unknown
): payload is PoReviewEventPayloadMap[T] {
  if (event === PO_REVIEW_EVENT.REVIEW_COMPLETED) {
    return isReviewCompletedPayload(payload);
  }
  if (event === PO_REVIEW_EVENT.MASTER_DATA_RELOADED) {
    return isMasterDataReloadedPayload(payload);
  }
  if (event === PO_REVIEW_EVENT.DOCUMENT_PARSE_FAILED) {
    return isDocumentParseFailedPayload(payload);
  }
  return isMasterDataFailurePayload(payload);
}

export type EventLogger = (eventName: string, payload: unknown) => void;

export function emitPoReviewEvent<T extends PoReviewEventName>(
  event: T,
  payload: PoReviewEventPayloadMap[T],
  logger: EventLogger = console.warn
): void {
  if (!isPoReviewEventPayload(event, payload)) {
    logger('PO_REVIEW_EVENT_PAYLOAD_INVALID', { event });
  }
  const requestId = getRequestContext()?.requestId;
  logger(event, requestId ? { ...payload, requestId } : payload);
}

export function describeError(error: unknown): { code: string | null; message: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : null;
    return { code, message: error.message };
  }
  return { code: null, message: String(error) };
}
