import type { QueryResultRow } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { query, type RowQuery } from '../db';
import type {
  PalletLimitViolation,
  ReconciliationResult,
  ValidatedItem,
  ValidationSummary
} from './allocation/types';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type ReviewRecord = {
  id: string;
  timestamp: string;
  aggregateDocNumber: string;
  breakdownDocNumber: string | null;
  summary: JsonObject;
  mismatchCount: number;
  warningCount: number;
};

/**
 * Converts a value into something every JSON consumer accepts: NaN and
 * +/-Infinity become 0, Maps become plain objects, Sets become arrays, Dates
 * become ISO strings, and undefined properties are dropped.
 */
export function sanitizeForExternalization(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((entry) => sanitizeForExternalization(entry));
  if (value instanceof Set) return [...value].map((entry) => sanitizeForExternalization(entry));
  if (value instanceof Map) {
    const out: JsonObject = {};
    for (const [key, entry] of value) {
      out[String(key)] = sanitizeForExternalization(entry);
    }
    return out;
  }
  if (typeof value === 'object') {
    const out: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined || typeof entry === 'function') continue;
      out[key] = sanitizeForExternalization(entry);
    }
    return out;
  }
  return null;
}

function sanitizeObject(value: unknown): JsonObject {
  const sanitized = sanitizeForExternalization(value);
  if (sanitized !== null && typeof sanitized === 'object' && !Array.isArray(sanitized)) {
    return sanitized;
  }
  return {};
}

export type ReviewRecordInput = {
  aggregateDocNumber: string;
  breakdownDocNumber?: string | null;
  summary: ValidationSummary;
  validatedItems: readonly Pick<ValidatedItem, 'combinedStatus'>[];
  reconciliation?: Pick<ReconciliationResult, 'mismatches'> | null;
  palletViolations?: readonly PalletLimitViolation[];
};

export type ReviewRecordOptions = {
  now?: () => Date;
  generateId?: () => string;
};

export function countWarnings(
  items: readonly Pick<ValidatedItem, 'combinedStatus'>[],
  palletViolations: readonly PalletLimitViolation[] = []
): number {
  return items.filter((item) => item.combinedStatus !== 'OK').length + palletViolations.length;
}

export function buildReviewRecord(input: ReviewRecordInput, options: ReviewRecordOptions = {}): ReviewRecord {
  const now = options.now ?? (() => new Date());
  const generateId = options.generateId ?? uuidv4;
  return {
    id: generateId(),
    timestamp: now().toISOString(),
    aggregateDocNumber: input.aggregateDocNumber,
    breakdownDocNumber: input.breakdownDocNumber ?? null,
    summary: sanitizeObject(input.summary),
    mismatchCount: input.reconciliation?.mismatches.length ?? 0,
    warningCount: countWarnings(input.validatedItems, input.palletViolations)
  };
}

export interface ReviewRecordRepository {
  save(record: ReviewRecord): Promise<void>;
  list(limit: number, offset?: number): Promise<ReviewRecord[]>;
  remove(id: string): Promise<boolean>;
}

export class InMemoryReviewRecordRepository implements ReviewRecordRepository {
  private records = new Map<string, ReviewRecord>();

  async save(record: ReviewRecord): Promise<void> {
    this.records.set(record.id, record);
  }

  async list(limit: number, offset = 0): Promise<ReviewRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp))
      .slice(offset, offset + limit);
  }

  async remove(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}

function toIsoTimestamp(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return String(value ?? '');
}

export function mapReviewRecordRow(row: QueryResultRow): ReviewRecord {
  return {
    id: String(row.id),
    timestamp: toIsoTimestamp(row.created_at),
    aggregateDocNumber: String(row.aggregate_doc_number ?? ''),
    breakdownDocNumber: row.breakdown_doc_number == null ? null : String(row.breakdown_doc_number),
    summary: sanitizeObject(row.summary),
    mismatchCount: Number(row.mismatch_count ?? 0),
    warningCount: Number(row.warning_count ?? 0)
  };
}

export class PgReviewRecordRepository implements ReviewRecordRepository {
  constructor(private readonly run: RowQuery = query) {}

  async save(record: ReviewRecord): Promise<void> {
    await this.run(
      `INSERT INTO po_review_records (
         id, created_at, aggregate_doc_number, breakdown_doc_number, summary, mismatch_count, warning_count
       ) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        record.id,
        record.timestamp,
        record.aggregateDocNumber,
        record.breakdownDocNumber,
        JSON.stringify(record.summary),
        record.mismatchCount,
        record.warningCount
      ]
    );
  }

  async list(limit: number, offset = 0): Promise<ReviewRecord[]> {
    const { rows } = await this.run(
      `SELECT id, created_at, aggregate_doc_number, breakdown_doc_number, summary, mismatch_count, warning_count
         FROM po_review_records
        ORDER BY created_at DESC
        LIMIT $1 OFFSET $2`,
      [limit, offset]
    );
    return rows.map(mapReviewRecordRow);
  }

  async remove(id: string): Promise<boolean> {
    const { rowCount } = await this.run('DELETE FROM po_review_records WHERE id = $1', [id]);
    return (rowCount ?? 0) > 0;
  }
}
