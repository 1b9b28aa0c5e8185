import { describe, expect, it, vi } from 'vitest';
import type { RowQuery } from '../db';
import type { ReconciliationRecord } from './allocation/types';
import { summarizeValidatedItems } from './poSummary.service';
import {
  InMemoryReviewRecordRepository,
  PgReviewRecordRepository,
  buildReviewRecord,
  sanitizeForExternalization,
  type ReviewRecord
} from './reviewRecord.service';

function record(id: string, timestamp: string): ReviewRecord {
  return {
    id,
    timestamp,
    aggregateDocNumber: 'PO-1',
    breakdownDocNumber: null,
    summary: {},
    mismatchCount: 0,
    warningCount: 0
  };
}

function mismatch(sku: string): ReconciliationRecord {
  return { sku, aggregateQty: 10, breakdownTotalQty: 5, difference: -5, status: 'under', breakdownByDestination: [] };
}

describe('sanitizeForExternalization', () => {
  it('replaces values JSON cannot carry', () => {
    const sanitized = sanitizeForExternalization({
      a: Number.NaN,
      b: Number.POSITIVE_INFINITY,
      c: new Map([['DC1', { units: 1 }]]),
      d: new Set([1, 2]),
      e: undefined,
      f: new Date('2026-01-02T03:04:05.000Z'),
      g: [undefined, Number.NEGATIVE_INFINITY],
      h: BigInt(10)
    });
    expect(sanitized).toEqual({
      a: 0,
      b: 0,
      c: { DC1: { units: 1 } },
      d: [1, 2],
      f: '2026-01-02T03:04:05.000Z',
      g: [null, 0],
      h: 10
    });
  });
});

describe('buildReviewRecord', () => {
  it('stamps the record and counts mismatches and warnings', () => {
    const result = buildReviewRecord(
      {
        aggregateDocNumber: 'PO-1',
        breakdownDocNumber: 'PO-1-B',
        summary: summarizeValidatedItems([]),
        validatedItems: [{ combinedStatus: 'OK' }, { combinedStatus: 'PRICE_MISMATCH' }],
        reconciliation: { mismatches: [mismatch('A'), mismatch('B')] },
        palletViolations: [{ palletId: 'P001', limit: 'weight', actual: 2600, max: 2500 }]
      },
      { now: () => new Date('2026-03-01T00:00:00.000Z'), generateId: () => 'review-1' }
    );

    expect(result).toEqual({
      id: 'review-1',
      timestamp: '2026-03-01T00:00:00.000Z',
      aggregateDocNumber: 'PO-1',
      breakdownDocNumber: 'PO-1-B',
      summary: {
        lineCount: 0,
        totalUnits: 0,
        totalCartons: 0,
        totalAmount: 0,
        okCount: 0,
        lowCount: 0,
        outOfStockCount: 0,
        priceMismatchCount: 0,
        productMissingCount: 0,
        totalShortage: 0,
        totalTransferFromSub: 0,
        shortageItems: [],
        perDestination: {}
      },
      mismatchCount: 2,
      warningCount: 2
    });
  });

  it('reports no mismatches without a reconciliation', () => {
    const result = buildReviewRecord({
      aggregateDocNumber: 'PO-2',
      summary: summarizeValidatedItems([]),
      validatedItems: []
    });
    expect(result.mismatchCount).toBe(0);
    expect(result.breakdownDocNumber).toBeNull();
    expect(result.id).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('InMemoryReviewRecordRepository', () => {
  it('lists newest first with paging and removes by id', async () => {
    const repository = new InMemoryReviewRecordRepository();
    await repository.save(record('r1', '2026-01-01T00:00:00.000Z'));
    await repository.save(record('r3', '2026-01-03T00:00:00.000Z'));
    await repository.save(record('r2', '2026-01-02T00:00:00.000Z'));

    expect((await repository.list(2)).map((entry) => entry.id)).toEqual(['r3', 'r2']);
    expect((await repository.list(2, 2)).map((entry) => entry.id)).toEqual(['r1']);
    expect(await repository.remove('r2')).toBe(true);
    expect(await repository.remove('r2')).toBe(false);
  });
});

describe('PgReviewRecordRepository', () => {
  it('inserts the summary as JSON', async () => {
    const run = vi.fn<Parameters<RowQuery>, ReturnType<RowQuery>>().mockResolvedValue({ rows: [], rowCount: 1 });
    const repository = new PgReviewRecordRepository(run);
    await repository.save({ ...record('r1', '2026-01-01T00:00:00.000Z'), summary: { lineCount: 3 } });

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][1]).toEqual([
      'r1',
      '2026-01-01T00:00:00.000Z',
      'PO-1',
      null,
      '{"lineCount":3}',
      0,
      0
    ]);
  });

  it('maps rows back into records', async () => {
    const run = vi.fn<Parameters<RowQuery>, ReturnType<RowQuery>>().mockResolvedValue({
      rows: [
        {
          id: 'r9',
          created_at: new Date('2026-02-01T10:00:00.000Z'),
          aggregate_doc_number: 'PO-9',
          breakdown_doc_number: 'PO-9-B',
          summary: { lineCount: 4 },
          mismatch_count: 1,
          warning_count: 2
        }
      ]
    });
    const repository = new PgReviewRecordRepository(run);

    expect(await repository.list(10, 20)).toEqual([
      {
        id: 'r9',
        timestamp: '2026-02-01T10:00:00.000Z',
        aggregateDocNumber: 'PO-9',
        breakdownDocNumber: 'PO-9-B',
        summary: { lineCount: 4 },
        mismatchCount: 1,
        warningCount: 2
      }
    ]);
    expect(run.mock.calls[0][1]).toEqual([10, 20]);
  });

  it('reports whether a delete matched a row', async () => {
    const run = vi.fn<Parameters<RowQuery>, ReturnType<RowQuery>>().mockResolvedValue({ rows: [], rowCount: 0 });
    expect(await new PgReviewRecordRepository(run).remove('missing')).toBe(false);
  });
});
