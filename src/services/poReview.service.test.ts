import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_PALLET_POLICY } from '../config/palletPolicy';
import type { AllocationPolicy } from '../config/allocationPolicy';
import type { POLineItem, ProductRecord } from './allocation/types';
import { DocumentParseError, type DocumentParser, type ParsedDocument } from './documentIntake.service';
import { createSnapshot, MasterDataStore } from './masterData.service';
import { inheritAggregateUnitCost, intakeDocument, runPoReview } from './poReview.service';
import { InMemoryReviewRecordRepository } from './reviewRecord.service';

const mug: ProductRecord = {
  sku: 'A100',
  name: 'Ceramic Mug',
  unitPrice: 4.5,
  packSize: 12,
  cartonWeight: 18,
  cartonHeight: 9,
  maxCartonsPerPallet: 40
};

const masterData = {
  source: 'test',
  products: [mug],
  stockRows: [
    { sku: 'A100', location: 'MAIN', onHand: 50 },
    { sku: 'A100', location: 'SUB', onHand: 80 }
  ]
};

const store = new MasterDataStore(async () => masterData, createSnapshot(masterData));

const totalPolicy: AllocationPolicy = {
  defaultSafetyStock: 0,
  defaultStockMode: 'TOTAL',
  useDocumentCostForAggregate: false
};

function item(overrides: Partial<POLineItem>): POLineItem {
  return {
    sku: 'A100',
    description: 'Mug',
    destinationId: '',
    quantityUnits: 0,
    packSize: 0,
    unitCost: 0,
    documentNumber: 'PO-77',
    shipWindow: '03/01-03/15',
    isAggregate: true,
    ...overrides
  };
}

function doc(documentNumber: string, items: POLineItem[]): ParsedDocument {
  return { documentNumber, shipWindow: '03/01-03/15', items, error: null };
}

describe('runPoReview', () => {
  it('validates and packs the breakdown and reconciles it with the aggregate', async () => {
    const repository = new InMemoryReviewRecordRepository();
    const logger = vi.fn();

    const result = await runPoReview(
      {
        aggregate: doc('PO-77', [item({ quantityUnits: 120, unitCost: 4.5 })]),
        breakdown: doc('PO-77-B', [
          item({ destinationId: 'DC1', quantityUnits: 60, isAggregate: false }),
          item({ destinationId: 'DC2', quantityUnits: 60, isAggregate: false })
        ]),
        safetyStock: 10,
        stockMode: 'TOTAL'
      },
      {
        store,
        repository,
        allocationPolicy: totalPolicy,
        palletPolicy: DEFAULT_PALLET_POLICY,
        logger,
        generateId: () => 'review-1',
        now: () => new Date('2026-03-01T00:00:00.000Z')
      }
    );

    expect(result.validatedItems.map((line) => [line.destinationId, line.unitCost, line.combinedStatus])).toEqual([
      ['DC1', 4.5, 'OK'],
      ['DC2', 4.5, 'OK']
    ]);
    expect(result.reconciliation?.isValid).toBe(true);
    expect(result.pallets.map((pallet) => [pallet.id, pallet.kind, pallet.destinationId, pallet.totalCartons])).toEqual([
      ['P001', 'MIXED', 'DC1', 5],
      ['P002', 'MIXED', 'DC2', 5]
    ]);
    expect(result.pallets[0].utilizationPercent).toBe(13);
    expect(result.palletViolations).toEqual([]);
    expect(result.summary.totalAmount).toBe(540);
    expect(result.masterDataDegraded).toBe(false);

    expect(await repository.list(10)).toEqual([result.record]);
    expect(result.record).toMatchObject({
      id: 'review-1',
      timestamp: '2026-03-01T00:00:00.000Z',
      aggregateDocNumber: 'PO-77',
      breakdownDocNumber: 'PO-77-B',
      mismatchCount: 0,
      warningCount: 0
    });
    expect(logger).toHaveBeenCalledWith('PO_REVIEW_COMPLETED', {
      reviewId: 'review-1',
      aggregateDocNumber: 'PO-77',
      breakdownDocNumber: 'PO-77-B',
      lineCount: 2,
      palletCount: 2,
      mismatchCount: 0,
      warningCount: 0
    });
  });

  it('falls back to the aggregate and the configured defaults', async () => {
    const result = await runPoReview(
      {
        aggregate: doc('PO-78', [
          item({ quantityUnits: 150, unitCost: 4.5 }),
          item({ sku: 'Z9', quantityUnits: 5, unitCost: 2 })
        ])
      },
      {
        store,
        allocationPolicy: { ...totalPolicy, defaultSafetyStock: 10, defaultStockMode: 'MAIN' },
        palletPolicy: DEFAULT_PALLET_POLICY,
        logger: vi.fn()
      }
    );

    expect(result.safetyStock).toBe(10);
    expect(result.stockMode).toBe('MAIN');
    expect(result.reconciliation).toBeNull();
    expect(result.validatedItems.map((line) => [line.sku, line.transferFromSub, line.remainingShortage, line.combinedStatus])).toEqual([
      ['A100', 70, 40, 'INVENTORY_LOW'],
      ['Z9', 0, 5, 'PRODUCT_MISSING']
    ]);
    expect(result.summary.totalShortage).toBe(45);
    expect(result.pallets).toHaveLength(1);
    expect(result.pallets[0]).toMatchObject({ id: 'P001', kind: 'MIXED', totalCartons: 18, totalWeight: 349, totalHeight: 16 });
    expect(result.record.warningCount).toBe(2);
  });
});

describe('inheritAggregateUnitCost', () => {
  it('fills missing breakdown costs from the first priced aggregate line', () => {
    const lines = inheritAggregateUnitCost(
      [item({ destinationId: 'DC1', isAggregate: false }), item({ sku: 'B300', destinationId: 'DC1', unitCost: 9 })],
      [item({ unitCost: 0 }), item({ unitCost: 4.5 }), item({ unitCost: 5 })]
    );
    expect(lines.map((line) => line.unitCost)).toEqual([4.5, 9]);
  });
});

describe('intakeDocument', () => {
  it('logs and throws when the parser reports a failure', async () => {
    const parser: DocumentParser = {
      parseDocument: vi.fn(async () => ({
        documentNumber: '',
        shipWindow: 'TBD',
        items: [],
        error: 'bad.csv has no SKU column.'
      }))
    };
    const logger = vi.fn();

    await expect(intakeDocument(parser, { name: 'bad.csv', content: 'x' }, 'breakdown', logger)).rejects.toBeInstanceOf(
      DocumentParseError
    );
    expect(logger).toHaveBeenCalledWith('DOCUMENT_PARSE_FAILED', {
      documentName: 'bad.csv',
      role: 'breakdown',
      error: 'bad.csv has no SKU column.'
    });
  });
});
