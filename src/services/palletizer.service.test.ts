import { describe, expect, it } from 'vitest';
import { DEFAULT_PALLET_POLICY } from '../config/palletPolicy';
import { mapPalletInput } from './allocation/mappers';
import type { PalletInput, ProductRecord } from './allocation/types';
import {
  buildPalletInputs,
  capPalletCapacity,
  findPalletLimitViolations,
  formatPalletId,
  packPallets,
  packPalletsByDestination,
  planPalletsFromUnits,
  type UnitOrderLine
} from './palletizer.service';

function input(sku: string, cartonQty: number, maxCartonsPerPallet: number | null, extra: Partial<PalletInput> = {}): PalletInput {
  return {
    sku,
    cartonQty,
    packSize: 6,
    description: `${sku} desc`,
    cartonWeightLbs: 15,
    cartonHeightIn: 10,
    maxCartonsPerPallet,
    ...extra
  };
}

describe('formatPalletId', () => {
  it('zero pads to three digits', () => {
    expect(formatPalletId(1)).toBe('P001');
    expect(formatPalletId(42)).toBe('P042');
    expect(formatPalletId(1234)).toBe('P1234');
  });
});

describe('packPallets', () => {
  it('fills one FULL pallet when the cartons match the capacity exactly', () => {
    const pallets = packPallets([input('A100', 10, 10)]);
    expect(pallets).toEqual([
      {
        id: 'P001',
        kind: 'FULL',
        destinationId: '',
        lineEntries: [{ sku: 'A100', cartonQty: 10, description: 'A100 desc', packSize: 6 }],
        totalCartons: 10,
        totalUnits: 60,
        totalWeight: 190,
        totalHeight: 16,
        utilizationPercent: 100
      }
    ]);
  });

  it('emits FULL pallets first and packs remainders first-fit decreasing', () => {
    const pallets = packPallets([input('A', 25, 10), input('B', 7, 20), input('C', 12, 8)]);

    expect(pallets.map((pallet) => [pallet.id, pallet.kind, pallet.totalCartons])).toEqual([
      ['P001', 'FULL', 10],
      ['P002', 'FULL', 10],
      ['P003', 'FULL', 8],
      ['P004', 'MIXED', 9],
      ['P005', 'MIXED', 7]
    ]);
    expect(pallets[3].lineEntries.map((entry) => [entry.sku, entry.cartonQty])).toEqual([
      ['A', 5],
      ['C', 4]
    ]);
    expect(pallets[3].utilizationPercent).toBe(100);
    expect(pallets[4].utilizationPercent).toBe(35);
  });

  it('conserves cartons per SKU and keeps every pallet within capacity', () => {
    const items = [input('A', 33, 12), input('B', 5, 7), input('C', 19, 20), input('D', 3, 9), input('E', 41, 15)];
    const capacity = new Map(items.map((item) => [item.sku, item.maxCartonsPerPallet ?? 0]));
    const pallets = packPallets(items);

    const packed = new Map<string, number>();
    for (const pallet of pallets) {
      for (const entry of pallet.lineEntries) {
        packed.set(entry.sku, (packed.get(entry.sku) ?? 0) + entry.cartonQty);
      }
    }
    expect(Object.fromEntries(packed)).toEqual({ A: 33, B: 5, C: 19, D: 3, E: 41 });

    for (const pallet of pallets) {
      if (pallet.kind === 'FULL') {
        expect(pallet.lineEntries).toHaveLength(1);
        expect(pallet.lineEntries[0].cartonQty).toBe(capacity.get(pallet.lineEntries[0].sku));
      } else {
        const volume = pallet.lineEntries.reduce(
          (sum, entry) => sum + entry.cartonQty / (capacity.get(entry.sku) ?? 1),
          0
        );
        expect(volume).toBeLessThanOrEqual(1 + 1e-9);
      }
    }
  });

  it('trims SKUs before packing', () => {
    const [pallet] = packPallets([input(' A ', 3, 20), input('A', 4, 20)]);
    expect(pallet.lineEntries).toEqual([{ sku: 'A', cartonQty: 7, description: 'A desc', packSize: 6 }]);
  });

  it('splits a large carton count without walking it pallet by pallet', () => {
    const pallets = packPallets([input('A', 1_000_000, 300_000)]);
    expect(pallets.map((pallet) => [pallet.kind, pallet.totalCartons])).toEqual([
      ['FULL', 300_000],
      ['FULL', 300_000],
      ['FULL', 300_000],
      ['MIXED', 100_000]
    ]);
  });

  it('skips carton counts beyond the line maximum', () => {
    const pallets = packPallets([input('A', 1e18, 20), input('B', Number.MAX_SAFE_INTEGER, 1), input('C', 5, 10)]);
    expect(pallets).toHaveLength(1);
    expect(pallets[0].lineEntries.map((entry) => [entry.sku, entry.cartonQty])).toEqual([['C', 5]]);
  });

  it('reads an unsafe carton count from raw input as no cartons', () => {
    expect(mapPalletInput({ sku: 'A', cartonQty: '1e18' }).cartonQty).toBe(0);
    expect(packPallets([mapPalletInput({ sku: 'A', cartonQty: '1e18' })])).toEqual([]);
  });

  it('skips empty lines and falls back to the default capacity', () => {
    const pallets = packPallets([input('A', 0, 10), input('B', 20, null)]);
    expect(pallets).toHaveLength(1);
    expect(pallets[0].kind).toBe('FULL');
    expect(pallets[0].totalCartons).toBe(DEFAULT_PALLET_POLICY.defaultCartonsPerPallet);
  });

  it('merges remainders of the same SKU and pack size on a MIXED pallet', () => {
    const [pallet] = packPallets([input('A', 3, 20), input('A', 4, 20)]);
    expect(pallet.kind).toBe('MIXED');
    expect(pallet.lineEntries).toEqual([{ sku: 'A', cartonQty: 7, description: 'A desc', packSize: 6 }]);
    expect(pallet.totalUnits).toBe(42);
  });

  it('uses the tallest carton for MIXED height', () => {
    const [pallet] = packPallets([input('A', 2, 20, { cartonHeightIn: 12 }), input('B', 2, 20, { cartonHeightIn: 8 })]);
    expect(pallet.totalHeight).toBe(18);
    expect(pallet.totalWeight).toBe(100);
  });

  it('keeps a shared destination on MIXED pallets and clears a mixed one', () => {
    expect(packPallets([input('A', 2, 20, { destinationId: 'DC1' }), input('B', 2, 20, { destinationId: 'DC1' })])[0].destinationId).toBe('DC1');
    expect(packPallets([input('A', 2, 20, { destinationId: 'DC1' }), input('B', 2, 20, { destinationId: 'DC2' })])[0].destinationId).toBe('');
  });

  it('starts numbering at firstPalletNumber', () => {
    expect(packPallets([input('A', 5, 10)], { firstPalletNumber: 7 })[0].id).toBe('P007');
  });
});

describe('packPalletsByDestination', () => {
  it('packs destinations in id order with one running sequence', () => {
    const pallets = packPalletsByDestination([
      input('A', 25, 10, { destinationId: 'DC2' }),
      input('B', 5, 10, { destinationId: 'DC1' })
    ]);
    expect(pallets.map((pallet) => [pallet.id, pallet.kind, pallet.destinationId])).toEqual([
      ['P001', 'MIXED', 'DC1'],
      ['P002', 'FULL', 'DC2'],
      ['P003', 'FULL', 'DC2'],
      ['P004', 'MIXED', 'DC2']
    ]);
  });
});

describe('capPalletCapacity', () => {
  it('keeps the configured capacity when the limits allow it', () => {
    expect(capPalletCapacity(40, 18, 9)).toBe(40);
  });

  it('caps by full layers under the height limit', () => {
    expect(capPalletCapacity(100, 50, 20)).toBe(30);
  });

  it('never drops below one carton', () => {
    expect(capPalletCapacity(20, 3000, 10)).toBe(1);
    expect(capPalletCapacity(undefined, 0, 0)).toBe(20);
  });
});

describe('buildPalletInputs', () => {
  const mug: ProductRecord = {
    sku: 'A100',
    name: 'Ceramic Mug',
    unitPrice: 4.5,
    packSize: 12,
    cartonWeight: 18,
    cartonHeight: 9,
    maxCartonsPerPallet: 40
  };

  it('converts units to cartons with product dimensions or defaults', () => {
    const inputs = buildPalletInputs(
      [
        { sku: 'A100', description: 'mug', destinationId: 'DC1', quantityUnits: 100, effectivePackSize: 12 },
        { sku: 'A100', description: 'mug', destinationId: 'DC2', quantityUnits: 0, effectivePackSize: 12 },
        { sku: 'Z9', description: 'unknown', destinationId: '', quantityUnits: 5, effectivePackSize: 1 }
      ],
      new Map([['A100', mug]])
    );
    expect(inputs).toEqual([
      {
        sku: 'A100',
        cartonQty: 9,
        packSize: 12,
        description: 'Ceramic Mug',
        cartonWeightLbs: 18,
        cartonHeightIn: 9,
        maxCartonsPerPallet: 40,
        destinationId: 'DC1'
      },
      {
        sku: 'Z9',
        cartonQty: 5,
        packSize: 1,
        description: 'unknown',
        cartonWeightLbs: 15,
        cartonHeightIn: 10,
        maxCartonsPerPallet: 20,
        destinationId: ''
      }
    ]);
  });
});

describe('planPalletsFromUnits', () => {
  const products = new Map<string, ProductRecord>([
    [
      'A100',
      { sku: 'A100', name: 'Ceramic Mug', unitPrice: 4.5, packSize: 12, cartonWeight: 18, cartonHeight: 9, maxCartonsPerPallet: 40 }
    ]
  ]);

  function order(sku: string, quantityUnits: number, packSize = 0, destinationId = ''): UnitOrderLine {
    return { sku, description: 'widget', destinationId, quantityUnits, packSize };
  }

  it('converts units through the line or product pack size and packs the cartons', () => {
    const pallets = planPalletsFromUnits([order(' A100 ', 100), order('Z9', 50, 5), order('Z9', 0, 5)], products);
    expect(pallets).toHaveLength(1);
    expect(pallets[0].kind).toBe('MIXED');
    expect(pallets[0].lineEntries).toEqual([
      { sku: 'Z9', cartonQty: 10, description: 'widget', packSize: 5 },
      { sku: 'A100', cartonQty: 9, description: 'Ceramic Mug', packSize: 12 }
    ]);
    expect(pallets[0].totalUnits).toBe(158);
    expect(pallets[0].totalWeight).toBe(352);
    expect(pallets[0].totalHeight).toBe(16);
  });

  it('packs each destination separately when asked', () => {
    const pallets = planPalletsFromUnits([order('A100', 500, 0, 'DC2'), order('Z9', 10, 5, 'DC1')], products, {
      byDestination: true
    });
    expect(pallets.map((pallet) => [pallet.id, pallet.kind, pallet.destinationId, pallet.totalCartons])).toEqual([
      ['P001', 'MIXED', 'DC1', 2],
      ['P002', 'FULL', 'DC2', 40],
      ['P003', 'MIXED', 'DC2', 2]
    ]);
  });
});

describe('findPalletLimitViolations', () => {
  it('reports weight before height for each pallet', () => {
    const pallets = packPallets([input('H', 40, 40, { cartonWeightLbs: 70, cartonHeightIn: 20 })]);
    expect(findPalletLimitViolations(pallets)).toEqual([
      { palletId: 'P001', limit: 'weight', actual: 2840, max: 2500 },
      { palletId: 'P001', limit: 'height', actual: 86, max: 68 }
    ]);
  });

  it('returns nothing for pallets within limits', () => {
    expect(findPalletLimitViolations(packPallets([input('A', 10, 10)]))).toEqual([]);
  });
});
