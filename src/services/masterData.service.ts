import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { QueryResultRow } from 'pg';
import { query, type RowQuery } from '../db';
import { findHeader, parseCsv, toRecords, type CsvRecord } from '../lib/csv';
import { toInt } from '../lib/numbers';
import { withTimeout } from '../lib/timeouts';
import {
  PO_REVIEW_EVENT,
  describeError,
  emitPoReviewEvent,
  type EventLogger
} from '../observability/poReview.events';
import { buildStockRecords, emptyStockRecord, mapProductRecord, stockAt, type RawStockRow } from './allocation/mappers';
import {
  MAIN_LOCATION,
  SUB_LOCATION,
  type Availability,
  type ProductMaster,
  type ProductRecord,
  type StockLedger,
  type StockMode,
  type StockRecord
} from './allocation/types';
import { resolveAvailability } from './availability.service';

export type MasterDataSnapshot = {
  stock: StockLedger;
  products: ProductMaster;
  source: string;
  loadedAt: string;
};

export type MasterDataSource = {
  source: string;
  products: ProductRecord[];
  stockRows: RawStockRow[];
};

export type MasterDataLoader = () => Promise<MasterDataSource>;

export function createSnapshot(data: MasterDataSource, loadedAt: Date = new Date()): MasterDataSnapshot {
  const products = new Map<string, ProductRecord>();
  for (const product of data.products) {
    if (product.sku) products.set(product.sku, Object.freeze(product));
  }
  const stock = new Map<string, StockRecord>();
  for (const [sku, record] of buildStockRecords(data.stockRows)) {
    stock.set(sku, Object.freeze(record));
  }
  return Object.freeze({
    stock,
    products,
    source: data.source,
    loadedAt: loadedAt.toISOString()
  });
}

export function emptySnapshot(): MasterDataSnapshot {
  return createSnapshot({ source: 'empty', products: [], stockRows: [] }, new Date(0));
}

/**
 * Holds the current stock ledger and product master. Readers take one snapshot
 * per request; `reload()` builds a new snapshot and swaps it in with a single
 * assignment, so a request never sees a half-loaded ledger. Concurrent reloads
 * share one load.
 */
export class MasterDataStore {
  private snapshot: MasterDataSnapshot;
  private inflight: Promise<MasterDataSnapshot> | null = null;

  constructor(
    private readonly loader: MasterDataLoader,
    initial: MasterDataSnapshot = emptySnapshot(),
    private readonly logger: EventLogger = console.warn
  ) {
    this.snapshot = initial;
  }

  getSnapshot(): MasterDataSnapshot {
    return this.snapshot;
  }

  reload(): Promise<MasterDataSnapshot> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async load(): Promise<MasterDataSnapshot> {
    const startedAt = Date.now();
    try {
      const next = createSnapshot(await this.loader());
      this.snapshot = next;
      emitPoReviewEvent(
        PO_REVIEW_EVENT.MASTER_DATA_RELOADED,
        {
          source: next.source,
          productCount: next.products.size,
          stockSkuCount: next.stock.size,
          durationMs: Date.now() - startedAt
        },
        this.logger
      );
      return next;
    } catch (error) {
      emitPoReviewEvent(
        PO_REVIEW_EVENT.MASTER_DATA_RELOAD_FAILED,
        { source: this.snapshot.source, skuCount: this.snapshot.products.size, error: describeError(error) },
        this.logger
      );
      throw error;
    }
  }
}

const PRODUCT_HEADERS = {
  sku: ['sku', 'itemsku', 'item'],
  name: ['productnameshort', 'productname', 'name', 'description'],
  unitPrice: ['unitprice', 'keyaccountprice', 'price', 'cost'],
  packSize: ['unitspercase', 'packsize', 'casepack'],
  cartonWeight: ['mastercartonweightlbs', 'cartonweight', 'cartonweightlbs', 'weight'],
  cartonHeight: ['mastercartonheightinches', 'cartonheight', 'cartonheightin', 'height'],
  maxCartonsPerPallet: ['maxcartonsperpallet', 'cartonsperpallet', 'palletcartons']
} as const;

const STOCK_HEADERS = {
  sku: ['sku', 'itemsku', 'item'],
  location: ['location', 'locationcode', 'warehouse'],
  onHand: ['onhand', 'onhandqty', 'qty', 'quantity']
} as const;

function valueOf(record: CsvRecord, header: string | undefined): string | undefined {
  return header === undefined ? undefined : record[header];
}

export function parseProductCsv(text: string): ProductRecord[] {
  const parsed = parseCsv(text);
  const columns = {
    sku: findHeader(parsed.headers, PRODUCT_HEADERS.sku),
    name: findHeader(parsed.headers, PRODUCT_HEADERS.name),
    unitPrice: findHeader(parsed.headers, PRODUCT_HEADERS.unitPrice),
    packSize: findHeader(parsed.headers, PRODUCT_HEADERS.packSize),
    cartonWeight: findHeader(parsed.headers, PRODUCT_HEADERS.cartonWeight),
    cartonHeight: findHeader(parsed.headers, PRODUCT_HEADERS.cartonHeight),
    maxCartonsPerPallet: findHeader(parsed.headers, PRODUCT_HEADERS.maxCartonsPerPallet)
  };
  if (!columns.sku) return [];
  return toRecords(parsed)
    .map((record) =>
      mapProductRecord({
        sku: valueOf(record, columns.sku),
        name: valueOf(record, columns.name),
        unitPrice: valueOf(record, columns.unitPrice),
        packSize: valueOf(record, columns.packSize),
        cartonWeight: valueOf(record, columns.cartonWeight),
        cartonHeight: valueOf(record, columns.cartonHeight),
        maxCartonsPerPallet: valueOf(record, columns.maxCartonsPerPallet)
      })
    )
    .filter((product) => product.sku !== '');
}

export function parseStockCsv(text: string): RawStockRow[] {
  const parsed = parseCsv(text);
  const sku = findHeader(parsed.headers, STOCK_HEADERS.sku);
  if (!sku) return [];
  const location = findHeader(parsed.headers, STOCK_HEADERS.location);
  const onHand = findHeader(parsed.headers, STOCK_HEADERS.onHand);
  return toRecords(parsed).map((record) => ({
    sku: valueOf(record, sku),
    location: valueOf(record, location),
    onHand: valueOf(record, onHand)
  }));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readOptionalFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return '';
    throw error;
  }
}

export const PRODUCTS_FILE = 'products.csv';
export const INVENTORY_FILE = 'inventory.csv';

/** Reads `products.csv` and `inventory.csv` from `dir`. A missing file loads as empty. */
export function createCsvMasterDataLoader(dir: string): MasterDataLoader {
  return async () => {
    const [productsText, inventoryText] = await Promise.all([
      readOptionalFile(path.join(dir, PRODUCTS_FILE)),
      readOptionalFile(path.join(dir, INVENTORY_FILE))
    ]);
    return {
      source: `csv:${dir}`,
      products: parseProductCsv(productsText),
      stockRows: parseStockCsv(inventoryText)
    };
  };
}

export interface MasterDataClient {
  fetchStock(skus: readonly string[]): Promise<Map<string, StockRecord>>;
  fetchProducts(skus: readonly string[]): Promise<Map<string, ProductRecord>>;
}

function mapProductRow(row: QueryResultRow): ProductRecord {
  return mapProductRecord({
    sku: row.sku,
    name: row.name,
    unitPrice: row.unit_price,
    packSize: row.pack_size,
    cartonWeight: row.carton_weight_lbs,
    cartonHeight: row.carton_height_in,
    maxCartonsPerPallet: row.max_cartons_per_pallet
  });
}

function mapStockRow(row: QueryResultRow): RawStockRow {
  return { sku: row.sku, location: row.location, onHand: row.on_hand };
}

const PRODUCT_COLUMNS =
  'sku, name, unit_price, pack_size, carton_weight_lbs, carton_height_in, max_cartons_per_pallet';

export class PgMasterDataClient implements MasterDataClient {
  constructor(private readonly run: RowQuery = query) {}

  async fetchProducts(skus: readonly string[]): Promise<Map<string, ProductRecord>> {
    const products = new Map<string, ProductRecord>();
    if (skus.length === 0) return products;
    const { rows } = await this.run(`SELECT ${PRODUCT_COLUMNS} FROM products WHERE sku = ANY($1::text[])`, [[...skus]]);
    for (const product of rows.map(mapProductRow)) {
      products.set(product.sku, product);
    }
    return products;
  }

  async fetchStock(skus: readonly string[]): Promise<Map<string, StockRecord>> {
    if (skus.length === 0) return new Map();
    const { rows } = await this.run(
      'SELECT sku, location, on_hand FROM inventory_positions WHERE sku = ANY($1::text[])',
      [[...skus]]
    );
    return buildStockRecords(rows.map(mapStockRow));
  }

  /** Full-table load used as the reload source when the service runs against PostgreSQL. */
  async loadAll(): Promise<MasterDataSource> {
    const [products, stock] = await Promise.all([
      this.run(`SELECT ${PRODUCT_COLUMNS} FROM products ORDER BY sku`),
      this.run('SELECT sku, location, on_hand FROM inventory_positions ORDER BY sku, location')
    ]);
    return {
      source: 'postgres',
      products: products.rows.map(mapProductRow),
      stockRows: stock.rows.map(mapStockRow)
    };
  }
}

/** Trimmed, non-empty SKUs in first-seen order without duplicates. */
export function normalizeSkuList(skus: readonly string[]): string[] {
  return [...new Set(skus.map((sku) => sku.trim()).filter(Boolean))];
}

export type LookupOptions = {
  logger?: EventLogger;
  timeoutMs?: number;
};

export type MasterDataLookup = {
  stock: StockLedger;
  products: ProductMaster;
  // true when the remote client failed and defaults stand in for what it would have returned
  degraded: boolean;
};

/**
 * Resolves stock and product records for `skus`: snapshot first, then the
 * remote client for whatever the snapshot lacks. A failing client is logged and
 * the lookup carries on with what it has; unknown SKUs fall through to the
 * validator's defaults.
 */
export async function lookupMasterData(
  skus: readonly string[],
  store: Pick<MasterDataStore, 'getSnapshot'>,
  client?: MasterDataClient | null,
  options: LookupOptions = {}
): Promise<MasterDataLookup> {
  const logger = options.logger ?? console.warn;
  const snapshot = store.getSnapshot();
  const unique = normalizeSkuList(skus);
  const stock = new Map<string, StockRecord>();
  const products = new Map<string, ProductRecord>();
  const missingStock: string[] = [];
  const missingProducts: string[] = [];

  for (const sku of unique) {
    const stockRecord = snapshot.stock.get(sku);
    if (stockRecord) stock.set(sku, stockRecord);
    else missingStock.push(sku);

    const product = snapshot.products.get(sku);
    if (product) products.set(sku, product);
    else missingProducts.push(sku);
  }

  if (!client || (missingStock.length === 0 && missingProducts.length === 0)) {
    return { stock, products, degraded: false };
  }

  try {
    const [remoteStock, remoteProducts] = await withTimeout(
      Promise.all([
        missingStock.length > 0 ? client.fetchStock(missingStock) : Promise.resolve(new Map<string, StockRecord>()),
        missingProducts.length > 0
          ? client.fetchProducts(missingProducts)
          : Promise.resolve(new Map<string, ProductRecord>())
      ]),
      options.timeoutMs ?? 0,
      'master data lookup'
    );
    for (const sku of missingStock) {
      const record = remoteStock.get(sku);
      if (record) stock.set(sku, record);
    }
    for (const sku of missingProducts) {
      const record = remoteProducts.get(sku);
      if (record) products.set(sku, record);
    }
    return { stock, products, degraded: false };
  } catch (error) {
    emitPoReviewEvent(
      PO_REVIEW_EVENT.MASTER_DATA_REMOTE_LOOKUP_FAILED,
      {
        source: 'remote',
        skuCount: new Set([...missingStock, ...missingProducts]).size,
        error: describeError(error)
      },
      logger
    );
    return { stock, products, degraded: true };
  }
}

export type SkuCheck = {
  sku: string;
  found: boolean;
  product: ProductRecord | null;
  stock: {
    main: number;
    sub: number;
    total: number;
    byLocation: Readonly<Record<string, number>>;
  };
  safetyStock: number;
  availability: Availability;
};

// Quick check of one SKU: product record plus the MAIN/SUB split and what is available after safety stock.
export function describeSku(
  sku: string,
  lookup: Pick<MasterDataLookup, 'stock' | 'products'>,
  safetyStock: number,
  mode: StockMode
): SkuCheck {
  const product = lookup.products.get(sku) ?? null;
  const stock = lookup.stock.get(sku) ?? null;
  const record = stock ?? emptyStockRecord();
  return {
    sku,
    found: product !== null || stock !== null,
    product,
    stock: {
      main: stockAt(record, MAIN_LOCATION),
      sub: stockAt(record, SUB_LOCATION),
      total: toInt(record.total),
      byLocation: record.byLocation
    },
    safetyStock,
    availability: resolveAvailability(record, safetyStock, mode)
  };
}
