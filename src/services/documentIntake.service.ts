import { findHeader, parseCsv, toRecords, type CsvRecord } from '../lib/csv';
import { mapLineItem, type RawLineItem } from './allocation/mappers';
import type { POLineItem } from './allocation/types';

export const DOCUMENT_PARSE_FAILED = 'DOCUMENT_PARSE_FAILED';
const DEFAULT_SHIP_WINDOW = 'TBD';

export type DocumentRole = 'aggregate' | 'breakdown';

export type DocumentMeta = {
  name: string;
  role?: DocumentRole;
  documentNumber?: string;
  shipWindow?: string;
};

/** `error` is null on success; a failed parse carries the reason and no items. */
export type ParsedDocument = {
  documentNumber: string;
  shipWindow: string;
  items: POLineItem[];
  error: string | null;
};

export interface DocumentParser {
  parseDocument(bytes: Uint8Array | string, meta: DocumentMeta): Promise<ParsedDocument>;
}

export class DocumentParseError extends Error {
  code: string;
  status: number;
  details: { message: string; document: string };

  constructor(message: string, document: string) {
    super(DOCUMENT_PARSE_FAILED);
    this.code = DOCUMENT_PARSE_FAILED;
    this.status = 422;
    this.details = { message, document };
  }
}

export function failedDocument(error: string, meta: DocumentMeta): ParsedDocument {
  return {
    documentNumber: meta.documentNumber ?? '',
    shipWindow: meta.shipWindow ?? DEFAULT_SHIP_WINDOW,
    items: [],
    error
  };
}

/** Throws for a failed parse. A document that parsed to zero items passes through. */
export function assertDocumentParsed(doc: ParsedDocument, meta: Pick<DocumentMeta, 'name'>): ParsedDocument {
  if (doc.error !== null) {
    throw new DocumentParseError(doc.error, meta.name);
  }
  return doc;
}

const HEADER_SYNONYMS = {
  sku: ['sku', 'vendorstyle', 'style', 'item', 'itemnumber', 'upc'],
  description: ['description', 'desc', 'itemdescription', 'productname', 'name'],
  quantity: ['qty', 'quantity', 'units', 'unitqty', 'unitquantity', 'totalunits', 'orderqty'],
  packSize: ['packsize', 'vendorpacksize', 'pack', 'casepack', 'innerpack'],
  unitCost: ['unitcost', 'cost', 'price', 'unitprice'],
  destination: ['dc', 'dcid', 'destination', 'destinationid', 'shipto', 'store'],
  documentNumber: ['po', 'ponumber', 'purchaseorder', 'purchaseordernumber'],
  shipWindow: ['shipwindow', 'shipdate', 'shipdates']
} as const;

type HeaderField = keyof typeof HEADER_SYNONYMS;
type HeaderMapping = { [K in HeaderField]: string | undefined };

const DESTINATION_COLUMN = /^DC#\s*([A-Za-z0-9-]+)$/i;

function resolveHeaders(headers: string[]): HeaderMapping {
  return {
    sku: findHeader(headers, HEADER_SYNONYMS.sku),
    description: findHeader(headers, HEADER_SYNONYMS.description),
    quantity: findHeader(headers, HEADER_SYNONYMS.quantity),
    packSize: findHeader(headers, HEADER_SYNONYMS.packSize),
    unitCost: findHeader(headers, HEADER_SYNONYMS.unitCost),
    destination: findHeader(headers, HEADER_SYNONYMS.destination),
    documentNumber: findHeader(headers, HEADER_SYNONYMS.documentNumber),
    shipWindow: findHeader(headers, HEADER_SYNONYMS.shipWindow)
  };
}

function destinationColumns(headers: string[]): Array<{ header: string; destinationId: string }> {
  const columns: Array<{ header: string; destinationId: string }> = [];
  for (const header of headers) {
    const match = DESTINATION_COLUMN.exec(header.trim());
    if (match) columns.push({ header, destinationId: match[1] });
  }
  return columns;
}

function cell(record: CsvRecord, header: string | undefined): string {
  return header === undefined ? '' : record[header] ?? '';
}

function firstValue(records: CsvRecord[], header: string | undefined): string {
  if (header === undefined) return '';
  for (const record of records) {
    const value = cell(record, header);
    if (value) return value;
  }
  return '';
}

function decode(bytes: Uint8Array | string): string {
  return typeof bytes === 'string' ? bytes : Buffer.from(bytes).toString('utf8');
}

/**
 * Reads a CSV export of a purchase order.
 *
 * Narrow layouts carry one line per row with an optional destination column.
 * Wide layouts carry one `DC# <id>` quantity column per destination and yield one
 * breakdown line per non-zero cell.
 */
export class CsvPurchaseOrderParser implements DocumentParser {
  async parseDocument(bytes: Uint8Array | string, meta: DocumentMeta): Promise<ParsedDocument> {
    try {
      return this.parseText(decode(bytes), meta);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return failedDocument(`Unable to read ${meta.name}: ${message}`, meta);
    }
  }

  parseText(text: string, meta: DocumentMeta): ParsedDocument {
    const parsed = parseCsv(text);
    if (parsed.headers.length === 0) {
      return failedDocument(`${meta.name} has no header row.`, meta);
    }
    const mapping = resolveHeaders(parsed.headers);
    if (!mapping.sku) {
      return failedDocument(`${meta.name} has no SKU column.`, meta);
    }

    const records = toRecords(parsed);
    const documentNumber = meta.documentNumber || firstValue(records, mapping.documentNumber);
    const shipWindow = meta.shipWindow || firstValue(records, mapping.shipWindow) || DEFAULT_SHIP_WINDOW;
    const dcColumns = destinationColumns(parsed.headers);
    const items: POLineItem[] = [];

    for (const record of records) {
      const sku = cell(record, mapping.sku);
      if (!sku) continue;
      const base: RawLineItem = {
        sku,
        description: cell(record, mapping.description),
        packSize: cell(record, mapping.packSize),
        unitCost: cell(record, mapping.unitCost),
        documentNumber,
        shipWindow
      };

      if (dcColumns.length > 0) {
        for (const column of dcColumns) {
          const item = mapLineItem({
            ...base,
            destinationId: column.destinationId,
            quantityUnits: cell(record, column.header),
            isAggregate: false
          });
          if (item.quantityUnits > 0) items.push(item);
        }
        continue;
      }

      const destinationId = cell(record, mapping.destination);
      items.push(
        mapLineItem({
          ...base,
          destinationId,
          quantityUnits: cell(record, mapping.quantity),
          isAggregate: meta.role ? meta.role === 'aggregate' : destinationId === ''
        })
      );
    }

    return { documentNumber, shipWindow, items, error: null };
  }
}

/** Wraps line items that arrive already extracted (JSON bodies) as a parsed document. */
export function documentFromLineItems(raw: readonly RawLineItem[], meta: DocumentMeta): ParsedDocument {
  const documentNumber = meta.documentNumber ?? '';
  const shipWindow = meta.shipWindow || DEFAULT_SHIP_WINDOW;
  const items = raw.map((entry) =>
    mapLineItem({
      documentNumber,
      shipWindow,
      ...(meta.role ? { isAggregate: meta.role === 'aggregate' } : {}),
      ...entry
    })
  );
  return { documentNumber, shipWindow, items, error: null };
}
