import 'dotenv/config';
import { createApp } from './app';
import type { AppContext } from './appContext';
import { getAllocationPolicy } from './config/allocationPolicy';
import { getPalletPolicy } from './config/palletPolicy';
import { getSystemSettingsPath } from './config/systemSettings';
import { closePool, getPool, isDatabaseConfigured, query } from './db';
import { CsvPurchaseOrderParser } from './services/documentIntake.service';
import {
  MasterDataStore,
  PgMasterDataClient,
  createCsvMasterDataLoader
} from './services/masterData.service';
import { InMemoryReviewRecordRepository, PgReviewRecordRepository } from './services/reviewRecord.service';
import { SystemSettingsService } from './services/systemSettings.service';

const PORT = Number(process.env.PORT) || 3000;
const MASTER_DATA_DIR = process.env.MASTER_DATA_DIR || 'data';
const LOOKUP_TIMEOUT_MS = Number(process.env.MASTER_DATA_LOOKUP_TIMEOUT_MS || 3000);

async function buildContext(): Promise<AppContext> {
  const useDatabase = isDatabaseConfigured();
  const pgClient = useDatabase ? new PgMasterDataClient() : null;
  const loader = pgClient ? () => pgClient.loadAll() : createCsvMasterDataLoader(MASTER_DATA_DIR);

  const masterData = new MasterDataStore(loader);
  const settings = new SystemSettingsService(getSystemSettingsPath(), {
    allocationPolicy: getAllocationPolicy(),
    palletPolicy: getPalletPolicy()
  });
  await Promise.all([masterData.reload(), settings.load()]);

  if (useDatabase) {
    getPool().on('error', (err) => {
      console.error('Unexpected DB pool error', err);
    });
  }

  return {
    masterData,
    masterDataClient: pgClient,
    reviews: useDatabase ? new PgReviewRecordRepository() : new InMemoryReviewRecordRepository(),
    settings,
    parser: new CsvPurchaseOrderParser(),
    lookupTimeoutMs: LOOKUP_TIMEOUT_MS,
    pingDatabase: useDatabase ? () => query('SELECT 1') : undefined
  };
}

async function main() {
  const ctx = await buildContext();
  const server = createApp(ctx).listen(PORT, () => {
    console.log(`PO allocation API listening on port ${PORT}`);
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    server.close(() => {
      closePool()
        .catch((error) => console.error('Failed to close DB pool', error))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('Startup failed', error);
  process.exit(1);
});
