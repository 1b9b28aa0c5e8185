import type { EventLogger } from './observability/poReview.events';
import type { DocumentParser } from './services/documentIntake.service';
import type { MasterDataClient, MasterDataStore } from './services/masterData.service';
import type { ReviewRecordRepository } from './services/reviewRecord.service';
import type { SystemSettingsService } from './services/systemSettings.service';

/** Everything the routers need, built once at startup (or by a test). */
export type AppContext = {
  masterData: MasterDataStore;
  masterDataClient: MasterDataClient | null;
  reviews: ReviewRecordRepository;
  settings: SystemSettingsService;
  parser: DocumentParser;
  lookupTimeoutMs?: number;
  pingDatabase?: () => Promise<unknown>;
  logger?: EventLogger;
};
