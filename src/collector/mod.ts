/**
 * Collector Module
 * @module
 */

export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  mergeScanBatches,
  SCAN_COLUMN_BATCH_SIZE,
  ScannerClient,
} from './client.ts'
export type { FetchLike, MetainfoResult, ScannerClientConfig, ScanParams, ScanResult } from './client.ts'

export {
  buildFieldStatus,
  collectMarket,
  extractSampleRow,
  formatFieldStatusTsv,
  isUsableValue,
  marketSpecFromResults,
  scanColumns,
} from './collector.ts'
export type { FieldStatus, FieldStatusEntry, MarketCollection } from './collector.ts'

export {
  chooseTickers,
  DEFAULT_MAX_TICKERS,
  normalizeMetainfo,
  parseScanResponse,
  rawFieldSchema,
  rawMetainfoSchema,
  rawScanResponseSchema,
  scanRowSchema,
} from './schemas.ts'
export type { NormalizedMetainfo, RawField, RawMetainfo, RawScanResponse, ScanRequest, ScanRow } from './schemas.ts'

export {
  loadMarketResults,
  loadStoredMetainfo,
  marketResultsDir,
  RESULT_FILES,
  saveMarketResults,
  snapshotMarketResults,
} from './store.ts'
export type { StoredMarketResults } from './store.ts'
