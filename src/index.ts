export * from './domain/types';
export * from './domain/errors';
export type { ILogger, LogLevel } from './ports/logger';
export type { IDocumentStore } from './ports/datastore';
export type { IChartProvider } from './ports/chart';
export type { INetWorthAggregator, SeriesKey } from './ports/analytics';
export { CategoryRegistry, type CreateCategoryOptions } from './usecases/categories';
export { ItemRegistry, type ItemPatch, type DeleteOutcome } from './usecases/items';
export { SnapshotStore } from './usecases/snapshots';
export { ReconciliationEngine } from './usecases/reconciliation';
export {
  NetWorthAggregator,
  renderSeries,
  type CategoryTotal,
  type GoalProgress,
  type NetWorthSummary,
  type TargetProgress,
} from './usecases/analytics';
export { Ledger, emptyState } from './usecases/ledger';
export {
  LedgerDocumentSchema,
  loadDocument,
  parseDocument,
  saveDocument,
  type LedgerDocument,
} from './usecases/document';
export { migrateLegacy } from './usecases/migration';
export { openLedger, saveLedger } from './usecases/session';
export { JsonFileStore } from './adapters/json/jsonFileStore';
export { createConsoleLogger, silentLogger } from './adapters/logger/consoleLogger';
export { AppConfigFile, loadConfig, resolveDataFile, type AppConfig } from './config/appConfig';
