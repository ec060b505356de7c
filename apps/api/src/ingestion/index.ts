import { ConfigurationError } from '../analytics/errors.js';
import type { DataSourceConfig } from '../config/index.js';

import { CsvEventSource } from './csv-source.js';
import type { EventSource } from './types.js';
import { WarehouseEventSource } from './warehouse-source.js';

export { CsvEventSource, parseCsvTable } from './csv-source.js';
export { WarehouseEventSource, quoteTableName, type SqlQueryable } from './warehouse-source.js';
export { assertRequiredColumns, createSnapshot, loadEvents, normalizeRow, normalizeTable } from './load-events.js';
export type { EventSource, LoadReport, RawEventTable } from './types.js';

/**
 * Pick the configured source. A CSV export takes precedence over the warehouse.
 */
export function createEventSource(dataSource: DataSourceConfig): EventSource {
  if (dataSource.csvPath) {
    return new CsvEventSource(dataSource.csvPath);
  }
  if (dataSource.databaseUrl) {
    return WarehouseEventSource.fromUrl(dataSource.databaseUrl, dataSource.table);
  }
  throw new ConfigurationError(
    'No analytics data source configured: set ANALYTICS_CSV_PATH or ANALYTICS_DATABASE_URL'
  );
}
