import type { DatasetSnapshot, FailureEvent, FilterOptions, FilterQuery, FilterSelection } from '@flakelens/shared';
import { filterQuerySchema } from '@flakelens/shared';
import type { FastifyInstance } from 'fastify';

import { buildSelection, resolveFilters, type StaleCacheWarning } from '../analytics/index.js';

export interface ResolvedRequest {
  readonly query: FilterQuery;
  readonly snapshot: DatasetSnapshot;
  readonly selection: FilterSelection;
  readonly events: readonly FailureEvent[];
  readonly options: FilterOptions;
  readonly stale: StaleCacheWarning | null;
}

/**
 * Parse the filter query string and narrow the current snapshot with it.
 * Zod and selection errors propagate to the error handler.
 */
export async function resolveRequest(fastify: FastifyInstance, rawQuery: unknown): Promise<ResolvedRequest> {
  const query = filterQuerySchema.parse(rawQuery);
  const { snapshot, warning } = await fastify.analytics.current();
  const selection = buildSelection(query, snapshot);
  const { events, options } = resolveFilters(snapshot, selection);

  return { query, snapshot, selection, events, options, stale: warning };
}
