/**
 * Maintenance Connection v8 Client
 *
 * Queries, creates and updates asset, location and classification records
 * through the Maintenance Connection v8 REST API:
 * - OData-style $filter / $top / $skip query building
 * - Normalization of raw results into a flat, null-safe record shape
 * - Pass-through POST (create) and PUT (update) of record batches
 *
 * @example
 * ```typescript
 * import { createClient } from '@mc-v8/client';
 *
 * const client = createClient({ server: 'mc.example.local', user: 'svc', password: 'secret' });
 *
 * const [vessel] = await client.get('assets', {
 *   filter: 'ID', operator: 'eq', identifier: 'SHI-V-1405', top: 50, skip: 0,
 * });
 *
 * if (typeof vessel?.PK === 'number') {
 *   await client.update('assets', [{ PK: vessel.PK, Vicinity: 'SHNR-PID-1104' }]);
 * }
 * ```
 */

// API
export {
  MaintenanceConnectionClient,
  createClient,
  buildQuery,
  COMPARISON_OPERATORS,
  LOGICAL_OPERATORS,
  FILTER_FIELDS,
  MAX_TOP,
  DEFAULT_OPERATOR,
  type ComparisonOperator,
  type LogicalOperator,
  type FilterField,
} from './api/index.js';

// Models
export { normalizeRecord, normalizeResults } from './models/normalize.js';
export {
  RECORD_FIELDS,
  REFERENCE_FIELDS,
  type AssetRecordInput,
  type AssetRecordUpdate,
  type GetOptions,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
  type KnownModule,
  type Module,
  type NormalizedRecord,
  type QueryOptions,
  type RecordType,
  type Ref,
  type ReferenceField,
  type SortDirection,
  type TypeDetails,
} from './models/types.js';

// Config & errors
export {
  loadConfigFromEnv,
  validateConfig,
  type MaintenanceConnectionConfig,
} from './utils/config.js';
export {
  MaintenanceConnectionError,
  ResultsMissingError,
  QueryParameterError,
  ConfigError,
} from './utils/errors.js';
