export {
  MaintenanceConnectionClient,
  createClient,
} from './client.js';

export {
  buildQuery,
  COMPARISON_OPERATORS,
  LOGICAL_OPERATORS,
  FILTER_FIELDS,
  MAX_TOP,
  DEFAULT_OPERATOR,
  type ComparisonOperator,
  type LogicalOperator,
  type FilterField,
} from './query.js';
