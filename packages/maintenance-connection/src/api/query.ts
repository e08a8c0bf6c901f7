/**
 * OData-style query strings for v8 GET requests.
 *
 * @example
 * ```typescript
 * buildQuery({ filter: 'ID', operator: 'eq', identifier: 'SHI-V-1405', top: 50, skip: 0 });
 * // '?$filter=ID%20eq%20"SHI-V-1405"&$top=50&$skip=0'
 * ```
 */

import type { QueryOptions } from '../models/types.js';
import { QueryParameterError } from '../utils/errors.js';

export const COMPARISON_OPERATORS = ['eq', 'ne', 'gt', 'ge', 'lt', 'le'] as const;
export const LOGICAL_OPERATORS = ['and', 'or', 'not'] as const;

export type ComparisonOperator = typeof COMPARISON_OPERATORS[number];
export type LogicalOperator = typeof LOGICAL_OPERATORS[number];

/** Filter fields the assets and classifications collections document. */
export const FILTER_FIELDS = [
  'ID',
  'PK',
  'parentRef.ID',
  'ClassificationRef.ID',
  'RepairCenterRef.ID',
  'ShopRef.ID',
  'Vicinity',
  'Icon',
  'IsLocation',
  'TypeDetails.Value',
  'LastModifiedDate',
  'IsOpen',
] as const;

export type FilterField = typeof FILTER_FIELDS[number];

export const MAX_TOP = 500;
export const DEFAULT_OPERATOR: ComparisonOperator = 'eq';

function checkPaging(top: number | undefined, skip: number | undefined): void {
  if (top !== undefined && (!Number.isInteger(top) || top < 1 || top > MAX_TOP)) {
    throw new QueryParameterError(`top must be an integer between 1 and ${MAX_TOP}, got ${top}`);
  }
  if (skip !== undefined && (!Number.isInteger(skip) || skip < 0)) {
    throw new QueryParameterError(`skip must be a non-negative integer, got ${skip}`);
  }
}

export function buildQuery(options: QueryOptions = {}): string {
  const { filter, operator, identifier, top, skip, orderBy } = options;
  checkPaging(top, skip);

  const parts: string[] = [];
  if (filter) {
    const op = operator || DEFAULT_OPERATOR;
    const value = encodeURIComponent(String(identifier ?? ''));
    parts.push(`$filter=${encodeURIComponent(filter)}%20${op}%20"${value}"`);
  }
  if (top !== undefined) parts.push(`$top=${top}`);
  if (skip !== undefined) parts.push(`$skip=${skip}`);
  if (orderBy) {
    parts.push(`$orderby=${encodeURIComponent(orderBy.field)}%20${orderBy.direction || 'asc'}`);
  }

  return parts.length > 0 ? `?${parts.join('&')}` : '';
}
