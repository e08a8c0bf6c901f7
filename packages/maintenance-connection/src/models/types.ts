/**
 * Maintenance Connection Types
 *
 * Shapes of the records exchanged with the v8 REST API, plus the
 * JSON value model the normalizer works against.
 */

import type { ComparisonOperator, FilterField, LogicalOperator } from '../api/query.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Remote collection names. Other collections exist on the server and are
 * accepted as plain strings.
 */
export type KnownModule = 'assets' | 'classifications';
export type Module = KnownModule | (string & {});

export type RecordType = 'A' | 'L';

export type Ref = {
  ID: JsonPrimitive;
};

export type TypeDetails = {
  Value: JsonPrimitive;
};

/**
 * A record as produced by the normalizer. Every key is always present.
 * Scalars keep whatever primitive the server sent (PK is usually a
 * number, Vicinity may be a bare page number).
 * Declared as type aliases so a normalized record is itself a JsonValue.
 */
export type NormalizedRecord = {
  PK: JsonPrimitive;
  ID: JsonPrimitive;
  Name: JsonPrimitive;
  IsLocation: JsonPrimitive;
  Vicinity: JsonPrimitive;
  Icon: JsonPrimitive;
  UDFChar9: JsonPrimitive;
  ParentRef: Ref | null;
  ClassificationRef: Ref | null;
  RepairCenterRef: Ref | null;
  ShopRef: Ref | null;
  TypeDetails: TypeDetails | null;
};

export const RECORD_FIELDS = [
  'PK',
  'ID',
  'Name',
  'IsLocation',
  'Vicinity',
  'Icon',
  'UDFChar9',
  'ParentRef',
  'ClassificationRef',
  'RepairCenterRef',
  'ShopRef',
  'TypeDetails',
] as const satisfies ReadonlyArray<keyof NormalizedRecord>;

export const REFERENCE_FIELDS = [
  'ParentRef',
  'ClassificationRef',
  'RepairCenterRef',
  'ShopRef',
] as const satisfies ReadonlyArray<keyof NormalizedRecord>;

export type ReferenceField = typeof REFERENCE_FIELDS[number];

/**
 * Body item for a create (POST). ID, Name, ParentRef and ClassificationRef
 * are required by the remote API's own validation.
 */
export interface AssetRecordInput {
  PK?: number;
  ID: string;
  Name: string;
  IsLocation?: boolean;
  Vicinity?: string;
  Icon?: string;
  UDFChar9?: string;
  ParentRef: { ID: string } | null;
  ClassificationRef: { ID: string } | null;
  RepairCenterRef?: { ID: string } | null;
  ShopRef?: { ID: string } | null;
  TypeDetails?: { Value: RecordType };
}

/** Body item for an update (PUT). PK comes from a prior get(). */
export type AssetRecordUpdate = Partial<AssetRecordInput> & { PK: number };

export type SortDirection = 'asc' | 'desc';

export interface QueryOptions {
  /** Field to filter on. Documented fields autocomplete; any other field is accepted. */
  filter?: FilterField | (string & {});
  /** Defaults to `eq` when a filter is given. */
  operator?: ComparisonOperator | LogicalOperator | (string & {});
  identifier?: string | number | boolean;
  /** Page size, 1..500. Omitted means the server default of 50. */
  top?: number;
  skip?: number;
  /** Sort order; `direction` defaults to `'asc'`. */
  orderBy?: { field: FilterField | (string & {}); direction?: SortDirection };
}

export interface GetOptions extends QueryOptions {
  raw?: boolean;
}
