/**
 * Record Normalizer
 *
 * Maps raw `Results` entries onto the fixed record shape. Nested
 * references are cut down to their ID; a reference that is absent or not
 * an object becomes null. Primitive values pass through as sent.
 */

import type { JsonObject, JsonValue, NormalizedRecord, Ref, TypeDetails } from './types.js';
import { asPrimitive, isJsonObject } from '../utils/index.js';

function toRef(value: JsonValue | undefined): Ref | null {
  if (!isJsonObject(value)) return null;
  return { ID: asPrimitive(value.ID) };
}

function toTypeDetails(value: JsonValue | undefined): TypeDetails | null {
  if (!isJsonObject(value)) return null;
  return { Value: asPrimitive(value.Value) };
}

export function normalizeRecord(raw: JsonValue): NormalizedRecord {
  const result: JsonObject = isJsonObject(raw) ? raw : {};

  return {
    PK: asPrimitive(result.PK),
    ID: asPrimitive(result.ID),
    Name: asPrimitive(result.Name),
    IsLocation: asPrimitive(result.IsLocation),
    Vicinity: asPrimitive(result.Vicinity),
    Icon: asPrimitive(result.Icon),
    UDFChar9: asPrimitive(result.UDFChar9),
    ParentRef: toRef(result.ParentRef),
    ClassificationRef: toRef(result.ClassificationRef),
    RepairCenterRef: toRef(result.RepairCenterRef),
    ShopRef: toRef(result.ShopRef),
    TypeDetails: toTypeDetails(result.TypeDetails),
  };
}

export function normalizeResults(results: JsonValue[]): NormalizedRecord[] {
  return results.map(normalizeRecord);
}
