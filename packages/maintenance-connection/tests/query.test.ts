/**
 * Query Builder Tests
 */

import { describe, it, expect } from 'vitest';
import { buildQuery, FILTER_FIELDS, LOGICAL_OPERATORS, type FilterField } from '../src/api/query.js';
import type { QueryOptions } from '../src/models/types.js';
import { QueryParameterError } from '../src/utils/errors.js';

describe('buildQuery', () => {
  it('builds filter, top and skip in order', () => {
    expect(buildQuery({ filter: 'ID', operator: 'eq', identifier: 'SHI-V-1405', top: 50, skip: 0 }))
      .toBe('?$filter=ID%20eq%20"SHI-V-1405"&$top=50&$skip=0');
  });

  it('builds top and skip without a filter', () => {
    expect(buildQuery({ top: 5, skip: 10 })).toBe('?$top=5&$skip=10');
  });

  it('keeps dotted reference fields readable', () => {
    expect(buildQuery({ filter: 'RepairCenterRef.ID', operator: 'eq', identifier: 'Main', top: 5, skip: 10 }))
      .toBe('?$filter=RepairCenterRef.ID%20eq%20"Main"&$top=5&$skip=10');
  });

  it('passes other operators through', () => {
    expect(buildQuery({ filter: 'LastModifiedDate', operator: 'gt', identifier: '2012-10-15', top: 50, skip: 0 }))
      .toBe('?$filter=LastModifiedDate%20gt%20"2012-10-15"&$top=50&$skip=0');
  });

  it('encodes spaces in identifiers', () => {
    expect(buildQuery({ filter: 'parentRef.ID', operator: 'eq', identifier: 'SHI-INLET FLASH GAS AREA' }))
      .toBe('?$filter=parentRef.ID%20eq%20"SHI-INLET%20FLASH%20GAS%20AREA"');
  });

  it('defaults the operator to eq', () => {
    expect(buildQuery({ filter: 'ID', identifier: 'V' })).toBe('?$filter=ID%20eq%20"V"');
  });

  it('quotes non-string identifiers', () => {
    expect(buildQuery({ filter: 'IsLocation', operator: 'eq', identifier: true }))
      .toBe('?$filter=IsLocation%20eq%20"true"');
  });

  it('returns an empty query when nothing is given', () => {
    expect(buildQuery()).toBe('');
    expect(buildQuery({})).toBe('');
  });

  it('ignores operator and identifier without a filter', () => {
    expect(buildQuery({ operator: 'eq', identifier: 'X', top: 50, skip: 0 })).toBe('?$top=50&$skip=0');
  });

  it('appends orderby last', () => {
    expect(buildQuery({ top: 50, skip: 0, orderBy: { field: 'ID', direction: 'desc' } }))
      .toBe('?$top=50&$skip=0&$orderby=ID%20desc');
    expect(buildQuery({ orderBy: { field: 'Name' } })).toBe('?$orderby=Name%20asc');
  });

  it('accepts the maximum page size', () => {
    expect(buildQuery({ top: 500 })).toBe('?$top=500');
  });

  it('rejects top outside 1..500', () => {
    expect(() => buildQuery({ top: 501 })).toThrow(QueryParameterError);
    expect(() => buildQuery({ top: 0 })).toThrow('top must be an integer between 1 and 500, got 0');
    expect(() => buildQuery({ top: 2.5 })).toThrow(QueryParameterError);
  });

  it('rejects negative or fractional skip', () => {
    expect(() => buildQuery({ skip: -1 })).toThrow('skip must be a non-negative integer, got -1');
    expect(() => buildQuery({ skip: 1.5 })).toThrow(QueryParameterError);
  });

  it('builds a filter for every documented field', () => {
    const field: FilterField = 'TypeDetails.Value';
    expect(FILTER_FIELDS).toContain(field);
    expect(buildQuery({ filter: field, operator: 'eq', identifier: 'L' }))
      .toBe('?$filter=TypeDetails.Value%20eq%20"L"');

    for (const filter of FILTER_FIELDS) {
      expect(buildQuery({ filter, identifier: 'x' })).toBe(`?$filter=${filter}%20eq%20"x"`);
    }
  });

  it('accepts logical operators and undocumented fields', () => {
    const options: QueryOptions = { filter: 'TargetHours', operator: LOGICAL_OPERATORS[2], identifier: 5 };
    expect(LOGICAL_OPERATORS).toEqual(['and', 'or', 'not']);
    expect(buildQuery(options)).toBe('?$filter=TargetHours%20not%20"5"');
  });
});
