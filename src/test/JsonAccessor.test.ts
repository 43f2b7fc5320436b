import { describe, it, expect } from 'vitest';
import {
  asBox,
  asInteger,
  asScalarOrVector,
  asVector3,
  firstPresent,
  isJsonObject,
} from '../engine/potree/JsonAccessor';

describe('JsonAccessor', () => {
  it('firstPresent returns the first non-null key in order', () => {
    expect(firstPresent({ b: 2, a: 1 }, ['a', 'b'])).toBe(1);
    expect(firstPresent({ a: null, b: 'x' }, ['a', 'b'])).toBe('x');
    expect(firstPresent({ c: 3 }, ['a', 'b'])).toBeUndefined();
  });

  it('asVector3 reads arrays and {x,y,z} objects', () => {
    expect(asVector3([1, 2, 3, 4])).toEqual([1, 2, 3]);
    expect(asVector3({ x: 4, y: 5, z: 6 })).toEqual([4, 5, 6]);
    expect(asVector3({ x: 4 })).toEqual([4, 0, 0]);
  });

  it('asVector3 rejects short arrays, non-numeric entries and scalars', () => {
    expect(asVector3([1, 2])).toBeUndefined();
    expect(asVector3([1, 'a', 3])).toBeUndefined();
    expect(asVector3(7)).toBeUndefined();
    expect(asVector3(undefined)).toBeUndefined();
  });

  it('asScalarOrVector expands a scalar uniformly', () => {
    expect(asScalarOrVector(0.01)).toEqual([0.01, 0.01, 0.01]);
    expect(asScalarOrVector([1, 2, 3])).toEqual([1, 2, 3]);
    expect(asScalarOrVector('0.01')).toBeUndefined();
  });

  it('asBox fills a missing corner with zeros', () => {
    expect(asBox({ max: [1, 2, 3] })).toEqual({ min: [0, 0, 0], max: [1, 2, 3] });
    expect(asBox([1, 2, 3])).toBeUndefined();
  });

  it('asInteger rejects fractional values', () => {
    expect(asInteger(12)).toBe(12);
    expect(asInteger(1.5)).toBeUndefined();
  });

  it('isJsonObject excludes arrays and null', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
  });
});
