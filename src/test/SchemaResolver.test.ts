import { describe, it, expect } from 'vitest';
import { SchemaError } from '../engine/potree/errors';
import {
  expandAlias,
  parseAttributeKind,
  parseComponentType,
  resolveSchema,
} from '../engine/potree/SchemaResolver';
import { recordStride } from '../engine/potree/types';

describe('resolveSchema', () => {
  it('applies defaults for absent optional fields', () => {
    const schema = resolveSchema({ pointAttributes: 'LAS' });
    expect(schema.pointCount).toBe(0);
    expect(schema.hierarchyStepSize).toBe(5);
    expect(schema.octreeDir).toBe('octree');
    expect(schema.bboxMin).toEqual([0, 0, 0]);
    expect(schema.bboxMax).toEqual([0, 0, 0]);
    expect(schema.scale).toEqual([0.001, 0.001, 0.001]);
    expect(schema.offset).toEqual([0, 0, 0]);
  });

  it('reads point count from points, then pointCount', () => {
    expect(resolveSchema({ points: 10, pointCount: 20, pointAttributes: 'LAS' }).pointCount).toBe(10);
    expect(resolveSchema({ pointCount: 20, pointAttributes: 'LAS' }).pointCount).toBe(20);
  });

  it('expands a scalar scale to a uniform vector', () => {
    const schema = resolveSchema({ scale: 0.01, pointAttributes: 'LAS' });
    expect(schema.scale).toEqual([0.01, 0.01, 0.01]);
  });

  it('reads scale and offset component-wise from arrays and objects', () => {
    const schema = resolveSchema({
      scale: [0.1, 0.2, 0.3],
      offset: { x: 1, y: 2, z: 3 },
      pointAttributes: 'LAS',
    });
    expect(schema.scale).toEqual([0.1, 0.2, 0.3]);
    expect(schema.offset).toEqual([1, 2, 3]);
  });

  it('prefers boundingBox over tightBoundingBox', () => {
    const schema = resolveSchema({
      boundingBox: { min: [1, 2, 3], max: [4, 5, 6] },
      tightBoundingBox: { min: [9, 9, 9], max: [9, 9, 9] },
      pointAttributes: 'LAS',
    });
    expect(schema.bboxMin).toEqual([1, 2, 3]);
    expect(schema.bboxMax).toEqual([4, 5, 6]);
  });

  it('falls back to tightBoundingBox and defaults offset to its min', () => {
    const schema = resolveSchema({
      tightBoundingBox: { min: { x: -5, y: 10, z: 0.5 }, max: { x: 5, y: 20, z: 1.5 } },
      pointAttributes: 'LAS',
    });
    expect(schema.bboxMin).toEqual([-5, 10, 0.5]);
    expect(schema.bboxMax).toEqual([5, 20, 1.5]);
    expect(schema.offset).toEqual([-5, 10, 0.5]);
  });

  it('falls back to tightBoundingBox when boundingBox is not a box', () => {
    const schema = resolveSchema({
      boundingBox: 5,
      tightBoundingBox: { min: [1, 2, 3], max: [4, 5, 6] },
      pointAttributes: 'LAS',
    });
    expect(schema.bboxMin).toEqual([1, 2, 3]);
    expect(schema.bboxMax).toEqual([4, 5, 6]);
    expect(schema.offset).toEqual([1, 2, 3]);
  });

  it('reads octreeDir and hierarchyStepSize', () => {
    const schema = resolveSchema({ octreeDirPath: 'data', hierarchyStepSize: 4, pointAttributes: 'LAS' });
    expect(schema.octreeDir).toBe('data');
    expect(schema.hierarchyStepSize).toBe(4);
  });

  it('expands the LASRGB alias to position, rgb, intensity, classification', () => {
    const schema = resolveSchema({ pointAttributes: 'LASRGB' });
    expect(schema.attributes).toEqual([
      { kind: 'position', componentType: 'float32', sizeBytes: 12, elementCount: 3 },
      { kind: 'rgb', componentType: 'uint8', sizeBytes: 3, elementCount: 3 },
      { kind: 'intensity', componentType: 'uint16', sizeBytes: 2, elementCount: 1 },
      { kind: 'classification', componentType: 'uint8', sizeBytes: 1, elementCount: 1 },
    ]);
    expect(recordStride(schema)).toBe(18);
  });

  it('matches aliases case-insensitively', () => {
    expect(resolveSchema({ pointAttributes: 'lasrgb' }).attributes).toHaveLength(4);
    expect(resolveSchema({ pointAttributes: 'rgb' }).attributes.map((a) => a.kind)).toEqual(['position', 'rgb']);
    expect(resolveSchema({ pointAttributes: 'XYZ' }).attributes.map((a) => a.kind)).toEqual(['position']);
  });

  it('looks for pointAttributes, then attributes, then schema', () => {
    const fromAttributes = resolveSchema({ attributes: [{ name: 'POSITION_CARTESIAN' }], schema: 'LASRGB' });
    expect(fromAttributes.attributes).toHaveLength(1);
    const fromSchema = resolveSchema({ schema: 'RGB' });
    expect(fromSchema.attributes).toHaveLength(2);
  });

  it('parses descriptor arrays with per-kind defaults', () => {
    const schema = resolveSchema({
      pointAttributes: [
        { name: 'POSITION_CARTESIAN' },
        { name: 'RGBA_PACKED' },
        { name: 'INTENSITY', type: 'uint16' },
        { name: 'CLASSIFICATION' },
        { name: 'FILLER' },
      ],
    });
    expect(schema.attributes).toEqual([
      { kind: 'position', componentType: 'float32', sizeBytes: 12, elementCount: 3 },
      { kind: 'packedColor', componentType: 'uint32', sizeBytes: 4, elementCount: 4 },
      { kind: 'intensity', componentType: 'uint16', sizeBytes: 2, elementCount: 1 },
      { kind: 'classification', componentType: 'uint32', sizeBytes: 1, elementCount: 1 },
      { kind: 'unknown', componentType: 'float32', sizeBytes: 4, elementCount: 1 },
    ]);
    expect(recordStride(schema)).toBe(23);
  });

  it('parses Potree 2 style descriptors', () => {
    const schema = resolveSchema({
      points: 3,
      scale: [0.001, 0.001, 0.001],
      offset: [10, 20, 30],
      attributes: [
        { name: 'position', size: 12, numElements: 3, type: 'int32' },
        { name: 'intensity', size: 2, numElements: 1, type: 'uint16' },
        { name: 'return number', size: 1, numElements: 1, type: 'uint8' },
        { name: 'number of returns', size: 1, numElements: 1, type: 'uint8' },
        { name: 'classification', size: 1, numElements: 1, type: 'uint8' },
        { name: 'gps-time', size: 8, numElements: 1, type: 'double' },
        { name: 'rgb', size: 6, numElements: 3, type: 'uint16' },
      ],
    });
    expect(schema.attributes.map((a) => [a.kind, a.componentType])).toEqual([
      ['position', 'int32'],
      ['intensity', 'uint16'],
      ['returnNumber', 'uint8'],
      ['numberOfReturns', 'uint8'],
      ['classification', 'uint8'],
      ['gpsTime', 'float64'],
      ['rgb', 'uint16'],
    ]);
    expect(recordStride(schema)).toBe(31);
  });

  it('fails on a missing attribute list', () => {
    expect(() => resolveSchema({ points: 1 })).toThrow(SchemaError);
    expect(() => resolveSchema({ points: 1 })).toThrow('missing point attribute schema');
  });

  it('fails on an unsupported attribute list shape instead of defaulting', () => {
    expect(() => resolveSchema({ pointAttributes: 42 })).toThrow(SchemaError);
    expect(() => resolveSchema({ pointAttributes: { name: 'POSITION' } })).toThrow(SchemaError);
  });

  it('fails on an empty list, non-object entries and non-positive sizes', () => {
    expect(() => resolveSchema({ pointAttributes: [] })).toThrow(SchemaError);
    expect(() => resolveSchema({ pointAttributes: ['POSITION'] })).toThrow('Attribute entry 0 is not an object');
    expect(() => resolveSchema({ pointAttributes: [{ name: 'RGB', size: 0 }] })).toThrow(SchemaError);
  });

  it('fails when the document is not an object', () => {
    expect(() => resolveSchema([1, 2, 3])).toThrow(SchemaError);
    expect(() => resolveSchema(null)).toThrow(SchemaError);
  });
});

describe('parseAttributeKind', () => {
  it('resolves names by priority', () => {
    expect(parseAttributeKind('POSITION_CARTESIAN')).toBe('position');
    expect(parseAttributeKind('COLOR_PACKED')).toBe('packedColor');
    expect(parseAttributeKind('RGB')).toBe('rgb');
    expect(parseAttributeKind('COLOR_FLOATS_1')).toBe('rgb');
    expect(parseAttributeKind('intensity')).toBe('intensity');
    expect(parseAttributeKind('CLASSIFICATION')).toBe('classification');
    expect(parseAttributeKind('NORMAL_OCT16')).toBe('normal');
    expect(parseAttributeKind('GPSTIME')).toBe('gpsTime');
    expect(parseAttributeKind('POINT_SOURCE_ID')).toBe('pointSourceId');
    expect(parseAttributeKind('SOURCE_ID')).toBe('pointSourceId');
    expect(parseAttributeKind('SPACING')).toBe('unknown');
    expect(parseAttributeKind(undefined)).toBe('unknown');
  });

  it('distinguishes NUMBER_OF_RETURNS from RETURN_NUMBER', () => {
    expect(parseAttributeKind('NUMBER_OF_RETURNS')).toBe('numberOfReturns');
    expect(parseAttributeKind('RETURN_NUMBER')).toBe('returnNumber');
  });
});

describe('parseComponentType', () => {
  it('matches tokens case-insensitively', () => {
    expect(parseComponentType('FLOAT', 4, 1)).toBe('float32');
    expect(parseComponentType('double', 8, 1)).toBe('float64');
    expect(parseComponentType('DATA_TYPE_UINT8', 1, 1)).toBe('uint8');
    expect(parseComponentType('int8', 1, 1)).toBe('int8');
    expect(parseComponentType('UINT32', 4, 1)).toBe('uint32');
    expect(parseComponentType('int16', 2, 1)).toBe('int16');
  });

  it('keeps sized float tokens apart', () => {
    expect(parseComponentType('float64', 8, 1)).toBe('float64');
    expect(parseComponentType('FLOAT32', 4, 1)).toBe('float32');
  });

  it('infers from size when the token is absent or unknown', () => {
    expect(parseComponentType(undefined, 12, 3)).toBe('float32');
    expect(parseComponentType('bogus', 3, 3)).toBe('uint32');
  });
});

describe('expandAlias', () => {
  it('always starts with a float position', () => {
    expect(expandAlias('')).toEqual([
      { kind: 'position', componentType: 'float32', sizeBytes: 12, elementCount: 3 },
    ]);
  });
});
