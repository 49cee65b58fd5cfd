import { describe, expect, it } from 'vitest';
import {
  CONVERTERS,
  createSampleArray,
  float32ToInt16,
  float32ToInt24,
  float32ToInt32,
  float32ToUint8,
  getConverter,
  int16ToFloat32,
  int16ToInt24,
  int16ToInt32,
  int16ToUint8,
  int24ToFloat32,
  int24ToInt16,
  int24ToInt32,
  int24ToUint8,
  int32ToFloat32,
  int32ToInt16,
  int32ToInt24,
  int32ToUint8,
  isIdentityConverter,
  sampleTypeOf,
  storedSampleType,
  uint8ToFloat32,
  uint8ToInt16,
  uint8ToInt24,
  uint8ToInt32,
} from '../src/converters';
import { WavFormat, type SampleType, type WavBitDepth } from '../src/types';

const SAMPLE_TYPES: SampleType[] = ['float32', 'uint8', 'int16', 'int24', 'int32'];

describe('from float32', () => {
  it.each([
    [1, 255],
    [-1, 0],
    [0, 127],
    [0.5, 191],
  ])('float32ToUint8(%f) = %i', (input, expected) => {
    expect(float32ToUint8(input)).toBe(expected);
  });

  it.each([
    [1, 32767],
    [-1, -32767],
    [0.5, 16383],
    [0, 0],
  ])('float32ToInt16(%f) = %i', (input, expected) => {
    expect(float32ToInt16(input)).toBe(expected);
  });

  it('wraps out-of-range input instead of clipping', () => {
    expect(float32ToInt16(2)).toBe(-2);
  });

  it('scales to 24 and 32 bits', () => {
    expect(float32ToInt24(1)).toBe(8388607);
    expect(float32ToInt24(-1)).toBe(-8388607);
    expect(float32ToInt24(0.5)).toBe(4194303);
    expect(float32ToInt32(1)).toBe(2147483647);
    expect(float32ToInt32(-1)).toBe(-2147483647);
    expect(float32ToInt32(0.5)).toBe(1073741823);
  });
});

describe('from uint8', () => {
  it('maps the unsigned range onto [-1, 1]', () => {
    expect(uint8ToFloat32(255)).toBe(1);
    expect(uint8ToFloat32(0)).toBe(-1);
    expect(uint8ToFloat32(128)).toBe(Math.fround(0.5 / 127.5));
  });

  it('recenters on 128 before widening', () => {
    expect(uint8ToInt16(0)).toBe(-32768);
    expect(uint8ToInt16(128)).toBe(0);
    expect(uint8ToInt16(255)).toBe(32512);
    expect(uint8ToInt24(0)).toBe(-8388608);
    expect(uint8ToInt24(255)).toBe(8323072);
    expect(uint8ToInt32(0)).toBe(-2147483648);
    expect(uint8ToInt32(255)).toBe(2130706432);
  });
});

describe('from int16', () => {
  it('divides by the positive full scale', () => {
    expect(int16ToFloat32(32767)).toBe(1);
    expect(int16ToFloat32(-32767)).toBe(-1);
    expect(int16ToFloat32(-32768)).toBe(Math.fround(-32768 / 32767));
  });

  it.each([
    [-32768, 0],
    [32767, 255],
    [0, 128],
    [-1, 127],
    [255, 128],
  ])('int16ToUint8(%i) = %i', (input, expected) => {
    expect(int16ToUint8(input)).toBe(expected);
  });

  it('shifts into wider integers', () => {
    expect(int16ToInt24(1)).toBe(256);
    expect(int16ToInt24(-1)).toBe(-256);
    expect(int16ToInt32(-32768)).toBe(-2147483648);
    expect(int16ToInt32(32767)).toBe(2147418112);
  });
});

describe('from int24', () => {
  it('converts to every other representation', () => {
    expect(int24ToFloat32(8388607)).toBe(1);
    expect(int24ToFloat32(-8388607)).toBe(-1);
    expect(int24ToUint8(-8388608)).toBe(0);
    expect(int24ToUint8(8388607)).toBe(255);
    expect(int24ToInt16(8388607)).toBe(32767);
    expect(int24ToInt16(-8388608)).toBe(-32768);
    expect(int24ToInt32(8388607)).toBe(2147483392);
    expect(int24ToInt32(-1)).toBe(-256);
  });
});

describe('from int32', () => {
  it('converts to every other representation', () => {
    expect(int32ToFloat32(2147483647)).toBe(1);
    expect(int32ToUint8(-2147483648)).toBe(0);
    expect(int32ToUint8(2147483647)).toBe(255);
    expect(int32ToInt16(2147483647)).toBe(32767);
    expect(int32ToInt16(-2147483648)).toBe(-32768);
    expect(int32ToInt24(-2147483648)).toBe(-8388608);
    expect(int32ToInt24(256)).toBe(1);
  });
});

describe('CONVERTERS', () => {
  it('has an identity on the diagonal and a real converter elsewhere', () => {
    for (const from of SAMPLE_TYPES) {
      for (const to of SAMPLE_TYPES) {
        expect(isIdentityConverter(CONVERTERS[from][to])).toBe(from === to);
      }
    }
  });

  it('dispatches through getConverter', () => {
    expect(getConverter('int16', 'uint8')).toBe(int16ToUint8);
    expect(getConverter('float32', 'int24')(0.5)).toBe(4194303);
    expect(getConverter('int24', 'int24')(-5)).toBe(-5);
  });
});

describe('storedSampleType', () => {
  const cases: [WavFormat, WavBitDepth, SampleType][] = [
    [WavFormat.PCM, 8, 'uint8'],
    [WavFormat.PCM, 16, 'int16'],
    [WavFormat.PCM, 24, 'int24'],
    [WavFormat.PCM, 32, 'int32'],
    [WavFormat.FLOAT, 32, 'float32'],
  ];

  it.each(cases)('format %i at %i bits is stored as %s', (format, bitDepth, expected) => {
    expect(storedSampleType({ format, bitDepth })).toBe(expected);
  });
});

describe('sample arrays', () => {
  it('creates the typed array for each representation', () => {
    expect(createSampleArray('float32', 3)).toBeInstanceOf(Float32Array);
    expect(createSampleArray('uint8', 3)).toBeInstanceOf(Uint8Array);
    expect(createSampleArray('int16', 3)).toBeInstanceOf(Int16Array);
    expect(createSampleArray('int24', 3)).toBeInstanceOf(Int32Array);
    expect(createSampleArray('int32', 3).length).toBe(3);
  });

  it('infers the representation from the array type', () => {
    expect(sampleTypeOf(new Float32Array(1))).toBe('float32');
    expect(sampleTypeOf(new Uint8Array(1))).toBe('uint8');
    expect(sampleTypeOf(new Int16Array(1))).toBe('int16');
    expect(sampleTypeOf(new Int32Array(1))).toBe('int32');
  });
});
