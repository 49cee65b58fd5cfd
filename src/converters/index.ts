import { WavFormat, type SampleArray, type SampleArrayMap, type SampleConverter, type SampleType, type WavFormatDescriptor } from '../types';
import { float32ToInt16, float32ToInt24, float32ToInt32, float32ToUint8 } from './fromFloat32';
import { uint8ToFloat32, uint8ToInt16, uint8ToInt24, uint8ToInt32 } from './fromUint8';
import { int16ToFloat32, int16ToInt24, int16ToInt32, int16ToUint8 } from './fromInt16';
import { int24ToFloat32, int24ToInt16, int24ToInt32, int24ToUint8 } from './fromInt24';
import { int32ToFloat32, int32ToInt16, int32ToInt24, int32ToUint8 } from './fromInt32';

export * from './fromFloat32';
export * from './fromUint8';
export * from './fromInt16';
export * from './fromInt24';
export * from './fromInt32';

const identity: SampleConverter = (sample) => sample;

/**
 * Conversion table indexed as `CONVERTERS[from][to]`.
 */
export const CONVERTERS: Readonly<Record<SampleType, Readonly<Record<SampleType, SampleConverter>>>> = {
  float32: {
    float32: identity,
    uint8: float32ToUint8,
    int16: float32ToInt16,
    int24: float32ToInt24,
    int32: float32ToInt32,
  },
  uint8: {
    float32: uint8ToFloat32,
    uint8: identity,
    int16: uint8ToInt16,
    int24: uint8ToInt24,
    int32: uint8ToInt32,
  },
  int16: {
    float32: int16ToFloat32,
    uint8: int16ToUint8,
    int16: identity,
    int24: int16ToInt24,
    int32: int16ToInt32,
  },
  int24: {
    float32: int24ToFloat32,
    uint8: int24ToUint8,
    int16: int24ToInt16,
    int24: identity,
    int32: int24ToInt32,
  },
  int32: {
    float32: int32ToFloat32,
    uint8: int32ToUint8,
    int16: int32ToInt16,
    int24: int32ToInt24,
    int32: identity,
  },
};

export function getConverter(from: SampleType, to: SampleType): SampleConverter {
  return CONVERTERS[from][to];
}

export function isIdentityConverter(converter: SampleConverter): boolean {
  return converter === identity;
}

/**
 * The representation a descriptor's samples take on disk.
 */
export function storedSampleType(descriptor: Pick<WavFormatDescriptor, 'format' | 'bitDepth'>): SampleType {
  if (descriptor.format === WavFormat.FLOAT) return 'float32';
  switch (descriptor.bitDepth) {
    case 8:
      return 'uint8';
    case 16:
      return 'int16';
    case 24:
      return 'int24';
    case 32:
      return 'int32';
  }
}

type SampleArrayConstructors = { [K in SampleType]: new (length: number) => SampleArrayMap[K] };

const SAMPLE_ARRAY_CONSTRUCTORS: SampleArrayConstructors = {
  float32: Float32Array,
  uint8: Uint8Array,
  int16: Int16Array,
  int24: Int32Array,
  int32: Int32Array,
};

export function createSampleArray<T extends SampleType>(type: T, length: number): SampleArrayMap[T] {
  const Ctor: SampleArrayConstructors[T] = SAMPLE_ARRAY_CONSTRUCTORS[type];
  return new Ctor(length);
}

/**
 * Infers the representation of a typed array. An `Int32Array` is read as `int32`;
 * 24-bit input has to be named explicitly.
 */
export function sampleTypeOf(samples: SampleArray): SampleType {
  if (samples instanceof Float32Array) return 'float32';
  if (samples instanceof Uint8Array) return 'uint8';
  if (samples instanceof Int16Array) return 'int16';
  if (samples instanceof Int32Array) return 'int32';
  throw new TypeError(`Unsupported sample array type: ${Object.prototype.toString.call(samples)}`);
}
