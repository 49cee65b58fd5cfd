import { INT32_FLOAT_SCALE, UINT8_MIDPOINT } from '../constants';

export function int32ToFloat32(sample: number): number {
  return Math.fround(sample / INT32_FLOAT_SCALE);
}

export function int32ToUint8(sample: number): number {
  return ((sample >> 24) + UINT8_MIDPOINT) & 0xff;
}

export function int32ToInt16(sample: number): number {
  return sample >> 16;
}

export function int32ToInt24(sample: number): number {
  return sample >> 8;
}
