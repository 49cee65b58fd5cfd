import { INT24_FLOAT_SCALE, UINT8_MIDPOINT } from '../constants';

export function int24ToFloat32(sample: number): number {
  return Math.fround(sample / INT24_FLOAT_SCALE);
}

export function int24ToUint8(sample: number): number {
  return ((sample >> 16) + UINT8_MIDPOINT) & 0xff;
}

export function int24ToInt16(sample: number): number {
  return sample >> 8;
}

export function int24ToInt32(sample: number): number {
  return sample << 8;
}
