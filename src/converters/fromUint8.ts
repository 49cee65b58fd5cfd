import { UINT8_FLOAT_SCALE, UINT8_MIDPOINT } from '../constants';

export function uint8ToFloat32(sample: number): number {
  return Math.fround((sample - UINT8_FLOAT_SCALE) / UINT8_FLOAT_SCALE);
}

export function uint8ToInt16(sample: number): number {
  return (sample - UINT8_MIDPOINT) * 256;
}

export function uint8ToInt24(sample: number): number {
  return (sample - UINT8_MIDPOINT) * 65536;
}

export function uint8ToInt32(sample: number): number {
  return (sample - UINT8_MIDPOINT) << 24;
}
