import { INT16_FLOAT_SCALE, INT24_FLOAT_SCALE, INT32_FLOAT_SCALE, UINT8_FLOAT_SCALE } from '../constants';

// `| 0`, `<< n` and `& 0xff` coerce through ToInt32, which truncates toward zero
// and wraps anything outside the target width.

export function float32ToUint8(sample: number): number {
  return (sample * UINT8_FLOAT_SCALE + UINT8_FLOAT_SCALE) & 0xff;
}

export function float32ToInt16(sample: number): number {
  return ((sample * INT16_FLOAT_SCALE) << 16) >> 16;
}

export function float32ToInt24(sample: number): number {
  return ((sample * INT24_FLOAT_SCALE) << 8) >> 8;
}

export function float32ToInt32(sample: number): number {
  return (sample * INT32_FLOAT_SCALE) | 0;
}
