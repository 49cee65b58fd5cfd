import { INT16_FLOAT_SCALE, UINT8_MIDPOINT } from '../constants';

export function int16ToFloat32(sample: number): number {
  return Math.fround(sample / INT16_FLOAT_SCALE);
}

/** Keeps the top byte only; the low byte is discarded rather than rounded. */
export function int16ToUint8(sample: number): number {
  return ((sample >> 8) + UINT8_MIDPOINT) & 0xff;
}

export function int16ToInt24(sample: number): number {
  return sample << 8;
}

export function int16ToInt32(sample: number): number {
  return sample << 16;
}
