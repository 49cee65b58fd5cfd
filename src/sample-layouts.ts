import type { SampleType } from './types';

/**
 * How one stored sample is laid out in the little-endian byte stream.
 */
export interface SampleLayout {
  bytesPerSample: number;
  get(view: DataView, offset: number): number;
  set(view: DataView, offset: number, value: number): void;
}

export const SAMPLE_LAYOUTS: Readonly<Record<SampleType, SampleLayout>> = {
  float32: {
    bytesPerSample: 4,
    get: (view, offset) => view.getFloat32(offset, true),
    set: (view, offset, value) => view.setFloat32(offset, value, true),
  },
  uint8: {
    bytesPerSample: 1,
    get: (view, offset) => view.getUint8(offset),
    set: (view, offset, value) => view.setUint8(offset, value),
  },
  int16: {
    bytesPerSample: 2,
    get: (view, offset) => view.getInt16(offset, true),
    set: (view, offset, value) => view.setInt16(offset, value, true),
  },
  int24: {
    bytesPerSample: 3,
    get: (view, offset) => {
      const v = (view.getUint8(offset + 2) << 16) | (view.getUint8(offset + 1) << 8) | view.getUint8(offset);
      // sign-extend bit 23
      return (v << 8) >> 8;
    },
    set: (view, offset, value) => {
      view.setUint8(offset, value & 0xff);
      view.setUint8(offset + 1, (value >> 8) & 0xff);
      view.setUint8(offset + 2, (value >> 16) & 0xff);
    },
  },
  int32: {
    bytesPerSample: 4,
    get: (view, offset) => view.getInt32(offset, true),
    set: (view, offset, value) => view.setInt32(offset, value, true),
  },
};

export function bytesPerFrame(type: SampleType, numChannels: number): number {
  return SAMPLE_LAYOUTS[type].bytesPerSample * numChannels;
}
