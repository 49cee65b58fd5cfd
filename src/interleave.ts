import { createSampleArray } from './converters';
import { SAMPLE_LAYOUTS } from './sample-layouts';
import type { SampleArrayMap, SampleConverter, SampleType } from './types';

/**
 * Checks the channel arrays handed to a write against the file's channel count.
 * A mismatch is a caller bug, so this throws instead of returning a result.
 */
export function assertChannelBuffers(
  channels: readonly ArrayLike<number>[],
  numChannels: number,
  frames: number
): void {
  if (channels.length !== numChannels) {
    throw new Error(`Expected ${numChannels} channel buffer(s), received ${channels.length}.`);
  }
  if (!Number.isInteger(frames) || frames < 0) {
    throw new RangeError(`Invalid frame count: ${frames}.`);
  }
  for (let ch = 0; ch < channels.length; ch++) {
    if (channels[ch].length < frames) {
      throw new RangeError(`Channel ${ch} holds ${channels[ch].length} samples, ${frames} requested.`);
    }
  }
}

/**
 * Converts `frames` samples from each channel and packs them frame-major,
 * channel-minor into a little-endian byte stream of the stored type.
 */
export function interleave(
  channels: readonly ArrayLike<number>[],
  frames: number,
  convert: SampleConverter,
  stored: SampleType
): Uint8Array {
  const layout = SAMPLE_LAYOUTS[stored];
  const step = layout.bytesPerSample;
  const numChannels = channels.length;
  const out = new Uint8Array(frames * numChannels * step);
  const view = new DataView(out.buffer);

  let ofs = 0;
  for (let i = 0; i < frames; ++i) {
    for (let ch = 0; ch < numChannels; ++ch, ofs += step) {
      layout.set(view, ofs, convert(channels[ch][i]));
    }
  }
  return out;
}

/**
 * Splits an interleaved byte stream of the stored type into one array per channel,
 * converting each sample to `target`. A trailing partial frame is dropped.
 */
export function deinterleave<T extends SampleType>(
  bytes: Uint8Array,
  numChannels: number,
  stored: SampleType,
  convert: SampleConverter,
  target: T
): SampleArrayMap[T][] {
  const layout = SAMPLE_LAYOUTS[stored];
  const step = layout.bytesPerSample;
  const samplesRead = Math.floor(bytes.length / step);
  const framesRead = Math.floor(samplesRead / numChannels);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const channelData = Array.from({ length: numChannels }, () => createSampleArray(target, framesRead));
  const outs: { [index: number]: number }[] = channelData;

  let ofs = 0;
  for (let i = 0; i < framesRead; ++i) {
    for (let ch = 0; ch < numChannels; ++ch, ofs += step) {
      outs[ch][i] = convert(layout.get(view, ofs));
    }
  }
  return channelData;
}
